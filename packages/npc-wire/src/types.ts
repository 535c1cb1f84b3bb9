// NPC wire protocol types.
//
// A message is a small record tagged with a numeric kind. Payloads
// (`param`, `error`) are opaque to the protocol and passed through as-is.

// ============================================================================
// Call Identifiers
// ============================================================================

/** Smallest int32. Reserved: allocators never hand it out. */
export const MIN_CALL_ID = -2147483648;

/** Largest int32. The allocator wraps to `MIN_CALL_ID + 1` after it. */
export const MAX_CALL_ID = 2147483647;

/** Correlation key binding a Deliver to its Notify/Ack/Cancel traffic. */
export type CallId = number;

// ============================================================================
// Message Kinds
// ============================================================================

/**
 * Wire discriminant values for message kinds.
 */
export const MessageKind = {
  Emit: 0,
  Deliver: 1,
  Notify: 2,
  Ack: 3,
  Cancel: 4,
} as const;

export type MessageKind = (typeof MessageKind)[keyof typeof MessageKind];

const KIND_NAMES: Record<MessageKind, string> = {
  [MessageKind.Emit]: "Emit",
  [MessageKind.Deliver]: "Deliver",
  [MessageKind.Notify]: "Notify",
  [MessageKind.Ack]: "Ack",
  [MessageKind.Cancel]: "Cancel",
};

/** Human-readable name of a message kind. */
export function kindName(kind: MessageKind): string {
  return KIND_NAMES[kind];
}

// ============================================================================
// Messages
// ============================================================================

/**
 * One-way call (discriminant = 0).
 *
 * The id is allocated by the sender but nothing correlates on it.
 */
export interface EmitMessage {
  kind: typeof MessageKind.Emit;
  id?: CallId;
  method: string;
  param?: unknown;
}

/**
 * Correlated call (discriminant = 1).
 * Answered by zero or more Notify and exactly one Ack.
 */
export interface DeliverMessage {
  kind: typeof MessageKind.Deliver;
  id: CallId;
  method: string;
  param?: unknown;
}

/**
 * Progress update for an outstanding Deliver (discriminant = 2).
 */
export interface NotifyMessage {
  kind: typeof MessageKind.Notify;
  id: CallId;
  param?: unknown;
}

/**
 * Terminal response to a Deliver (discriminant = 3).
 *
 * A non-null `error` means failure; otherwise `param` is the result.
 */
export interface AckMessage {
  kind: typeof MessageKind.Ack;
  id: CallId;
  param?: unknown;
  error?: unknown;
}

/**
 * Request to abort an outstanding Deliver (discriminant = 4).
 */
export interface CancelMessage {
  kind: typeof MessageKind.Cancel;
  id: CallId;
}

/** Protocol message. */
export type Message = EmitMessage | DeliverMessage | NotifyMessage | AckMessage | CancelMessage;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Create an Emit message.
 */
export function messageEmit(method: string, param?: unknown, id?: CallId): EmitMessage {
  const message: EmitMessage =
    id === undefined ? { kind: MessageKind.Emit, method } : { kind: MessageKind.Emit, id, method };
  if (param !== undefined) message.param = param;
  return message;
}

/**
 * Create a Deliver message.
 */
export function messageDeliver(id: CallId, method: string, param?: unknown): DeliverMessage {
  const message: DeliverMessage = { kind: MessageKind.Deliver, id, method };
  if (param !== undefined) message.param = param;
  return message;
}

/**
 * Create a Notify message.
 */
export function messageNotify(id: CallId, param?: unknown): NotifyMessage {
  const message: NotifyMessage = { kind: MessageKind.Notify, id };
  if (param !== undefined) message.param = param;
  return message;
}

/**
 * Create an Ack message. `null` and `undefined` error both mean success.
 */
export function messageAck(id: CallId, param?: unknown, error?: unknown): AckMessage {
  const message: AckMessage = { kind: MessageKind.Ack, id };
  if (param !== undefined && param !== null) message.param = param;
  if (error !== undefined && error !== null) message.error = error;
  return message;
}

/**
 * Create a Cancel message.
 */
export function messageCancel(id: CallId): CancelMessage {
  return { kind: MessageKind.Cancel, id };
}

/**
 * Render a message for diagnostics, e.g. `{kind=Ack, id=7, error=unimplemented}`.
 */
export function formatMessage(message: Message): string {
  const parts = [`kind=${kindName(message.kind)}`];
  if (message.id !== undefined) parts.push(`id=${message.id}`);
  if ("method" in message) parts.push(`method=${message.method}`);
  if ("param" in message && message.param !== undefined) {
    parts.push(`param=${formatPayload(message.param)}`);
  }
  if ("error" in message && message.error !== undefined) {
    parts.push(`error=${formatPayload(message.error)}`);
  }
  return `{${parts.join(", ")}}`;
}

function formatPayload(value: unknown): string {
  if (typeof value === "string") return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
