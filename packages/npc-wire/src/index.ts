// NPC wire protocol types and utilities
//
// Message model, error taxonomy and the JSON codec shared by the engine
// and every transport.

// ============================================================================
// Error Types
// ============================================================================

export { ErrorReason, WireError, isErrorReason } from "./errors.ts";

// ============================================================================
// Wire Types
// ============================================================================

export type {
  CallId,
  EmitMessage,
  DeliverMessage,
  NotifyMessage,
  AckMessage,
  CancelMessage,
  Message,
} from "./types.ts";

export {
  MIN_CALL_ID,
  MAX_CALL_ID,
  MessageKind,
  kindName,
  messageEmit,
  messageDeliver,
  messageNotify,
  messageAck,
  messageCancel,
  formatMessage,
} from "./types.ts";

// ============================================================================
// Wire Schemas
// ============================================================================

export {
  CallIdSchema,
  EmitMessageSchema,
  DeliverMessageSchema,
  NotifyMessageSchema,
  AckMessageSchema,
  CancelMessageSchema,
  MessageSchema,
} from "./schemas.ts";

// ============================================================================
// Wire Codec
// ============================================================================

export { parseMessage, encodeMessage, decodeMessage, encodeFrame, decodeFrame } from "./codec.ts";
