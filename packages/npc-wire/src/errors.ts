// Error taxonomy for NPC calls and wire decoding.

/**
 * Error payloads produced by the protocol itself.
 *
 * Every call error reaches the caller as the `error` argument of its
 * terminal reply; application handlers may reply with any other payload.
 */
export const ErrorReason = {
  /** Callee has no handler for the delivered method. */
  UNIMPLEMENTED: "unimplemented",
  /** Caller's timer expired before the Ack arrived. */
  TIMEDOUT: "timedout",
  /** Caller invoked the cancel function. */
  CANCELLED: "cancelled",
  /** Default reason of an engine-wide teardown. */
  DISCONNECTED: "disconnected",
  /** Callee handler threw while being invoked. */
  INTERNAL: "internal",
} as const;

export type ErrorReason = (typeof ErrorReason)[keyof typeof ErrorReason];

const REASONS: ReadonlySet<unknown> = new Set<unknown>(Object.values(ErrorReason));

/** Check whether an error payload is one of the protocol's own reasons. */
export function isErrorReason(error: unknown): error is ErrorReason {
  return REASONS.has(error);
}

/** Error decoding a wire message. */
export class WireError extends Error {
  constructor(
    public kind: "syntax" | "schema",
    message: string,
    public issues: string[] = [],
  ) {
    super(message);
    this.name = "WireError";
  }

  static syntax(message: string): WireError {
    return new WireError("syntax", message);
  }

  static schema(issues: string[]): WireError {
    return new WireError("schema", `invalid message: ${issues.join("; ")}`, issues);
  }
}
