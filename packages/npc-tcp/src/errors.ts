// Byte-stream transport errors.

export type TransportErrorKind = "io" | "closed" | "framing";

/**
 * Failure of the TCP transport itself. The engine never sees these: a
 * failed connection reaches it as a disconnect.
 */
export class TransportError extends Error {
  constructor(
    public readonly kind: TransportErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "TransportError";
  }

  static io(message: string): TransportError {
    return new TransportError("io", message);
  }

  static closed(): TransportError {
    return new TransportError("closed", "connection closed");
  }

  static framing(message: string): TransportError {
    return new TransportError("framing", message);
  }
}
