// Length-prefixed framing for TCP streams.
//
// Every frame is prefixed with a 4-byte little-endian length header.

import type { Duplex } from "node:stream";

import { TransportError } from "./errors.ts";

/** Default upper bound for an inbound frame: 16 MiB. */
export const DEFAULT_MAX_FRAME_LENGTH = 16 * 1024 * 1024;

export interface FramingOptions {
  /**
   * Largest frame accepted from the peer. A larger length header is a
   * framing error and closes the socket.
   * Default: 16 MiB
   */
  maxFrameLength?: number;
}

export type FrameListener = (frame: Uint8Array) => void;

/** Receives `null` for an orderly close, the cause otherwise. */
export type CloseListener = (error: TransportError | null) => void;

/**
 * A length-prefixed connection over a byte stream.
 *
 * Reassembles frames from arbitrarily split chunks and hands each complete
 * frame to the `onFrame` listeners. Works on any Duplex; in practice a
 * `net.Socket`.
 */
export class LengthPrefixedFramed {
  private buf: Buffer = Buffer.alloc(0);
  private closed = false;
  private error: TransportError | null = null;
  private readonly maxFrameLength: number;
  private readonly frameListeners = new Set<FrameListener>();
  private readonly closeListeners = new Set<CloseListener>();

  constructor(
    private readonly socket: Duplex,
    options: FramingOptions = {},
  ) {
    this.maxFrameLength = options.maxFrameLength ?? DEFAULT_MAX_FRAME_LENGTH;

    socket.on("data", (chunk: Buffer) => {
      if (this.closed) return;
      this.buf = this.buf.length === 0 ? chunk : Buffer.concat([this.buf, chunk]);
      this.processBuffer();
    });

    socket.on("error", (err: Error) => {
      if (!this.error) this.error = TransportError.io(err.message);
    });

    socket.on("close", () => {
      this.finish();
    });
  }

  private processBuffer(): void {
    while (this.buf.length >= 4) {
      const frameLen = this.buf.readUInt32LE(0);
      if (frameLen > this.maxFrameLength) {
        this.error = TransportError.framing(
          `frame of ${frameLen} bytes exceeds limit of ${this.maxFrameLength}`,
        );
        this.buf = Buffer.alloc(0);
        this.socket.destroy();
        return;
      }

      const needed = 4 + frameLen;
      if (this.buf.length < needed) break;

      const frame = new Uint8Array(this.buf.subarray(4, needed));
      this.buf = this.buf.subarray(needed);
      for (const listener of this.frameListeners) {
        listener(frame);
      }
      if (this.closed) return;
    }
  }

  private finish(): void {
    if (this.closed) return;
    this.closed = true;
    const error = this.error;
    for (const listener of this.closeListeners) {
      listener(error);
    }
    this.frameListeners.clear();
    this.closeListeners.clear();
  }

  /** Whether the underlying stream has closed. */
  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Subscribe to complete frames.
   *
   * @returns Function removing the listener
   */
  onFrame(listener: FrameListener): () => void {
    this.frameListeners.add(listener);
    return () => this.frameListeners.delete(listener);
  }

  /**
   * Subscribe to the end of the connection. Runs once.
   *
   * @returns Function removing the listener
   */
  onClose(listener: CloseListener): () => void {
    this.closeListeners.add(listener);
    return () => this.closeListeners.delete(listener);
  }

  /**
   * Send one frame: 4-byte little-endian length, then the payload.
   */
  send(payload: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.closed) {
        reject(TransportError.closed());
        return;
      }
      if (payload.length > 0xffff_ffff) {
        reject(TransportError.framing("frame too large for u32 length prefix"));
        return;
      }

      const framed = Buffer.alloc(4 + payload.length);
      framed.writeUInt32LE(payload.length, 0);
      framed.set(payload, 4);

      this.socket.write(framed, (err) => {
        if (err) reject(TransportError.io(err.message));
        else resolve();
      });
    });
  }

  /** Close the connection. Close listeners run once the stream reports it. */
  close(): void {
    this.socket.destroy();
  }
}
