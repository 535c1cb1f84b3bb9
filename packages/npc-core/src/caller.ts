// Promise-based calls on top of an engine.
//
// `deliver` reports through callbacks; most application code wants a
// promise and an AbortSignal instead. NpcCaller adapts one to the other
// without adding any state to the engine.

import { ErrorReason } from "@npc-rpc/wire";

import type { Npc } from "./engine.ts";
import type { Notify } from "./types.ts";

/**
 * Error a call rejects with when its terminal reply carries an error.
 */
export class NpcCallError extends Error {
  constructor(
    /** Method that was called. */
    public readonly method: string,
    /** Error payload, either an `ErrorReason` or the handler's own error. */
    public readonly reason: unknown,
  ) {
    super(`${method} failed: ${describeReason(reason)}`);
    this.name = "NpcCallError";
  }

  /** The peer has no handler for the method. */
  isUnimplemented(): boolean {
    return this.reason === ErrorReason.UNIMPLEMENTED;
  }

  /** The call's timer expired. */
  isTimeout(): boolean {
    return this.reason === ErrorReason.TIMEDOUT;
  }

  /** The call was cancelled locally (explicitly or through its signal). */
  isCancelled(): boolean {
    return this.reason === ErrorReason.CANCELLED;
  }

  /** The engine was disconnected with the default reason. */
  isDisconnected(): boolean {
    return this.reason === ErrorReason.DISCONNECTED;
  }
}

function describeReason(reason: unknown): string {
  if (typeof reason === "string") return reason;
  if (reason instanceof Error) return reason.message;
  try {
    return JSON.stringify(reason) ?? String(reason);
  } catch {
    return String(reason);
  }
}

/** Per-call options. */
export interface CallOptions {
  /** Timeout in milliseconds; 0 disables it. Defaults to the caller's default. */
  timeoutMs?: number;
  /** Progress callback. */
  onNotify?: Notify;
  /** Aborting the signal cancels the call. */
  signal?: AbortSignal;
}

/** Caller-wide defaults. */
export interface CallerConfig {
  /** Default timeout in milliseconds. Default: 30000 */
  timeoutMs?: number;
}

/**
 * Promise-returning view of an engine's `deliver`.
 *
 * @example
 * ```typescript
 * const caller = new NpcCaller(npc, { timeoutMs: 5000 });
 * try {
 *   const sum = await caller.call("add", [1, 2]);
 * } catch (e) {
 *   if (e instanceof NpcCallError && e.isUnimplemented()) { ... }
 * }
 * ```
 */
export class NpcCaller {
  private readonly timeoutMs: number;

  constructor(
    private readonly npc: Npc,
    config: CallerConfig = {},
  ) {
    this.timeoutMs = config.timeoutMs ?? 30000;
  }

  /**
   * Call `method` and wait for its result.
   *
   * Resolves with the Ack's param; rejects with NpcCallError when the
   * terminal reply has a non-null error.
   */
  call(method: string, param?: unknown, options: CallOptions = {}): Promise<unknown> {
    const { signal, onNotify } = options;
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    return new Promise<unknown>((resolve, reject) => {
      let settled = false;
      let onAbort: (() => void) | undefined;

      const cancel = this.npc.deliver(
        method,
        param,
        timeoutMs,
        (result, error) => {
          settled = true;
          if (onAbort) signal?.removeEventListener("abort", onAbort);
          if (error === undefined || error === null) {
            resolve(result);
          } else {
            reject(new NpcCallError(method, error));
          }
        },
        onNotify,
      );

      if (!signal || settled) return;
      if (signal.aborted) {
        cancel();
        return;
      }
      onAbort = () => cancel();
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }

  /** Fire-and-forget call. */
  emit(method: string, param?: unknown): void {
    this.npc.emit(method, param);
  }
}
