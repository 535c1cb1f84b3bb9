// Constructors for the value a handler returns.

import type { Cancel, Cancellable } from "./types.ts";

const NONE: Cancellable = Object.freeze<Cancellable>({ kind: "none" });

/**
 * Mark handler work as interruptible.
 *
 * @example
 * ```typescript
 * npc.on("download", (param, notify, reply) => {
 *   const job = startDownload(param, notify, reply);
 *   return cancellable(() => job.abort());
 * });
 * ```
 */
export function cancellable(cancel: Cancel): Cancellable {
  return { kind: "cancellable", cancel };
}

/** Mark handler work as not interruptible. */
export function nonCancellable(): Cancellable {
  return NONE;
}

/** Check whether handler work can be interrupted. */
export function isCancellable(
  work: Cancellable,
): work is Extract<Cancellable, { kind: "cancellable" }> {
  return work.kind === "cancellable";
}
