// Callback types shared by the engine, its tables and the transports.

/** Aborts a delivery, or stops interruptible handler work. */
export type Cancel = () => void;

/** Progress callback. */
export type Notify = (param?: unknown) => void;

/**
 * Terminal callback.
 *
 * `error` is `null`/`undefined` on success, otherwise the error payload
 * (an `ErrorReason` or whatever the handler replied with).
 */
export type Reply = (param?: unknown, error?: unknown) => void;

/**
 * Work a handler started, as seen by the engine.
 *
 * `cancellable` work is interrupted by an inbound Cancel or a disconnect;
 * `none` means there is nothing to interrupt.
 */
export type Cancellable = { kind: "cancellable"; cancel: Cancel } | { kind: "none" };

/**
 * Application handler for a method.
 *
 * Calls `notify` zero or more times, then `reply` once. Extra calls after
 * the first reply are ignored.
 */
export type Handler = (param: unknown, notify: Notify, reply: Reply) => Cancellable;
