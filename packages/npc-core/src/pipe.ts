// In-process relay between two engines.

import type { Message } from "@npc-rpc/wire";

import type { Endpoint } from "./transport.ts";

export interface PipeOptions {
  /**
   * Deliver each message from a microtask instead of synchronously inside
   * the sender's call. Closer to a real transport: a handler that replies
   * right away no longer completes the call before `deliver` returns.
   * Default: false
   */
  deferred?: boolean;
}

/**
 * Connect two endpoints back to back.
 *
 * Each side's send function feeds the other side's `receive`. Messages
 * still queued when the pipe is closed are dropped.
 *
 * Usage:
 * ```typescript
 * const client = new Npc();
 * const server = new Npc();
 * const unpipe = pipe(client, server);
 *
 * server.on("echo", (param, _notify, reply) => {
 *   reply(param);
 *   return nonCancellable();
 * });
 * client.deliver("echo", "hi", 0, (param) => console.log(param));
 *
 * unpipe(); // both sides disconnect
 * ```
 *
 * @returns Function closing the pipe; disconnects both sides with `reason`.
 */
export function pipe(
  a: Endpoint,
  b: Endpoint,
  options: PipeOptions = {},
): (reason?: unknown) => void {
  let open = true;

  const forward = (to: Endpoint) =>
    options.deferred
      ? (message: Message) => {
          queueMicrotask(() => {
            if (open) to.receive(message);
          });
        }
      : (message: Message) => {
          if (open) to.receive(message);
        };

  a.connect(forward(b));
  b.connect(forward(a));

  return (reason) => {
    if (!open) return;
    open = false;
    a.disconnect(reason);
    b.disconnect(reason);
  };
}
