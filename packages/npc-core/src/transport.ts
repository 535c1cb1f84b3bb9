/**
 * Transport boundary.
 *
 * The engine never touches bytes or sockets. A transport binding installs a
 * send function with `connect`, feeds every inbound message to `receive` in
 * arrival order, and calls `disconnect` when the channel goes away.
 *
 * Bindings:
 * - pipe (this package) for two engines in one process
 * - attachSocket (npc-tcp) for length-prefixed byte streams
 * - attachWebSocket / ReconnectingWsClient (npc-ws) for WebSocket
 * - attachPort (npc-port) for MessagePort
 */

import type { Message } from "@npc-rpc/wire";

/**
 * Hands one outbound message to the peer.
 *
 * Delivery failures are not reported back to the engine.
 */
export type Send = (message: Message) => void;

/**
 * What a transport binding drives: the engine's connection lifecycle and
 * its inbound entry point.
 */
export interface Endpoint {
  /** Install the send function (tearing down any previous connection). */
  connect(send: Send): void;

  /** Fail every pending call with `reason` and stop sending. */
  disconnect(reason?: unknown): void;

  /** Dispatch one inbound message. */
  receive(message: Message): void;
}
