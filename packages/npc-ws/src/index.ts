// WebSocket transport for NPC engines.
//
// WebSocket provides message framing: one WebSocket message per NPC message,
// JSON text.

export { attachWebSocket, WS_OPEN, type WebSocketLike } from "./transport.ts";
export {
  ReconnectingWsClient,
  createReconnectingClient,
  type ReconnectingClientConfig,
  type ConnectionState,
  type BackoffConfig,
  ClientClosedError,
  ReconnectFailedError,
} from "./reconnecting.ts";
