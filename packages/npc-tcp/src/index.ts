// @npc-rpc/tcp - TCP transport for NPC engines (Node.js only)
//
// Provides TCP-specific I/O: socket framing, engine attachment, client and
// server helpers.

export {
  LengthPrefixedFramed,
  DEFAULT_MAX_FRAME_LENGTH,
  type FramingOptions,
  type FrameListener,
  type CloseListener,
} from "./framing.ts";
export { TransportError, type TransportErrorKind } from "./errors.ts";
export {
  attachSocket,
  connectTcp,
  listenTcp,
  type AttachSocketOptions,
  type Detach,
  type TcpConnectOptions,
  type TcpListenOptions,
} from "./transport.ts";
