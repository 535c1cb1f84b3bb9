// WebSocket transport for NPC engines.
//
// Each WebSocket message carries one NPC message as JSON text.

import {
  type Endpoint,
  type Message,
  ErrorReason,
  WireError,
  decodeMessage,
  encodeMessage,
  logger,
} from "@npc-rpc/core";

const log = logger("ws");

/** `readyState` of an open socket. */
export const WS_OPEN = 1;

/**
 * The part of a WebSocket the transport uses.
 *
 * The browser `WebSocket` and the `ws` package both satisfy it.
 */
export interface WebSocketLike {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  addEventListener(type: "open" | "close" | "error", listener: () => void): void;
  addEventListener(type: "message", listener: (event: { data: unknown }) => void): void;
  removeEventListener(type: "open" | "close" | "error", listener: () => void): void;
  removeEventListener(type: "message", listener: (event: { data: unknown }) => void): void;
}

const textDecoder = new TextDecoder();

function messageText(data: unknown): string | null {
  if (typeof data === "string") return data;
  if (data instanceof ArrayBuffer) return textDecoder.decode(data);
  if (ArrayBuffer.isView(data)) {
    return textDecoder.decode(new Uint8Array(data.buffer, data.byteOffset, data.byteLength));
  }
  return null;
}

/**
 * Run an engine over a WebSocket.
 *
 * The engine is connected as soon as the socket is open (immediately if it
 * already is) and disconnected with `"disconnected"` when the socket closes
 * or fails. Messages that fail to decode are logged and dropped.
 *
 * @returns Function detaching the engine; disconnects it with `reason`.
 * The socket itself is left open.
 */
export function attachWebSocket(npc: Endpoint, ws: WebSocketLike): (reason?: unknown) => void {
  let attached = true;

  const onOpen = () => {
    npc.connect((message) => {
      ws.send(encodeMessage(message));
    });
  };

  const onMessage = (event: { data: unknown }) => {
    const text = messageText(event.data);
    if (text === null) {
      log("dropped message of unsupported type");
      return;
    }
    let message: Message;
    try {
      message = decodeMessage(text);
    } catch (e) {
      if (!(e instanceof WireError)) throw e;
      log("dropped message: %s", e.message);
      return;
    }
    npc.receive(message);
  };

  const stop = () => {
    attached = false;
    ws.removeEventListener("open", onOpen);
    ws.removeEventListener("message", onMessage);
    ws.removeEventListener("close", onClose);
    ws.removeEventListener("error", onClose);
  };

  const onClose = () => {
    if (!attached) return;
    stop();
    npc.disconnect(ErrorReason.DISCONNECTED);
  };

  ws.addEventListener("message", onMessage);
  ws.addEventListener("close", onClose);
  ws.addEventListener("error", onClose);
  if (ws.readyState === WS_OPEN) {
    onOpen();
  } else {
    ws.addEventListener("open", onOpen);
  }

  return (reason) => {
    if (!attached) return;
    stop();
    npc.disconnect(reason);
  };
}
