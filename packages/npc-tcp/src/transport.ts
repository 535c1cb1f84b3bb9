// TCP transport for NPC engines.

import net from "node:net";
import type { Duplex } from "node:stream";
import {
  type Endpoint,
  type Message,
  ErrorReason,
  WireError,
  decodeFrame,
  encodeFrame,
  formatMessage,
  logger,
} from "@npc-rpc/core";

import { TransportError } from "./errors.ts";
import { type FramingOptions, LengthPrefixedFramed } from "./framing.ts";

const log = logger("tcp");

/** Options for attaching an engine to a socket. */
export interface AttachSocketOptions extends FramingOptions {}

/** Tears down an attachment: disconnects the engine, closes the socket. */
export type Detach = (reason?: unknown) => void;

/**
 * Run an engine over a connected byte stream.
 *
 * Outbound messages are encoded as UTF-8 JSON frames; inbound frames that
 * fail to decode are logged and dropped. When the stream closes the engine
 * is disconnected with `"disconnected"`, or with the socket error's message
 * if the stream failed.
 */
export function attachSocket(
  npc: Endpoint,
  socket: Duplex,
  options: AttachSocketOptions = {},
): Detach {
  const framed = new LengthPrefixedFramed(socket, options);
  let attached = true;

  framed.onFrame((frame) => {
    let message: Message;
    try {
      message = decodeFrame(frame);
    } catch (e) {
      if (!(e instanceof WireError)) throw e;
      log("dropped %d byte frame: %s", frame.length, e.message);
      return;
    }
    npc.receive(message);
  });

  framed.onClose((error) => {
    if (!attached) return;
    attached = false;
    log("socket closed%s", error ? `: ${error.message}` : "");
    npc.disconnect(error ? error.message : ErrorReason.DISCONNECTED);
  });

  npc.connect((message) => {
    framed.send(encodeFrame(message)).catch((e: unknown) => {
      log("send of %s failed: %O", formatMessage(message), e);
    });
  });

  return (reason) => {
    if (!attached) return;
    attached = false;
    npc.disconnect(reason);
    framed.close();
  };
}

/** Where to connect. */
export interface TcpConnectOptions extends AttachSocketOptions {
  /** Default: "127.0.0.1" */
  host?: string;
  port: number;
}

/**
 * Connect to a peer and run `npc` over the connection.
 *
 * @returns Detach function, once the socket is connected
 */
export function connectTcp(npc: Endpoint, options: TcpConnectOptions): Promise<Detach> {
  const host = options.host ?? "127.0.0.1";
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port: options.port });

    const onError = (err: Error) => {
      reject(TransportError.io(err.message));
    };
    socket.once("error", onError);
    socket.once("connect", () => {
      socket.off("error", onError);
      log("connected to %s:%d", host, options.port);
      resolve(attachSocket(npc, socket, options));
    });
  });
}

/** Where to listen. */
export interface TcpListenOptions extends AttachSocketOptions {
  /** Default: all interfaces */
  host?: string;
}

/**
 * Accept connections on `port`, running a fresh engine for each.
 *
 * `onPeer` is called once per accepted socket and returns the engine that
 * serves it; that engine is disconnected when the socket closes.
 *
 * @returns The listening server
 */
export function listenTcp(
  port: number,
  onPeer: (socket: net.Socket) => Endpoint,
  options: TcpListenOptions = {},
): Promise<net.Server> {
  return new Promise((resolve, reject) => {
    const server = net.createServer((socket) => {
      log("accepted %s:%d", socket.remoteAddress, socket.remotePort);
      attachSocket(onPeer(socket), socket, options);
    });

    const onError = (err: Error) => {
      reject(TransportError.io(err.message));
    };
    server.once("error", onError);
    server.listen(port, options.host, () => {
      server.off("error", onError);
      resolve(server);
    });
  });
}
