/**
 * Run an NPC engine over a MessagePort.
 *
 * Messages are posted as structured values, no JSON step. Inbound values are
 * validated before they reach the engine, since anything may be posted to a
 * port.
 */

import { z } from "zod";
import {
  type Endpoint,
  type Message,
  ErrorReason,
  WireError,
  logger,
  parseMessage,
} from "@npc-rpc/core";

const log = logger("port");

/**
 * The part of a port the binding uses. A `worker_threads` MessagePort
 * satisfies it.
 */
export interface PortLike {
  postMessage(value: unknown): void;
  on(event: "message", listener: (value: unknown) => void): unknown;
  on(event: "close", listener: () => void): unknown;
  off(event: "message", listener: (value: unknown) => void): unknown;
  off(event: "close", listener: () => void): unknown;
  start?(): void;
}

/**
 * Options for attachPort.
 */
export interface AttachPortOptions {
  /**
   * Channel name for sharing one port between several engines. Messages
   * are wrapped as `{ channelName, message }` and inbound values for other
   * channels are ignored. Without it, messages are posted bare.
   */
  channelName?: string;
}

const EnvelopeSchema = z.object({
  channelName: z.string(),
  message: z.unknown(),
});

/**
 * Connects `npc` to `port` and starts the port.
 *
 * The engine is disconnected with `"disconnected"` when the port closes.
 *
 * @param npc - The engine to connect.
 * @param port - The port to run over.
 * @param options - Additional options.
 * @returns A function detaching the engine; disconnects it with `reason`.
 */
export function attachPort(
  npc: Endpoint,
  port: PortLike,
  options: AttachPortOptions = {},
): (reason?: unknown) => void {
  const { channelName } = options;
  let attached = true;

  const unwrap = (value: unknown): unknown => {
    if (channelName === undefined) return value;
    const envelope = EnvelopeSchema.safeParse(value);
    if (!envelope.success || envelope.data.channelName !== channelName) return undefined;
    return envelope.data.message;
  };

  const onMessage = (value: unknown): void => {
    const data = unwrap(value);
    if (data === undefined) return;

    let message: Message;
    try {
      message = parseMessage(data);
    } catch (e) {
      if (!(e instanceof WireError)) throw e;
      log("dropped value: %s", e.message);
      return;
    }
    npc.receive(message);
  };

  const stop = (): void => {
    attached = false;
    port.off("message", onMessage);
    port.off("close", onClose);
  };

  const onClose = (): void => {
    if (!attached) return;
    stop();
    log("port closed%s", channelName === undefined ? "" : ` (${channelName})`);
    npc.disconnect(ErrorReason.DISCONNECTED);
  };

  port.on("message", onMessage);
  port.on("close", onClose);
  port.start?.();

  npc.connect((message) => {
    port.postMessage(channelName === undefined ? message : { channelName, message });
  });

  return (reason) => {
    if (!attached) return;
    stop();
    npc.disconnect(reason);
  };
}
