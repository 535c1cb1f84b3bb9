// Diagnostics for NPC engines and transports.
//
// Built on the `debug` package: nothing is printed unless the namespace is
// enabled, e.g. `DEBUG=npc:*` (everything) or `DEBUG=npc:trace` (messages
// only).

import createDebug from "debug";
import { type Message, kindName } from "@npc-rpc/wire";

import type { Send } from "./transport.ts";

export type Debugger = createDebug.Debugger;

/**
 * Create a logger under the `npc:` prefix.
 *
 * @example
 * ```typescript
 * const log = logger("tcp");
 * log("frame too large: %d bytes", size);
 * ```
 */
export function logger(scope: string): Debugger {
  return createDebug(`npc:${scope}`);
}

/**
 * Receives one trace line and its structured details.
 */
export type LogSink = (line: string, details: Record<string, unknown>) => void;

export interface TraceOptions {
  /**
   * Namespace for the default sink. Defaults to "npc:trace".
   */
  namespace?: string;

  /**
   * Include `param` payloads. Defaults to false (payloads may be large or
   * sensitive). Errors are always included.
   */
  logParams?: boolean;

  /**
   * Where lines go. Defaults to a `debug` logger on `namespace`.
   */
  log?: LogSink;
}

function sinkFor(options: TraceOptions): LogSink {
  if (options.log) return options.log;
  const debug = createDebug(options.namespace ?? "npc:trace");
  return (line, details) => {
    if (debug.enabled) debug("%s %O", line, details);
  };
}

/** Build the trace line and details for a message. */
export function describeMessage(
  direction: "→" | "←",
  message: Message,
  logParams: boolean,
): { line: string; details: Record<string, unknown> } {
  const kind = kindName(message.kind);
  const details: Record<string, unknown> = { kind };
  let line = `${direction} ${kind}`;

  if (message.id !== undefined) {
    details.id = message.id;
    line += ` #${message.id}`;
  }
  if ("method" in message) {
    details.method = message.method;
    line += ` ${message.method}`;
  }
  if (logParams && "param" in message && message.param !== undefined) {
    details.param = message.param;
  }
  if ("error" in message && message.error !== undefined) {
    details.error = message.error;
    line += ` ✗`;
  }
  return { line, details };
}

/**
 * Wrap a send function so every outbound message is traced.
 *
 * @example
 * ```typescript
 * npc.connect(traceSend((m) => socket.send(encodeMessage(m))));
 * ```
 */
export function traceSend(send: Send, options: TraceOptions = {}): Send {
  const sink = sinkFor(options);
  const logParams = options.logParams ?? false;
  return (message) => {
    const { line, details } = describeMessage("→", message, logParams);
    sink(line, details);
    send(message);
  };
}

/**
 * Wrap an inbound entry point so every received message is traced.
 */
export function traceReceive(
  receive: (message: Message) => void,
  options: TraceOptions = {},
): (message: Message) => void {
  const sink = sinkFor(options);
  const logParams = options.logParams ?? false;
  return (message) => {
    const { line, details } = describeMessage("←", message, logParams);
    sink(line, details);
    receive(message);
  };
}
