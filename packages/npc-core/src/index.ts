// @npc-rpc/core - NPC protocol engine
// Correlated calls, progress, cancellation and disconnect cleanup over any
// duplex transport.

// Wire types, error taxonomy and codec
export type {
  CallId,
  Message,
  EmitMessage,
  DeliverMessage,
  NotifyMessage,
  AckMessage,
  CancelMessage,
} from "@npc-rpc/wire";

export {
  ErrorReason,
  WireError,
  MessageKind,
  MIN_CALL_ID,
  MAX_CALL_ID,
  messageEmit,
  messageDeliver,
  messageNotify,
  messageAck,
  messageCancel,
  formatMessage,
  encodeMessage,
  decodeMessage,
  encodeFrame,
  decodeFrame,
  parseMessage,
} from "@npc-rpc/wire";

// Callback types and handler results
export type { Cancel, Notify, Reply, Handler, Cancellable } from "./types.ts";
export { cancellable, nonCancellable, isCancellable } from "./cancellable.ts";

// Building blocks
export { Latch } from "./latch.ts";
export { CallIdAllocator } from "./allocator.ts";
export { CorrelationTables, type PendingReply, type TableSizes } from "./tables.ts";

// Transport abstraction
export type { Send, Endpoint } from "./transport.ts";

// Engine
export { Npc, type NpcOptions, type ErrorHook } from "./engine.ts";

// Promise-based calls
export { NpcCaller, NpcCallError, type CallOptions, type CallerConfig } from "./caller.ts";

// In-process relay
export { pipe, type PipeOptions } from "./pipe.ts";

// Diagnostics
export {
  logger,
  traceSend,
  traceReceive,
  describeMessage,
  type Debugger,
  type LogSink,
  type TraceOptions,
} from "./logging.ts";
