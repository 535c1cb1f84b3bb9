// Protocol engine.
//
// Owns the correlation state of one endpoint and runs the
// deliver/notify/ack/cancel state machine. Each engine is both caller and
// callee; the transport is reduced to a send function and `receive`.

import {
  type AckMessage,
  type CancelMessage,
  type DeliverMessage,
  type EmitMessage,
  type Message,
  type NotifyMessage,
  ErrorReason,
  MessageKind,
  formatMessage,
  messageAck,
  messageCancel,
  messageDeliver,
  messageEmit,
  messageNotify,
} from "@npc-rpc/wire";

import { CallIdAllocator } from "./allocator.ts";
import { Latch } from "./latch.ts";
import { type Debugger, logger } from "./logging.ts";
import { CorrelationTables, type PendingReply, type TableSizes } from "./tables.ts";
import type { Endpoint, Send } from "./transport.ts";
import type { Cancel, Cancellable, Handler, Notify, Reply } from "./types.ts";

const baseLog = logger("engine");

/** Longest delay a single timer takes; longer ones are armed in steps. */
const MAX_TIMER_DELAY = 0x7fffffff;

/** Reports an exception thrown by user code or by the send function. */
export type ErrorHook = (error: unknown, context: string) => void;

export interface NpcOptions {
  /**
   * Name of this endpoint, appended to the log namespace
   * (`npc:engine:<name>`). Useful when several engines share a process.
   */
  name?: string;

  /**
   * Called when a send function, handler, reply/notify callback or cancel
   * callback throws. The engine keeps dispatching either way.
   * Defaults to logging on the engine's namespace.
   */
  onError?: ErrorHook;
}

/**
 * NPC engine: near procedure calls between two peers.
 *
 * @example
 * ```typescript
 * const npc = new Npc({ name: "client" });
 * npc.connect((message) => socket.send(encodeMessage(message)));
 * socket.onmessage = (event) => npc.receive(decodeMessage(event.data));
 *
 * const cancel = npc.deliver("download", { file: "a.txt" }, 5000,
 *   (param, error) => console.log("done", param, error),
 *   (progress) => console.log("progress", progress),
 * );
 * ```
 */
export class Npc implements Endpoint {
  private readonly tables = new CorrelationTables();
  private readonly ids = new CallIdAllocator();
  private send: Send | null = null;
  private readonly log: Debugger;
  private readonly onError: ErrorHook;

  constructor(options: NpcOptions = {}) {
    this.log = options.name ? baseLog.extend(options.name) : baseLog;
    this.onError =
      options.onError ??
      ((error, context) => {
        this.log("%s threw: %O", context, error);
      });
  }

  /** Whether a send function is installed. */
  get connected(): boolean {
    return this.send !== null;
  }

  /** Current table sizes. */
  pending(): TableSizes {
    return this.tables.size();
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  /**
   * Register the handler for `method`, or remove it when `handler` is null.
   *
   * The last registration wins. Dispatches already running keep the handler
   * they were bound to.
   */
  on(method: string, handler: Handler | null): void {
    if (handler === null) {
      this.tables.handlers.delete(method);
    } else {
      this.tables.handlers.set(method, handler);
    }
  }

  // ==========================================================================
  // Outbound
  // ==========================================================================

  /**
   * Fire-and-forget call. Nothing comes back, not even an error when the
   * peer has no handler.
   */
  emit(method: string, param?: unknown): void {
    const id = this.ids.next();
    this.post(messageEmit(method, param, id));
  }

  /**
   * Correlated call.
   *
   * `onReply(param, error)` runs exactly once: on the peer's Ack, on timeout
   * (`"timedout"`), on cancel (`"cancelled"`) or on disconnect. `onNotify`
   * receives progress until then and never after.
   *
   * @param timeout - Milliseconds before the call times out; 0 or Infinity
   *   disables it
   * @returns Cancel function. Only its first effective call does anything.
   */
  deliver(
    method: string,
    param?: unknown,
    timeout: number = 0,
    onReply?: Reply,
    onNotify?: Notify,
  ): Cancel {
    const id = this.ids.next();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const done = new Latch<[unknown, unknown]>(([result, error]) => {
      if (timer !== undefined) {
        clearTimeout(timer);
        timer = undefined;
      }
      this.tables.release(this.tables.replies, id, reply);
      if (notify) this.tables.release(this.tables.notifies, id, notify);
      if (onReply) this.invoke(`onReply for #${id}`, () => onReply(result, error));
    });

    const reply: PendingReply = (result, error) => done.tryComplete([result, error]);
    this.tables.replies.set(id, reply);

    const notify: Notify | undefined = onNotify
      ? (progress) => {
          if (done.completed) return;
          this.invoke(`onNotify for #${id}`, () => onNotify(progress));
        }
      : undefined;
    if (notify) this.tables.notifies.set(id, notify);

    const arm = (remaining: number): void => {
      const step = Math.min(remaining, MAX_TIMER_DELAY);
      timer = setTimeout(() => {
        timer = undefined;
        if (remaining > step) {
          arm(remaining - step);
        } else if (reply(null, ErrorReason.TIMEDOUT)) {
          this.post(messageCancel(id));
        }
      }, step);
    };
    if (timeout > 0 && Number.isFinite(timeout)) arm(timeout);

    this.post(messageDeliver(id, method, param));

    return () => {
      if (reply(null, ErrorReason.CANCELLED)) {
        this.post(messageCancel(id));
      }
    };
  }

  // ==========================================================================
  // Inbound
  // ==========================================================================

  /**
   * Dispatch one inbound message.
   *
   * Total over message kinds: unknown ids and methods are dropped with a
   * log line, except a Deliver for an unknown method, which is answered
   * with an `"unimplemented"` Ack. Absent payloads reach callbacks as null.
   */
  receive(message: Message): void {
    switch (message.kind) {
      case MessageKind.Emit:
        this.handleEmit(message);
        break;
      case MessageKind.Deliver:
        this.handleDeliver(message);
        break;
      case MessageKind.Notify:
        this.handleNotify(message);
        break;
      case MessageKind.Ack:
        this.handleAck(message);
        break;
      case MessageKind.Cancel:
        this.handleCancel(message);
        break;
      default:
        this.log("unhandled message: %O", message);
    }
  }

  private handleEmit(message: EmitMessage): void {
    const handler = this.tables.handlers.get(message.method);
    if (!handler) {
      this.log("unhandled message: %s", formatMessage(message));
      return;
    }
    this.invoke(`handler for ${message.method}`, () => {
      handler(message.param ?? null, ignoreNotify, ignoreReply);
    });
  }

  private handleDeliver(message: DeliverMessage): void {
    const { id, method } = message;
    const param = message.param ?? null;
    const handler = this.tables.handlers.get(method);
    if (!handler) {
      this.log("unhandled message: %s", formatMessage(message));
      this.post(messageAck(id, null, ErrorReason.UNIMPLEMENTED));
      return;
    }

    let cancelEntry: Cancel | undefined;
    const done = new Latch<() => void>((finish) => {
      if (cancelEntry) this.tables.release(this.tables.cancels, id, cancelEntry);
      finish();
    });

    const reply: Reply = (result, error) => {
      done.tryComplete(() => this.post(messageAck(id, result, error)));
    };
    const notify: Notify = (progress) => {
      if (done.completed) return;
      this.post(messageNotify(id, progress));
    };

    let work: Cancellable;
    try {
      work = handler(param, notify, reply);
    } catch (e) {
      this.onError(e, `handler for ${method}`);
      done.tryComplete(() => this.post(messageAck(id, null, ErrorReason.INTERNAL)));
      return;
    }

    // A handler that already replied has nothing left to cancel.
    if (work.kind === "cancellable" && !done.completed) {
      const cancel = work.cancel;
      cancelEntry = () => {
        done.tryComplete(() => this.invoke(`cancel for ${method} #${id}`, cancel));
      };
      this.tables.cancels.set(id, cancelEntry);
    }
  }

  private handleNotify(message: NotifyMessage): void {
    const notify = this.tables.notifies.get(message.id);
    if (!notify) {
      this.log("no pending notify for #%d", message.id);
      return;
    }
    notify(message.param ?? null);
  }

  private handleAck(message: AckMessage): void {
    const reply = this.tables.replies.get(message.id);
    if (!reply) {
      this.log("no pending reply for #%d", message.id);
      return;
    }
    reply(message.param ?? null, message.error ?? null);
  }

  private handleCancel(message: CancelMessage): void {
    const cancel = this.tables.cancels.get(message.id);
    if (!cancel) {
      this.log("nothing to cancel for #%d", message.id);
      return;
    }
    cancel();
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Install a send function.
   *
   * Any previous connection is torn down first, so no call outlives the
   * connection it was sent on.
   */
  connect(send: Send): void {
    this.disconnect(ErrorReason.DISCONNECTED);
    this.send = send;
  }

  /**
   * Tear down the connection.
   *
   * Every call pending right now gets `onReply(null, reason)`, every
   * interruptible handler we are running is cancelled, and sending stops
   * until the next `connect`. Calls started while the sweep runs are left
   * for the next one.
   */
  disconnect(reason?: unknown): void {
    const error = reason ?? ErrorReason.DISCONNECTED;
    const replies = this.tables.snapshotReplies();
    const cancels = this.tables.snapshotCancels();
    if (replies.length > 0 || cancels.length > 0) {
      this.log("disconnect (%O): %d replies, %d cancels", error, replies.length, cancels.length);
    }
    for (const reply of replies) {
      reply(null, error);
    }
    for (const cancel of cancels) {
      cancel();
    }
    this.send = null;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private post(message: Message): void {
    const send = this.send;
    if (!send) {
      this.log("not connected, dropped %s", formatMessage(message));
      return;
    }
    this.invoke("send", () => send(message));
  }

  private invoke(context: string, fn: () => void): void {
    try {
      fn();
    } catch (e) {
      this.onError(e, context);
    }
  }
}

function ignoreNotify(): void {}

function ignoreReply(): void {}
