// Correlation tables for one engine.

import type { CallId } from "@npc-rpc/wire";
import type { Cancel, Handler, Notify } from "./types.ts";

/**
 * Caller-side terminal callback, as stored in the reply table.
 *
 * Returns true if this invocation completed the call.
 */
export type PendingReply = (param: unknown, error: unknown) => boolean;

/** Entry counts, for diagnostics and tests. */
export interface TableSizes {
  replies: number;
  notifies: number;
  cancels: number;
  handlers: number;
}

/**
 * All correlation state of an engine.
 *
 * - `replies`: calls we delivered that await a terminal result.
 * - `notifies`: progress callbacks for calls we delivered.
 * - `cancels`: interruptible handler work we are running for the peer.
 * - `handlers`: method name to handler.
 *
 * Per-call entries are removed with `release`, which only removes the
 * entry it was given, so an entry is removed exactly once.
 */
export class CorrelationTables {
  readonly replies = new Map<CallId, PendingReply>();
  readonly notifies = new Map<CallId, Notify>();
  readonly cancels = new Map<CallId, Cancel>();
  readonly handlers = new Map<string, Handler>();

  /**
   * Remove `entry` from `table` if it is still the one stored under `id`.
   *
   * @returns true if the entry was removed
   */
  release<V>(table: Map<CallId, V>, id: CallId, entry: V): boolean {
    if (table.get(id) !== entry) return false;
    table.delete(id);
    return true;
  }

  /** Pending replies at this instant, for the disconnect sweep. */
  snapshotReplies(): PendingReply[] {
    return [...this.replies.values()];
  }

  /** Pending handler cancellations at this instant, for the disconnect sweep. */
  snapshotCancels(): Cancel[] {
    return [...this.cancels.values()];
  }

  size(): TableSizes {
    return {
      replies: this.replies.size,
      notifies: this.notifies.size,
      cancels: this.cancels.size,
      handlers: this.handlers.size,
    };
  }
}
