// Call ID allocator.

import { type CallId, MAX_CALL_ID, MIN_CALL_ID } from "@npc-rpc/wire";

/**
 * Allocates call IDs for one engine.
 *
 * Dense int32 sequence: the counter starts at `MIN_CALL_ID` and is bumped
 * before each allocation, wrapping from `MAX_CALL_ID` to `MIN_CALL_ID + 1`.
 * `MIN_CALL_ID` itself is never handed out.
 *
 * IDs only need to be unique among outstanding calls. Completed calls leave
 * their tables immediately, so a collision would take more than 2^32 - 1
 * simultaneously outstanding deliveries.
 */
export class CallIdAllocator {
  private current: CallId;

  constructor(start: CallId = MIN_CALL_ID) {
    this.current = start;
  }

  /** Allocate the next call ID. */
  next(): CallId {
    this.current = this.current < MAX_CALL_ID ? this.current + 1 : MIN_CALL_ID + 1;
    return this.current;
  }
}
