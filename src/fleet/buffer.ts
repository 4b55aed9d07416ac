/**
 * PriorityBuffer — per-device accumulation between flushes.
 *
 * The pending set is unbounded; capacity only limits how many messages
 * leave on each flush. Overflow is resolved over the whole inter-flush
 * accumulation, so a late high-priority message still displaces an
 * earlier low-priority one.
 *
 * Every operation is synchronous. On Node's event loop an accumulate can
 * therefore never interleave with a flush: each flush sees a consistent
 * snapshot and leaves the buffer empty.
 */

import { createRanker } from './priority.js';
import type { FlushResult, Message, PriorityPolicy } from './types.js';

interface PendingEntry {
  message: Message;
  rank: number;
  /** Arrival order, used as the tie-break between equal ranks */
  seq: number;
}

export class PriorityBuffer {
  private pending: PendingEntry[] = [];
  private nextSeq = 0;
  private readonly rank: (message: Message) => number;

  constructor(policy: PriorityPolicy) {
    this.rank = createRanker(policy);
  }

  /**
   * Append a message. Never blocks and never fails.
   */
  accumulate(message: Message): void {
    this.pending.push({ message, rank: this.rank(message), seq: this.nextSeq++ });
  }

  /**
   * Drain the buffer: order by priority (stable on arrival), keep the first
   * `capacity` messages and drop the rest. The buffer is empty afterwards.
   */
  flush(capacity: number): FlushResult {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Flush capacity must be a non-negative integer, got ${capacity}`);
    }

    const entries = this.pending;
    this.pending = [];

    entries.sort((a, b) => a.rank - b.rank || a.seq - b.seq);
    const ordered = entries.map((entry) => entry.message);

    return {
      retained: ordered.slice(0, capacity),
      dropped: ordered.slice(capacity),
    };
  }

  /**
   * Empty the buffer without resolving priority.
   * Returns the discarded messages in arrival order.
   */
  clear(): Message[] {
    const discarded = this.pending.map((entry) => entry.message);
    this.pending = [];
    return discarded;
  }

  get size(): number {
    return this.pending.length;
  }

  get isEmpty(): boolean {
    return this.pending.length === 0;
  }
}
