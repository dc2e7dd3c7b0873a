/**
 * Rate-Limited Priority Queue
 * Guards the urgent channel: at most one delivery starts per cooldown window.
 * Entries are ordered by score desc, then admission order.
 */

import type { Item, Rating } from '../db/models';

export interface QueueEntry {
  item: Item;
  rating: Rating;
  accountId: string;
  seq: number;
  enqueuedAt: Date;
}

export type AdmitInput = Pick<QueueEntry, 'item' | 'rating' | 'accountId'>;

export type AdmitResult =
  | { kind: 'deliver_now'; entry: QueueEntry }
  | { kind: 'queued'; position: number }
  | { kind: 'duplicate' }
  | { kind: 'dropped' };

export interface PriorityQueueOptions {
  cooldownMs: number;
  maxQueueSize: number;
  clock?: () => number;
}

export interface QueueSnapshotEntry {
  itemId: string;
  accountId: string;
  score: number;
  enqueuedAt: string;
}

export class RateLimitedPriorityQueue {
  private entries: QueueEntry[] = [];
  private lastDeliveryAt: number | null = null;
  private nextSeq = 0;
  private readonly clock: () => number;

  constructor(private readonly options: PriorityQueueOptions) {
    if (!Number.isInteger(options.maxQueueSize) || options.maxQueueSize < 1) {
      throw new RangeError(`maxQueueSize must be a positive integer, got ${options.maxQueueSize}`);
    }
    this.clock = options.clock ?? Date.now;
  }

  get size(): number {
    return this.entries.length;
  }

  inCooldown(now: number = this.clock()): boolean {
    return this.lastDeliveryAt !== null && now - this.lastDeliveryAt < this.options.cooldownMs;
  }

  cooldownRemainingMs(now: number = this.clock()): number {
    if (this.lastDeliveryAt === null) return 0;
    return Math.max(0, this.lastDeliveryAt + this.options.cooldownMs - now);
  }

  /**
   * Admit an urgent item. An idle window is claimed for it on the spot;
   * otherwise it waits in priority order.
   */
  tryAdmit(input: AdmitInput, now: number = this.clock()): AdmitResult {
    if (this.entries.some((e) => e.item.id === input.item.id)) {
      return { kind: 'duplicate' };
    }

    const entry: QueueEntry = {
      ...input,
      seq: this.nextSeq++,
      enqueuedAt: new Date(now),
    };

    // Queued entries outrank a newcomer only through the drainer, so an empty queue is required
    if (!this.inCooldown(now) && this.entries.length === 0) {
      this.lastDeliveryAt = now;
      return { kind: 'deliver_now', entry };
    }

    this.insert(entry);

    if (this.entries.length > this.options.maxQueueSize) {
      const evicted = this.evictLowest();
      if (evicted.seq === entry.seq) {
        return { kind: 'dropped' };
      }
    }

    return { kind: 'queued', position: this.entries.indexOf(entry) + 1 };
  }

  /**
   * Claim the window and pop the head. Null while cooling down or empty.
   */
  takeNext(now: number = this.clock()): QueueEntry | null {
    if (this.entries.length === 0 || this.inCooldown(now)) {
      return null;
    }
    const head = this.entries.shift();
    if (!head) return null;
    this.lastDeliveryAt = now;
    return head;
  }

  snapshot(): QueueSnapshotEntry[] {
    return this.entries.map((e) => ({
      itemId: e.item.id,
      accountId: e.accountId,
      score: e.rating.score,
      enqueuedAt: e.enqueuedAt.toISOString(),
    }));
  }

  private insert(entry: QueueEntry): void {
    const index = this.entries.findIndex((e) => e.rating.score < entry.rating.score);
    if (index === -1) {
      this.entries.push(entry);
    } else {
      this.entries.splice(index, 0, entry);
    }
  }

  /** Remove the lowest-score entry, the oldest one among equal scores. */
  private evictLowest(): QueueEntry {
    let victimIndex = 0;
    for (let i = 1; i < this.entries.length; i++) {
      const candidate = this.entries[i];
      const victim = this.entries[victimIndex];
      if (
        candidate.rating.score < victim.rating.score ||
        (candidate.rating.score === victim.rating.score && candidate.seq < victim.seq)
      ) {
        victimIndex = i;
      }
    }
    const [evicted] = this.entries.splice(victimIndex, 1);
    return evicted;
  }
}
