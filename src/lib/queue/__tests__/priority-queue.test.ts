/**
 * Tests for the Rate-Limited Priority Queue
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { RateLimitedPriorityQueue, type AdmitInput } from '../priority-queue';
import { makeItem, makeRating } from '../../__tests__/helpers';

const MINUTE = 60 * 1000;
const COOLDOWN = 15 * MINUTE;

function entry(id: string, score: number): AdmitInput {
  return { item: makeItem(id), rating: makeRating(score), accountId: 'alice' };
}

describe('RateLimitedPriorityQueue', () => {
  let now: number;
  let queue: RateLimitedPriorityQueue;

  beforeEach(() => {
    now = Date.UTC(2024, 4, 1, 12, 0, 0);
    queue = new RateLimitedPriorityQueue({
      cooldownMs: COOLDOWN,
      maxQueueSize: 3,
      clock: () => now,
    });
  });

  describe('tryAdmit', () => {
    it('should deliver immediately when nothing was ever delivered', () => {
      const result = queue.tryAdmit(entry('1', 9));

      expect(result.kind).toBe('deliver_now');
      expect(queue.size).toBe(0);
      expect(queue.cooldownRemainingMs()).toBe(COOLDOWN);
    });

    it('should queue while in cooldown', () => {
      queue.tryAdmit(entry('1', 9));
      now += 5 * MINUTE;

      expect(queue.tryAdmit(entry('2', 9))).toEqual({ kind: 'queued', position: 1 });
      expect(queue.cooldownRemainingMs()).toBe(10 * MINUTE);
    });

    it('should deliver immediately once the cooldown has elapsed', () => {
      queue.tryAdmit(entry('1', 9));
      now += 20 * MINUTE;

      expect(queue.tryAdmit(entry('2', 9)).kind).toBe('deliver_now');
    });

    it('should treat exactly one cooldown as elapsed', () => {
      queue.tryAdmit(entry('1', 9));
      now += COOLDOWN;

      expect(queue.tryAdmit(entry('2', 9)).kind).toBe('deliver_now');
    });

    it('should report duplicates of queued items', () => {
      queue.tryAdmit(entry('1', 9));
      queue.tryAdmit(entry('2', 9));

      expect(queue.tryAdmit(entry('2', 10))).toEqual({ kind: 'duplicate' });
      expect(queue.size).toBe(1);
    });

    it('should order by score desc then admission order', () => {
      queue.tryAdmit(entry('0', 9));

      expect(queue.tryAdmit(entry('a', 9))).toEqual({ kind: 'queued', position: 1 });
      expect(queue.tryAdmit(entry('b', 10))).toEqual({ kind: 'queued', position: 1 });
      expect(queue.tryAdmit(entry('c', 9))).toEqual({ kind: 'queued', position: 3 });

      expect(queue.snapshot().map((e) => e.itemId)).toEqual(['b', 'a', 'c']);
    });

    it('should evict the lowest score, oldest among ties, when full', () => {
      queue.tryAdmit(entry('0', 10));
      queue.tryAdmit(entry('a', 9));
      queue.tryAdmit(entry('b', 9));
      queue.tryAdmit(entry('c', 10));

      expect(queue.tryAdmit(entry('d', 10))).toEqual({ kind: 'queued', position: 2 });
      expect(queue.size).toBe(3);
      expect(queue.snapshot().map((e) => e.itemId)).toEqual(['c', 'd', 'b']);
    });

    it('should drop a newcomer that scores below everything in a full queue', () => {
      queue.tryAdmit(entry('0', 10));
      queue.tryAdmit(entry('a', 10));
      queue.tryAdmit(entry('b', 10));
      queue.tryAdmit(entry('c', 10));

      expect(queue.tryAdmit(entry('low', 9))).toEqual({ kind: 'dropped' });
      expect(queue.snapshot().map((e) => e.itemId)).toEqual(['a', 'b', 'c']);
    });

    it('should queue behind waiting entries even when the window is open', () => {
      queue.tryAdmit(entry('0', 9));
      queue.tryAdmit(entry('a', 9));
      now += 20 * MINUTE;

      expect(queue.tryAdmit(entry('b', 10))).toEqual({ kind: 'queued', position: 1 });
    });
  });

  describe('takeNext', () => {
    it('should return null when empty', () => {
      expect(queue.takeNext()).toBeNull();
    });

    it('should return null during cooldown', () => {
      queue.tryAdmit(entry('0', 9));
      queue.tryAdmit(entry('a', 9));

      expect(queue.takeNext()).toBeNull();
      expect(queue.size).toBe(1);
    });

    it('should pop the head and claim the window after cooldown', () => {
      queue.tryAdmit(entry('0', 9));
      queue.tryAdmit(entry('a', 9));
      queue.tryAdmit(entry('b', 10));
      now += COOLDOWN;

      expect(queue.takeNext()?.item.id).toBe('b');
      expect(queue.takeNext()).toBeNull();
      expect(queue.cooldownRemainingMs()).toBe(COOLDOWN);
    });

    it('should never start two deliveries within one cooldown window', () => {
      const starts: number[] = [];
      queue.tryAdmit(entry('0', 9));
      starts.push(now);
      for (const id of ['a', 'b', 'c']) queue.tryAdmit(entry(id, 9));

      for (let minute = 0; minute < 60; minute++) {
        now += MINUTE;
        if (queue.takeNext()) starts.push(now);
      }

      for (let i = 1; i < starts.length; i++) {
        expect(starts[i] - starts[i - 1]).toBeGreaterThanOrEqual(COOLDOWN);
      }
      expect(starts.length).toBe(4);
    });
  });

  it('should reject a non-positive queue bound', () => {
    expect(() => new RateLimitedPriorityQueue({ cooldownMs: COOLDOWN, maxQueueSize: 0 })).toThrow(
      RangeError
    );
  });
});
