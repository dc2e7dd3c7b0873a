/**
 * Tests for the Notification Drainer
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { URGENT_CHANNEL_ID } from '../../db/models';
import {
  InMemoryDeliveryLedger,
  InMemoryPendingActionRepository,
} from '../../db/repositories/in-memory';
import { PendingActionStore } from '../../services/pending-action-store';
import { NotificationDrainer } from '../notification-drainer';
import { RateLimitedPriorityQueue } from '../priority-queue';
import {
  FakeReplyTransport,
  FakeUrgentSender,
  makeItem,
  makeRating,
  sequentialIds,
} from '../../__tests__/helpers';

const COOLDOWN = 15 * 60 * 1000;

describe('NotificationDrainer', () => {
  let now: number;
  let queue: RateLimitedPriorityQueue;
  let sender: FakeUrgentSender;
  let ledger: InMemoryDeliveryLedger;
  let repo: InMemoryPendingActionRepository;
  let transport: FakeReplyTransport;
  let drainer: NotificationDrainer;

  beforeEach(() => {
    now = Date.UTC(2024, 4, 1, 12, 0, 0);
    queue = new RateLimitedPriorityQueue({ cooldownMs: COOLDOWN, maxQueueSize: 10, clock: () => now });
    sender = new FakeUrgentSender();
    ledger = new InMemoryDeliveryLedger();
    repo = new InMemoryPendingActionRepository();
    transport = new FakeReplyTransport();
    drainer = new NotificationDrainer({
      queue,
      urgentSender: sender,
      ledger,
      pendingActions: new PendingActionStore(repo),
      transport,
      intervalMs: 30_000,
      sendTimeoutMs: 1_000,
      newAlertId: sequentialIds(),
    });
  });

  afterEach(async () => {
    await drainer.stop();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('deliver', () => {
    it('should record the urgent delivery and open a pending action', async () => {
      const admit = queue.tryAdmit({ item: makeItem('104'), rating: makeRating(9), accountId: 'alice' });
      if (admit.kind !== 'deliver_now') throw new Error(`unexpected ${admit.kind}`);

      const outcome = await drainer.deliver(admit.entry);

      expect(outcome).toEqual({ status: 'delivered', alertId: 'alert-1' });
      expect(sender.sent).toEqual([{ itemId: '104', alertId: 'alert-1' }]);
      expect(await ledger.has('104', URGENT_CHANNEL_ID)).toBe(true);

      const action = await repo.findById('alert-1');
      expect(action?.state).toBe('pending');
      expect(action?.item.id).toBe('104');
      expect(action?.rating.score).toBe(9);
    });

    it('should open the pending action even when the ledger write fails', async () => {
      vi.spyOn(ledger, 'record').mockRejectedValue(new Error('db down'));
      const admit = queue.tryAdmit({ item: makeItem('104'), rating: makeRating(9), accountId: 'alice' });
      if (admit.kind !== 'deliver_now') throw new Error(`unexpected ${admit.kind}`);

      const outcome = await drainer.deliver(admit.entry);

      expect(outcome).toEqual({ status: 'delivered', alertId: 'alert-1' });
      expect((await repo.findById('alert-1'))?.state).toBe('pending');
      expect(transport.messages).toEqual([]);
    });

    it('should tell the operator when a sent alert cannot be tracked', async () => {
      vi.spyOn(repo, 'insert').mockRejectedValue(new Error('db down'));
      const admit = queue.tryAdmit({ item: makeItem('104'), rating: makeRating(9), accountId: 'alice' });
      if (admit.kind !== 'deliver_now') throw new Error(`unexpected ${admit.kind}`);

      const outcome = await drainer.deliver(admit.entry);

      expect(outcome).toEqual({ status: 'delivered', alertId: 'alert-1' });
      expect(await ledger.has('104', URGENT_CHANNEL_ID)).toBe(true);
      expect(transport.messages).toEqual([
        {
          subject: 'Alert alert-1 cannot take replies',
          text: 'The alert for @alice was sent but could not be tracked: db down',
        },
      ]);
    });

    it('should drop the entry when the send fails', async () => {
      sender.result = { status: 'failure', reason: 'smtp down' };
      const admit = queue.tryAdmit({ item: makeItem('104'), rating: makeRating(9), accountId: 'alice' });
      if (admit.kind !== 'deliver_now') throw new Error(`unexpected ${admit.kind}`);

      const outcome = await drainer.deliver(admit.entry);

      expect(outcome).toEqual({ status: 'failed', reason: 'smtp down' });
      expect(await ledger.has('104', URGENT_CHANNEL_ID)).toBe(false);
      expect(repo.actions.size).toBe(0);
      expect(queue.size).toBe(0);
    });
  });

  describe('drainOnce', () => {
    it('should do nothing while the cooldown holds', async () => {
      queue.tryAdmit({ item: makeItem('1'), rating: makeRating(9), accountId: 'alice' });
      queue.tryAdmit({ item: makeItem('2'), rating: makeRating(9), accountId: 'alice' });

      expect(await drainer.drainOnce()).toBe(false);
      expect(sender.sent).toEqual([]);
    });

    it('should deliver the highest-priority entry after the cooldown', async () => {
      queue.tryAdmit({ item: makeItem('1'), rating: makeRating(9), accountId: 'alice' });
      queue.tryAdmit({ item: makeItem('2'), rating: makeRating(9), accountId: 'alice' });
      queue.tryAdmit({ item: makeItem('3'), rating: makeRating(10), accountId: 'bob' });
      now += COOLDOWN;

      expect(await drainer.drainOnce()).toBe(true);
      expect(sender.sent.map((s) => s.itemId)).toEqual(['3']);
      expect(queue.size).toBe(1);
    });
  });

  it('should drain on its interval once started', async () => {
    vi.useFakeTimers();
    queue.tryAdmit({ item: makeItem('1'), rating: makeRating(9), accountId: 'alice' });
    queue.tryAdmit({ item: makeItem('2'), rating: makeRating(9), accountId: 'alice' });
    now += COOLDOWN;

    drainer.start();
    expect(drainer.running).toBe(true);
    await vi.advanceTimersByTimeAsync(30_000);

    expect(sender.sent.map((s) => s.itemId)).toEqual(['2']);

    await drainer.stop();
    expect(drainer.running).toBe(false);
  });
});
