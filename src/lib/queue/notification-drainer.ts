/**
 * Notification Drainer
 * Single background loop that delivers urgent entries once the cooldown allows,
 * then opens a pending action for the operator's decision.
 */

import { randomUUID } from 'crypto';
import { URGENT_CHANNEL_ID } from '../db/models';
import type { DeliveryLedger } from '../db/repositories/delivery-ledger';
import type { ReplyTransport, UrgentSender } from '../notify/types';
import type { PendingActionStore } from '../services/pending-action-store';
import { withTimeout } from '../utils/timeout';
import { logError, logInfo, logWarn } from '../observability/logger';
import type { QueueEntry, RateLimitedPriorityQueue } from './priority-queue';

export type UrgentDeliveryOutcome =
  | { status: 'delivered'; alertId: string }
  | { status: 'failed'; reason: string };

export interface NotificationDrainerDeps {
  queue: RateLimitedPriorityQueue;
  urgentSender: UrgentSender;
  ledger: DeliveryLedger;
  pendingActions: PendingActionStore;
  /** Tells the operator when a sent alert could not be tracked. */
  transport: ReplyTransport;
  intervalMs: number;
  sendTimeoutMs: number;
  newAlertId?: () => string;
}

export class NotificationDrainer {
  private timer: NodeJS.Timeout | null = null;
  private readonly inFlight = new Set<Promise<UrgentDeliveryOutcome>>();
  private readonly newAlertId: () => string;

  constructor(private readonly deps: NotificationDrainerDeps) {
    this.newAlertId = deps.newAlertId ?? randomUUID;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      this.drainOnce().catch((error) => logError('Drainer tick failed', error));
    }, this.deps.intervalMs);

    logInfo('Notification drainer started', { intervalMs: this.deps.intervalMs });
  }

  /**
   * Stop the loop and wait for any delivery in flight
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await Promise.allSettled([...this.inFlight]);
    logInfo('Notification drainer stopped');
  }

  /**
   * Deliver the queue head if the cooldown allows. True when an entry was taken.
   */
  async drainOnce(): Promise<boolean> {
    const entry = this.deps.queue.takeNext();
    if (!entry) return false;

    await this.deliver(entry);
    return true;
  }

  /**
   * Send one entry whose window has already been claimed
   */
  deliver(entry: QueueEntry): Promise<UrgentDeliveryOutcome> {
    const delivery = this.send(entry);
    this.inFlight.add(delivery);
    return delivery.finally(() => this.inFlight.delete(delivery));
  }

  private async send(entry: QueueEntry): Promise<UrgentDeliveryOutcome> {
    const { item, rating, accountId } = entry;
    const alertId = this.newAlertId();

    try {
      const result = await withTimeout(
        this.deps.urgentSender.sendUrgent(item, rating, alertId),
        this.deps.sendTimeoutMs,
        'urgent send'
      );

      if (result.status === 'failure') {
        logWarn('Urgent delivery failed, entry dropped', {
          itemId: item.id,
          accountId,
          reason: result.reason,
        });
        return { status: 'failed', reason: result.reason };
      }

      // The operator already holds the alert id: the pending action comes first
      await this.openPendingAction(alertId, entry);
      await this.recordDelivery(entry);

      logInfo('Urgent alert delivered', { alertId, itemId: item.id, accountId, score: rating.score });
      return { status: 'delivered', alertId };
    } catch (error) {
      logError('Urgent delivery failed, entry dropped', error, { itemId: item.id, accountId });
      const reason = error instanceof Error ? error.message : String(error);
      return { status: 'failed', reason };
    }
  }

  private async openPendingAction(alertId: string, entry: QueueEntry): Promise<void> {
    const { item, rating, accountId } = entry;
    try {
      await this.deps.pendingActions.create({ alertId, accountId, item, rating });
    } catch (error) {
      logError('Pending action not created for a sent alert', error, { alertId, itemId: item.id });
      const reason = error instanceof Error ? error.message : String(error);
      try {
        await this.deps.transport.notify(
          `Alert ${alertId} cannot take replies`,
          `The alert for @${accountId} was sent but could not be tracked: ${reason}`
        );
      } catch (notifyError) {
        logError('Operator notification failed', notifyError, { alertId });
      }
    }
  }

  private async recordDelivery(entry: QueueEntry): Promise<void> {
    const { item, rating, accountId } = entry;
    try {
      await this.deps.ledger.record({
        itemId: item.id,
        channelId: URGENT_CHANNEL_ID,
        accountId,
        score: rating.score,
        category: rating.category,
      });
    } catch (error) {
      logError('Urgent delivery not recorded in the ledger', error, { itemId: item.id, accountId });
    }
  }
}
