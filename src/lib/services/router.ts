/**
 * Tiered Router
 * Sends a rated item to the bulk or premium chat channel, or through the urgent queue
 */

import type { Account, Item, Rating } from '../db/models';
import { URGENT_CHANNEL_ID } from '../db/models';
import type { ChannelRepository } from '../db/repositories/channels';
import type { DeliveryLedger } from '../db/repositories/delivery-ledger';
import type { ChannelSender, ChannelSendResult, UrgentSender } from '../notify/types';
import type { NotificationDrainer } from '../queue/notification-drainer';
import type { RateLimitedPriorityQueue } from '../queue/priority-queue';
import { tier, type Tier, type TierThresholds } from '../ranking/tiers';
import { withAbortableTimeout } from '../utils/timeout';
import { logError, logInfo, logWarn } from '../observability/logger';

export type RouteOutcome =
  | { tier: Tier; status: 'filtered' }
  | { tier: Tier; status: 'delivered'; channelId: string; alertId?: string }
  | { tier: Tier; status: 'duplicate'; channelId: string }
  | { tier: Tier; status: 'queued'; position: number }
  | { tier: Tier; status: 'dropped' }
  | { tier: Tier; status: 'skipped'; reason: string }
  | { tier: Tier; status: 'failed'; reason: string };

export interface ItemRouterDeps {
  channels: ChannelRepository;
  ledger: DeliveryLedger;
  channelSender: ChannelSender;
  urgentSender: UrgentSender;
  queue: RateLimitedPriorityQueue;
  drainer: NotificationDrainer;
  thresholds: TierThresholds;
  premiumChannelId: string;
  sendTimeoutMs: number;
}

export class ItemRouter {
  constructor(private readonly deps: ItemRouterDeps) {}

  async routeItem(account: Account, item: Item, rating: Rating): Promise<RouteOutcome> {
    const itemTier = tier(rating.score, this.deps.thresholds);

    switch (itemTier) {
      case 'filter':
        return { tier: itemTier, status: 'filtered' };
      case 'bulk':
        return this.sendToChannel(itemTier, account.channelId, account.id, item, rating);
      case 'premium':
        return this.sendToChannel(itemTier, this.deps.premiumChannelId, account.id, item, rating);
      case 'urgent':
        if (!this.deps.urgentSender.isConfigured()) {
          logWarn('Urgent channel not configured, routing to premium', { itemId: item.id });
          return this.sendToChannel(itemTier, this.deps.premiumChannelId, account.id, item, rating);
        }
        return this.admitUrgent(account, item, rating);
    }
  }

  /**
   * Ledger pre-check, send, then record on confirmed delivery
   */
  async sendToChannel(
    itemTier: Tier,
    channelId: string,
    accountId: string,
    item: Item,
    rating: Rating
  ): Promise<RouteOutcome> {
    if (await this.deps.ledger.has(item.id, channelId)) {
      return { tier: itemTier, status: 'duplicate', channelId };
    }

    const channel = await this.deps.channels.findById(channelId);
    if (!channel || !channel.active) {
      logWarn('Channel missing or inactive, delivery skipped', { channelId, itemId: item.id });
      return { tier: itemTier, status: 'skipped', reason: `channel ${channelId} unavailable` };
    }

    let result: ChannelSendResult;
    try {
      result = await withAbortableTimeout(
        (signal) => this.deps.channelSender.send(channel, item, rating, signal),
        this.deps.sendTimeoutMs,
        `send to ${channelId}`
      );
    } catch (error) {
      logError('Channel delivery failed', error, { channelId, itemId: item.id });
      const reason = error instanceof Error ? error.message : String(error);
      return { tier: itemTier, status: 'failed', reason };
    }

    if (result.status === 'not_found') {
      await this.deps.channels.deactivate(channelId);
      logWarn('Channel webhook not found, channel deactivated', { channelId });
      return { tier: itemTier, status: 'failed', reason: `channel ${channelId} not found` };
    }

    if (result.status === 'transient_error') {
      logWarn('Channel delivery failed', { channelId, itemId: item.id, error: result.message });
      return { tier: itemTier, status: 'failed', reason: result.message };
    }

    await this.deps.ledger.record({
      itemId: item.id,
      channelId,
      accountId,
      score: rating.score,
      category: rating.category,
    });

    logInfo('Item delivered', { tier: itemTier, channelId, itemId: item.id, score: rating.score });
    return { tier: itemTier, status: 'delivered', channelId };
  }

  private async admitUrgent(account: Account, item: Item, rating: Rating): Promise<RouteOutcome> {
    if (await this.deps.ledger.has(item.id, URGENT_CHANNEL_ID)) {
      return { tier: 'urgent', status: 'duplicate', channelId: URGENT_CHANNEL_ID };
    }

    const admit = this.deps.queue.tryAdmit({ item, rating, accountId: account.id });

    switch (admit.kind) {
      case 'deliver_now': {
        const outcome = await this.deps.drainer.deliver(admit.entry);
        return outcome.status === 'delivered'
          ? { tier: 'urgent', status: 'delivered', channelId: URGENT_CHANNEL_ID, alertId: outcome.alertId }
          : { tier: 'urgent', status: 'failed', reason: outcome.reason };
      }
      case 'queued':
        logInfo('Urgent item queued', { itemId: item.id, position: admit.position });
        return { tier: 'urgent', status: 'queued', position: admit.position };
      case 'duplicate':
        return { tier: 'urgent', status: 'duplicate', channelId: URGENT_CHANNEL_ID };
      case 'dropped':
        logWarn('Urgent queue full, item dropped', { itemId: item.id, score: rating.score });
        return { tier: 'urgent', status: 'dropped' };
    }
  }
}
