/**
 * In-memory repositories
 * Used by tests and by the worker in dev mode when Supabase is not configured.
 * Same contracts as the Supabase implementations, state lost on restart.
 */

import { compareItemIds } from '../../utils/item-id';
import type {
  Account,
  Channel,
  DeliveryRecord,
  PendingAction,
  PendingActionState,
} from '../models';
import type { AccountRepository, RegisterAccountInput } from './accounts';
import type { ChannelRepository, UpsertChannelInput } from './channels';
import type { DeliveryLedger, RecordDeliveryInput } from './delivery-ledger';
import {
  emptyCounts,
  type CreatePendingActionInput,
  type PendingActionCounts,
  type PendingActionExpectation,
  type PendingActionPatch,
  type PendingActionRepository,
} from './pending-actions';

export class InMemoryAccountRepository implements AccountRepository {
  readonly accounts = new Map<string, Account>();

  async listActive(): Promise<Account[]> {
    return [...this.accounts.values()]
      .filter((a) => a.active)
      .sort((a, b) => a.id.localeCompare(b.id))
      .map((a) => ({ ...a }));
  }

  async findById(id: string): Promise<Account | null> {
    const account = this.accounts.get(id);
    return account ? { ...account } : null;
  }

  async register(input: RegisterAccountInput): Promise<Account> {
    const existing = this.accounts.get(input.id);
    const account: Account = {
      id: input.id,
      channelId: input.channelId,
      watermark: existing?.watermark ?? null,
      active: true,
      addedAt: existing?.addedAt ?? new Date(),
    };
    this.accounts.set(input.id, account);
    return { ...account };
  }

  async advanceWatermark(accountId: string, itemId: string): Promise<boolean> {
    const account = this.accounts.get(accountId);
    if (!account) return false;
    if (account.watermark !== null && compareItemIds(itemId, account.watermark) <= 0) {
      return false;
    }
    account.watermark = itemId;
    return true;
  }

  async deactivate(accountId: string): Promise<void> {
    const account = this.accounts.get(accountId);
    if (account) account.active = false;
  }
}

export class InMemoryChannelRepository implements ChannelRepository {
  readonly channels = new Map<string, Channel>();

  async findById(id: string): Promise<Channel | null> {
    const channel = this.channels.get(id);
    return channel ? { ...channel } : null;
  }

  async upsert(input: UpsertChannelInput): Promise<Channel> {
    const channel: Channel = { ...input, active: true };
    this.channels.set(input.id, channel);
    return { ...channel };
  }

  async deactivate(id: string): Promise<void> {
    const channel = this.channels.get(id);
    if (channel) channel.active = false;
  }
}

export class InMemoryDeliveryLedger implements DeliveryLedger {
  readonly records = new Map<string, DeliveryRecord>();

  private key(itemId: string, channelId: string): string {
    return `${itemId}:${channelId}`;
  }

  async has(itemId: string, channelId: string): Promise<boolean> {
    return this.records.has(this.key(itemId, channelId));
  }

  async record(input: RecordDeliveryInput): Promise<boolean> {
    const key = this.key(input.itemId, input.channelId);
    if (this.records.has(key)) return false;
    this.records.set(key, {
      itemId: input.itemId,
      channelId: input.channelId,
      accountId: input.accountId,
      score: input.score ?? null,
      category: input.category ?? null,
      deliveredAt: new Date(),
    });
    return true;
  }

  async prune(deliveredBefore: Date): Promise<number> {
    let removed = 0;
    for (const [key, record] of this.records) {
      if (record.deliveredAt < deliveredBefore) {
        this.records.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async countSince(since: Date): Promise<number> {
    let count = 0;
    for (const record of this.records.values()) {
      if (record.deliveredAt >= since) count++;
    }
    return count;
  }
}

export class InMemoryPendingActionRepository implements PendingActionRepository {
  readonly actions = new Map<string, PendingAction>();

  async insert(input: CreatePendingActionInput): Promise<PendingAction> {
    if (this.actions.has(input.alertId)) {
      throw new Error(`Failed to create pending action: duplicate alert id ${input.alertId}`);
    }
    const now = new Date();
    const action: PendingAction = {
      alertId: input.alertId,
      accountId: input.accountId,
      item: input.item,
      rating: input.rating,
      state: 'pending',
      requirements: null,
      outcome: null,
      buildStartedAt: null,
      createdAt: now,
      updatedAt: now,
    };
    this.actions.set(action.alertId, action);
    return { ...action };
  }

  async findById(alertId: string): Promise<PendingAction | null> {
    const action = this.actions.get(alertId);
    return action ? { ...action } : null;
  }

  async compareAndSet(
    alertId: string,
    expected: PendingActionExpectation,
    patch: PendingActionPatch
  ): Promise<PendingAction | null> {
    const action = this.actions.get(alertId);
    if (!action || action.state !== expected.state) return null;
    const { claimableBefore, claimedAt } = expected;
    if (claimableBefore && action.buildStartedAt && action.buildStartedAt >= claimableBefore) {
      return null;
    }
    if (claimedAt && action.buildStartedAt?.getTime() !== claimedAt.getTime()) return null;

    if (patch.state !== undefined) action.state = patch.state;
    if (patch.requirements !== undefined) action.requirements = patch.requirements;
    if (patch.outcome !== undefined) action.outcome = patch.outcome;
    if (patch.buildStartedAt !== undefined) action.buildStartedAt = patch.buildStartedAt;
    action.updatedAt = new Date();
    return { ...action };
  }

  async findByStateOlderThan(
    state: PendingActionState,
    createdBefore: Date
  ): Promise<PendingAction[]> {
    return [...this.actions.values()]
      .filter((a) => a.state === state && a.createdAt < createdBefore)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((a) => ({ ...a }));
  }

  async countByState(): Promise<PendingActionCounts> {
    const counts = emptyCounts();
    for (const action of this.actions.values()) {
      counts[action.state] += 1;
    }
    return counts;
  }
}
