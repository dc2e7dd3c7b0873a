/**
 * Cycle Dispatcher
 * One polling pass over every active account: fetch, dedupe, score, route,
 * then advance the account's watermark.
 */

import { randomUUID } from 'crypto';
import type winston from 'winston';
import type { Account, Item, Rating } from '../db/models';
import type { AccountRepository } from '../db/repositories/accounts';
import type { DeliveryLedger } from '../db/repositories/delivery-ledger';
import { FatalIngestionError, TimeoutError } from '../errors';
import type { FetchOutcome, SourceFetcher } from '../ingest/types';
import { neutralRating, type Scorer } from '../ranking/scorer';
import type { ItemRouter, RouteOutcome } from '../services/router';
import type { ConcurrencyGate } from '../utils/concurrency-gate';
import { compareItemIds, isNewerThan, maxItemId } from '../utils/item-id';
import { withAbortableTimeout } from '../utils/timeout';
import { withCorrelationId } from '../observability/logger';

export interface CycleSummary {
  cycleId: string;
  startedAt: Date;
  finishedAt: Date | null;
  accountsProcessed: number;
  accountsInitialized: number;
  accountsSkipped: number;
  accountsDeactivated: number;
  itemsSeen: number;
  itemsDelivered: number;
  itemsQueued: number;
  itemsFiltered: number;
  itemsDuplicate: number;
  itemsFailed: number;
}

export interface CycleDispatcherDeps {
  accounts: AccountRepository;
  ledger: DeliveryLedger;
  fetcher: SourceFetcher;
  scorer: Scorer;
  router: ItemRouter;
  gate: ConcurrencyGate;
  fetchTimeoutMs: number;
  scoreTimeoutMs: number;
  skipReposts: boolean;
}

export function emptySummary(cycleId: string): CycleSummary {
  return {
    cycleId,
    startedAt: new Date(),
    finishedAt: null,
    accountsProcessed: 0,
    accountsInitialized: 0,
    accountsSkipped: 0,
    accountsDeactivated: 0,
    itemsSeen: 0,
    itemsDelivered: 0,
    itemsQueued: 0,
    itemsFiltered: 0,
    itemsDuplicate: 0,
    itemsFailed: 0,
  };
}

export function isRepost(item: Item): boolean {
  return item.text.trim().toUpperCase().startsWith('RT @');
}

/** Oldest first, id as tie-break. */
export function chronological(a: Item, b: Item): number {
  const byTime = a.createdAt.getTime() - b.createdAt.getTime();
  return byTime !== 0 ? byTime : compareItemIds(a.id, b.id);
}

function tally(summary: CycleSummary, outcome: RouteOutcome): void {
  switch (outcome.status) {
    case 'delivered':
      summary.itemsDelivered++;
      break;
    case 'queued':
      summary.itemsQueued++;
      break;
    case 'filtered':
      summary.itemsFiltered++;
      break;
    case 'duplicate':
      summary.itemsDuplicate++;
      break;
    case 'dropped':
    case 'skipped':
    case 'failed':
      summary.itemsFailed++;
      break;
  }
}

export class CycleDispatcher {
  constructor(private readonly deps: CycleDispatcherDeps) {}

  /**
   * Run one cycle. Rejects with FatalIngestionError once in-flight accounts settle
   * if the source rejected our credentials.
   */
  async runCycle(signal?: AbortSignal): Promise<CycleSummary> {
    const cycleId = randomUUID().slice(0, 8);
    const log = withCorrelationId(cycleId);
    const summary = emptySummary(cycleId);

    const accounts = await this.deps.accounts.listActive();
    log.info('Cycle started', { accounts: accounts.length });

    // Written from inside the account tasks
    const failure: { fatal: FatalIngestionError | null } = { fatal: null };

    await Promise.all(
      accounts.map((account) =>
        this.deps.gate.run(async () => {
          if (failure.fatal || signal?.aborted) {
            summary.accountsSkipped++;
            return;
          }
          try {
            await this.processAccount(account, summary, log, signal);
          } catch (error) {
            if (error instanceof FatalIngestionError) {
              failure.fatal = failure.fatal ?? error;
              return;
            }
            summary.accountsSkipped++;
            log.error('Account processing failed', {
              accountId: account.id,
              error: error instanceof Error ? error.message : String(error),
            });
          }
        })
      )
    );

    summary.finishedAt = new Date();

    const { fatal } = failure;
    if (fatal) {
      log.error('Cycle aborted: source credentials rejected', { accountId: fatal.accountId });
      throw fatal;
    }

    log.info('Cycle finished', { ...summary });
    return summary;
  }

  private async fetch(
    account: Account,
    log: winston.Logger,
    signal?: AbortSignal
  ): Promise<FetchOutcome> {
    try {
      return await withAbortableTimeout(
        (fetchSignal) => this.deps.fetcher.fetchNewItems(account, fetchSignal),
        this.deps.fetchTimeoutMs,
        `fetch @${account.id}`,
        signal
      );
    } catch (error) {
      if (!(error instanceof TimeoutError)) throw error;
      log.warn('Fetch timed out', { accountId: account.id, timeoutMs: error.timeoutMs });
      return { status: 'transient_error', message: error.message };
    }
  }

  private async processAccount(
    account: Account,
    summary: CycleSummary,
    log: winston.Logger,
    signal?: AbortSignal
  ): Promise<void> {
    const outcome = await this.fetch(account, log, signal);

    switch (outcome.status) {
      case 'not_found':
        await this.deps.accounts.deactivate(account.id);
        summary.accountsDeactivated++;
        log.warn('Account not found at source, deactivated', { accountId: account.id });
        return;
      case 'auth_failed':
        throw new FatalIngestionError(outcome.message, account.id);
      case 'rate_limited':
        summary.accountsSkipped++;
        log.warn('Source rate limited, account skipped', { accountId: account.id });
        return;
      case 'transient_error':
        summary.accountsSkipped++;
        log.warn('Fetch failed, account skipped', { accountId: account.id, error: outcome.message });
        return;
      case 'ok':
        break;
    }

    const { items } = outcome;
    const watermark = account.watermark;

    // First sight of an account: remember where we are, deliver nothing
    if (watermark === null) {
      const highest = maxItemId(items.map((i) => i.id));
      if (highest !== null) {
        await this.deps.accounts.advanceWatermark(account.id, highest);
      }
      summary.accountsInitialized++;
      log.info('Account initialized', { accountId: account.id, watermark: highest });
      return;
    }

    const fresh = items.filter((i) => isNewerThan(i.id, watermark)).sort(chronological);
    let highest = watermark;

    for (const item of fresh) {
      if (signal?.aborted) break;

      summary.itemsSeen++;
      await this.processItem(account, item, summary, log);

      if (compareItemIds(item.id, highest) > 0) {
        highest = item.id;
      }
    }

    if (highest !== watermark) {
      await this.deps.accounts.advanceWatermark(account.id, highest);
    }
    summary.accountsProcessed++;
  }

  private async processItem(
    account: Account,
    item: Item,
    summary: CycleSummary,
    log: winston.Logger
  ): Promise<void> {
    try {
      if (await this.deps.ledger.has(item.id, account.channelId)) {
        summary.itemsDuplicate++;
        return;
      }

      if (this.deps.skipReposts && isRepost(item)) {
        summary.itemsFiltered++;
        return;
      }

      const rating = await this.score(account, item, log);
      const outcome = await this.deps.router.routeItem(account, item, rating);
      tally(summary, outcome);
    } catch (error) {
      summary.itemsFailed++;
      log.error('Item processing failed', {
        accountId: account.id,
        itemId: item.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async score(account: Account, item: Item, log: winston.Logger): Promise<Rating> {
    try {
      return await withAbortableTimeout(
        (scoreSignal) => this.deps.scorer.score(item, { accountId: account.id }, scoreSignal),
        this.deps.scoreTimeoutMs,
        'score'
      );
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      log.warn('Scoring failed, using neutral rating', { itemId: item.id, error: reason });
      return neutralRating(item, `scoring failed: ${reason}`);
    }
  }
}
