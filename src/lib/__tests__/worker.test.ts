/**
 * Tests for worker wiring and lifecycle
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadSettings } from '../config/settings';
import { InvalidTierThresholdsError } from '../errors';
import {
  InMemoryAccountRepository,
  InMemoryChannelRepository,
  InMemoryDeliveryLedger,
  InMemoryPendingActionRepository,
} from '../db/repositories/in-memory';
import { createWorker, type Collaborators, type Repositories, type Worker } from '../worker';
import {
  FakeBuilder,
  FakeChannelSender,
  FakeFetcher,
  FakeReplyTransport,
  FakeScorer,
  FakeUrgentSender,
  makeItem,
} from './helpers';

describe('createWorker', () => {
  let repositories: Repositories;
  let fetcher: FakeFetcher;
  let channelSender: FakeChannelSender;
  let collaborators: Collaborators;
  let worker: Worker;

  beforeEach(async () => {
    repositories = {
      accounts: new InMemoryAccountRepository(),
      channels: new InMemoryChannelRepository(),
      ledger: new InMemoryDeliveryLedger(),
      pendingActions: new InMemoryPendingActionRepository(),
    };
    fetcher = new FakeFetcher();
    channelSender = new FakeChannelSender();
    collaborators = {
      fetcher,
      scorer: new FakeScorer(),
      channelSender,
      urgentSender: new FakeUrgentSender(),
      replyTransport: new FakeReplyTransport(),
      builder: new FakeBuilder(),
    };

    await repositories.channels.upsert({
      id: 'general',
      name: 'General',
      webhookUrl: 'https://hooks.example.test/general',
    });
    await repositories.accounts.register({ id: 'alice', channelId: 'general' });
    await repositories.accounts.advanceWatermark('alice', '100');

    worker = createWorker(loadSettings({ SOURCE_API_KEY: 'test-source-key' }), {
      repositories,
      collaborators,
    });
  });

  afterEach(async () => {
    await worker.stop();
  });

  it('should reject inverted tier thresholds', () => {
    const settings = loadSettings({
      SOURCE_API_KEY: 'test-source-key',
      TIER_PREMIUM_MIN: '9',
      TIER_URGENT_MIN: '8',
    });

    expect(() => createWorker(settings, { repositories, collaborators })).toThrow(
      InvalidTierThresholdsError
    );
  });

  it('should run a cycle on start and record its summary', async () => {
    fetcher.outcomes.set('alice', { status: 'ok', items: [makeItem('101')] });

    await worker.start({ http: false, cron: false });

    await vi.waitFor(async () => {
      expect((await worker.status()).lastCycle).not.toBeNull();
    });

    const status = await worker.status();
    expect(status.running).toBe(true);
    expect(status.drainerRunning).toBe(true);
    expect(status.lastCycle?.itemsDelivered).toBe(1);
    expect(channelSender.sent).toEqual([{ channelId: 'general', itemId: '101' }]);
    expect((await repositories.accounts.findById('alice'))?.watermark).toBe('101');
  });

  it('should stop ingestion when credentials are rejected', async () => {
    fetcher.outcomes.set('alice', { status: 'auth_failed', message: 'HTTP 401' });

    await worker.start({ http: false, cron: false });

    await vi.waitFor(async () => {
      expect((await worker.status()).fatalError).toBe('HTTP 401');
    });
    expect((await worker.status()).dispatcherRunning).toBe(false);
  });

  it('should release its timers on stop', async () => {
    await worker.start({ http: false, cron: false });
    await worker.stop();

    const status = await worker.status();
    expect(status.running).toBe(false);
    expect(status.drainerRunning).toBe(false);
  });
});
