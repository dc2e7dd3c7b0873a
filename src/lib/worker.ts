/**
 * Worker
 * Builds every long-lived object once and owns their lifecycle:
 * the dispatcher loop, the urgent drainer, the maintenance cron and the HTTP server.
 */

import type { Server } from 'http';
import type { ScheduledTask } from 'node-cron';
import type { BuildCollaborator } from './build/build-client';
import { HttpBuildClient, UnavailableBuildClient } from './build/build-client';
import type { Settings } from './config/settings';
import { createSupabaseClient } from './db/client';
import { SupabaseAccountRepository, type AccountRepository } from './db/repositories/accounts';
import { SupabaseChannelRepository, type ChannelRepository } from './db/repositories/channels';
import { SupabaseDeliveryLedger, type DeliveryLedger } from './db/repositories/delivery-ledger';
import {
  InMemoryAccountRepository,
  InMemoryChannelRepository,
  InMemoryDeliveryLedger,
  InMemoryPendingActionRepository,
} from './db/repositories/in-memory';
import {
  SupabasePendingActionRepository,
  type PendingActionRepository,
} from './db/repositories/pending-actions';
import { createTransport, isEmailConfigured, Mailer } from './email/nodemailer-sender';
import { EmailReplyTransport, EmailUrgentSender } from './email/urgent-sender';
import type { FatalIngestionError } from './errors';
import { createHttpApp } from './http/server';
import { TwitterApiFetcher } from './ingest/source-fetcher';
import type { SourceFetcher } from './ingest/types';
import type { ChannelSender, ReplyTransport, UrgentSender } from './notify/types';
import { WebhookChannelSender } from './notify/webhook-sender';
import { NotificationDrainer } from './queue/notification-drainer';
import { RateLimitedPriorityQueue } from './queue/priority-queue';
import { NeutralScorer, OpenAIScorer, type Scorer } from './ranking/scorer';
import { assertTierThresholds } from './ranking/tiers';
import {
  scheduleMaintenance,
  startDispatcherLoop,
  type DispatcherLoop,
} from './scheduler/cron-jobs';
import { CycleDispatcher, type CycleSummary } from './scheduler/cycle-dispatcher';
import { PendingActionStore } from './services/pending-action-store';
import { ReplyProcessor } from './services/reply-processor';
import { ItemRouter } from './services/router';
import { collectStatus, type WorkerStatus } from './services/status';
import { ConcurrencyGate } from './utils/concurrency-gate';
import { logError, logInfo, logWarn } from './observability/logger';

export interface Repositories {
  accounts: AccountRepository;
  channels: ChannelRepository;
  ledger: DeliveryLedger;
  pendingActions: PendingActionRepository;
}

export interface Collaborators {
  fetcher: SourceFetcher;
  scorer: Scorer;
  channelSender: ChannelSender;
  urgentSender: UrgentSender;
  replyTransport: ReplyTransport;
  builder: BuildCollaborator;
}

export interface StartOptions {
  http?: boolean;
  cron?: boolean;
}

export interface Worker {
  readonly repositories: Repositories;
  readonly queue: RateLimitedPriorityQueue;
  readonly dispatcher: CycleDispatcher;
  readonly drainer: NotificationDrainer;
  readonly replies: ReplyProcessor;
  start(options?: StartOptions): Promise<void>;
  stop(): Promise<void>;
  status(): Promise<WorkerStatus>;
}

/**
 * Supabase when configured, in-memory otherwise (dev only: state lost on restart)
 */
export function createRepositories(settings: Settings): Repositories {
  if (!settings.supabase) {
    logWarn('Supabase not configured, using in-memory repositories');
    return {
      accounts: new InMemoryAccountRepository(),
      channels: new InMemoryChannelRepository(),
      ledger: new InMemoryDeliveryLedger(),
      pendingActions: new InMemoryPendingActionRepository(),
    };
  }

  const db = createSupabaseClient(settings.supabase);
  return {
    accounts: new SupabaseAccountRepository(db),
    channels: new SupabaseChannelRepository(db),
    ledger: new SupabaseDeliveryLedger(db),
    pendingActions: new SupabasePendingActionRepository(db),
  };
}

export function createCollaborators(settings: Settings): Collaborators {
  const mailer = isEmailConfigured(settings.email)
    ? new Mailer(createTransport(settings.email), settings.email.from)
    : null;

  if (!mailer || !settings.email.alertRecipient) {
    logWarn('Urgent email channel not configured, urgent items go to the premium channel');
  }

  let scorer: Scorer;
  if (settings.scoring.apiKey) {
    scorer = new OpenAIScorer({
      apiKey: settings.scoring.apiKey,
      baseUrl: settings.scoring.baseUrl,
      model: settings.scoring.model,
    });
  } else {
    logWarn('SCORING_API_KEY not set, every item gets the neutral rating');
    scorer = new NeutralScorer();
  }

  return {
    fetcher: new TwitterApiFetcher({
      apiKey: settings.source.apiKey,
      baseUrl: settings.source.baseUrl,
      maxItems: settings.source.maxItemsPerFetch,
      timeoutMs: settings.source.fetchTimeoutMs,
    }),
    scorer,
    channelSender: new WebhookChannelSender({ timeoutMs: settings.channels.sendTimeoutMs }),
    urgentSender: new EmailUrgentSender(mailer, settings.email.alertRecipient),
    replyTransport: new EmailReplyTransport(mailer, settings.email.alertRecipient),
    builder: settings.build.serviceUrl
      ? new HttpBuildClient({
          serviceUrl: settings.build.serviceUrl,
          timeoutMs: settings.build.timeoutMs,
        })
      : new UnavailableBuildClient(),
  };
}

/**
 * Wire the worker. Repositories and collaborators come from settings unless supplied.
 */
export function createWorker(
  settings: Settings,
  deps: { repositories?: Repositories; collaborators?: Collaborators } = {}
): Worker {
  const thresholds = assertTierThresholds(settings.tiers);
  const repositories = deps.repositories ?? createRepositories(settings);
  const collaborators = deps.collaborators ?? createCollaborators(settings);

  const queue = new RateLimitedPriorityQueue({
    cooldownMs: settings.urgent.cooldownMs,
    maxQueueSize: settings.urgent.maxQueueSize,
  });
  const pendingStore = new PendingActionStore(repositories.pendingActions);
  const drainer = new NotificationDrainer({
    queue,
    urgentSender: collaborators.urgentSender,
    ledger: repositories.ledger,
    pendingActions: pendingStore,
    transport: collaborators.replyTransport,
    intervalMs: settings.urgent.drainIntervalMs,
    sendTimeoutMs: settings.channels.sendTimeoutMs,
  });
  const router = new ItemRouter({
    channels: repositories.channels,
    ledger: repositories.ledger,
    channelSender: collaborators.channelSender,
    urgentSender: collaborators.urgentSender,
    queue,
    drainer,
    thresholds,
    premiumChannelId: settings.channels.premiumChannelId,
    sendTimeoutMs: settings.channels.sendTimeoutMs,
  });
  const dispatcher = new CycleDispatcher({
    accounts: repositories.accounts,
    ledger: repositories.ledger,
    fetcher: collaborators.fetcher,
    scorer: collaborators.scorer,
    router,
    gate: new ConcurrencyGate(settings.scheduler.maxConcurrentAccounts),
    fetchTimeoutMs: settings.source.fetchTimeoutMs,
    scoreTimeoutMs: settings.scoring.timeoutMs,
    skipReposts: settings.scheduler.skipReposts,
  });
  const replies = new ReplyProcessor({
    store: pendingStore,
    router,
    transport: collaborators.replyTransport,
    builder: collaborators.builder,
    interestingChannelId: settings.channels.interestingChannelId,
    buildTimeoutMs: settings.build.timeoutMs,
  });

  let controller: AbortController | null = null;
  let loop: DispatcherLoop | null = null;
  let maintenance: ScheduledTask | null = null;
  let server: Server | null = null;
  let fatalError: FatalIngestionError | null = null;
  let lastCycle: CycleSummary | null = null;

  const status = () =>
    collectStatus({
      queue,
      pendingActions: pendingStore,
      running: controller !== null,
      dispatcherRunning: loop?.running ?? false,
      drainerRunning: drainer.running,
      fatalError,
      lastCycle,
    });

  const onFatal = (error: FatalIngestionError) => {
    fatalError = error;
    logError('Ingestion stopped: source credentials rejected', error, { accountId: error.accountId });
  };

  return {
    repositories,
    queue,
    dispatcher,
    drainer,
    replies,
    status,

    async start(options: StartOptions = {}) {
      if (controller) return;
      controller = new AbortController();
      fatalError = null;

      drainer.start();
      loop = startDispatcherLoop({
        dispatcher,
        intervalMs: settings.scheduler.checkIntervalMs,
        signal: controller.signal,
        onSummary: (summary) => {
          lastCycle = summary;
        },
        onFatal,
      });

      if (options.cron !== false) {
        maintenance = scheduleMaintenance(
          {
            ledger: repositories.ledger,
            replies,
            ledgerRetentionDays: settings.scheduler.ledgerRetentionDays,
            pendingTtlHours: settings.scheduler.pendingTtlHours,
          },
          settings.scheduler.maintenanceCron
        );
      }

      if (options.http !== false) {
        const app = createHttpApp({ replies, status });
        const listening = app.listen(settings.http.port);
        server = listening;
        await new Promise<void>((resolve, reject) => {
          listening.once('listening', resolve);
          listening.once('error', reject);
        });
        logInfo('Operator HTTP server listening', { port: settings.http.port });
      }

      logInfo('Worker started');
    },

    async stop() {
      if (!controller) return;
      controller.abort();

      await loop?.stop();
      await drainer.stop();
      maintenance?.stop();

      const closing = server;
      if (closing) {
        await new Promise<void>((resolve, reject) => {
          closing.close((error) => (error ? reject(error) : resolve()));
        });
      }

      controller = null;
      loop = null;
      maintenance = null;
      server = null;
      logInfo('Worker stopped');
    },
  };
}
