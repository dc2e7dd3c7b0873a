/**
 * Scheduled Jobs
 * The dispatcher interval loop and the daily maintenance cron
 */

import cron, { type ScheduledTask } from 'node-cron';
import type { DeliveryLedger } from '../db/repositories/delivery-ledger';
import { FatalIngestionError } from '../errors';
import type { ReplyProcessor } from '../services/reply-processor';
import { logInfo, logError, logDebug } from '../observability/logger';
import type { CycleDispatcher, CycleSummary } from './cycle-dispatcher';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface MaintenanceDeps {
  ledger: DeliveryLedger;
  replies: ReplyProcessor;
  ledgerRetentionDays: number;
  pendingTtlHours: number;
}

export interface MaintenanceResult {
  prunedRecords: number;
  expiredAlerts: number;
  interruptedBuilds: number;
}

/**
 * Prune old ledger rows, expire stale pending alerts and fail abandoned builds
 */
export async function runMaintenance(
  deps: MaintenanceDeps,
  now: Date = new Date()
): Promise<MaintenanceResult> {
  const prunedRecords = await deps.ledger.prune(
    new Date(now.getTime() - deps.ledgerRetentionDays * DAY_MS)
  );
  const expiredAlerts = await deps.replies.expireStale(deps.pendingTtlHours, now);
  const interruptedBuilds = await deps.replies.failInterruptedBuilds(now);

  return { prunedRecords, expiredAlerts, interruptedBuilds };
}

/**
 * Daily maintenance job
 * Cron pattern from MAINTENANCE_CRON (default "0 3 * * *")
 */
export function scheduleMaintenance(deps: MaintenanceDeps, cronPattern: string): ScheduledTask {
  if (!cron.validate(cronPattern)) {
    throw new Error(`Invalid maintenance cron pattern: ${cronPattern}`);
  }

  logInfo('Scheduling maintenance', { pattern: cronPattern });

  return cron.schedule(cronPattern, async () => {
    logInfo('Maintenance cron triggered');

    try {
      const result = await runMaintenance(deps);
      logInfo('Maintenance completed', { ...result });
    } catch (error) {
      logError('Maintenance cron failed', error);
    }
  });
}

export interface DispatcherLoopOptions {
  dispatcher: CycleDispatcher;
  intervalMs: number;
  signal: AbortSignal;
  onSummary?: (summary: CycleSummary) => void;
  onFatal: (error: FatalIngestionError) => void;
}

export interface DispatcherLoop {
  readonly running: boolean;
  stop(): Promise<void>;
}

/**
 * Run a cycle now and then every intervalMs. A tick that finds the previous
 * cycle still running is skipped. A fatal ingestion error ends the loop.
 */
export function startDispatcherLoop(options: DispatcherLoopOptions): DispatcherLoop {
  const { dispatcher, intervalMs, signal, onSummary, onFatal } = options;
  let current: Promise<void> | null = null;
  let timer: NodeJS.Timeout | null = null;

  const halt = () => {
    if (timer) {
      clearInterval(timer);
      timer = null;
    }
  };

  const tick = () => {
    if (current) {
      logDebug('Previous cycle still running, tick skipped');
      return;
    }
    if (signal.aborted) return;

    current = dispatcher
      .runCycle(signal)
      .then((summary) => onSummary?.(summary))
      .catch((error: unknown) => {
        if (error instanceof FatalIngestionError) {
          halt();
          onFatal(error);
          return;
        }
        logError('Cycle failed', error);
      })
      .finally(() => {
        current = null;
      });
  };

  timer = setInterval(tick, intervalMs);
  tick();

  logInfo('Dispatcher loop started', { intervalMs });

  return {
    get running() {
      return timer !== null;
    },
    async stop() {
      halt();
      if (current) await current;
    },
  };
}
