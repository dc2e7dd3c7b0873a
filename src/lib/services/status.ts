/**
 * Worker status snapshot for the operator surface
 */

import type { PendingActionCounts } from '../db/repositories/pending-actions';
import type { QueueSnapshotEntry, RateLimitedPriorityQueue } from '../queue/priority-queue';
import type { CycleSummary } from '../scheduler/cycle-dispatcher';
import type { PendingActionStore } from './pending-action-store';

export interface WorkerStatus {
  running: boolean;
  dispatcherRunning: boolean;
  drainerRunning: boolean;
  fatalError: string | null;
  lastCycle: CycleSummary | null;
  queue: {
    size: number;
    cooldownRemainingMs: number;
    entries: QueueSnapshotEntry[];
  };
  pendingActions: PendingActionCounts;
}

export interface StatusSources {
  queue: RateLimitedPriorityQueue;
  pendingActions: PendingActionStore;
  running: boolean;
  dispatcherRunning: boolean;
  drainerRunning: boolean;
  fatalError: Error | null;
  lastCycle: CycleSummary | null;
}

export async function collectStatus(sources: StatusSources): Promise<WorkerStatus> {
  return {
    running: sources.running,
    dispatcherRunning: sources.dispatcherRunning,
    drainerRunning: sources.drainerRunning,
    fatalError: sources.fatalError ? sources.fatalError.message : null,
    lastCycle: sources.lastCycle,
    queue: {
      size: sources.queue.size,
      cooldownRemainingMs: sources.queue.cooldownRemainingMs(),
      entries: sources.queue.snapshot(),
    },
    pendingActions: await sources.pendingActions.countByState(),
  };
}
