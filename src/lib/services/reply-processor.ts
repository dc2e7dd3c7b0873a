/**
 * Reply Processor
 * Drives the pending-action state machine from the operator's replies:
 *
 *   pending --INTERESTING--> interesting
 *   pending --NOTHING--> filtered
 *   pending --BUILD--> awaiting_requirements --REQUIREMENTS--> build_succeeded | build_failed
 *
 * Every transition is a compare-and-set, so concurrent replies cannot both apply.
 * A build claim left behind by an earlier process, or older than the build timeout,
 * can be claimed again by the next reply and is failed by the maintenance sweep.
 */

import type { BuildCollaborator, BuildResult } from '../build/build-client';
import { isTerminalState, type PendingAction, type PendingActionState } from '../db/models';
import type { ReplyTransport } from '../notify/types';
import { logError, logInfo, logWarn } from '../observability/logger';
import type { PendingActionStore } from './pending-action-store';
import type { ItemRouter } from './router';

export const REPLY_ACTIONS = ['INTERESTING', 'NOTHING', 'BUILD', 'REQUIREMENTS'] as const;
export type ReplyAction = (typeof REPLY_ACTIONS)[number];

export const DEFAULT_REQUIREMENTS = 'no customization';

const ACTION_ALIASES: Record<string, ReplyAction> = {
  '1': 'INTERESTING',
  I: 'INTERESTING',
  INTERESTING: 'INTERESTING',
  '2': 'NOTHING',
  N: 'NOTHING',
  NOTHING: 'NOTHING',
  '3': 'BUILD',
  B: 'BUILD',
  BUILD: 'BUILD',
  REQUIREMENTS: 'REQUIREMENTS',
};

const DEFAULT_TOKENS = new Set(['', 'DEFAULT', 'SKIP']);

export interface ReplyInput {
  alertId: string;
  action?: string;
  text?: string;
}

export interface ReplyCommand {
  action: ReplyAction;
  requirements?: string;
}

export type ReplyResult =
  | { status: 'applied'; action: ReplyAction; state: PendingActionState }
  | { status: 'not_found' }
  | { status: 'terminal'; state: PendingActionState }
  | { status: 'invalid_action'; state: PendingActionState; action: string }
  | { status: 'conflict'; state: PendingActionState };

/**
 * Requirements text, with the explicit default token mapped to the sentinel
 */
export function normalizeRequirements(text: string | undefined): string {
  const trimmed = (text ?? '').trim();
  return DEFAULT_TOKENS.has(trimmed.toUpperCase()) ? DEFAULT_REQUIREMENTS : trimmed;
}

/**
 * Map a reply to a command. Free text counts as requirements only while they are awaited.
 */
export function parseReplyAction(
  input: Omit<ReplyInput, 'alertId'>,
  state: PendingActionState
): ReplyCommand | null {
  const keyword = (input.action ?? input.text ?? '').trim().toUpperCase();
  const action = Object.prototype.hasOwnProperty.call(ACTION_ALIASES, keyword)
    ? ACTION_ALIASES[keyword]
    : undefined;

  if (action === 'REQUIREMENTS') {
    return { action, requirements: normalizeRequirements(input.text) };
  }

  if (action) {
    return { action };
  }

  if (input.action === undefined && state === 'awaiting_requirements') {
    return { action: 'REQUIREMENTS', requirements: normalizeRequirements(input.text) };
  }

  return null;
}

export interface ReplyProcessorDeps {
  store: PendingActionStore;
  router: ItemRouter;
  transport: ReplyTransport;
  builder: BuildCollaborator;
  interestingChannelId: string;
  buildTimeoutMs: number;
  clock?: () => Date;
}

export class ReplyProcessor {
  private readonly clock: () => Date;
  private readonly startedAt: Date;

  constructor(private readonly deps: ReplyProcessorDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.startedAt = this.clock();
  }

  async handleReply(input: ReplyInput): Promise<ReplyResult> {
    const current = await this.deps.store.get(input.alertId);
    if (!current) {
      return { status: 'not_found' };
    }

    if (isTerminalState(current.state)) {
      logWarn('Reply to a closed alert ignored', {
        alertId: current.alertId,
        state: current.state,
        action: input.action ?? input.text,
      });
      return { status: 'terminal', state: current.state };
    }

    const command = parseReplyAction(input, current.state);
    if (!command) {
      return invalid(current, input.action ?? input.text ?? '');
    }

    if (current.state === 'pending') {
      switch (command.action) {
        case 'INTERESTING':
          return this.markInteresting(current);
        case 'NOTHING':
          return this.dismiss(current);
        case 'BUILD':
          return this.requestRequirements(current);
        case 'REQUIREMENTS':
          return invalid(current, command.action);
      }
    }

    if (command.action === 'REQUIREMENTS') {
      return this.runBuild(current, command.requirements ?? DEFAULT_REQUIREMENTS);
    }

    return invalid(current, command.action);
  }

  /**
   * Close pending alerts older than the TTL. Returns how many were expired.
   */
  async expireStale(ttlHours: number, now: Date = new Date()): Promise<number> {
    const cutoff = new Date(now.getTime() - ttlHours * 60 * 60 * 1000);
    const stale = await this.deps.store.listOlderThan('pending', cutoff);

    let expired = 0;
    for (const action of stale) {
      const updated = await this.deps.store.transition(
        action.alertId,
        { state: 'pending' },
        { state: 'filtered', outcome: 'expired' }
      );
      if (updated) expired++;
    }

    if (expired > 0) {
      logInfo('Expired stale alerts', { expired, ttlHours });
    }
    return expired;
  }

  /**
   * Fail builds whose claim was abandoned. Returns how many were failed.
   */
  async failInterruptedBuilds(now: Date = this.clock()): Promise<number> {
    const cutoff = this.claimCutoff(now);
    const candidates = await this.deps.store.listOlderThan('awaiting_requirements', cutoff);

    let failed = 0;
    for (const action of candidates) {
      const claimedAt = action.buildStartedAt;
      if (!claimedAt || claimedAt >= cutoff) continue;

      const updated = await this.deps.store.transition(
        action.alertId,
        { state: 'awaiting_requirements', claimedAt },
        { state: 'build_failed', outcome: 'interrupted' }
      );
      if (!updated) continue;

      failed++;
      logWarn('Interrupted build marked failed', { alertId: action.alertId, claimedAt });
      await this.notify(
        `Build failed for alert ${action.alertId}`,
        'Build failed: interrupted before a result was recorded'
      );
    }
    return failed;
  }

  /** Claims made before this instant belong to a build that is no longer running. */
  private claimCutoff(now: Date): Date {
    return new Date(Math.max(now.getTime() - this.deps.buildTimeoutMs, this.startedAt.getTime()));
  }

  private async markInteresting(current: PendingAction): Promise<ReplyResult> {
    const updated = await this.deps.store.transition(
      current.alertId,
      { state: 'pending' },
      { state: 'interesting' }
    );
    if (!updated) return { status: 'conflict', state: current.state };

    const forward = await this.deps.router.sendToChannel(
      'urgent',
      this.deps.interestingChannelId,
      current.accountId,
      current.item,
      current.rating
    );
    const forwarded = forward.status === 'delivered' || forward.status === 'duplicate';
    const outcome = forwarded ? 'forwarded' : 'forward_failed';

    await this.deps.store.transition(current.alertId, { state: 'interesting' }, { outcome });
    logInfo('Alert marked interesting', { alertId: current.alertId, outcome });

    return { status: 'applied', action: 'INTERESTING', state: 'interesting' };
  }

  private async dismiss(current: PendingAction): Promise<ReplyResult> {
    const updated = await this.deps.store.transition(
      current.alertId,
      { state: 'pending' },
      { state: 'filtered', outcome: 'dismissed' }
    );
    if (!updated) return { status: 'conflict', state: current.state };

    logInfo('Alert dismissed', {
      alertId: current.alertId,
      itemId: current.item.id,
      accountId: current.accountId,
    });
    return { status: 'applied', action: 'NOTHING', state: 'filtered' };
  }

  private async requestRequirements(current: PendingAction): Promise<ReplyResult> {
    const updated = await this.deps.store.transition(
      current.alertId,
      { state: 'pending' },
      { state: 'awaiting_requirements' }
    );
    if (!updated) return { status: 'conflict', state: current.state };

    await this.notify(
      `Build requested for alert ${current.alertId}`,
      [
        `Build requested for @${current.accountId}: ${current.rating.summary}`,
        '',
        'Reply with your requirements, or DEFAULT to build with no customization.',
        `Alert id: ${current.alertId}`,
      ].join('\n')
    );

    return { status: 'applied', action: 'BUILD', state: 'awaiting_requirements' };
  }

  private async runBuild(current: PendingAction, requirements: string): Promise<ReplyResult> {
    // Stamping the claim time claims the build; a live claim blocks a second one
    const claimedAt = this.clock();
    const claimed = await this.deps.store.transition(
      current.alertId,
      { state: 'awaiting_requirements', claimableBefore: this.claimCutoff(claimedAt) },
      { requirements, buildStartedAt: claimedAt }
    );
    if (!claimed) return { status: 'conflict', state: current.state };

    if (current.buildStartedAt) {
      logWarn('Abandoned build claim taken over', {
        alertId: current.alertId,
        previousClaim: current.buildStartedAt,
      });
    }
    logInfo('Build started', { alertId: current.alertId, requirements });

    let result: BuildResult;
    try {
      result = await this.deps.builder.build(current.item, current.rating, requirements);
    } catch (error) {
      logError('Build collaborator threw', error, { alertId: current.alertId });
      result = { status: 'failure', reason: error instanceof Error ? error.message : String(error) };
    }

    const state: PendingActionState = result.status === 'success' ? 'build_succeeded' : 'build_failed';
    const outcome = result.status === 'success' ? result.artifactUrl : result.reason;

    const finished = await this.deps.store.transition(
      current.alertId,
      { state: 'awaiting_requirements', claimedAt },
      { state, outcome }
    );
    if (!finished) {
      logError('Build outcome could not be recorded', undefined, { alertId: current.alertId, state });
      return { status: 'conflict', state: 'awaiting_requirements' };
    }

    await this.notify(
      result.status === 'success'
        ? `Build finished for alert ${current.alertId}`
        : `Build failed for alert ${current.alertId}`,
      result.status === 'success'
        ? `Build succeeded: ${result.artifactUrl}`
        : `Build failed: ${result.reason}`
    );

    return { status: 'applied', action: 'REQUIREMENTS', state };
  }

  private async notify(subject: string, text: string): Promise<void> {
    try {
      const sent = await this.deps.transport.notify(subject, text);
      if (!sent) logWarn('Operator notification not sent', { subject });
    } catch (error) {
      logError('Operator notification failed', error, { subject });
    }
  }
}

function invalid(current: PendingAction, action: string): ReplyResult {
  return { status: 'invalid_action', state: current.state, action };
}
