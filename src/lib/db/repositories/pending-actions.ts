/**
 * Pending actions repository
 * Durable record of urgent alerts awaiting a human decision.
 * Every mutation is a compare-and-set on the current state.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import {
  fromItemSnapshot,
  toItemSnapshot,
  type Item,
  type PendingAction,
  type PendingActionRow,
  type PendingActionState,
  type Rating,
} from '../models';

export interface CreatePendingActionInput {
  alertId: string;
  accountId: string;
  item: Item;
  rating: Rating;
}

export interface PendingActionExpectation {
  state: PendingActionState;
  /** Build not claimed, or claimed before this instant (an abandoned claim). */
  claimableBefore?: Date;
  /** Build claimed at exactly this instant. */
  claimedAt?: Date;
}

export interface PendingActionPatch {
  state?: PendingActionState;
  requirements?: string;
  outcome?: string;
  buildStartedAt?: Date;
}

export type PendingActionCounts = Record<PendingActionState, number>;

export interface PendingActionRepository {
  insert(input: CreatePendingActionInput): Promise<PendingAction>;

  findById(alertId: string): Promise<PendingAction | null>;

  /** Apply patch only if the stored record matches the expectation. Null when it did not. */
  compareAndSet(
    alertId: string,
    expected: PendingActionExpectation,
    patch: PendingActionPatch
  ): Promise<PendingAction | null>;

  findByStateOlderThan(state: PendingActionState, createdBefore: Date): Promise<PendingAction[]>;

  countByState(): Promise<PendingActionCounts>;
}

export function emptyCounts(): PendingActionCounts {
  return {
    pending: 0,
    interesting: 0,
    filtered: 0,
    awaiting_requirements: 0,
    build_succeeded: 0,
    build_failed: 0,
  };
}

export function rowToPendingAction(row: PendingActionRow): PendingAction {
  return {
    alertId: row.alert_id,
    accountId: row.account_id,
    item: fromItemSnapshot(row.item),
    rating: row.rating,
    state: row.state,
    requirements: row.requirements,
    outcome: row.outcome,
    buildStartedAt: row.build_started_at ? new Date(row.build_started_at) : null,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export class SupabasePendingActionRepository implements PendingActionRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(input: CreatePendingActionInput): Promise<PendingAction> {
    const { data, error } = await this.db
      .from('pending_actions')
      .insert({
        alert_id: input.alertId,
        account_id: input.accountId,
        item: toItemSnapshot(input.item),
        rating: input.rating,
        state: 'pending',
      })
      .select()
      .single();

    if (error) throw new Error(`Failed to create pending action: ${error.message}`);
    const row: PendingActionRow = data;
    return rowToPendingAction(row);
  }

  async findById(alertId: string): Promise<PendingAction | null> {
    const { data, error } = await this.db
      .from('pending_actions')
      .select('*')
      .eq('alert_id', alertId)
      .maybeSingle();

    if (error) throw new Error(`Failed to fetch pending action ${alertId}: ${error.message}`);
    const row: PendingActionRow | null = data;
    return row ? rowToPendingAction(row) : null;
  }

  async compareAndSet(
    alertId: string,
    expected: PendingActionExpectation,
    patch: PendingActionPatch
  ): Promise<PendingAction | null> {
    let query = this.db
      .from('pending_actions')
      .update({
        state: patch.state,
        requirements: patch.requirements,
        outcome: patch.outcome,
        build_started_at: patch.buildStartedAt?.toISOString(),
        updated_at: new Date().toISOString(),
      })
      .eq('alert_id', alertId)
      .eq('state', expected.state);

    if (expected.claimableBefore) {
      query = query.or(
        `build_started_at.is.null,build_started_at.lt.${expected.claimableBefore.toISOString()}`
      );
    }
    if (expected.claimedAt) {
      query = query.eq('build_started_at', expected.claimedAt.toISOString());
    }

    const { data, error } = await query.select();

    if (error) throw new Error(`Failed to update pending action ${alertId}: ${error.message}`);
    const rows: PendingActionRow[] = data ?? [];
    return rows.length > 0 ? rowToPendingAction(rows[0]) : null;
  }

  async findByStateOlderThan(
    state: PendingActionState,
    createdBefore: Date
  ): Promise<PendingAction[]> {
    const { data, error } = await this.db
      .from('pending_actions')
      .select('*')
      .eq('state', state)
      .lt('created_at', createdBefore.toISOString())
      .order('created_at', { ascending: true });

    if (error) throw new Error(`Failed to list pending actions: ${error.message}`);
    const rows: PendingActionRow[] = data ?? [];
    return rows.map(rowToPendingAction);
  }

  async countByState(): Promise<PendingActionCounts> {
    const { data, error } = await this.db.from('pending_actions').select('state');

    if (error) throw new Error(`Failed to count pending actions: ${error.message}`);
    const rows: Pick<PendingActionRow, 'state'>[] = data ?? [];
    const counts = emptyCounts();
    for (const row of rows) {
      counts[row.state] += 1;
    }
    return counts;
  }
}
