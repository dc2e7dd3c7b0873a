/**
 * Pending-Action Store
 * Read-through cache over the durable pending-action repository.
 * The repository is the source of truth; a failed compare-and-set evicts the cached copy.
 * Only open alerts are cached: a record leaves the cache once it reaches a terminal state.
 */

import { isTerminalState, type PendingAction, type PendingActionState } from '../db/models';
import type {
  CreatePendingActionInput,
  PendingActionCounts,
  PendingActionExpectation,
  PendingActionPatch,
  PendingActionRepository,
} from '../db/repositories/pending-actions';

export class PendingActionStore {
  private readonly cache = new Map<string, PendingAction>();

  constructor(private readonly repository: PendingActionRepository) {}

  async create(input: CreatePendingActionInput): Promise<PendingAction> {
    const action = await this.repository.insert(input);
    this.remember(action);
    return action;
  }

  async get(alertId: string): Promise<PendingAction | null> {
    const cached = this.cache.get(alertId);
    if (cached) return cached;

    const action = await this.repository.findById(alertId);
    if (action) this.remember(action);
    return action;
  }

  /**
   * Apply the patch if the stored record still matches. Null when another writer got there first.
   */
  async transition(
    alertId: string,
    expected: PendingActionExpectation,
    patch: PendingActionPatch
  ): Promise<PendingAction | null> {
    const updated = await this.repository.compareAndSet(alertId, expected, patch);
    if (updated) {
      this.remember(updated);
    } else {
      this.cache.delete(alertId);
    }
    return updated;
  }

  async listOlderThan(state: PendingActionState, createdBefore: Date): Promise<PendingAction[]> {
    return this.repository.findByStateOlderThan(state, createdBefore);
  }

  async countByState(): Promise<PendingActionCounts> {
    return this.repository.countByState();
  }

  get cachedCount(): number {
    return this.cache.size;
  }

  private remember(action: PendingAction): void {
    if (isTerminalState(action.state)) {
      this.cache.delete(action.alertId);
    } else {
      this.cache.set(action.alertId, action);
    }
  }
}
