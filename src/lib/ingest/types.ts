import type { Account, Item } from '../db/models';

/** Outcome of fetching one account's recent items. Each failure mode is distinct. */
export type FetchOutcome =
  | { status: 'ok'; items: Item[] }
  | { status: 'not_found' }
  | { status: 'auth_failed'; message: string }
  | { status: 'rate_limited'; retryAfterSeconds?: number }
  | { status: 'transient_error'; message: string };

export interface SourceFetcher {
  fetchNewItems(account: Account, signal?: AbortSignal): Promise<FetchOutcome>;
}
