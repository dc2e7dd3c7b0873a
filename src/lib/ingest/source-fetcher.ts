/**
 * Source API Fetcher
 * Fetches an account's latest posts and maps HTTP failures to FetchOutcome variants
 */

import { z } from 'zod';
import type { Account, Item } from '../db/models';
import { isItemId } from '../utils/item-id';
import { HttpStatusError, isRetryableError, retryWithBackoff } from '../utils/retry';
import { logDebug, logWarn } from '../observability/logger';
import type { FetchOutcome, SourceFetcher } from './types';

export interface SourceFetcherOptions {
  apiKey: string;
  baseUrl: string;
  maxItems: number;
  timeoutMs: number;
  maxRetries?: number;
  initialRetryDelayMs?: number;
}

const metricsSchema = z
  .object({
    like_count: z.number().optional(),
    retweet_count: z.number().optional(),
    reply_count: z.number().optional(),
  })
  .optional();

// Both the flat and the public_metrics shapes are seen in the wild
const rawPostSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  text: z.string().default(''),
  createdAt: z.string().optional(),
  created_at: z.string().optional(),
  url: z.string().optional(),
  likeCount: z.number().optional(),
  retweetCount: z.number().optional(),
  replyCount: z.number().optional(),
  public_metrics: metricsSchema,
});

type RawPost = z.infer<typeof rawPostSchema>;

const RETRYABLE_STATUSES = [429, 500, 502, 503, 504];

const responseSchema = z.union([
  z.object({ data: z.object({ tweets: z.array(z.unknown()) }) }),
  z.object({ tweets: z.array(z.unknown()) }),
  z.object({ data: z.array(z.unknown()) }),
  z.array(z.unknown()),
]);

/**
 * Extract the post list from any of the accepted response envelopes
 */
function extractPosts(body: unknown): unknown[] {
  const parsed = responseSchema.safeParse(body);
  if (!parsed.success) return [];
  const value = parsed.data;
  if (Array.isArray(value)) return value;
  if ('tweets' in value) return value.tweets;
  if (Array.isArray(value.data)) return value.data;
  return value.data.tweets;
}

export function toItem(raw: RawPost, accountId: string): Item | null {
  if (!isItemId(raw.id) || raw.text.trim() === '') {
    return null;
  }

  const createdRaw = raw.createdAt ?? raw.created_at;
  const createdAt = createdRaw ? new Date(createdRaw) : new Date();

  return {
    id: raw.id,
    accountId,
    text: raw.text,
    createdAt: Number.isNaN(createdAt.getTime()) ? new Date() : createdAt,
    url: raw.url ?? `https://x.com/${accountId}/status/${raw.id}`,
    metrics: {
      likes: raw.likeCount ?? raw.public_metrics?.like_count ?? 0,
      reposts: raw.retweetCount ?? raw.public_metrics?.retweet_count ?? 0,
      replies: raw.replyCount ?? raw.public_metrics?.reply_count ?? 0,
    },
  };
}

export function parseItems(body: unknown, accountId: string): Item[] {
  const items: Item[] = [];
  for (const entry of extractPosts(body)) {
    const parsed = rawPostSchema.safeParse(entry);
    if (!parsed.success) {
      logWarn('Skipping unparseable post', { accountId });
      continue;
    }
    const item = toItem(parsed.data, accountId);
    if (item) items.push(item);
  }
  return items;
}

export class TwitterApiFetcher implements SourceFetcher {
  constructor(private readonly options: SourceFetcherOptions) {}

  async fetchNewItems(account: Account, signal?: AbortSignal): Promise<FetchOutcome> {
    const url = new URL('/twitter/user/last_tweets', this.options.baseUrl);
    url.searchParams.set('userName', account.id);
    url.searchParams.set('max_results', String(this.options.maxItems));

    const attempt = async (): Promise<Response> => {
      signal?.throwIfAborted();
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);
      const onAbort = () => controller.abort();
      signal?.addEventListener('abort', onAbort, { once: true });

      try {
        const response = await fetch(url, {
          headers: {
            'x-api-key': this.options.apiKey,
            Accept: 'application/json',
          },
          signal: controller.signal,
        });

        if (response.status === 429 || response.status >= 500) {
          throw new HttpStatusError(response.status, response.statusText);
        }
        return response;
      } finally {
        clearTimeout(timeoutId);
        signal?.removeEventListener('abort', onAbort);
      }
    };

    let response: Response;
    try {
      response = await retryWithBackoff(attempt, {
        maxRetries: this.options.maxRetries ?? 3,
        initialDelay: this.options.initialRetryDelayMs ?? 2000,
        maxDelay: 8000,
        // Shutdown aborts are not retried
        shouldRetry: (error) => !signal?.aborted && isRetryableError(error, RETRYABLE_STATUSES),
      });
    } catch (error) {
      if (error instanceof HttpStatusError && error.status === 429) {
        return { status: 'rate_limited' };
      }
      const message = error instanceof Error ? error.message : String(error);
      return { status: 'transient_error', message };
    }

    if (response.status === 401 || response.status === 403) {
      return { status: 'auth_failed', message: `Source API rejected credentials (HTTP ${response.status})` };
    }

    if (response.status === 404) {
      return { status: 'not_found' };
    }

    if (!response.ok) {
      return { status: 'transient_error', message: `HTTP ${response.status}: ${response.statusText}` };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { status: 'transient_error', message: `Invalid JSON from source API: ${message}` };
    }

    const items = parseItems(body, account.id);
    logDebug('Fetched items', { accountId: account.id, count: items.length });

    return { status: 'ok', items };
  }
}
