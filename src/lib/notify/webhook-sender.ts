/**
 * Chat Webhook Sender
 * Posts an embed per item to a channel's webhook URL
 */

import type { Channel, Item, Rating } from '../db/models';
import { HttpStatusError, isRetryableError, retryWithBackoff } from '../utils/retry';
import { logDebug } from '../observability/logger';
import type { ChannelSender, ChannelSendResult } from './types';

const MAX_DESCRIPTION_LENGTH = 4096;
const RETRYABLE_STATUSES = [408, 429, 500, 502, 503, 504];

export interface WebhookSenderOptions {
  timeoutMs: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

export interface WebhookEmbedField {
  name: string;
  value: string;
  inline: boolean;
}

export interface WebhookPayload {
  username: string;
  embeds: {
    author: { name: string; url: string };
    title: string;
    url: string;
    description: string;
    color: number;
    timestamp: string;
    fields: WebhookEmbedField[];
    footer: { text: string };
  }[];
}

/**
 * Format a count for display (1200 -> 1.2k)
 */
export function formatCount(n: number): string {
  if (n >= 1_000_000) return `${(n / 1_000_000).toFixed(1)}M`;
  if (n >= 1_000) return `${(n / 1_000).toFixed(1)}k`;
  return String(n);
}

function colorForScore(score: number): number {
  if (score >= 9) return 0xe74c3c;
  if (score >= 7) return 0xf39c12;
  return 0x3498db;
}

export function buildPayload(channel: Channel, item: Item, rating: Rating): WebhookPayload {
  const description =
    item.text.length > MAX_DESCRIPTION_LENGTH
      ? `${item.text.slice(0, MAX_DESCRIPTION_LENGTH - 3)}...`
      : item.text;

  const fields: WebhookEmbedField[] = [
    { name: 'Summary', value: rating.summary.slice(0, 256) || 'No summary', inline: false },
    { name: 'Likes', value: formatCount(item.metrics.likes), inline: true },
    { name: 'Reposts', value: formatCount(item.metrics.reposts), inline: true },
    { name: 'Replies', value: formatCount(item.metrics.replies), inline: true },
  ];

  if (rating.action !== 'send') {
    fields.push({ name: 'Suggested action', value: rating.action.toUpperCase(), inline: false });
  }

  return {
    username: `Feed Alerts - ${channel.name}`,
    embeds: [
      {
        author: { name: `@${item.accountId}`, url: `https://x.com/${item.accountId}` },
        title: `Score: ${rating.score}/10 | ${rating.category.toUpperCase()}`,
        url: item.url,
        description,
        color: colorForScore(rating.score),
        timestamp: item.createdAt.toISOString(),
        fields,
        footer: { text: rating.reason ? rating.reason.slice(0, 100) : 'Rated' },
      },
    ],
  };
}

export class WebhookChannelSender implements ChannelSender {
  constructor(private readonly options: WebhookSenderOptions) {}

  async send(
    channel: Channel,
    item: Item,
    rating: Rating,
    signal?: AbortSignal
  ): Promise<ChannelSendResult> {
    const payload = buildPayload(channel, item, rating);

    const attempt = async (): Promise<Response> => {
      signal?.throwIfAborted();
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);
      const onAbort = () => controller.abort();
      signal?.addEventListener('abort', onAbort, { once: true });

      try {
        const response = await fetch(channel.webhookUrl, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(payload),
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
        maxRetries: this.options.maxRetries ?? 2,
        initialDelay: this.options.retryDelayMs ?? 1000,
        // Spread retries from many channels hitting the same rate limit
        jitter: true,
        shouldRetry: (error) => !signal?.aborted && isRetryableError(error, RETRYABLE_STATUSES),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { status: 'transient_error', message };
    }

    if (response.status === 404) {
      return { status: 'not_found' };
    }

    if (!response.ok) {
      return { status: 'transient_error', message: `HTTP ${response.status}: ${response.statusText}` };
    }

    logDebug('Webhook delivered', { channelId: channel.id, itemId: item.id });
    return { status: 'success' };
  }
}
