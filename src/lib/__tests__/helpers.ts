/**
 * Shared fixtures and in-process fakes for the collaborator interfaces
 */

import type { BuildCollaborator, BuildResult } from '../build/build-client';
import type { Account, Channel, Item, Rating } from '../db/models';
import type { FetchOutcome, SourceFetcher } from '../ingest/types';
import type {
  ChannelSender,
  ChannelSendResult,
  ReplyTransport,
  UrgentSender,
  UrgentSendResult,
} from '../notify/types';
import type { Scorer } from '../ranking/scorer';

export function makeItem(id: string, overrides: Partial<Item> = {}): Item {
  return {
    id,
    accountId: 'alice',
    text: `post ${id}`,
    createdAt: new Date('2024-05-01T12:00:00Z'),
    url: `https://x.com/alice/status/${id}`,
    metrics: { likes: 0, reposts: 0, replies: 0 },
    ...overrides,
  };
}

export function makeRating(score: number, overrides: Partial<Rating> = {}): Rating {
  return {
    score,
    category: 'news',
    action: 'send',
    summary: `summary for score ${score}`,
    reason: 'test rating',
    ...overrides,
  };
}

export function makeAccount(overrides: Partial<Account> = {}): Account {
  return {
    id: 'alice',
    channelId: 'general',
    watermark: null,
    active: true,
    addedAt: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  };
}

export class FakeFetcher implements SourceFetcher {
  readonly outcomes = new Map<string, FetchOutcome>();
  readonly calls: string[] = [];

  async fetchNewItems(account: Account): Promise<FetchOutcome> {
    this.calls.push(account.id);
    return this.outcomes.get(account.id) ?? { status: 'ok', items: [] };
  }
}

export class FakeScorer implements Scorer {
  readonly scores = new Map<string, number>();
  readonly scored: string[] = [];
  failWith: Error | null = null;

  async score(item: Item): Promise<Rating> {
    this.scored.push(item.id);
    if (this.failWith) throw this.failWith;
    return makeRating(this.scores.get(item.id) ?? 5);
  }
}

export class FakeChannelSender implements ChannelSender {
  readonly sent: { channelId: string; itemId: string }[] = [];
  readonly results = new Map<string, ChannelSendResult>();

  async send(channel: Channel, item: Item): Promise<ChannelSendResult> {
    const result = this.results.get(channel.id) ?? { status: 'success' };
    if (result.status === 'success') {
      this.sent.push({ channelId: channel.id, itemId: item.id });
    }
    return result;
  }
}

export class FakeUrgentSender implements UrgentSender {
  readonly sent: { itemId: string; alertId: string }[] = [];
  configured = true;
  result: UrgentSendResult = { status: 'success', messageId: 'msg-1' };

  isConfigured(): boolean {
    return this.configured;
  }

  async sendUrgent(item: Item, _rating: Rating, alertId: string): Promise<UrgentSendResult> {
    if (this.result.status === 'success') {
      this.sent.push({ itemId: item.id, alertId });
    }
    return this.result;
  }
}

export class FakeReplyTransport implements ReplyTransport {
  readonly messages: { subject: string; text: string }[] = [];

  async notify(subject: string, text: string): Promise<boolean> {
    this.messages.push({ subject, text });
    return true;
  }
}

export class FakeBuilder implements BuildCollaborator {
  readonly requests: string[] = [];
  result: BuildResult = { status: 'success', artifactUrl: 'https://builds.example.test/artifact-1' };

  async build(_item: Item, _rating: Rating, requirements: string): Promise<BuildResult> {
    this.requests.push(requirements);
    return this.result;
  }
}

/** Sequential id factory for alert ids. */
export function sequentialIds(prefix = 'alert'): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}
