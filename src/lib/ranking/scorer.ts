/**
 * Item Scorer
 * Rates a post's importance 1-10 with an OpenAI-compatible chat model
 */

import OpenAI from 'openai';
import { z } from 'zod';
import { RATING_ACTIONS, type Item, type Rating } from '../db/models';
import { normalizeScore } from './tiers';

export interface ScoringContext {
  accountId: string;
}

export interface Scorer {
  score(item: Item, context: ScoringContext, signal?: AbortSignal): Promise<Rating>;
}

export const NEUTRAL_SCORE = 5;
export const UNSCORED_CATEGORY = 'unscored';

/**
 * Rating used whenever scoring fails or times out
 */
export function neutralRating(item: Item, reason: string): Rating {
  return {
    score: NEUTRAL_SCORE,
    category: UNSCORED_CATEGORY,
    action: 'send',
    summary: item.text.slice(0, 100),
    reason,
  };
}

const ratingSchema = z.object({
  score: z.coerce.number(),
  category: z.string().min(1).default('unknown'),
  action: z.enum(RATING_ACTIONS).catch('send'),
  summary: z.string().optional(),
  reason: z.string().default('model rating'),
});

/**
 * Extract and validate the JSON object in a model reply.
 * Throws when no valid rating can be read.
 */
export function parseRating(content: string, item: Item): Rating {
  const match = content.match(/\{[\s\S]*\}/);
  if (!match) {
    throw new Error(`No JSON object in scoring reply: ${content.slice(0, 100)}`);
  }

  const parsed = ratingSchema.parse(JSON.parse(match[0]));

  return {
    score: normalizeScore(parsed.score),
    category: parsed.category,
    action: parsed.action,
    summary: parsed.summary ?? item.text.slice(0, 100),
    reason: parsed.reason,
  };
}

export function buildPrompt(item: Item, context: ScoringContext): string {
  return `Analyze this post from @${context.accountId}:

POST: ${item.text}

METRICS:
- Likes: ${item.metrics.likes}
- Reposts: ${item.metrics.reposts}
- Replies: ${item.metrics.replies}

Rate this post 1-10 based on IMPORTANCE and VALUE:
1-3: Fluff, greetings, spam, basic community chat
4-6: Minor updates, personal thoughts, general news
7-8: Useful insights, notable announcements
9-10: Critical, time-sensitive information or opportunities

Also classify:
- CATEGORY: bot | alpha | news | community | fluff | question | giveaway
- ACTION: ${RATING_ACTIONS.join(' | ')}

Respond with JSON only:
{"score": 7, "category": "news", "summary": "Brief 10-word summary", "action": "send", "reason": "Why this rating?"}`;
}

export interface OpenAIScorerOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
}

export class OpenAIScorer implements Scorer {
  private client: OpenAI;
  private model: string;

  constructor(opts: OpenAIScorerOptions) {
    this.client = new OpenAI({
      apiKey: opts.apiKey,
      baseURL: opts.baseUrl,
      maxRetries: 1,
    });
    this.model = opts.model;
  }

  async score(item: Item, context: ScoringContext, signal?: AbortSignal): Promise<Rating> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [{ role: 'user', content: buildPrompt(item, context) }],
        temperature: 0.3,
        max_tokens: 500,
      },
      { signal }
    );

    const content = response.choices[0]?.message.content ?? '';
    return parseRating(content, item);
  }
}

/**
 * Used when no scoring key is configured: every item gets the neutral rating
 */
export class NeutralScorer implements Scorer {
  async score(item: Item): Promise<Rating> {
    return neutralRating(item, 'scoring disabled');
  }
}
