/**
 * Score Tiers
 * Maps a 1-10 importance score to a delivery tier
 */

import { InvalidTierThresholdsError } from '../errors';

export type Tier = 'filter' | 'bulk' | 'premium' | 'urgent';

export interface TierThresholds {
  bulkMin: number; // lowest score delivered at all
  premiumMin: number;
  urgentMin: number;
}

export const DEFAULT_TIER_THRESHOLDS: TierThresholds = {
  bulkMin: 4,
  premiumMin: 7,
  urgentMin: 9,
};

export const MIN_SCORE = 1;
export const MAX_SCORE = 10;

/**
 * Round and clamp any numeric score into 1..10. Non-finite values become the minimum.
 */
export function normalizeScore(score: number): number {
  if (!Number.isFinite(score)) return MIN_SCORE;
  return Math.min(MAX_SCORE, Math.max(MIN_SCORE, Math.round(score)));
}

/**
 * Validate tier configuration
 */
export function validateTierThresholds(thresholds: TierThresholds): {
  valid: boolean;
  errors: string[];
} {
  const errors: string[] = [];
  const { bulkMin, premiumMin, urgentMin } = thresholds;

  for (const [name, value] of Object.entries(thresholds)) {
    if (!Number.isInteger(value)) {
      errors.push(`${name} must be an integer (got ${value})`);
    }
  }

  if (bulkMin <= MIN_SCORE) {
    errors.push(`bulkMin must be greater than ${MIN_SCORE} so the filter tier is not empty`);
  }

  if (premiumMin <= bulkMin) {
    errors.push(`premiumMin (${premiumMin}) must be greater than bulkMin (${bulkMin})`);
  }

  if (urgentMin <= premiumMin) {
    errors.push(`urgentMin (${urgentMin}) must be greater than premiumMin (${premiumMin})`);
  }

  if (urgentMin > MAX_SCORE) {
    errors.push(`urgentMin must be at most ${MAX_SCORE}`);
  }

  return { valid: errors.length === 0, errors };
}

export function assertTierThresholds(thresholds: TierThresholds): TierThresholds {
  const result = validateTierThresholds(thresholds);
  if (!result.valid) {
    throw new InvalidTierThresholdsError(result.errors.join('; '));
  }
  return thresholds;
}

/**
 * Pure and total: every score maps to exactly one tier
 */
export function tier(score: number, thresholds: TierThresholds = DEFAULT_TIER_THRESHOLDS): Tier {
  const s = normalizeScore(score);
  if (s >= thresholds.urgentMin) return 'urgent';
  if (s >= thresholds.premiumMin) return 'premium';
  if (s >= thresholds.bulkMin) return 'bulk';
  return 'filter';
}
