/**
 * Item id helpers
 * Source ids are decimal strings wider than 2^53, so they are compared as BigInt.
 */

const DECIMAL_ID = /^\d+$/;

export function isItemId(value: string): boolean {
  return DECIMAL_ID.test(value);
}

/** Negative when a < b, zero when equal, positive when a > b. */
export function compareItemIds(a: string, b: string): number {
  const left = BigInt(a);
  const right = BigInt(b);
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

export function isNewerThan(candidate: string, watermark: string): boolean {
  return compareItemIds(candidate, watermark) > 0;
}

export function maxItemId(ids: string[]): string | null {
  let max: string | null = null;
  for (const id of ids) {
    if (max === null || compareItemIds(id, max) > 0) {
      max = id;
    }
  }
  return max;
}
