/**
 * Domain models and their database row shapes
 * Row types mirror supabase/schema.sql (snake_case columns)
 */

// ============================================
// Channel
// ============================================

export interface Channel {
  id: string;
  name: string;
  webhookUrl: string;
  active: boolean;
}

export interface ChannelRow {
  id: string;
  name: string;
  webhook_url: string;
  is_active: boolean;
  created_at: string;
}

/** Ledger channel id used for the scarce direct-to-person channel. */
export const URGENT_CHANNEL_ID = 'urgent';

// ============================================
// Account (monitored source account)
// ============================================

export interface Account {
  id: string; // source handle
  channelId: string; // bulk destination
  watermark: string | null; // highest processed item id
  active: boolean;
  addedAt: Date;
}

export interface AccountRow {
  id: string;
  channel_id: string;
  last_item_id: string | null;
  is_active: boolean;
  added_at: string;
}

// ============================================
// Item (post fetched from the source)
// ============================================

export interface ItemMetrics {
  likes: number;
  reposts: number;
  replies: number;
}

export interface Item {
  id: string;
  accountId: string;
  text: string;
  createdAt: Date;
  url: string;
  metrics: ItemMetrics;
}

// ============================================
// Rating
// ============================================

export const RATING_ACTIONS = ['send', 'filter', 'highlight', 'follow_user', 'build_bot'] as const;
export type RatingAction = (typeof RATING_ACTIONS)[number];

export interface Rating {
  score: number; // 1-10
  category: string;
  action: RatingAction;
  summary: string;
  reason: string;
}

// ============================================
// Delivery record (exactly-once ledger)
// ============================================

export interface DeliveryRecord {
  itemId: string;
  channelId: string;
  accountId: string;
  score: number | null;
  category: string | null;
  deliveredAt: Date;
}

export interface DeliveryRecordRow {
  item_id: string;
  channel_id: string;
  account_id: string;
  score: number | null;
  category: string | null;
  delivered_at: string;
}

// ============================================
// Pending action (urgent alert awaiting a human decision)
// ============================================

export const PENDING_ACTION_STATES = [
  'pending',
  'interesting',
  'filtered',
  'awaiting_requirements',
  'build_succeeded',
  'build_failed',
] as const;
export type PendingActionState = (typeof PENDING_ACTION_STATES)[number];

export const TERMINAL_STATES: ReadonlySet<PendingActionState> = new Set([
  'interesting',
  'filtered',
  'build_succeeded',
  'build_failed',
]);

export function isTerminalState(state: PendingActionState): boolean {
  return TERMINAL_STATES.has(state);
}

/** JSON snapshot of an item as stored on the pending action. */
export interface ItemSnapshot {
  id: string;
  accountId: string;
  text: string;
  createdAt: string;
  url: string;
  metrics: ItemMetrics;
}

export interface PendingAction {
  alertId: string;
  accountId: string;
  item: Item;
  rating: Rating;
  state: PendingActionState;
  requirements: string | null;
  outcome: string | null;
  buildStartedAt: Date | null; // set when a build is claimed
  createdAt: Date;
  updatedAt: Date;
}

export interface PendingActionRow {
  alert_id: string;
  account_id: string;
  item: ItemSnapshot;
  rating: Rating;
  state: PendingActionState;
  requirements: string | null;
  outcome: string | null;
  build_started_at: string | null;
  created_at: string;
  updated_at: string;
}

export function toItemSnapshot(item: Item): ItemSnapshot {
  return {
    id: item.id,
    accountId: item.accountId,
    text: item.text,
    createdAt: item.createdAt.toISOString(),
    url: item.url,
    metrics: { ...item.metrics },
  };
}

export function fromItemSnapshot(snapshot: ItemSnapshot): Item {
  return {
    id: snapshot.id,
    accountId: snapshot.accountId,
    text: snapshot.text,
    createdAt: new Date(snapshot.createdAt),
    url: snapshot.url,
    metrics: { ...snapshot.metrics },
  };
}
