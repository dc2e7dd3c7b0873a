/**
 * Delivery ledger
 * One row per (item, channel) that was confirmed delivered.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { DeliveryRecord, DeliveryRecordRow } from '../models';

export interface RecordDeliveryInput {
  itemId: string;
  channelId: string;
  accountId: string;
  score?: number;
  category?: string;
}

export interface DeliveryLedger {
  has(itemId: string, channelId: string): Promise<boolean>;

  /** Insert-if-absent. Returns false when the pair was already recorded. */
  record(input: RecordDeliveryInput): Promise<boolean>;

  /** Delete records delivered before the cutoff. Returns the number removed. */
  prune(deliveredBefore: Date): Promise<number>;

  countSince(since: Date): Promise<number>;
}

export function rowToDeliveryRecord(row: DeliveryRecordRow): DeliveryRecord {
  return {
    itemId: row.item_id,
    channelId: row.channel_id,
    accountId: row.account_id,
    score: row.score,
    category: row.category,
    deliveredAt: new Date(row.delivered_at),
  };
}

export class SupabaseDeliveryLedger implements DeliveryLedger {
  constructor(private readonly db: SupabaseClient) {}

  async has(itemId: string, channelId: string): Promise<boolean> {
    const { count, error } = await this.db
      .from('delivery_records')
      .select('item_id', { count: 'exact', head: true })
      .eq('item_id', itemId)
      .eq('channel_id', channelId);

    if (error) throw new Error(`Failed to check delivery ledger: ${error.message}`);
    return (count ?? 0) > 0;
  }

  async record(input: RecordDeliveryInput): Promise<boolean> {
    const { data, error } = await this.db
      .from('delivery_records')
      .upsert(
        {
          item_id: input.itemId,
          channel_id: input.channelId,
          account_id: input.accountId,
          score: input.score ?? null,
          category: input.category ?? null,
        },
        { onConflict: 'item_id,channel_id', ignoreDuplicates: true }
      )
      .select('item_id');

    if (error) throw new Error(`Failed to record delivery: ${error.message}`);
    // ignoreDuplicates returns no row for a conflicting insert
    const rows: Pick<DeliveryRecordRow, 'item_id'>[] = data ?? [];
    return rows.length > 0;
  }

  async prune(deliveredBefore: Date): Promise<number> {
    const { count, error } = await this.db
      .from('delivery_records')
      .delete({ count: 'exact' })
      .lt('delivered_at', deliveredBefore.toISOString());

    if (error) throw new Error(`Failed to prune delivery ledger: ${error.message}`);
    return count ?? 0;
  }

  async countSince(since: Date): Promise<number> {
    const { count, error } = await this.db
      .from('delivery_records')
      .select('item_id', { count: 'exact', head: true })
      .gte('delivered_at', since.toISOString());

    if (error) throw new Error(`Failed to count deliveries: ${error.message}`);
    return count ?? 0;
  }
}
