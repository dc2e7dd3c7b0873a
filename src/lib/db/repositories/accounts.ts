/**
 * Accounts repository
 * Monitored accounts and their per-account watermark
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { Account, AccountRow } from '../models';

export interface RegisterAccountInput {
  id: string;
  channelId: string;
}

export interface AccountRepository {
  listActive(): Promise<Account[]>;

  findById(id: string): Promise<Account | null>;

  /** Create the account, or re-activate and re-point an existing one. Watermark is kept. */
  register(input: RegisterAccountInput): Promise<Account>;

  /**
   * Store itemId as the watermark only if it is greater than the stored value
   * (or none is stored). Returns false when the write was rejected.
   */
  advanceWatermark(accountId: string, itemId: string): Promise<boolean>;

  deactivate(accountId: string): Promise<void>;
}

export function rowToAccount(row: AccountRow): Account {
  return {
    id: row.id,
    channelId: row.channel_id,
    watermark: row.last_item_id,
    active: row.is_active,
    addedAt: new Date(row.added_at),
  };
}

export class SupabaseAccountRepository implements AccountRepository {
  constructor(private readonly db: SupabaseClient) {}

  async listActive(): Promise<Account[]> {
    const { data, error } = await this.db
      .from('accounts')
      .select('*')
      .eq('is_active', true)
      .order('id', { ascending: true });

    if (error) throw new Error(`Failed to list accounts: ${error.message}`);
    const rows: AccountRow[] = data ?? [];
    return rows.map(rowToAccount);
  }

  async findById(id: string): Promise<Account | null> {
    const { data, error } = await this.db.from('accounts').select('*').eq('id', id).maybeSingle();

    if (error) throw new Error(`Failed to fetch account ${id}: ${error.message}`);
    const row: AccountRow | null = data;
    return row ? rowToAccount(row) : null;
  }

  async register(input: RegisterAccountInput): Promise<Account> {
    const { data, error } = await this.db
      .from('accounts')
      .upsert(
        { id: input.id, channel_id: input.channelId, is_active: true },
        { onConflict: 'id' }
      )
      .select()
      .single();

    if (error) throw new Error(`Failed to register account ${input.id}: ${error.message}`);
    const row: AccountRow = data;
    return rowToAccount(row);
  }

  async advanceWatermark(accountId: string, itemId: string): Promise<boolean> {
    // Numeric comparison happens in SQL; ids do not fit in a JS number
    const { data, error } = await this.db.rpc('advance_watermark', {
      p_account_id: accountId,
      p_item_id: itemId,
    });

    if (error) throw new Error(`Failed to advance watermark for ${accountId}: ${error.message}`);
    return data === true;
  }

  async deactivate(accountId: string): Promise<void> {
    const { error } = await this.db
      .from('accounts')
      .update({ is_active: false })
      .eq('id', accountId);

    if (error) throw new Error(`Failed to deactivate account ${accountId}: ${error.message}`);
  }
}
