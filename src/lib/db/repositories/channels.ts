import type { SupabaseClient } from '@supabase/supabase-js';
import type { Channel, ChannelRow } from '../models';

export interface UpsertChannelInput {
  id: string;
  name: string;
  webhookUrl: string;
}

export interface ChannelRepository {
  findById(id: string): Promise<Channel | null>;

  upsert(input: UpsertChannelInput): Promise<Channel>;

  /** Webhook reported gone; stop delivering to it until an operator re-registers it. */
  deactivate(id: string): Promise<void>;
}

export function rowToChannel(row: ChannelRow): Channel {
  return {
    id: row.id,
    name: row.name,
    webhookUrl: row.webhook_url,
    active: row.is_active,
  };
}

export class SupabaseChannelRepository implements ChannelRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findById(id: string): Promise<Channel | null> {
    const { data, error } = await this.db.from('channels').select('*').eq('id', id).maybeSingle();

    if (error) throw new Error(`Failed to fetch channel ${id}: ${error.message}`);
    const row: ChannelRow | null = data;
    return row ? rowToChannel(row) : null;
  }

  async upsert(input: UpsertChannelInput): Promise<Channel> {
    const { data, error } = await this.db
      .from('channels')
      .upsert(
        { id: input.id, name: input.name, webhook_url: input.webhookUrl, is_active: true },
        { onConflict: 'id' }
      )
      .select()
      .single();

    if (error) throw new Error(`Failed to upsert channel ${input.id}: ${error.message}`);
    const row: ChannelRow = data;
    return rowToChannel(row);
  }

  async deactivate(id: string): Promise<void> {
    const { error } = await this.db.from('channels').update({ is_active: false }).eq('id', id);

    if (error) throw new Error(`Failed to deactivate channel ${id}: ${error.message}`);
  }
}
