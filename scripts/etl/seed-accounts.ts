/**
 * Register chat channels and monitored accounts from config/accounts.json
 * Usage: npm run seed:accounts [-- --file=path/to/accounts.json]
 */

import 'dotenv/config';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { loadSettings } from '../../src/lib/config/settings';
import { createRepositories } from '../../src/lib/worker';

const seedFileSchema = z.object({
  channels: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string().min(1),
      webhookUrl: z.string().url(),
    })
  ),
  accounts: z.array(
    z.object({
      id: z.string().regex(/^\w{1,15}$/, 'account handle must be 1-15 word characters'),
      channelId: z.string().min(1),
    })
  ),
});

const argFile = process.argv.find((a) => a.startsWith('--file='))?.split('=')[1];
const seedPath = resolve(argFile ?? 'config/accounts.json');

async function seedAccounts() {
  const settings = loadSettings();
  if (!settings.supabase) {
    console.error('❌ SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required');
    process.exit(1);
  }

  const seed = seedFileSchema.parse(JSON.parse(readFileSync(seedPath, 'utf-8')));
  const repos = createRepositories(settings);

  console.log(`🌱 Seeding from ${seedPath}...`);

  for (const channel of seed.channels) {
    await repos.channels.upsert(channel);
    console.log(`✓ Channel: ${channel.id} (${channel.name})`);
  }

  const channelIds = new Set(seed.channels.map((c) => c.id));
  for (const account of seed.accounts) {
    if (!channelIds.has(account.channelId) && !(await repos.channels.findById(account.channelId))) {
      console.warn(`⚠ Skipping @${account.id}: unknown channel ${account.channelId}`);
      continue;
    }
    await repos.accounts.register(account);
    console.log(`✓ Account: @${account.id} -> ${account.channelId}`);
  }

  console.log('✅ Accounts seeded successfully!');
}

seedAccounts().catch((error) => {
  console.error('❌ Error seeding accounts:', error);
  process.exit(1);
});
