/**
 * Print persisted counts: active accounts, deliveries in the last 24h, alerts by state
 */

import 'dotenv/config';
import { loadSettings } from '../../src/lib/config/settings';
import { createRepositories } from '../../src/lib/worker';

async function printStatus() {
  const settings = loadSettings();
  if (!settings.supabase) {
    console.error('❌ SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required');
    process.exit(1);
  }

  const repos = createRepositories(settings);
  const since = new Date(Date.now() - 24 * 60 * 60 * 1000);

  const [accounts, deliveries, alerts] = await Promise.all([
    repos.accounts.listActive(),
    repos.ledger.countSince(since),
    repos.pendingActions.countByState(),
  ]);

  console.log('📊 Feed alert router status');
  console.log(`   Active accounts:        ${accounts.length}`);
  console.log(`   Deliveries (last 24h):  ${deliveries}`);
  console.log('   Alerts by state:');
  for (const [state, count] of Object.entries(alerts)) {
    console.log(`     ${state.padEnd(22)} ${count}`);
  }

  const uninitialized = accounts.filter((a) => a.watermark === null).map((a) => a.id);
  if (uninitialized.length > 0) {
    console.log(`   Awaiting first cycle:   ${uninitialized.join(', ')}`);
  }
}

printStatus().catch((error) => {
  console.error('❌ Error reading status:', error);
  process.exit(1);
});
