/**
 * Start the worker: dispatcher loop, urgent drainer, maintenance cron and operator HTTP server.
 * SIGINT/SIGTERM stop it after in-flight work settles.
 */

import 'dotenv/config';
import { loadSettings } from '../../src/lib/config/settings';
import { createWorker } from '../../src/lib/worker';
import { logError, logInfo } from '../../src/lib/observability/logger';

async function main() {
  const settings = loadSettings();
  const worker = createWorker(settings);

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logInfo(`Received ${signal}, shutting down`);
    await worker.stop();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        logError('Shutdown failed', error);
        process.exit(1);
      });
    });
  }

  await worker.start();
}

main().catch((error) => {
  logError('Worker failed to start', error);
  process.exit(1);
});
