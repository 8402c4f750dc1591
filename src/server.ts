import type { Server } from 'node:http';
import pino from 'pino';
import { config } from './config/index.js';
import { loadTrackerConfig } from './config/tracker-config.js';
import { pool, waitForDatabase } from './db/pool.js';
import { runMigrations } from './db/migrate.js';
import { createApp } from './app.js';
import { createMarketplaceClient } from './services/marketplace/client.js';
import { createPgSnapshotStore } from './services/store/pg-snapshot-store.js';
import { startTrackerLoop, type TrackerLoop } from './services/tracker/tracker-loop.js';

const logger = pino({ name: 'server' });

// Catch kills/OOM before pino can flush
process.on('uncaughtException', (err) => {
  console.error(`UNCAUGHT EXCEPTION: ${err.message}`);
  console.error(err.stack);
  process.exit(1);
});
process.on('unhandledRejection', (reason) => {
  console.error(`UNHANDLED REJECTION: ${String(reason)}`);
  process.exit(1);
});

function installShutdown(loop: TrackerLoop, server: Server): void {
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    await loop.stop();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    await pool.end();
    logger.info('Shutdown complete');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Shutdown failed');
          process.exit(1);
        });
    });
  }
}

async function boot(): Promise<void> {
  // Step 1: Env validated by Zod at import time; tracker config validated here
  const trackerConfig = await loadTrackerConfig(config.TRACKER_CONFIG_PATH);
  logger.info(
    { targets: trackerConfig.targets.length, verificationTiers: trackerConfig.verificationTiers },
    'Configuration validated',
  );

  // Step 2: Wait for the database
  logger.info('Connecting to database...');
  await waitForDatabase(pool, config.DB_CONNECT_RETRIES, config.DB_CONNECT_DELAY_MS);

  // Step 3: Run migrations
  await runMigrations();

  // Step 4: Start the tracker loop
  const loop = startTrackerLoop(
    {
      client: createMarketplaceClient({
        baseUrl: config.MARKETPLACE_API_BASE_URL,
        timeoutMs: config.HTTP_TIMEOUT_MS,
      }),
      store: createPgSnapshotStore(pool),
      config: trackerConfig,
      hitFeed: { limit: config.HIT_FEED_LIMIT, pages: config.HIT_FEED_PAGES },
    },
    {
      pollIntervalMs: config.POLL_INTERVAL_MS,
      seriesDelayMs: config.SERIES_DELAY_MS,
      skipDelayMs: config.SKIP_DELAY_MS,
      discoveryRetryMs: config.DISCOVERY_RETRY_MS,
      noTargetsRetryMs: config.NO_TARGETS_RETRY_MS,
    },
  );

  // Step 5: Start Express
  const app = createApp({ getLoopStatus: loop.getStatus });
  const server = app.listen(config.PORT, () => {
    logger.info(`Dashboard API ready on port ${config.PORT}`);
  });

  installShutdown(loop, server);
}

boot().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  const stack = err instanceof Error ? err.stack : '';
  console.error(`BOOT FAILED: ${message}`);
  console.error(`Stack: ${stack}`);
  process.exit(1);
});
