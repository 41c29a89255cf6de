/**
 * Server entry point.
 *
 * @module server
 */

import { createApp } from './app.js';
import { createComplianceLedger } from './complianceLedger.js';
import { loadConfig } from './config.js';
import { createLogger } from './logging/logger.js';
import { InMemoryStore } from './store/inMemoryStore.js';
import { PgStore } from './store/pgStore.js';
import type { Store } from './store/types.js';
import { closePool } from './utils/db.js';
import { runMigrations } from './utils/migrationRunner.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });

  let store: Store;
  if (config.store === 'postgres') {
    const applied = await runMigrations({ logger });
    logger.info('Database ready', { migrationsApplied: applied.length });
    store = new PgStore();
  } else {
    logger.warn('Using the in-memory store; nothing survives a restart');
    store = new InMemoryStore();
  }

  const app = createApp(createComplianceLedger({ store, logger }));
  const server = app.listen(config.port, () => {
    logger.info('Compliance ledger listening', { port: config.port, store: config.store });
  });

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    server.close(() => {
      closePool().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error('Failed to close the database pool', err instanceof Error ? err : undefined);
          process.exit(1);
        },
      );
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  createLogger().fatal('Server failed to start', err instanceof Error ? err : undefined);
  process.exit(1);
});
