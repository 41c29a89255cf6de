/**
 * Applies pending migrations and exits.
 *
 * @module db/migrate
 */

import { createLogger } from '../logging/logger.js';
import { closePool } from '../utils/db.js';
import { runMigrations } from '../utils/migrationRunner.js';

const logger = createLogger({ context: { component: 'migrate' } });

runMigrations({ logger })
  .then(async (applied) => {
    logger.info('All migrations applied', { count: applied.length });
    await closePool();
  })
  .catch((err: unknown) => {
    logger.fatal('Migration failed', err instanceof Error ? err : undefined);
    process.exit(1);
  });
