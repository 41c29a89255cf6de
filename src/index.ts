/**
 * Public surface of the compliance ledger.
 *
 * @module index
 */

export { createApp } from './app.js';
export { createComplianceLedger, type ComplianceLedger, type ComplianceLedgerOptions } from './complianceLedger.js';
export { loadConfig, type AppConfig, type StoreKind } from './config.js';
export { Sha256HashProvider, sha256, type HashProvider } from './crypto/hashProvider.js';
export * from './holds/index.js';
export * from './ledger/index.js';
export * from './locks/index.js';
export { createLogger, silentOutput, type Logger, type LogLevel } from './logging/logger.js';
export * from './retention/index.js';
export * from './rights/index.js';
export { InMemoryStore } from './store/inMemoryStore.js';
export { PgStore } from './store/pgStore.js';
export type { Store, StoreSession } from './store/types.js';
export { DATA_CATEGORIES, type DataCategory } from './types/vocabulary.js';
export * from './utils/errors.js';
export { fail, getHttpStatusForError, ok, type Result } from './utils/responses.js';
export { runMigrations } from './utils/migrationRunner.js';
export * from './versioning/index.js';
