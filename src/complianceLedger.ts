/**
 * Wires every engine over one store, ledger, logger and clock.
 *
 * @module complianceLedger
 */

import { LegalHoldRegistry } from './holds/legalHoldRegistry.js';
import { HashChainLedger } from './ledger/hashChainLedger.js';
import { RecordLockService } from './locks/recordLockService.js';
import { createLogger, type Logger } from './logging/logger.js';
import { RetentionEngine } from './retention/retentionEngine.js';
import { createRightsEngines, type RightsEngines } from './rights/engines.js';
import type { Store } from './store/types.js';
import type { HashProvider } from './crypto/hashProvider.js';
import { systemClock, type Clock } from './utils/dates.js';
import { RecordVersionService } from './versioning/recordVersionService.js';

export interface ComplianceLedgerOptions {
  store: Store;
  logger?: Logger;
  clock?: Clock;
  hasher?: HashProvider;
}

export interface ComplianceLedger {
  store: Store;
  ledger: HashChainLedger;
  holds: LegalHoldRegistry;
  retention: RetentionEngine;
  rights: RightsEngines;
  locks: RecordLockService;
  versions: RecordVersionService;
  logger: Logger;
}

export function createComplianceLedger(options: ComplianceLedgerOptions): ComplianceLedger {
  const { store } = options;
  const logger = options.logger ?? createLogger();
  const clock = options.clock ?? systemClock;
  const ledger = new HashChainLedger(store, { clock, logger, hasher: options.hasher });
  const deps = { store, ledger, logger, clock };
  const holds = new LegalHoldRegistry(deps);
  const locks = new RecordLockService(deps);

  return {
    store,
    ledger,
    holds,
    retention: new RetentionEngine({ ...deps, holds }),
    rights: createRightsEngines({ ...deps, holds }),
    locks,
    versions: new RecordVersionService({ ...deps, locks }),
    logger,
  };
}
