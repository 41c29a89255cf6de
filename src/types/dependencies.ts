/**
 * Collaborators every engine is constructed with.
 *
 * @module types/dependencies
 */

import type { HashChainLedger } from '../ledger/hashChainLedger.js';
import type { Logger } from '../logging/logger.js';
import type { Store } from '../store/types.js';
import type { Clock } from '../utils/dates.js';

export interface EngineDependencies {
  store: Store;
  ledger: HashChainLedger;
  logger?: Logger;
  /** Source of "now". Defaults to the system clock. */
  clock?: Clock;
}
