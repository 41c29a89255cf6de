export { HashChainLedger, type LedgerOptions } from './hashChainLedger.js';
export { canonicalize } from './canonical.js';
export { GENESIS, type ChainLink, type ChainVerification, type HistoryEntry } from './types.js';
