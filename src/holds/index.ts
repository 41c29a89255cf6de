export {
  HOLD_CHAIN,
  type HoldScope,
  LegalHoldRegistry,
  holdMatches,
  mapRowToHold,
  parseCreateHoldInput,
  parseReleaseHoldInput,
} from './legalHoldRegistry.js';
export * from './types.js';
