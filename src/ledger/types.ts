/**
 * Types for the hash-chain ledger.
 *
 * @module ledger/types
 */

import type { JsonObject } from '../utils/json.js';

/** Previous-hash sentinel carried by the first entry of every chain. */
export const GENESIS = 'GENESIS';

/** Position of an entry in its chain, as returned by `append`. */
export interface ChainLink {
  hash: string;
  previousHash: string;
  sequence: number;
}

export interface HistoryEntry extends ChainLink {
  scopeKey: string;
  payload: JsonObject;
  algorithm: string;
  recordedAt: string;
}

export interface ChainVerification {
  scopeKey: string;
  valid: boolean;
  /** Sequence position of the first broken entry, or null when intact. */
  breakPosition: number | null;
  totalEntries: number;
  reason: string | null;
}
