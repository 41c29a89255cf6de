/**
 * Ledger scope keys for rights requests.
 *
 * @module rights/chains
 */

import type { RequestKind } from './types.js';

/** Chain of every transition of one request. */
export function requestChain(kind: RequestKind, requestId: string): string {
  return `${kind}:${requestId}`;
}

/** Cross-request chain recording each creation for a kind. */
export function creationChain(kind: RequestKind): string {
  return `${kind}:requests`;
}

export function marketingChain(subjectId: string): string {
  return `marketing:${subjectId}`;
}
