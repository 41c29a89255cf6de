/**
 * Hash provider used by the ledger and for verification hashes.
 *
 * The algorithm is fixed per provider and carries a version. Ledger entries
 * record the provider id they were hashed with, so switching algorithms
 * means starting a new chain scope.
 *
 * @module crypto/hashProvider
 */

import { createHash } from 'node:crypto';

export interface HashProvider {
  /** Stable identifier stored beside every hash, e.g. `sha256/1`. */
  readonly id: string;
  /** Hex digest of the input. */
  hash(data: string | Uint8Array): string;
}

export class Sha256HashProvider implements HashProvider {
  readonly algorithm = 'sha256';
  readonly version = 1;

  get id(): string {
    return `${this.algorithm}/${this.version}`;
  }

  hash(data: string | Uint8Array): string {
    return createHash(this.algorithm).update(data).digest('hex');
  }
}

export const sha256 = new Sha256HashProvider();

/** True when `value` is a 64-character lowercase hex digest. */
export function isHexDigest(value: string): boolean {
  return /^[0-9a-f]{64}$/.test(value);
}
