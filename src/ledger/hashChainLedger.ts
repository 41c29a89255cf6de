/**
 * Hash-Chain Ledger
 *
 * Append-only history, chained per scope key. Each entry stores
 * `hash = H(canonical(payload) || previousHash)`, the first entry's
 * previous hash being `GENESIS`. Appends lock the scope, read its last
 * entry and write the next one inside the caller's unit of work; the lock
 * is held until that unit commits, so concurrent appends to one scope
 * queue behind each other.
 *
 * @module ledger/hashChainLedger
 */

import { v4 as uuidv4 } from 'uuid';
import { isHexDigest, sha256, type HashProvider } from '../crypto/hashProvider.js';
import { createLogger, silentOutput, type Logger } from '../logging/logger.js';
import type { LedgerEntryRow, Store, StoreSession } from '../store/types.js';
import { systemClock, type Clock } from '../utils/dates.js';
import { IntegrityError } from '../utils/errors.js';
import { parseJsonObject, type JsonObject } from '../utils/json.js';
import { requireText } from '../utils/validation.js';
import { canonicalize } from './canonical.js';
import { GENESIS, type ChainLink, type ChainVerification, type HistoryEntry } from './types.js';

export interface LedgerOptions {
  hasher?: HashProvider;
  clock?: Clock;
  logger?: Logger;
}

export class HashChainLedger {
  private readonly hasher: HashProvider;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly store: Store,
    options: LedgerOptions = {},
  ) {
    this.hasher = options.hasher ?? sha256;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? createLogger({ output: silentOutput })).child({ component: 'ledger' });
  }

  get algorithm(): string {
    return this.hasher.id;
  }

  computeHash(canonicalPayload: string, previousHash: string): string {
    return this.hasher.hash(canonicalPayload + previousHash);
  }

  /** Hash an arbitrary payload with the ledger's provider, unchained. */
  digest(payload: JsonObject): string {
    return this.hasher.hash(canonicalize(payload));
  }

  /**
   * Append an entry to `scopeKey` within `session`.
   *
   * @throws IntegrityError when the predecessor is missing, has no hash, or
   *   was written with a different hash algorithm.
   */
  async append(session: StoreSession, scopeKey: string, payload: JsonObject): Promise<ChainLink> {
    requireText(scopeKey, 'scopeKey');
    await session.lockScope(scopeKey);
    const last = await this.lastEntry(session, scopeKey);

    let previousHash = GENESIS;
    let sequence = 0;
    if (last) {
      const count = await session.count('ledger_entries', { scopeKey });
      if (count !== last.sequence + 1) {
        throw new IntegrityError(
          `Chain ${scopeKey} holds ${count} entries but its last sequence is ${last.sequence}; predecessor missing`,
          scopeKey,
        );
      }
      if (!isHexDigest(last.hash)) {
        throw new IntegrityError(`Chain ${scopeKey} entry ${last.sequence} has no usable hash`, scopeKey);
      }
      if (last.algorithm !== this.hasher.id) {
        throw new IntegrityError(
          `Chain ${scopeKey} is hashed with ${last.algorithm}; ${this.hasher.id} needs a new scope`,
          scopeKey,
        );
      }
      previousHash = last.hash;
      sequence = last.sequence + 1;
    }

    const canonicalPayload = canonicalize(payload);
    const hash = this.computeHash(canonicalPayload, previousHash);
    await session.insert('ledger_entries', {
      id: uuidv4(),
      scopeKey,
      sequence,
      payload: canonicalPayload,
      hash,
      previousHash,
      algorithm: this.hasher.id,
      recordedAt: this.clock().toISOString(),
    });

    this.logger.debug('Ledger entry appended', { scopeKey, sequence });
    return { hash, previousHash, sequence };
  }

  /**
   * Lock `scopeKey` and return the sequence its next entry will get. The
   * answer holds until the caller's unit of work ends.
   */
  async nextSequence(session: StoreSession, scopeKey: string): Promise<number> {
    requireText(scopeKey, 'scopeKey');
    await session.lockScope(scopeKey);
    const last = await this.lastEntry(session, scopeKey);
    return last ? last.sequence + 1 : 0;
  }

  /** Latest link of a chain, or null for an empty scope. */
  async head(scopeKey: string): Promise<ChainLink | null> {
    const last = await this.store.read((session) => this.lastEntry(session, scopeKey));
    return last ? { hash: last.hash, previousHash: last.previousHash, sequence: last.sequence } : null;
  }

  /**
   * Walk a chain in sequence order and report the first broken position.
   * Never repairs anything.
   */
  async verify(scopeKey: string): Promise<ChainVerification> {
    const entries = await this.entries(scopeKey);
    const broken = (position: number, reason: string): ChainVerification => {
      this.logger.error('Chain verification failed', undefined, { scopeKey, position, reason });
      return { scopeKey, valid: false, breakPosition: position, totalEntries: entries.length, reason };
    };

    for (const [position, entry] of entries.entries()) {
      if (entry.sequence !== position) {
        return broken(position, `expected sequence ${position}, found ${entry.sequence}`);
      }
      const expectedPrevious = position === 0 ? GENESIS : entries[position - 1]?.hash;
      if (entry.previousHash !== expectedPrevious) {
        return broken(position, 'previous hash does not match the preceding entry');
      }
      if (entry.algorithm !== this.hasher.id) {
        return broken(position, `entry hashed with ${entry.algorithm}`);
      }
      if (this.computeHash(entry.payload, entry.previousHash) !== entry.hash) {
        return broken(position, 'stored hash does not match the payload');
      }
    }

    return { scopeKey, valid: true, breakPosition: null, totalEntries: entries.length, reason: null };
  }

  /** Decoded entries of a chain in order. */
  async history(scopeKey: string): Promise<HistoryEntry[]> {
    const entries = await this.entries(scopeKey);
    return entries.map((entry) => {
      const payload = parseJsonObject(entry.payload);
      if (!payload) {
        throw new IntegrityError(`Chain ${scopeKey} entry ${entry.sequence} payload is unreadable`, scopeKey);
      }
      return {
        scopeKey: entry.scopeKey,
        sequence: entry.sequence,
        payload,
        hash: entry.hash,
        previousHash: entry.previousHash,
        algorithm: entry.algorithm,
        recordedAt: entry.recordedAt,
      };
    });
  }

  private async entries(scopeKey: string): Promise<LedgerEntryRow[]> {
    return this.store.read((session) =>
      session.find('ledger_entries', { scopeKey }, { orderBy: 'sequence', direction: 'asc' }),
    );
  }

  private async lastEntry(session: StoreSession, scopeKey: string): Promise<LedgerEntryRow | null> {
    const [last] = await session.find(
      'ledger_entries',
      { scopeKey },
      { orderBy: 'sequence', direction: 'desc', limit: 1 },
    );
    return last ?? null;
  }
}
