/**
 * Advisory record locks.
 *
 * A lock marks a clinical record as being edited by one holder. It is
 * separate from legal holds and never expires: a stale lock stays until
 * its holder, or someone forcing it, releases it. Lock changes are chained
 * under `lock:<table>:<recordId>`.
 *
 * @module locks/recordLockService
 */

import { v4 as uuidv4 } from 'uuid';
import type { HashChainLedger } from '../ledger/hashChainLedger.js';
import type { HistoryEntry } from '../ledger/types.js';
import { createLogger, silentOutput, type Logger } from '../logging/logger.js';
import type { RecordLockRow, Store, StoreSession } from '../store/types.js';
import type { EngineDependencies } from '../types/dependencies.js';
import { systemClock, type Clock } from '../utils/dates.js';
import { RecordLockedError, ValidationError } from '../utils/errors.js';
import type { JsonObject } from '../utils/json.js';
import { toResult, type Result } from '../utils/responses.js';
import { optionalText, requireRecord, requireText } from '../utils/validation.js';
import type { LockInput, LockResult, LockStatus, RecordLock, UnlockInput, UnlockResult } from './types.js';

export function lockChain(tableName: string, recordId: string): string {
  return `lock:${tableName}:${recordId}`;
}

export function parseLockInput(value: unknown): LockInput {
  const body = requireRecord(value, 'lock');
  return {
    holder: requireText(body['holder'], 'holder'),
    reason: optionalText(body['reason'], 'reason') ?? undefined,
  };
}

export function parseUnlockInput(value: unknown): UnlockInput {
  const body = requireRecord(value, 'unlock');
  const force = body['force'] ?? false;
  if (typeof force !== 'boolean') throw new ValidationError('force must be a boolean');
  return { holder: requireText(body['holder'], 'holder'), force };
}

function mapRowToLock(row: RecordLockRow): RecordLock {
  return {
    tableName: row.tableName,
    recordId: row.recordId,
    lockedBy: row.lockedBy,
    reason: row.reason,
    lockedAt: row.lockedAt,
  };
}

export class RecordLockService {
  private readonly store: Store;
  private readonly ledger: HashChainLedger;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(deps: EngineDependencies) {
    this.store = deps.store;
    this.ledger = deps.ledger;
    this.clock = deps.clock ?? systemClock;
    this.logger = (deps.logger ?? createLogger({ output: silentOutput })).child({ component: 'locks' });
  }

  /** Take the lock, or extend it when the holder already has it. */
  async lock(tableName: string, recordId: string, input: LockInput): Promise<Result<LockResult>> {
    return toResult(this.logger, 'lockRecord', async () => {
      requireText(tableName, 'tableName');
      requireText(recordId, 'recordId');
      const request = parseLockInput(input);
      const lockedAt = this.clock().toISOString();

      const result = await this.store.transaction(async (session): Promise<LockResult> => {
        const existing = await this.findLock(session, tableName, recordId);
        if (existing && existing.lockedBy !== request.holder) {
          throw new RecordLockedError(`Record locked by ${existing.lockedBy}`);
        }

        const action = existing ? 'EXTENDED' : 'ACQUIRED';
        const row: RecordLockRow = {
          id: existing?.id ?? uuidv4(),
          tableName,
          recordId,
          lockedBy: request.holder,
          reason: request.reason ?? null,
          lockedAt,
        };
        await this.appendAction(session, row, `LOCK_${action}`, request.holder, { reason: request.reason });
        if (existing) {
          await session.update('record_locks', existing.id, { reason: row.reason, lockedAt });
        } else {
          await session.insert('record_locks', row);
        }
        return { action, lock: mapRowToLock(row) };
      });

      this.logger.info(`Record lock ${result.action.toLowerCase()}`, { tableName, recordId, holder: request.holder });
      return result;
    });
  }

  /**
   * Release the lock. Releasing a record nobody holds succeeds; releasing
   * another holder's lock needs `force`.
   */
  async unlock(tableName: string, recordId: string, input: UnlockInput): Promise<Result<UnlockResult>> {
    return toResult(this.logger, 'unlockRecord', async () => {
      requireText(tableName, 'tableName');
      requireText(recordId, 'recordId');
      const request = parseUnlockInput(input);

      return this.store.transaction(async (session): Promise<UnlockResult> => {
        const existing = await this.findLock(session, tableName, recordId);
        if (!existing) return { released: false, message: 'No lock to release', previousHolder: null };

        const forced = existing.lockedBy !== request.holder;
        if (forced && !request.force) {
          throw new RecordLockedError(`Record locked by ${existing.lockedBy}; force is needed to release it`);
        }

        await this.appendAction(session, existing, forced ? 'LOCK_FORCE_RELEASED' : 'LOCK_RELEASED', request.holder, {
          previousHolder: existing.lockedBy,
        });
        await session.remove('record_locks', existing.id);
        if (forced) {
          this.logger.warn('Record lock released by force', {
            tableName,
            recordId,
            holder: existing.lockedBy,
            releasedBy: request.holder,
          });
        }
        return { released: true, message: 'Lock released', previousHolder: existing.lockedBy };
      });
    });
  }

  async getLock(tableName: string, recordId: string): Promise<Result<LockStatus>> {
    return toResult(this.logger, 'getLock', async () => {
      const row = await this.store.read((session) => this.findLock(session, tableName, recordId));
      return { isLocked: row !== null, lock: row ? mapRowToLock(row) : null };
    });
  }

  async getHistory(tableName: string, recordId: string): Promise<Result<HistoryEntry[]>> {
    return toResult(this.logger, 'getLockHistory', () => this.ledger.history(lockChain(tableName, recordId)));
  }

  /** Refuse inside a unit of work when someone other than `holder` has the lock. */
  async assertWritableWithin(
    session: StoreSession,
    tableName: string,
    recordId: string,
    holder: string,
  ): Promise<void> {
    const existing = await this.findLock(session, tableName, recordId);
    if (existing && existing.lockedBy !== holder) {
      throw new RecordLockedError(`Record locked by ${existing.lockedBy}`);
    }
  }

  private async findLock(session: StoreSession, tableName: string, recordId: string): Promise<RecordLockRow | null> {
    const [row] = await session.find('record_locks', { tableName, recordId }, { limit: 1 });
    return row ?? null;
  }

  private async appendAction(
    session: StoreSession,
    lock: RecordLockRow,
    action: string,
    performedBy: string,
    details: JsonObject,
  ): Promise<void> {
    await this.ledger.append(session, lockChain(lock.tableName, lock.recordId), {
      action,
      tableName: lock.tableName,
      recordId: lock.recordId,
      performedBy,
      performedAt: this.clock().toISOString(),
      details,
    });
  }
}
