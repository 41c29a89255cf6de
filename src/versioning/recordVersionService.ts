/**
 * Hash-chained version log of clinical records.
 *
 * Every version is a ledger entry under `version:<table>:<recordId>`
 * holding the full data snapshot, so the chain itself is the version
 * store. Writes are refused while another holder has the record's
 * advisory lock.
 *
 * @module versioning/recordVersionService
 */

import type { HashChainLedger } from '../ledger/hashChainLedger.js';
import type { ChainVerification, HistoryEntry } from '../ledger/types.js';
import type { RecordLockService } from '../locks/recordLockService.js';
import { createLogger, silentOutput, type Logger } from '../logging/logger.js';
import type { Store } from '../store/types.js';
import type { EngineDependencies } from '../types/dependencies.js';
import { systemClock, type Clock } from '../utils/dates.js';
import { IntegrityError, NotFoundError, ValidationError } from '../utils/errors.js';
import { isJsonObject, type JsonObject, type JsonValue } from '../utils/json.js';
import { toResult, type Result } from '../utils/responses.js';
import { requireIntegerInRange, requireOneOf, requireRecord, requireText } from '../utils/validation.js';
import {
  CHANGE_TYPES,
  type FieldDifference,
  type RecordVersion,
  type RecordVersionInput,
  type RestoreVersionInput,
  type VersionComparison,
} from './types.js';

export function versionChain(tableName: string, recordId: string): string {
  return `version:${tableName}:${recordId}`;
}

export function parseRecordVersionInput(value: unknown): RecordVersionInput {
  const body = requireRecord(value, 'version');
  const data = body['data'];
  if (!isJsonObject(data)) throw new ValidationError('data must be an object');
  return {
    data,
    changeType: requireOneOf(body['changeType'] ?? 'UPDATE', CHANGE_TYPES, 'changeType'),
    reason: requireText(body['reason'], 'reason'),
    changedBy: requireText(body['changedBy'], 'changedBy'),
  };
}

export function parseRestoreVersionInput(value: unknown): RestoreVersionInput {
  const body = requireRecord(value, 'restore');
  return {
    reason: requireText(body['reason'], 'reason'),
    restoredBy: requireText(body['restoredBy'], 'restoredBy'),
  };
}

export interface RecordVersionDependencies extends EngineDependencies {
  locks: RecordLockService;
}

function toVersion(entry: HistoryEntry, tableName: string, recordId: string): RecordVersion {
  const { payload } = entry;
  const data = payload['data'];
  const reason = payload['reason'];
  const changedBy = payload['changedBy'];
  const changedAt = payload['changedAt'];
  if (
    !isJsonObject(data) ||
    typeof reason !== 'string' ||
    typeof changedBy !== 'string' ||
    typeof changedAt !== 'string'
  ) {
    throw new IntegrityError(`Version entry ${entry.sequence} is malformed`, entry.scopeKey);
  }
  return {
    tableName,
    recordId,
    versionNumber: entry.sequence + 1,
    data,
    changeType: requireOneOf(payload['changeType'], CHANGE_TYPES, 'changeType'),
    reason,
    changedBy,
    changedAt,
    hash: entry.hash,
    previousHash: entry.previousHash,
  };
}

function sameValue(a: JsonValue | undefined, b: JsonValue | undefined): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/** Field-level differences from `before` to `after`, in field order. */
export function diffSnapshots(before: JsonObject, after: JsonObject): FieldDifference[] {
  const fields = Array.from(new Set([...Object.keys(before), ...Object.keys(after)])).sort();
  const differences: FieldDifference[] = [];
  for (const field of fields) {
    const a = before[field];
    const b = after[field];
    if (sameValue(a, b)) continue;
    differences.push({
      field,
      before: a ?? null,
      after: b ?? null,
      changeType: a === undefined ? 'ADDED' : b === undefined ? 'REMOVED' : 'MODIFIED',
    });
  }
  return differences;
}

export class RecordVersionService {
  private readonly store: Store;
  private readonly ledger: HashChainLedger;
  private readonly locks: RecordLockService;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(deps: RecordVersionDependencies) {
    this.store = deps.store;
    this.ledger = deps.ledger;
    this.locks = deps.locks;
    this.clock = deps.clock ?? systemClock;
    this.logger = (deps.logger ?? createLogger({ output: silentOutput })).child({ component: 'versions' });
  }

  async recordVersion(tableName: string, recordId: string, input: RecordVersionInput): Promise<Result<RecordVersion>> {
    return toResult(this.logger, 'recordVersion', async () => {
      requireText(tableName, 'tableName');
      requireText(recordId, 'recordId');
      const version = parseRecordVersionInput(input);
      return this.append(tableName, recordId, {
        data: version.data,
        changeType: version.changeType ?? 'UPDATE',
        reason: version.reason,
        changedBy: version.changedBy,
      });
    });
  }

  /** Newest first. */
  async getVersions(tableName: string, recordId: string): Promise<Result<RecordVersion[]>> {
    return toResult(this.logger, 'getVersions', async () => {
      const entries = await this.ledger.history(versionChain(tableName, recordId));
      return entries.map((entry) => toVersion(entry, tableName, recordId)).reverse();
    });
  }

  async getVersion(tableName: string, recordId: string, versionNumber: number): Promise<Result<RecordVersion>> {
    return toResult(this.logger, 'getVersion', () => this.findVersion(tableName, recordId, versionNumber));
  }

  async compareVersions(
    tableName: string,
    recordId: string,
    from: number,
    to: number,
  ): Promise<Result<VersionComparison>> {
    return toResult(this.logger, 'compareVersions', async () => {
      const [before, after] = await Promise.all([
        this.findVersion(tableName, recordId, from),
        this.findVersion(tableName, recordId, to),
      ]);
      const differences = diffSnapshots(before.data, after.data);
      return { tableName, recordId, from, to, differences, identical: differences.length === 0 };
    });
  }

  /** Write an old snapshot back as a new RESTORE version. */
  async restoreVersion(
    tableName: string,
    recordId: string,
    versionNumber: number,
    input: RestoreVersionInput,
  ): Promise<Result<RecordVersion>> {
    return toResult(this.logger, 'restoreVersion', async () => {
      const restore = parseRestoreVersionInput(input);
      const source = await this.findVersion(tableName, recordId, versionNumber);
      return this.append(tableName, recordId, {
        data: source.data,
        changeType: 'RESTORE',
        reason: `Restored from version ${versionNumber}: ${restore.reason}`,
        changedBy: restore.restoredBy,
      });
    });
  }

  async verifyVersions(tableName: string, recordId: string): Promise<Result<ChainVerification>> {
    return toResult(this.logger, 'verifyVersions', () => this.ledger.verify(versionChain(tableName, recordId)));
  }

  private async append(
    tableName: string,
    recordId: string,
    version: Required<RecordVersionInput>,
  ): Promise<RecordVersion> {
    const changedAt = this.clock().toISOString();
    const scopeKey = versionChain(tableName, recordId);
    const payload = {
      tableName,
      recordId,
      data: version.data,
      changeType: version.changeType,
      reason: version.reason,
      changedBy: version.changedBy,
      changedAt,
    };

    const link = await this.store.transaction(async (session) => {
      await this.locks.assertWritableWithin(session, tableName, recordId, version.changedBy);
      return this.ledger.append(session, scopeKey, payload);
    });

    this.logger.info('Record version written', {
      tableName,
      recordId,
      versionNumber: link.sequence + 1,
      changeType: version.changeType,
    });
    return {
      tableName,
      recordId,
      versionNumber: link.sequence + 1,
      data: version.data,
      changeType: version.changeType,
      reason: version.reason,
      changedBy: version.changedBy,
      changedAt,
      hash: link.hash,
      previousHash: link.previousHash,
    };
  }

  private async findVersion(tableName: string, recordId: string, versionNumber: number): Promise<RecordVersion> {
    requireIntegerInRange(versionNumber, 'versionNumber', 1);
    const entries = await this.ledger.history(versionChain(tableName, recordId));
    const entry = entries[versionNumber - 1];
    if (!entry) throw new NotFoundError('Version', `${tableName}/${recordId}#${versionNumber}`);
    return toVersion(entry, tableName, recordId);
  }
}
