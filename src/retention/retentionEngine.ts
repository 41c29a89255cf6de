/**
 * Retention Policy & Expiry Engine
 *
 * Registers tracked records against retention policies, computes expiry,
 * and drives records to DELETED or ANONYMIZED. Two independent hold
 * mechanisms guard disposal: the record-level hold flag toggled here and
 * the Legal Hold Registry, both checked inside the disposal's unit of work.
 * Every record action is chained under `retention:<recordId>`; review
 * sessions are chained under `retention:reviews`. Row writes precede the
 * append they belong to.
 *
 * Expiry is a computed value. An external scheduler pulls `scanExpired`
 * or `enforceExpired`; nothing here runs on a timer.
 *
 * @module retention/retentionEngine
 */

import { v4 as uuidv4 } from 'uuid';
import type { LegalHoldRegistry } from '../holds/legalHoldRegistry.js';
import type { HashChainLedger } from '../ledger/hashChainLedger.js';
import type { ChainVerification, HistoryEntry } from '../ledger/types.js';
import { createLogger, silentOutput, type Logger } from '../logging/logger.js';
import type {
  RetentionPolicyRow,
  RetentionRecordRow,
  RetentionReviewRow,
  Store,
  StoreSession,
} from '../store/types.js';
import type { EngineDependencies } from '../types/dependencies.js';
import { DATA_CATEGORIES } from '../types/vocabulary.js';
import { addDays, parseIsoDate, systemClock, toIsoDate, type Clock } from '../utils/dates.js';
import {
  IntegrityError,
  LegalHoldError,
  NotFoundError,
  StateError,
  isComplianceError,
} from '../utils/errors.js';
import type { JsonObject } from '../utils/json.js';
import { toResult, type Result } from '../utils/responses.js';
import {
  optionalText,
  requireIntegerInRange,
  requireOneOf,
  requireRecord,
  requireText,
} from '../utils/validation.js';
import {
  EXPIRY_ACTIONS,
  RETENTION_BASES,
  RETENTION_STATUSES,
  REVIEW_TYPES,
  TERMINAL_RETENTION_STATUSES,
  type ActorInput,
  type CompleteReviewInput,
  type CreatePolicyInput,
  type CreateReviewInput,
  type DisposalInput,
  type EnforcementReport,
  type ExtendRetentionInput,
  type RecordHoldInput,
  type RegisterRecordInput,
  type RetentionPolicy,
  type RetentionRecord,
  type RetentionReview,
  type RetentionStatistics,
  type RetentionStatus,
} from './types.js';

export const POLICY_CHAIN = 'retention:policies';
export const REVIEW_CHAIN = 'retention:reviews';

export function recordChain(recordId: string): string {
  return `retention:${recordId}`;
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

export function parseCreatePolicyInput(value: unknown): CreatePolicyInput {
  const body = requireRecord(value, 'policy');
  return {
    code: requireText(body['code'], 'code').toUpperCase(),
    name: requireText(body['name'], 'name'),
    dataCategory: requireOneOf(body['dataCategory'], DATA_CATEGORIES, 'dataCategory'),
    retentionDays: requireIntegerInRange(body['retentionDays'], 'retentionDays', 1),
    legalBasis: requireOneOf(body['legalBasis'], RETENTION_BASES, 'legalBasis'),
    actionOnExpiry: requireOneOf(body['actionOnExpiry'], EXPIRY_ACTIONS, 'actionOnExpiry'),
    createdBy: requireText(body['createdBy'], 'createdBy'),
  };
}

export function parseRegisterRecordInput(value: unknown): RegisterRecordInput {
  const body = requireRecord(value, 'record');
  const createdDate = requireText(body['createdDate'], 'createdDate');
  parseIsoDate(createdDate, 'createdDate');
  return {
    policyCode: requireText(body['policyCode'], 'policyCode').toUpperCase(),
    tableName: requireText(body['tableName'], 'tableName'),
    recordKey: requireText(body['recordKey'], 'recordKey'),
    createdDate,
    subjectId: optionalText(body['subjectId'], 'subjectId') ?? undefined,
    registeredBy: requireText(body['registeredBy'], 'registeredBy'),
  };
}

export function parseExtendRetentionInput(value: unknown): ExtendRetentionInput {
  const body = requireRecord(value, 'extension');
  return {
    days: requireIntegerInRange(body['days'], 'days', 1),
    reason: requireText(body['reason'], 'reason'),
    extendedBy: requireText(body['extendedBy'], 'extendedBy'),
    reviewId: optionalText(body['reviewId'], 'reviewId') ?? undefined,
  };
}

export function parseRecordHoldInput(value: unknown): RecordHoldInput {
  const body = requireRecord(value, 'hold');
  return {
    reason: requireText(body['reason'], 'reason'),
    heldBy: requireText(body['heldBy'], 'heldBy'),
  };
}

export function parseActorInput(value: unknown): ActorInput {
  const body = requireRecord(value, 'action');
  return {
    performedBy: requireText(body['performedBy'], 'performedBy'),
    notes: optionalText(body['notes'], 'notes') ?? undefined,
  };
}

export function parseDisposalInput(value: unknown): DisposalInput {
  const body = requireRecord(value, 'action');
  return {
    ...parseActorInput(body),
    reviewId: optionalText(body['reviewId'], 'reviewId') ?? undefined,
  };
}

export function parseCreateReviewInput(value: unknown): CreateReviewInput {
  const body = requireRecord(value, 'review');
  return {
    reviewType: requireOneOf(body['reviewType'], REVIEW_TYPES, 'reviewType'),
    scope: requireText(body['scope'], 'scope'),
    startedBy: requireText(body['startedBy'], 'startedBy'),
    policyCode: optionalText(body['policyCode'], 'policyCode')?.toUpperCase(),
  };
}

export function parseCompleteReviewInput(value: unknown): CompleteReviewInput {
  const body = requireRecord(value, 'completion');
  return {
    completedBy: requireText(body['completedBy'], 'completedBy'),
    notes: optionalText(body['notes'], 'notes') ?? undefined,
  };
}

// ─── Row mapping ─────────────────────────────────────────────────────────────

export function mapRowToPolicy(row: RetentionPolicyRow): RetentionPolicy {
  return {
    ...row,
    dataCategory: requireOneOf(row.dataCategory, DATA_CATEGORIES, 'dataCategory'),
    legalBasis: requireOneOf(row.legalBasis, RETENTION_BASES, 'legalBasis'),
    actionOnExpiry: requireOneOf(row.actionOnExpiry, EXPIRY_ACTIONS, 'actionOnExpiry'),
  };
}

export function mapRowToRecord(row: RetentionRecordRow): RetentionRecord {
  return {
    ...row,
    dataCategory: requireOneOf(row.dataCategory, DATA_CATEGORIES, 'dataCategory'),
    status: requireOneOf(row.status, RETENTION_STATUSES, 'status'),
  };
}

export function mapRowToReview(row: RetentionReviewRow): RetentionReview {
  return { ...row, reviewType: requireOneOf(row.reviewType, REVIEW_TYPES, 'reviewType') };
}

function isTerminal(status: string): boolean {
  return TERMINAL_RETENTION_STATUSES.some((terminal) => terminal === status);
}

// ─── Engine ──────────────────────────────────────────────────────────────────

type Disposal = 'DELETED' | 'ANONYMIZED';

type ReviewedAction = Disposal | 'EXTENDED';

export interface RetentionEngineDependencies extends EngineDependencies {
  holds: LegalHoldRegistry;
}

export class RetentionEngine {
  private readonly store: Store;
  private readonly ledger: HashChainLedger;
  private readonly holds: LegalHoldRegistry;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(deps: RetentionEngineDependencies) {
    this.store = deps.store;
    this.ledger = deps.ledger;
    this.holds = deps.holds;
    this.clock = deps.clock ?? systemClock;
    this.logger = (deps.logger ?? createLogger({ output: silentOutput })).child({ component: 'retention' });
  }

  private today(): string {
    return toIsoDate(this.clock());
  }

  // ─── Policies ───

  async createPolicy(input: CreatePolicyInput): Promise<Result<RetentionPolicy>> {
    return toResult(this.logger, 'createPolicy', async () => {
      const policy = parseCreatePolicyInput(input);
      const createdAt = this.clock().toISOString();

      const row = await this.store.transaction(async (session) => {
        const [existing] = await session.find('retention_policies', { code: policy.code }, { limit: 1 });
        if (existing) throw new StateError(`Policy code already exists: ${policy.code}`);

        const id = uuidv4();
        await this.ledger.append(session, POLICY_CHAIN, {
          action: 'POLICY_CREATED',
          policyId: id,
          ...policy,
          performedBy: policy.createdBy,
          performedAt: createdAt,
        });
        return session.insert('retention_policies', { id, ...policy, isActive: true, createdAt });
      });

      this.logger.info('Retention policy created', { code: row.code, retentionDays: row.retentionDays });
      return mapRowToPolicy(row);
    });
  }

  async getPolicy(code: string): Promise<Result<RetentionPolicy>> {
    return toResult(this.logger, 'getPolicy', async () => {
      const row = await this.store.read((session) => this.policyByCode(session, code));
      return mapRowToPolicy(row);
    });
  }

  async listPolicies(options: { activeOnly?: boolean } = {}): Promise<Result<RetentionPolicy[]>> {
    return toResult(this.logger, 'listPolicies', async () => {
      const rows = await this.store.read((session) =>
        session.find('retention_policies', options.activeOnly ? { isActive: true } : {}, { orderBy: 'code' }),
      );
      return rows.map(mapRowToPolicy);
    });
  }

  /** Stop new registrations under a policy. Existing records keep their expiry. */
  async deactivatePolicy(code: string, input: ActorInput): Promise<Result<RetentionPolicy>> {
    return toResult(this.logger, 'deactivatePolicy', async () => {
      const actor = parseActorInput(input);
      const row = await this.store.transaction(async (session) => {
        const policy = await this.policyByCode(session, code);
        if (!policy.isActive) throw new StateError('Policy is already inactive');
        await this.ledger.append(session, POLICY_CHAIN, {
          action: 'POLICY_DEACTIVATED',
          policyId: policy.id,
          code: policy.code,
          performedBy: actor.performedBy,
          performedAt: this.clock().toISOString(),
        });
        await session.update('retention_policies', policy.id, { isActive: false });
        return { ...policy, isActive: false };
      });
      return mapRowToPolicy(row);
    });
  }

  // ─── Records ───

  async register(input: RegisterRecordInput): Promise<Result<RetentionRecord>> {
    return toResult(this.logger, 'registerRecord', async () => {
      const registration = parseRegisterRecordInput(input);
      const now = this.clock().toISOString();

      const row = await this.store.transaction(async (session) => {
        const policy = await this.policyByCode(session, registration.policyCode);
        if (!policy.isActive) throw new StateError(`Policy is not active: ${policy.code}`);

        const [duplicate] = await session.find(
          'retention_records',
          { tableName: registration.tableName, recordKey: registration.recordKey },
          { limit: 1 },
        );
        if (duplicate) throw new StateError('Record already registered');

        const id = uuidv4();
        const expiryDate = addDays(registration.createdDate, policy.retentionDays);
        const record: RetentionRecordRow = {
          id,
          policyId: policy.id,
          tableName: registration.tableName,
          recordKey: registration.recordKey,
          subjectId: registration.subjectId ?? null,
          dataCategory: policy.dataCategory,
          createdDate: registration.createdDate,
          expiryDate,
          status: 'ACTIVE',
          extensionCount: 0,
          onHold: false,
          holdReason: null,
          heldBy: null,
          heldAt: null,
          registeredBy: registration.registeredBy,
          reviewId: null,
          updatedAt: now,
        };
        await this.appendAction(session, id, 'REGISTERED', registration.registeredBy, now, {
          policyCode: policy.code,
          tableName: record.tableName,
          recordKey: record.recordKey,
          expiryDate,
        });
        return session.insert('retention_records', record);
      });

      this.logger.info('Retention record registered', { recordId: row.id, expiryDate: row.expiryDate });
      return mapRowToRecord(row);
    });
  }

  async getRecord(recordId: string): Promise<Result<RetentionRecord>> {
    return toResult(this.logger, 'getRecord', async () => {
      const row = await this.store.read((session) => this.recordById(session, recordId));
      return mapRowToRecord(row);
    });
  }

  async findRecord(tableName: string, recordKey: string): Promise<Result<RetentionRecord | null>> {
    return toResult(this.logger, 'findRecord', async () => {
      const [row] = await this.store.read((session) =>
        session.find('retention_records', { tableName, recordKey }, { limit: 1 }),
      );
      return row ? mapRowToRecord(row) : null;
    });
  }

  /** ACTIVE records at or past expiry on `asOf` that carry no record-level hold. */
  async scanExpired(asOf: string = this.today()): Promise<Result<RetentionRecord[]>> {
    return toResult(this.logger, 'scanExpired', async () => {
      parseIsoDate(asOf, 'asOf');
      const rows = await this.store.read((session) => this.expiredRows(session, asOf));
      return rows.map(mapRowToRecord);
    });
  }

  async getRecordsExpiringSoon(
    daysAhead: number,
    asOf: string = this.today(),
  ): Promise<Result<RetentionRecord[]>> {
    return toResult(this.logger, 'getRecordsExpiringSoon', async () => {
      requireIntegerInRange(daysAhead, 'daysAhead', 0);
      const horizon = addDays(asOf, daysAhead);
      const rows = await this.store.read((session) =>
        session.find(
          'retention_records',
          { status: 'ACTIVE', expiryDate: { between: [asOf, horizon] } },
          { orderBy: 'expiryDate' },
        ),
      );
      return rows.map(mapRowToRecord);
    });
  }

  /** Push expiry out by `days`. No cap on how often. */
  async extend(recordId: string, input: ExtendRetentionInput): Promise<Result<RetentionRecord>> {
    return toResult(this.logger, 'extendRetention', async () => {
      const extension = parseExtendRetentionInput(input);
      const now = this.clock();

      const row = await this.store.transaction(async (session) => {
        const record = await this.recordById(session, recordId);
        if (isTerminal(record.status)) {
          throw new StateError(`Cannot extend a record that is ${record.status.toLowerCase()}`);
        }
        const expiryDate = addDays(record.expiryDate, extension.days);
        const status =
          record.status === 'EXPIRED' && expiryDate > toIsoDate(now) ? 'ACTIVE' : record.status;
        const patch = {
          expiryDate,
          status,
          extensionCount: record.extensionCount + 1,
          reviewId: extension.reviewId ?? record.reviewId,
          updatedAt: now.toISOString(),
        };

        await this.writeGuarded(session, record, patch);
        if (extension.reviewId !== undefined) {
          await this.countReviewAction(session, extension.reviewId, record, 'EXTENDED');
        }
        await this.appendAction(session, recordId, 'EXTENDED', extension.extendedBy, patch.updatedAt, {
          days: extension.days,
          reason: extension.reason,
          previousExpiryDate: record.expiryDate,
          expiryDate,
          reviewId: extension.reviewId,
        });
        return { ...record, ...patch };
      });

      this.logger.info('Retention extended', { recordId, expiryDate: row.expiryDate, extensions: row.extensionCount });
      return mapRowToRecord(row);
    });
  }

  /** Set the record-level hold flag. Independent of the Legal Hold Registry. */
  async applyHold(recordId: string, input: RecordHoldInput): Promise<Result<RetentionRecord>> {
    return toResult(this.logger, 'applyRecordHold', async () => {
      const hold = parseRecordHoldInput(input);
      const now = this.clock().toISOString();

      const row = await this.store.transaction(async (session) => {
        const record = await this.recordById(session, recordId);
        if (record.onHold) throw new StateError('Record is already on hold');
        if (isTerminal(record.status)) {
          throw new StateError(`Cannot hold a record that is ${record.status.toLowerCase()}`);
        }
        const patch = {
          onHold: true,
          status: 'LEGAL_HOLD',
          holdReason: hold.reason,
          heldBy: hold.heldBy,
          heldAt: now,
          updatedAt: now,
        };
        await this.writeGuarded(session, record, patch);
        await this.appendAction(session, recordId, 'HOLD_APPLIED', hold.heldBy, now, {
          reason: hold.reason,
          previousStatus: record.status,
        });
        return { ...record, ...patch };
      });

      return mapRowToRecord(row);
    });
  }

  /** Clear the hold flag. The record returns to EXPIRED when its expiry has passed. */
  async releaseHold(recordId: string, input: ActorInput): Promise<Result<RetentionRecord>> {
    return toResult(this.logger, 'releaseRecordHold', async () => {
      const actor = parseActorInput(input);
      const now = this.clock();

      const row = await this.store.transaction(async (session) => {
        const record = await this.recordById(session, recordId);
        if (!record.onHold) throw new StateError('Record is not on hold');
        const status: RetentionStatus = record.expiryDate <= toIsoDate(now) ? 'EXPIRED' : 'ACTIVE';
        const patch = {
          onHold: false,
          status,
          holdReason: null,
          heldBy: null,
          heldAt: null,
          updatedAt: now.toISOString(),
        };
        await this.writeGuarded(session, record, patch);
        await this.appendAction(session, recordId, 'HOLD_RELEASED', actor.performedBy, patch.updatedAt, {
          notes: actor.notes,
          status,
        });
        return { ...record, ...patch };
      });

      return mapRowToRecord(row);
    });
  }

  async delete(recordId: string, input: DisposalInput): Promise<Result<RetentionRecord>> {
    return toResult(this.logger, 'deleteRecord', () => this.dispose(recordId, 'DELETED', parseDisposalInput(input)));
  }

  async anonymize(recordId: string, input: DisposalInput): Promise<Result<RetentionRecord>> {
    return toResult(this.logger, 'anonymizeRecord', () =>
      this.dispose(recordId, 'ANONYMIZED', parseDisposalInput(input)),
    );
  }

  /** A subject's tracked records by expiry. Deleted and anonymized ones only on request. */
  async getSubjectRecords(
    subjectId: string,
    options: { includeDisposed?: boolean } = {},
  ): Promise<Result<RetentionRecord[]>> {
    return toResult(this.logger, 'getSubjectRecords', async () => {
      requireText(subjectId, 'subjectId');
      const rows = await this.store.read((session) =>
        session.find(
          'retention_records',
          options.includeDisposed ? { subjectId } : { subjectId, status: { in: ['ACTIVE', 'EXPIRED', 'LEGAL_HOLD'] } },
          { orderBy: 'expiryDate' },
        ),
      );
      return rows.map(mapRowToRecord);
    });
  }

  // ─── Reviews ───

  async createReview(input: CreateReviewInput): Promise<Result<RetentionReview>> {
    return toResult(this.logger, 'createRetentionReview', async () => {
      const review = parseCreateReviewInput(input);
      const startedAt = this.clock().toISOString();
      const row = await this.store.transaction((session) => this.openReview(session, review, startedAt));
      this.logger.info('Retention review started', { reviewId: row.id, reviewType: row.reviewType });
      return mapRowToReview(row);
    });
  }

  /**
   * Close a review and freeze its counts. Refused while any record flagged
   * for it is still EXPIRED: each one needs an extension or a disposal first.
   */
  async completeReview(reviewId: string, input: CompleteReviewInput): Promise<Result<RetentionReview>> {
    return toResult(this.logger, 'completeRetentionReview', async () => {
      const completion = parseCompleteReviewInput(input);
      const completedAt = this.clock().toISOString();

      const row = await this.store.transaction(async (session) => {
        const review = await this.reviewById(session, reviewId);
        if (review.completedAt !== null) throw new StateError('Review already completed');
        const awaiting = await session.count('retention_records', { reviewId, status: 'EXPIRED' });
        if (awaiting > 0) throw new StateError(`${awaiting} records still awaiting a decision`);

        const patch = { completedAt, completedBy: completion.completedBy, notes: completion.notes ?? null };
        const written = await session.update('retention_reviews', reviewId, patch, {
          completedAt: null,
          recordsReviewed: review.recordsReviewed,
        });
        if (written === 0) throw new StateError('Review changed while the action was in progress');
        await this.ledger.append(session, REVIEW_CHAIN, {
          action: 'REVIEW_COMPLETED',
          reviewId,
          recordsReviewed: review.recordsReviewed,
          recordsExtended: review.recordsExtended,
          recordsDeleted: review.recordsDeleted,
          recordsAnonymized: review.recordsAnonymized,
          notes: completion.notes,
          performedBy: completion.completedBy,
          performedAt: completedAt,
        });
        return { ...review, ...patch };
      });

      this.logger.info('Retention review completed', { reviewId, recordsReviewed: row.recordsReviewed });
      return mapRowToReview(row);
    });
  }

  async getReview(reviewId: string): Promise<Result<RetentionReview>> {
    return toResult(this.logger, 'getRetentionReview', async () => {
      const row = await this.store.read((session) => this.reviewById(session, reviewId));
      return mapRowToReview(row);
    });
  }

  async listReviews(options: { openOnly?: boolean } = {}): Promise<Result<RetentionReview[]>> {
    return toResult(this.logger, 'listRetentionReviews', async () => {
      const rows = await this.store.read((session) =>
        session.find('retention_reviews', options.openOnly ? { completedAt: null } : {}, { orderBy: 'startedAt' }),
      );
      return rows.map(mapRowToReview);
    });
  }

  /** Records a review is waiting on or has acted on. */
  async getReviewRecords(reviewId: string): Promise<Result<RetentionRecord[]>> {
    return toResult(this.logger, 'getReviewRecords', async () => {
      const rows = await this.store.read(async (session) => {
        await this.reviewById(session, reviewId);
        return session.find('retention_records', { reviewId }, { orderBy: 'expiryDate' });
      });
      return rows.map(mapRowToRecord);
    });
  }

  /**
   * Apply each expired record's policy action. DELETE and ANONYMIZE dispose
   * of the record; ARCHIVE, REVIEW and EXTEND flag it EXPIRED for a person
   * to act on. REVIEW records also join one TRIGGERED review opened by the
   * run. Records under a registry hold are skipped and reported.
   */
  async enforceExpired(input: ActorInput, asOf: string = this.today()): Promise<Result<EnforcementReport>> {
    return toResult(this.logger, 'enforceExpired', async () => {
      const actor = parseActorInput(input);
      parseIsoDate(asOf, 'asOf');
      const report: EnforcementReport = {
        asOf,
        reviewId: null,
        deleted: [],
        anonymized: [],
        flagged: [],
        skipped: [],
      };

      const expired = await this.store.read((session) => this.expiredRows(session, asOf));
      const policies = new Map<string, RetentionPolicyRow>();
      for (const row of await this.store.read((session) => session.find('retention_policies'))) {
        policies.set(row.id, row);
      }

      for (const record of expired) {
        const action = policies.get(record.policyId)?.actionOnExpiry;
        try {
          if (action === 'DELETE') {
            await this.dispose(record.id, 'DELETED', actor);
            report.deleted.push(record.id);
          } else if (action === 'ANONYMIZE') {
            await this.dispose(record.id, 'ANONYMIZED', actor);
            report.anonymized.push(record.id);
          } else if (action === 'ARCHIVE' || action === 'EXTEND') {
            await this.flagExpired(record.id, actor, action, null);
            report.flagged.push(record.id);
          } else {
            report.reviewId = await this.flagExpired(record.id, actor, 'REVIEW', {
              reviewId: report.reviewId,
              asOf,
            });
            report.flagged.push(record.id);
          }
        } catch (err) {
          if (!isComplianceError(err) || err instanceof IntegrityError) throw err;
          report.skipped.push({ recordId: record.id, reason: err.message });
        }
      }

      this.logger.info('Retention enforcement finished', {
        asOf,
        deleted: report.deleted.length,
        anonymized: report.anonymized.length,
        flagged: report.flagged.length,
        skipped: report.skipped.length,
        reviewId: report.reviewId,
      });
      return report;
    });
  }

  async getHistory(recordId: string): Promise<Result<HistoryEntry[]>> {
    return toResult(this.logger, 'getRetentionHistory', () => this.ledger.history(recordChain(recordId)));
  }

  async verifyHistory(recordId: string): Promise<Result<ChainVerification>> {
    return toResult(this.logger, 'verifyRetentionHistory', () => this.ledger.verify(recordChain(recordId)));
  }

  async getStatistics(asOf: string = this.today()): Promise<Result<RetentionStatistics>> {
    return toResult(this.logger, 'getRetentionStatistics', async () => {
      const rows = await this.store.read((session) => session.find('retention_records'));
      const byStatus: Record<RetentionStatus, number> = {
        ACTIVE: 0,
        EXPIRED: 0,
        DELETED: 0,
        ANONYMIZED: 0,
        LEGAL_HOLD: 0,
      };
      let onHold = 0;
      let dueForAction = 0;
      let totalExtensions = 0;
      for (const record of rows.map(mapRowToRecord)) {
        byStatus[record.status] += 1;
        totalExtensions += record.extensionCount;
        if (record.onHold) onHold += 1;
        else if (record.status === 'ACTIVE' && record.expiryDate <= asOf) dueForAction += 1;
      }
      return { total: rows.length, byStatus, onHold, dueForAction, totalExtensions };
    });
  }

  // ─── Internals ───

  private async dispose(recordId: string, outcome: Disposal, actor: DisposalInput): Promise<RetentionRecord> {
    const now = this.clock().toISOString();

    const row = await this.store.transaction(async (session) => {
      const record = await this.recordById(session, recordId);
      if (isTerminal(record.status)) {
        throw new StateError(`Record is already ${record.status.toLowerCase()}`);
      }
      if (record.onHold) throw new LegalHoldError('Record is on legal hold');

      const check = await this.holds.checkWithin(session, {
        subjectId: record.subjectId ?? undefined,
        category: record.dataCategory,
      });
      if (check.isHeld) {
        const numbers = check.matchingHolds.map((hold) => hold.holdNumber).join(', ');
        throw new LegalHoldError(`Record is covered by legal hold ${numbers}`);
      }

      const patch = { status: outcome, reviewId: actor.reviewId ?? record.reviewId, updatedAt: now };
      await this.writeGuarded(session, record, patch);
      if (actor.reviewId !== undefined) {
        await this.countReviewAction(session, actor.reviewId, record, outcome);
      }
      await this.appendAction(session, recordId, outcome, actor.performedBy, now, {
        previousStatus: record.status,
        notes: actor.notes,
        reviewId: actor.reviewId,
      });
      return { ...record, ...patch };
    });

    this.logger.info(`Retention record ${outcome.toLowerCase()}`, { recordId, actor: actor.performedBy });
    return mapRowToRecord(row);
  }

  /**
   * Mark a record EXPIRED. With `review`, the record joins that review, or
   * one opened here when `review.reviewId` is null; the review's id is returned.
   */
  private async flagExpired(
    recordId: string,
    actor: ActorInput,
    action: string,
    review: { reviewId: string | null; asOf: string } | null,
  ): Promise<string | null> {
    const now = this.clock().toISOString();
    return this.store.transaction(async (session) => {
      const record = await this.recordById(session, recordId);
      if (record.status !== 'ACTIVE') throw new StateError(`Record is ${record.status.toLowerCase()}`);

      let reviewId = review?.reviewId ?? null;
      if (review !== null && reviewId === null) {
        const opened = await this.openReview(
          session,
          { reviewType: 'TRIGGERED', scope: `Records expired on or before ${review.asOf}`, startedBy: actor.performedBy },
          now,
        );
        reviewId = opened.id;
      }
      await this.writeGuarded(session, record, {
        status: 'EXPIRED',
        reviewId: reviewId ?? record.reviewId,
        updatedAt: now,
      });
      await this.appendAction(session, recordId, 'FLAGGED_EXPIRED', actor.performedBy, now, {
        actionOnExpiry: action,
        reviewId: reviewId ?? undefined,
      });
      return reviewId;
    });
  }

  private async openReview(
    session: StoreSession,
    review: CreateReviewInput,
    startedAt: string,
  ): Promise<RetentionReviewRow> {
    const policy = review.policyCode === undefined ? null : await this.policyByCode(session, review.policyCode);
    const id = uuidv4();
    const link = await this.ledger.append(session, REVIEW_CHAIN, {
      action: 'REVIEW_STARTED',
      reviewId: id,
      reviewType: review.reviewType,
      scope: review.scope,
      policyCode: policy?.code,
      performedBy: review.startedBy,
      performedAt: startedAt,
    });
    return session.insert('retention_reviews', {
      id,
      policyId: policy?.id ?? null,
      reviewType: review.reviewType,
      scope: review.scope,
      startedBy: review.startedBy,
      startedAt,
      completedBy: null,
      completedAt: null,
      notes: null,
      recordsReviewed: 0,
      recordsExtended: 0,
      recordsDeleted: 0,
      recordsAnonymized: 0,
      hash: link.hash,
    });
  }

  /** Count an action taken under an open review. The review's policy, if any, must match the record's. */
  private async countReviewAction(
    session: StoreSession,
    reviewId: string,
    record: RetentionRecordRow,
    action: ReviewedAction,
  ): Promise<void> {
    const review = await this.reviewById(session, reviewId);
    if (review.completedAt !== null) throw new StateError('Review already completed');
    if (review.policyId !== null && review.policyId !== record.policyId) {
      throw new StateError('Record is outside the policy under review');
    }

    const patch: Partial<RetentionReviewRow> = { recordsReviewed: review.recordsReviewed + 1 };
    if (action === 'EXTENDED') patch.recordsExtended = review.recordsExtended + 1;
    else if (action === 'DELETED') patch.recordsDeleted = review.recordsDeleted + 1;
    else patch.recordsAnonymized = review.recordsAnonymized + 1;

    const written = await session.update('retention_reviews', reviewId, patch, {
      completedAt: null,
      recordsReviewed: review.recordsReviewed,
    });
    if (written === 0) throw new StateError('Review changed while the action was in progress');
  }

  /** Write a patch only if the record still has the status it was read with. */
  private async writeGuarded(
    session: StoreSession,
    record: RetentionRecordRow,
    patch: Partial<RetentionRecordRow>,
  ): Promise<void> {
    const written = await session.update('retention_records', record.id, patch, { status: record.status });
    if (written === 0) {
      throw new StateError('Record changed while the action was in progress');
    }
  }

  private async appendAction(
    session: StoreSession,
    recordId: string,
    action: string,
    performedBy: string,
    performedAt: string,
    details: JsonObject,
  ): Promise<void> {
    await this.ledger.append(session, recordChain(recordId), {
      action,
      recordId,
      performedBy,
      performedAt,
      details,
    });
  }

  private async expiredRows(session: StoreSession, asOf: string): Promise<RetentionRecordRow[]> {
    return session.find(
      'retention_records',
      { status: 'ACTIVE', onHold: false, expiryDate: { lte: asOf } },
      { orderBy: 'expiryDate' },
    );
  }

  private async policyByCode(session: StoreSession, code: string): Promise<RetentionPolicyRow> {
    const [row] = await session.find('retention_policies', { code: code.toUpperCase() }, { limit: 1 });
    if (!row) throw new NotFoundError('Retention policy', code);
    return row;
  }

  private async reviewById(session: StoreSession, reviewId: string): Promise<RetentionReviewRow> {
    const row = await session.get('retention_reviews', reviewId);
    if (!row) throw new NotFoundError('Retention review', reviewId);
    return row;
  }

  private async recordById(session: StoreSession, recordId: string): Promise<RetentionRecordRow> {
    const row = await session.get('retention_records', recordId);
    if (!row) throw new NotFoundError('Retention record', recordId);
    return row;
  }
}
