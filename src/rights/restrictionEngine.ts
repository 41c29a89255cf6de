/**
 * Restriction workflow: the generic engine plus a lookup of the active
 * restrictions on a record, which processing code consults before use.
 *
 * Processing code reports each attempt on a record through
 * `logProcessingAttempt`. An attempt on a restricted record is blocked
 * unless it carries an authorised override; either way it is stored with a
 * digest and, when a restriction covers the record, chained on the
 * restriction request as PROCESSING_BLOCKED or PROCESSING_ALLOWED.
 *
 * @module rights/restrictionEngine
 */

import { v4 as uuidv4 } from 'uuid';
import type { Filter, ProcessingAttemptRow } from '../store/types.js';
import { ValidationError } from '../utils/errors.js';
import { toResult, type Result } from '../utils/responses.js';
import { optionalText, requireRecord, requireText } from '../utils/validation.js';
import { restrictionKind, type RestrictionItemDetails, type RestrictionRequestDetails } from './kinds/restriction.js';
import { RightsRequestEngine, type RightsEngineDependencies } from './rightsRequestEngine.js';
import type { RightsItem } from './types.js';

export interface RestrictionCheck {
  isRestricted: boolean;
  restrictions: RightsItem<RestrictionItemDetails>[];
}

export interface ProcessingAttemptInput {
  tableName: string;
  recordId: string;
  /** What the caller tried, e.g. UPDATE or EXPORT. */
  operation: string;
  attemptedBy: string;
  subjectId?: string;
  operationDetails?: string;
  /** Both override fields let an attempt through a restriction. */
  overrideReason?: string;
  overrideAuthorizedBy?: string;
}

export type ProcessingAttempt = ProcessingAttemptRow;

export interface ProcessingAttemptQuery {
  subjectId?: string;
  tableName?: string;
  recordId?: string;
  /** Defaults to true. */
  blockedOnly?: boolean;
}

export function parseProcessingAttemptInput(value: unknown): ProcessingAttemptInput {
  const body = requireRecord(value, 'attempt');
  const attempt: ProcessingAttemptInput = {
    tableName: requireText(body['tableName'], 'tableName'),
    recordId: requireText(body['recordId'], 'recordId'),
    operation: requireText(body['operation'], 'operation').toUpperCase(),
    attemptedBy: requireText(body['attemptedBy'], 'attemptedBy'),
    subjectId: optionalText(body['subjectId'], 'subjectId') ?? undefined,
    operationDetails: optionalText(body['operationDetails'], 'operationDetails') ?? undefined,
  };
  const overrideReason = optionalText(body['overrideReason'], 'overrideReason');
  const overrideAuthorizedBy = optionalText(body['overrideAuthorizedBy'], 'overrideAuthorizedBy');
  if ((overrideReason === null) !== (overrideAuthorizedBy === null)) {
    throw new ValidationError('overrideReason and overrideAuthorizedBy must be given together');
  }
  if (overrideReason !== null && overrideAuthorizedBy !== null) {
    attempt.overrideReason = overrideReason;
    attempt.overrideAuthorizedBy = overrideAuthorizedBy;
  }
  return attempt;
}

export class RestrictionEngine extends RightsRequestEngine<RestrictionRequestDetails, RestrictionItemDetails> {
  constructor(deps: RightsEngineDependencies) {
    super(restrictionKind, deps);
  }

  async checkRestriction(tableName: string, recordId: string): Promise<Result<RestrictionCheck>> {
    return toResult(this.logger, 'checkRestriction', async () => {
      requireText(tableName, 'tableName');
      requireText(recordId, 'recordId');
      const rows = await this.store.read((session) =>
        session.find(
          'rights_items',
          { kind: this.kind, tableName, recordId, status: 'APPLIED' },
          { orderBy: 'appliedAt' },
        ),
      );
      const restrictions = rows.map((row) => this.toItem(row));
      return { isRestricted: restrictions.length > 0, restrictions };
    });
  }

  /** Record an attempt to process a record and say whether it may go ahead. */
  async logProcessingAttempt(input: ProcessingAttemptInput): Promise<Result<ProcessingAttempt>> {
    return toResult(this.logger, 'logProcessingAttempt', async () => {
      const attempt = parseProcessingAttemptInput(input);
      const attemptedAt = this.clock().toISOString();

      const row = await this.store.transaction(async (session) => {
        const [restriction] = await session.find(
          'rights_items',
          { kind: this.kind, tableName: attempt.tableName, recordId: attempt.recordId, status: 'APPLIED' },
          { orderBy: 'appliedAt', limit: 1 },
        );
        const request = restriction ? await this.requestById(session, restriction.requestId) : null;
        const wasBlocked = restriction !== undefined && attempt.overrideReason === undefined;
        const subjectId = attempt.subjectId ?? request?.subjectId ?? null;

        const id = uuidv4();
        const attemptHash = this.ledger.digest({
          attemptId: id,
          requestId: request?.id ?? null,
          itemId: restriction?.id ?? null,
          subjectId,
          tableName: attempt.tableName,
          recordId: attempt.recordId,
          operation: attempt.operation,
          attemptedBy: attempt.attemptedBy,
          attemptedAt,
          wasBlocked,
        });
        const stored = await session.insert('processing_attempts', {
          id,
          requestId: request?.id ?? null,
          itemId: restriction?.id ?? null,
          subjectId,
          tableName: attempt.tableName,
          recordId: attempt.recordId,
          operation: attempt.operation,
          operationDetails: attempt.operationDetails ?? null,
          attemptedBy: attempt.attemptedBy,
          attemptedAt,
          wasBlocked,
          overrideReason: attempt.overrideReason ?? null,
          overrideAuthorizedBy: attempt.overrideAuthorizedBy ?? null,
          attemptHash,
        });
        if (request && restriction) {
          await this.appendAction(
            session,
            request.id,
            wasBlocked ? 'PROCESSING_BLOCKED' : 'PROCESSING_ALLOWED',
            attempt.attemptedBy,
            attemptedAt,
            {
              attemptId: id,
              itemId: restriction.id,
              operation: attempt.operation,
              overrideReason: attempt.overrideReason,
              overrideAuthorizedBy: attempt.overrideAuthorizedBy,
              attemptHash,
            },
          );
        }
        return stored;
      });

      if (row.wasBlocked) {
        this.logger.warn('Processing blocked by restriction', {
          tableName: row.tableName,
          recordId: row.recordId,
          operation: row.operation,
          actor: row.attemptedBy,
        });
      }
      return row;
    });
  }

  /** Logged attempts, newest first. Only blocked ones unless `blockedOnly` is false. */
  async getProcessingAttempts(query: ProcessingAttemptQuery = {}): Promise<Result<ProcessingAttempt[]>> {
    return toResult(this.logger, 'getProcessingAttempts', async () => {
      const filter: Filter<ProcessingAttemptRow> = {};
      if (query.subjectId !== undefined) filter.subjectId = query.subjectId;
      if (query.tableName !== undefined) filter.tableName = query.tableName;
      if (query.recordId !== undefined) filter.recordId = query.recordId;
      if (query.blockedOnly ?? true) filter.wasBlocked = true;

      return this.store.read((session) =>
        session.find('processing_attempts', filter, { orderBy: 'attemptedAt', direction: 'desc' }),
      );
    });
  }
}
