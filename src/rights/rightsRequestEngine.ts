/**
 * Rights-Request State Machine
 *
 * One engine runs all four subject-rights workflows. A request is created
 * RECEIVED (or LEGAL_HOLD when a hold covers the subject), collects items,
 * and ends COMPLETED or REJECTED. Items move PENDING → APPROVED/REJECTED →
 * APPLIED/EXECUTED, optionally → LIFTED, and start ON_HOLD instead of
 * PENDING when a hold covers them. The {@link RequestKindDefinition}
 * supplies everything that differs between kinds.
 *
 * Hold checks run inside the same unit of work as the transition they
 * guard. Every transition appends one entry to the request's chain;
 * creation also appends to the kind's cross-request chain. Row writes
 * precede the append they belong to, so a writer that loses a status swap
 * gives up before it takes the chain's lock.
 *
 * @module rights/rightsRequestEngine
 */

import { v4 as uuidv4 } from 'uuid';
import type { LegalHoldRegistry } from '../holds/legalHoldRegistry.js';
import type { HoldCheck } from '../holds/types.js';
import type { HashChainLedger } from '../ledger/hashChainLedger.js';
import type { ChainVerification, HistoryEntry } from '../ledger/types.js';
import { createLogger, silentOutput, type Logger } from '../logging/logger.js';
import type { RightsItemRow, RightsRequestRow, Store, StoreSession } from '../store/types.js';
import type { EngineDependencies } from '../types/dependencies.js';
import { DATA_CATEGORIES } from '../types/vocabulary.js';
import { addDays, daysBetween, parseIsoDate, systemClock, toIsoDate, type Clock } from '../utils/dates.js';
import { ConcurrencyConflict, LegalHoldError, NotFoundError, StateError, ValidationError } from '../utils/errors.js';
import { isJsonObject, type JsonObject } from '../utils/json.js';
import { toResult, type Result } from '../utils/responses.js';
import { sequenceCode } from '../utils/sequenceCodes.js';
import {
  optionalEmail,
  optionalOneOf,
  optionalText,
  requireIntegerInRange,
  requireMinLength,
  requireOneOf,
  requireRecord,
  requireText,
} from '../utils/validation.js';
import { creationChain, requestChain } from './chains.js';
import { countPendingNotifications } from './thirdPartyTracker.js';
import {
  COMPELLING_GROUNDS_MIN_LENGTH,
  EXTENSION_REASON_MIN_LENGTH,
  ITEM_REJECTION_MIN_LENGTH,
  ITEM_STATUSES,
  LIFT_REASON_MIN_LENGTH,
  MAX_EXTENSION_DAYS,
  REQUEST_DECISIONS,
  REQUEST_REJECTION_MIN_LENGTH,
  REQUEST_STATUSES,
  RESPONSE_WINDOW_DAYS,
  REVIEW_DECISIONS,
  TERMINAL_REQUEST_STATUSES,
  type AddItemInput,
  type ApplyItemInput,
  type CompleteRequestInput,
  type CompletionResult,
  type CreateRequestInput,
  type ExtendDeadlineInput,
  type ItemStatus,
  type LiftItemInput,
  type OverrideRequestInput,
  type PendingRequest,
  type RejectRequestInput,
  type RequestKind,
  type RequestKindDefinition,
  type RequestStatus,
  type ReviewItemInput,
  type RightsItem,
  type RightsRequest,
  type RightsStatistics,
} from './types.js';

export interface RightsEngineDependencies extends EngineDependencies {
  holds: LegalHoldRegistry;
}

// ─── Shared input parsing ────────────────────────────────────────────────────

export function parseReviewItemInput(value: unknown): ReviewItemInput {
  const body = requireRecord(value, 'review');
  const decision = requireOneOf(body['decision'], REVIEW_DECISIONS, 'decision');
  const review: ReviewItemInput = { decision, reviewedBy: requireText(body['reviewedBy'], 'reviewedBy') };
  if (decision === 'REJECTED') {
    review.rejectionReason = requireMinLength(body['rejectionReason'], 'rejectionReason', ITEM_REJECTION_MIN_LENGTH);
  }
  return review;
}

export function parseApplyItemInput(value: unknown): ApplyItemInput {
  const body = requireRecord(value, 'apply');
  const parameters = body['parameters'] ?? {};
  if (!isJsonObject(parameters)) throw new ValidationError('parameters must be an object');
  return { appliedBy: requireText(body['appliedBy'], 'appliedBy'), parameters };
}

export function parseLiftItemInput(value: unknown): LiftItemInput {
  const body = requireRecord(value, 'lift');
  return {
    reason: requireMinLength(body['reason'], 'reason', LIFT_REASON_MIN_LENGTH),
    liftedBy: requireText(body['liftedBy'], 'liftedBy'),
  };
}

export function parseExtendDeadlineInput(value: unknown): ExtendDeadlineInput {
  const body = requireRecord(value, 'extension');
  return {
    days: requireIntegerInRange(body['days'], 'days', 1, MAX_EXTENSION_DAYS),
    reason: requireMinLength(body['reason'], 'reason', EXTENSION_REASON_MIN_LENGTH),
    extendedBy: requireText(body['extendedBy'], 'extendedBy'),
  };
}

export function parseCompleteRequestInput(value: unknown): CompleteRequestInput {
  const body = requireRecord(value, 'completion');
  return {
    completedBy: requireText(body['completedBy'], 'completedBy'),
    notes: optionalText(body['notes'], 'notes') ?? undefined,
  };
}

export function parseOverrideRequestInput(value: unknown): OverrideRequestInput {
  const body = requireRecord(value, 'override');
  return {
    compellingGrounds: requireMinLength(body['compellingGrounds'], 'compellingGrounds', COMPELLING_GROUNDS_MIN_LENGTH),
    overriddenBy: requireText(body['overriddenBy'], 'overriddenBy'),
  };
}

type CompletionWrite = { row: RightsRequestRow; alreadyCompleted: boolean };

function isTerminal(status: string): boolean {
  return TERMINAL_REQUEST_STATUSES.some((terminal) => terminal === status);
}

function holdNumbers(check: HoldCheck): string[] {
  return check.matchingHolds.map((hold) => hold.holdNumber);
}

// ─── Engine ──────────────────────────────────────────────────────────────────

export class RightsRequestEngine<R extends JsonObject, I extends JsonObject> {
  protected readonly store: Store;
  protected readonly ledger: HashChainLedger;
  protected readonly holds: LegalHoldRegistry;
  protected readonly logger: Logger;
  protected readonly clock: Clock;

  constructor(
    readonly definition: RequestKindDefinition<R, I>,
    deps: RightsEngineDependencies,
  ) {
    this.store = deps.store;
    this.ledger = deps.ledger;
    this.holds = deps.holds;
    this.clock = deps.clock ?? systemClock;
    this.logger = (deps.logger ?? createLogger({ output: silentOutput })).child({
      component: `rights:${definition.kind}`,
    });
  }

  get kind(): RequestKind {
    return this.definition.kind;
  }

  private get label(): string {
    return `${this.kind.charAt(0).toUpperCase()}${this.kind.slice(1)} request`;
  }

  // ─── Parsing at the edge ───

  parseCreateInput(value: unknown): CreateRequestInput<R> {
    const body = requireRecord(value, 'request');
    const receivedDate = optionalText(body['receivedDate'], 'receivedDate');
    if (receivedDate !== null) parseIsoDate(receivedDate, 'receivedDate');
    return {
      subjectId: requireText(body['subjectId'], 'subjectId'),
      subjectName: requireText(body['subjectName'], 'subjectName'),
      subjectEmail: optionalEmail(body['subjectEmail'], 'subjectEmail') ?? undefined,
      details: this.definition.parseRequestDetails(body['details']),
      receivedDate: receivedDate ?? undefined,
      createdBy: requireText(body['createdBy'], 'createdBy'),
    };
  }

  parseAddItemInput(value: unknown): AddItemInput<I> {
    const body = requireRecord(value, 'item');
    return {
      tableName: requireText(body['tableName'], 'tableName'),
      recordId: requireText(body['recordId'], 'recordId'),
      dataCategory: requireOneOf(body['dataCategory'], DATA_CATEGORIES, 'dataCategory'),
      details: this.definition.parseItemDetails(body['details']),
      addedBy: requireText(body['addedBy'], 'addedBy'),
    };
  }

  parseRejectInput(value: unknown): RejectRequestInput {
    const body = requireRecord(value, 'rejection');
    const rejection: RejectRequestInput = {
      reason: requireMinLength(body['reason'], 'reason', REQUEST_REJECTION_MIN_LENGTH),
      rejectedBy: requireText(body['rejectedBy'], 'rejectedBy'),
    };
    if (body['exception'] !== undefined && body['exception'] !== null) {
      if (this.definition.rejectionExceptions.length === 0) {
        throw new ValidationError(`${this.label}s take no rejection exception`);
      }
      rejection.exception = requireOneOf(body['exception'], this.definition.rejectionExceptions, 'exception');
    }
    return rejection;
  }

  // ─── Requests ───

  async create(input: CreateRequestInput<R>): Promise<Result<RightsRequest<R>>> {
    return toResult(this.logger, 'createRequest', async () => {
      const request = this.parseCreateInput(input);
      const now = this.clock();
      const createdAt = now.toISOString();
      const receivedDate = request.receivedDate ?? toIsoDate(now);
      const dueDate = addDays(receivedDate, RESPONSE_WINDOW_DAYS);
      const id = uuidv4();

      const row = await this.store.transaction(async (session) => {
        const serial = (await this.ledger.nextSequence(session, creationChain(this.kind))) + 1;
        const requestNumber = sequenceCode(this.definition.prefix, now, serial);
        const check = await this.holds.checkWithin(session, { subjectId: request.subjectId });
        const status: RequestStatus = check.isHeld ? 'LEGAL_HOLD' : 'RECEIVED';

        const link = await this.ledger.append(session, creationChain(this.kind), {
          action: 'REQUEST_CREATED',
          requestId: id,
          requestNumber,
          subjectId: request.subjectId,
          details: request.details,
          receivedDate,
          dueDate,
          performedBy: request.createdBy,
          performedAt: createdAt,
        });
        const inserted = await session.insert('rights_requests', {
          id,
          kind: this.kind,
          requestNumber,
          subjectId: request.subjectId,
          subjectName: request.subjectName,
          subjectEmail: request.subjectEmail ?? null,
          details: request.details,
          status,
          receivedDate,
          dueDate,
          extendedDueDate: null,
          extensionReason: null,
          decision: null,
          decisionReason: null,
          rejectionException: null,
          decidedBy: null,
          decidedAt: null,
          completedAt: null,
          completedBy: null,
          completionNotes: null,
          createdBy: request.createdBy,
          createdAt,
          updatedAt: createdAt,
          hash: link.hash,
          previousHash: link.previousHash,
        });
        await this.appendAction(session, id, 'REQUEST_CREATED', request.createdBy, createdAt, {
          requestNumber,
          status,
          dueDate,
          holds: holdNumbers(check),
        });
        return inserted;
      });

      this.logger.info(`${this.label} created`, { requestNumber: row.requestNumber, status: row.status, actor: request.createdBy });
      return this.toRequest(row);
    });
  }

  /** Push the due date out once, by 1 to 60 days. */
  async extendDeadline(requestId: string, input: ExtendDeadlineInput): Promise<Result<RightsRequest<R>>> {
    return toResult(this.logger, 'extendDeadline', async () => {
      const extension = parseExtendDeadlineInput(input);
      const now = this.clock().toISOString();

      const row = await this.store.transaction(async (session) => {
        const request = await this.requestById(session, requestId);
        this.assertOpen(request, 'extend');
        if (request.extendedDueDate !== null) throw new StateError('Request has already been extended');

        const patch = {
          extendedDueDate: addDays(request.dueDate, extension.days),
          extensionReason: extension.reason,
          updatedAt: now,
        };
        await this.writeRequest(session, request, patch);
        await this.appendAction(session, requestId, 'DEADLINE_EXTENDED', extension.extendedBy, now, {
          days: extension.days,
          reason: extension.reason,
          extendedDueDate: patch.extendedDueDate,
        });
        return { ...request, ...patch };
      });

      return this.toRequest(row);
    });
  }

  /**
   * Close the request once every item is settled and every required
   * third party has been told. Completing a completed request, or losing
   * the status swap to a concurrent caller, succeeds without writing.
   */
  async completeRequest(requestId: string, input: CompleteRequestInput): Promise<Result<CompletionResult<R>>> {
    return toResult(this.logger, 'completeRequest', async () => {
      const completion = parseCompleteRequestInput(input);
      const now = this.clock().toISOString();

      const { row, alreadyCompleted } = await this.terminalWrite<CompletionWrite>(
        'completeRequest',
        requestId,
        async (session) => {
          const request = await this.requestById(session, requestId);
          if (request.status === 'COMPLETED') return { row: request, alreadyCompleted: true };
          if (request.status === 'REJECTED') throw new StateError('Cannot complete a rejected request');

          const items = await session.find('rights_items', { requestId });
          this.assertItemsSettled(items);

          const pendingNotifications = await countPendingNotifications(session, requestId);
          if (pendingNotifications > 0) {
            throw new StateError(`${pendingNotifications} third party notifications pending`);
          }
          const check = await this.holds.checkWithin(session, { subjectId: request.subjectId });
          if (check.isHeld) {
            throw new LegalHoldError(`Subject is under legal hold ${holdNumbers(check).join(', ')}`);
          }
          const blocker = this.definition.completionBlocker(this.toRequest(request));
          if (blocker !== null) throw new StateError(blocker);

          const patch = {
            status: 'COMPLETED',
            completedAt: now,
            completedBy: completion.completedBy,
            completionNotes: completion.notes ?? null,
            updatedAt: now,
          };
          await this.writeTerminal(session, request, patch);
          await this.appendAction(session, requestId, 'REQUEST_COMPLETED', completion.completedBy, now, {
            notes: completion.notes,
            items: items.length,
          });
          return { row: { ...request, ...patch }, alreadyCompleted: false };
        },
        (current) => ({ row: current, alreadyCompleted: current.status === 'COMPLETED' }),
      );

      const items = await this.store.read((session) => session.find('rights_items', { requestId }));
      const count = (...statuses: ItemStatus[]) => items.filter((item) => statuses.some((s) => s === item.status)).length;
      if (!alreadyCompleted) {
        this.logger.info(`${this.label} completed`, { requestNumber: row.requestNumber, actor: completion.completedBy });
      }
      return {
        request: this.toRequest(row),
        alreadyCompleted,
        itemsExecuted: count('APPLIED', 'EXECUTED'),
        itemsRejected: count('REJECTED'),
        itemsLifted: count('LIFTED'),
      };
    });
  }

  /** Refuse the request. Never possible for an absolute right. */
  async reject(requestId: string, input: RejectRequestInput): Promise<Result<RightsRequest<R>>> {
    return toResult(this.logger, 'rejectRequest', async () => {
      const now = this.clock().toISOString();

      const row = await this.terminalWrite<RightsRequestRow>(
        'rejectRequest',
        requestId,
        async (session) => {
          const request = await this.requestById(session, requestId);
          this.assertNotAbsolute(request, 'reject');
          const rejection = this.parseRejectInput(input);
          this.assertOpen(request, 'reject');

          const patch = {
            status: 'REJECTED',
            decision: 'REJECTED',
            decisionReason: rejection.reason,
            rejectionException: rejection.exception ?? null,
            decidedBy: rejection.rejectedBy,
            decidedAt: now,
            updatedAt: now,
          };
          await this.writeTerminal(session, request, patch);
          await this.appendAction(session, requestId, 'REQUEST_REJECTED', rejection.rejectedBy, now, {
            reason: rejection.reason,
            exception: rejection.exception,
          });
          return { ...request, ...patch };
        },
        (current) => current,
      );

      return this.toRequest(row);
    });
  }

  /** Close the request on compelling legitimate grounds, where the kind allows it. */
  async override(requestId: string, input: OverrideRequestInput): Promise<Result<RightsRequest<R>>> {
    return toResult(this.logger, 'overrideRequest', async () => {
      const now = this.clock().toISOString();

      const row = await this.terminalWrite<RightsRequestRow>(
        'overrideRequest',
        requestId,
        async (session) => {
          const request = await this.requestById(session, requestId);
          this.assertNotAbsolute(request, 'override');
          if (!this.definition.overridable) throw new StateError(`${this.label}s cannot be overridden`);
          const override = parseOverrideRequestInput(input);
          this.assertOpen(request, 'override');

          const patch = {
            status: 'REJECTED',
            decision: 'OVERRIDDEN',
            decisionReason: override.compellingGrounds,
            decidedBy: override.overriddenBy,
            decidedAt: now,
            updatedAt: now,
          };
          await this.writeTerminal(session, request, patch);
          await this.appendAction(session, requestId, 'REQUEST_OVERRIDDEN', override.overriddenBy, now, {
            compellingGrounds: override.compellingGrounds,
          });
          return { ...request, ...patch };
        },
        (current) => current,
      );

      return this.toRequest(row);
    });
  }

  // ─── Items ───

  async addItem(requestId: string, input: AddItemInput<I>): Promise<Result<RightsItem<I>>> {
    return toResult(this.logger, 'addItem', async () => {
      const item = this.parseAddItemInput(input);
      const now = this.clock().toISOString();

      const row = await this.store.transaction(async (session) => {
        const request = await this.requestById(session, requestId);
        this.assertOpen(request, 'add items to');

        const check = await this.holds.checkWithin(session, {
          subjectId: request.subjectId,
          category: item.dataCategory,
        });
        const status: ItemStatus = check.isHeld ? 'ON_HOLD' : 'PENDING';
        const id = uuidv4();

        await this.appendAction(session, requestId, 'ITEM_ADDED', item.addedBy, now, {
          itemId: id,
          tableName: item.tableName,
          recordId: item.recordId,
          dataCategory: item.dataCategory,
          status,
          holds: holdNumbers(check),
        });
        return session.insert('rights_items', {
          id,
          requestId,
          kind: this.kind,
          tableName: item.tableName,
          recordId: item.recordId,
          dataCategory: item.dataCategory,
          details: item.details,
          status,
          reviewedBy: null,
          reviewedAt: null,
          rejectionReason: null,
          appliedBy: null,
          appliedAt: null,
          outcome: null,
          verificationHash: null,
          liftedBy: null,
          liftedAt: null,
          liftReason: null,
          createdAt: now,
          updatedAt: now,
        });
      });

      if (row.status === 'ON_HOLD') {
        this.logger.warn('Item placed on legal hold', { itemId: row.id, category: row.dataCategory });
      }
      return this.toItem(row);
    });
  }

  /**
   * Approve or reject an item. An ON_HOLD item is checked again and can be
   * reviewed once no hold covers it any more.
   */
  async reviewItem(itemId: string, input: ReviewItemInput): Promise<Result<RightsItem<I>>> {
    return toResult(this.logger, 'reviewItem', async () => {
      const review = parseReviewItemInput(input);
      const now = this.clock().toISOString();

      const row = await this.store.transaction(async (session) => {
        const item = await this.itemById(session, itemId);
        const request = await this.requestById(session, item.requestId);
        this.assertOpen(request, 'review items of');

        if (item.status === 'ON_HOLD') {
          const check = await this.checkItem(session, request, item);
          if (check.isHeld) throw new LegalHoldError('Item is on legal hold and cannot be reviewed');
        } else if (item.status !== 'PENDING') {
          throw new StateError(`Item is not pending review (status ${item.status})`);
        }

        const patch = {
          status: review.decision,
          reviewedBy: review.reviewedBy,
          reviewedAt: now,
          rejectionReason: review.rejectionReason ?? null,
          updatedAt: now,
        };
        await this.writeItem(session, item, patch);
        if (request.status === 'RECEIVED' || request.status === 'LEGAL_HOLD') {
          await this.writeRequest(session, request, { status: 'UNDER_REVIEW', updatedAt: now });
        }
        await this.appendAction(session, item.requestId, 'ITEM_REVIEWED', review.reviewedBy, now, {
          itemId,
          decision: review.decision,
          previousStatus: item.status,
          rejectionReason: review.rejectionReason,
        });
        return { ...item, ...patch };
      });

      return this.toItem(row);
    });
  }

  /** Carry out an approved item, stamping its outcome and a verification hash. */
  async applyItem(itemId: string, input: ApplyItemInput): Promise<Result<RightsItem<I>>> {
    return toResult(this.logger, 'applyItem', async () => {
      const apply = parseApplyItemInput(input);
      const now = this.clock().toISOString();

      const row = await this.store.transaction(async (session) => {
        const item = await this.itemById(session, itemId);
        const request = await this.requestById(session, item.requestId);
        this.assertOpen(request, 'apply items of');
        if (item.status !== 'APPROVED') {
          throw new StateError(`Item must be approved before applying (status ${item.status})`);
        }

        const check = await this.checkItem(session, request, item);
        if (check.isHeld) {
          throw new LegalHoldError(`Item is covered by legal hold ${holdNumbers(check).join(', ')}`);
        }

        const details = this.definition.parseItemDetails(item.details);
        const outcome = this.definition.applyOutcome(details, apply.parameters ?? {});
        const verificationHash = this.ledger.digest({
          itemId,
          requestId: item.requestId,
          tableName: item.tableName,
          recordId: item.recordId,
          outcome,
          appliedBy: apply.appliedBy,
          appliedAt: now,
        });
        const status = this.definition.appliedStatus;
        const patch = {
          status,
          appliedBy: apply.appliedBy,
          appliedAt: now,
          outcome,
          verificationHash,
          updatedAt: now,
        };
        await this.writeItem(session, item, patch);
        await this.appendAction(session, item.requestId, `ITEM_${status}`, apply.appliedBy, now, {
          itemId,
          outcome,
          verificationHash,
        });
        return { ...item, ...patch };
      });

      this.logger.info(`Item ${row.status.toLowerCase()}`, { itemId, table: row.tableName });
      return this.toItem(row);
    });
  }

  /** Undo an applied item, for kinds whose effect can be reversed. */
  async liftItem(itemId: string, input: LiftItemInput): Promise<Result<RightsItem<I>>> {
    return toResult(this.logger, 'liftItem', async () => {
      const lift = parseLiftItemInput(input);
      const now = this.clock().toISOString();

      const row = await this.store.transaction(async (session) => {
        const item = await this.itemById(session, itemId);
        const request = await this.requestById(session, item.requestId);
        if (!this.definition.liftable) throw new StateError(`${this.label} items cannot be lifted`);
        const blocker = this.definition.liftBlocker(this.definition.parseRequestDetails(request.details));
        if (blocker !== null) throw new StateError(blocker);
        if (item.status !== 'APPLIED') {
          throw new StateError(`Only applied items can be lifted (status ${item.status})`);
        }

        const patch = { status: 'LIFTED', liftedBy: lift.liftedBy, liftedAt: now, liftReason: lift.reason, updatedAt: now };
        await this.writeItem(session, item, patch);
        await this.appendAction(session, item.requestId, 'ITEM_LIFTED', lift.liftedBy, now, {
          itemId,
          reason: lift.reason,
        });
        return { ...item, ...patch };
      });

      return this.toItem(row);
    });
  }

  // ─── Queries ───

  /** Look a request up by id or by request number. */
  async getRequest(idOrNumber: string): Promise<Result<RightsRequest<R>>> {
    return toResult(this.logger, 'getRequest', async () => {
      const row = await this.store.read(async (session) => {
        const byId = await session.get('rights_requests', idOrNumber);
        if (byId && byId.kind === this.kind) return byId;
        const [byNumber] = await session.find('rights_requests', { requestNumber: idOrNumber, kind: this.kind });
        if (!byNumber) throw new NotFoundError(this.label, idOrNumber);
        return byNumber;
      });
      return this.toRequest(row);
    });
  }

  async getItem(itemId: string): Promise<Result<RightsItem<I>>> {
    return toResult(this.logger, 'getItem', async () => {
      const row = await this.store.read((session) => this.itemById(session, itemId));
      return this.toItem(row);
    });
  }

  async getItems(requestId: string): Promise<Result<RightsItem<I>[]>> {
    return toResult(this.logger, 'getItems', async () => {
      const rows = await this.store.read(async (session) => {
        await this.requestById(session, requestId);
        return session.find('rights_items', { requestId }, { orderBy: 'createdAt' });
      });
      return rows.map((row) => this.toItem(row));
    });
  }

  async getHistory(requestId: string): Promise<Result<HistoryEntry[]>> {
    return toResult(this.logger, 'getRequestHistory', async () => {
      await this.store.read((session) => this.requestById(session, requestId));
      return this.ledger.history(requestChain(this.kind, requestId));
    });
  }

  async verifyHistory(requestId: string): Promise<Result<ChainVerification>> {
    return toResult(this.logger, 'verifyRequestHistory', async () => {
      await this.store.read((session) => this.requestById(session, requestId));
      return this.ledger.verify(requestChain(this.kind, requestId));
    });
  }

  /** Verify the chain linking every request of this kind at creation. */
  async verifyCreationChain(): Promise<Result<ChainVerification>> {
    return toResult(this.logger, 'verifyCreationChain', () => this.ledger.verify(creationChain(this.kind)));
  }

  /**
   * Open requests ordered by effective due date. Requests waiting on a
   * legal hold are left out unless `includeHeld` is set.
   */
  async getPendingRequests(
    options: { includeHeld?: boolean; asOf?: string } = {},
  ): Promise<Result<PendingRequest<R>[]>> {
    return toResult(this.logger, 'getPendingRequests', async () => {
      const asOf = options.asOf ?? toIsoDate(this.clock());
      parseIsoDate(asOf, 'asOf');
      const statuses: RequestStatus[] = options.includeHeld
        ? ['RECEIVED', 'LEGAL_HOLD', 'UNDER_REVIEW']
        : ['RECEIVED', 'UNDER_REVIEW'];

      const rows = await this.store.read((session) =>
        session.find('rights_requests', { kind: this.kind, status: { in: statuses } }),
      );
      return rows
        .map((row): PendingRequest<R> => {
          const effectiveDueDate = row.extendedDueDate ?? row.dueDate;
          const daysRemaining = daysBetween(asOf, effectiveDueDate);
          return { ...this.toRequest(row), effectiveDueDate, daysRemaining, overdue: daysRemaining < 0 };
        })
        .sort(
          (a, b) =>
            a.effectiveDueDate.localeCompare(b.effectiveDueDate) || a.requestNumber.localeCompare(b.requestNumber),
        );
    });
  }

  async getStatistics(asOf?: string): Promise<Result<RightsStatistics>> {
    return toResult(this.logger, 'getRightsStatistics', async () => {
      const today = asOf ?? toIsoDate(this.clock());
      const [requests, items] = await this.store.read(async (session) =>
        Promise.all([
          session.find('rights_requests', { kind: this.kind }),
          session.find('rights_items', { kind: this.kind }),
        ]),
      );

      const byStatus: Record<RequestStatus, number> = {
        RECEIVED: 0,
        LEGAL_HOLD: 0,
        UNDER_REVIEW: 0,
        COMPLETED: 0,
        REJECTED: 0,
      };
      const itemsByStatus: Record<ItemStatus, number> = {
        PENDING: 0,
        ON_HOLD: 0,
        APPROVED: 0,
        REJECTED: 0,
        APPLIED: 0,
        EXECUTED: 0,
        LIFTED: 0,
      };
      let overdue = 0;
      let extended = 0;
      for (const row of requests) {
        byStatus[requireOneOf(row.status, REQUEST_STATUSES, 'status')] += 1;
        if (row.extendedDueDate !== null) extended += 1;
        if (!isTerminal(row.status) && (row.extendedDueDate ?? row.dueDate) < today) overdue += 1;
      }
      for (const row of items) {
        itemsByStatus[requireOneOf(row.status, ITEM_STATUSES, 'status')] += 1;
      }
      return { total: requests.length, byStatus, itemsByStatus, overdue, extended };
    });
  }

  // ─── Internals shared with kind engines ───

  protected async requestById(session: StoreSession, requestId: string): Promise<RightsRequestRow> {
    const row = await session.get('rights_requests', requestId);
    if (!row || row.kind !== this.kind) throw new NotFoundError(this.label, requestId);
    return row;
  }

  protected async itemById(session: StoreSession, itemId: string): Promise<RightsItemRow> {
    const row = await session.get('rights_items', itemId);
    if (!row || row.kind !== this.kind) throw new NotFoundError('Item', itemId);
    return row;
  }

  protected assertOpen(request: RightsRequestRow, verb: string): void {
    if (isTerminal(request.status)) {
      throw new StateError(`Cannot ${verb} a ${request.status.toLowerCase()} request`);
    }
  }

  protected async appendAction(
    session: StoreSession,
    requestId: string,
    action: string,
    performedBy: string,
    performedAt: string,
    details: JsonObject,
  ): Promise<void> {
    await this.ledger.append(session, requestChain(this.kind, requestId), {
      action,
      requestId,
      performedBy,
      performedAt,
      details,
    });
  }

  /** Write a non-terminal request change, guarded on the status it was read with. */
  protected async writeRequest(
    session: StoreSession,
    request: RightsRequestRow,
    patch: Partial<RightsRequestRow>,
  ): Promise<void> {
    const written = await session.update('rights_requests', request.id, patch, { status: request.status });
    if (written === 0) throw new StateError('Request changed while the action was in progress');
  }

  protected toRequest(row: RightsRequestRow): RightsRequest<R> {
    return {
      ...row,
      kind: this.kind,
      details: this.definition.parseRequestDetails(row.details),
      status: requireOneOf(row.status, REQUEST_STATUSES, 'status'),
      decision: optionalOneOf(row.decision, REQUEST_DECISIONS, 'decision'),
    };
  }

  protected toItem(row: RightsItemRow): RightsItem<I> {
    return {
      ...row,
      kind: this.kind,
      dataCategory: requireOneOf(row.dataCategory, DATA_CATEGORIES, 'dataCategory'),
      details: this.definition.parseItemDetails(row.details),
      status: requireOneOf(row.status, ITEM_STATUSES, 'status'),
    };
  }

  private checkItem(session: StoreSession, request: RightsRequestRow, item: RightsItemRow): Promise<HoldCheck> {
    return this.holds.checkWithin(session, { subjectId: request.subjectId, category: item.dataCategory });
  }

  private assertNotAbsolute(request: RightsRequestRow, verb: string): void {
    const right = this.definition.absoluteRight(this.definition.parseRequestDetails(request.details));
    if (right !== null) throw new StateError(`Cannot ${verb} ${right}: it is an absolute right`);
  }

  private assertItemsSettled(items: RightsItemRow[]): void {
    const count = (status: ItemStatus) => items.filter((item) => item.status === status).length;
    const pending = count('PENDING');
    if (pending > 0) throw new StateError(`${pending} items still pending review`);
    const onHold = count('ON_HOLD');
    if (onHold > 0) throw new LegalHoldError(`${onHold} items on legal hold`);
    const approved = count('APPROVED');
    if (approved > 0) {
      const verb = this.definition.appliedStatus === 'EXECUTED' ? 'executed' : 'applied';
      throw new StateError(`${approved} approved items not yet ${verb}`);
    }
  }

  private async writeItem(session: StoreSession, item: RightsItemRow, patch: Partial<RightsItemRow>): Promise<void> {
    const written = await session.update('rights_items', item.id, patch, { status: item.status });
    if (written === 0) throw new StateError('Item changed while the action was in progress');
  }

  /** Terminal status swap. Losing it to a concurrent writer is a conflict, not a failure. */
  private async writeTerminal(
    session: StoreSession,
    request: RightsRequestRow,
    patch: Partial<RightsRequestRow>,
  ): Promise<void> {
    const written = await session.update('rights_requests', request.id, patch, { status: request.status });
    if (written === 0) {
      throw new ConcurrencyConflict(`${request.requestNumber} left ${request.status} before the write`);
    }
  }

  /**
   * Run a terminal transition. When its status swap loses, the unit of
   * work rolls back and the request as it now stands is the result.
   */
  private async terminalWrite<T>(
    operation: string,
    requestId: string,
    work: (session: StoreSession) => Promise<T>,
    onConflict: (current: RightsRequestRow) => T,
  ): Promise<T> {
    try {
      return await this.store.transaction(work);
    } catch (err) {
      if (!(err instanceof ConcurrencyConflict)) throw err;
      this.logger.info(`${operation} lost a concurrent status change`, { requestId, reason: err.message });
      const current = await this.store.read((session) => this.requestById(session, requestId));
      return onConflict(current);
    }
  }
}
