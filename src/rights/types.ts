/**
 * Types shared by the four rights-request workflows.
 *
 * Erasure, rectification, restriction and objection requests run through
 * one state machine. What differs between them lives in a
 * {@link RequestKindDefinition}: the kind's detail vocabularies, its
 * sequence-code prefix, what applying an item stamps, and the extra rules
 * for lifting, rejecting and completing.
 *
 * @module rights/types
 */

import type { DataCategory } from '../types/vocabulary.js';
import type { JsonObject } from '../utils/json.js';

// ─── Vocabularies ────────────────────────────────────────────────────────────

export const REQUEST_KINDS = ['erasure', 'rectification', 'restriction', 'objection'] as const;

export type RequestKind = (typeof REQUEST_KINDS)[number];

export const REQUEST_STATUSES = ['RECEIVED', 'LEGAL_HOLD', 'UNDER_REVIEW', 'COMPLETED', 'REJECTED'] as const;

export type RequestStatus = (typeof REQUEST_STATUSES)[number];

export const TERMINAL_REQUEST_STATUSES: readonly RequestStatus[] = ['COMPLETED', 'REJECTED'];

export const ITEM_STATUSES = [
  'PENDING',
  'ON_HOLD',
  'APPROVED',
  'REJECTED',
  'APPLIED',
  'EXECUTED',
  'LIFTED',
] as const;

export type ItemStatus = (typeof ITEM_STATUSES)[number];

export const REVIEW_DECISIONS = ['APPROVED', 'REJECTED'] as const;

export type ReviewDecision = (typeof REVIEW_DECISIONS)[number];

export const REQUEST_DECISIONS = ['UPHELD', 'REJECTED', 'OVERRIDDEN'] as const;

export type RequestDecision = (typeof REQUEST_DECISIONS)[number];

/** Statutory response window. */
export const RESPONSE_WINDOW_DAYS = 30;

export const MAX_EXTENSION_DAYS = 60;
export const EXTENSION_REASON_MIN_LENGTH = 10;
export const ITEM_REJECTION_MIN_LENGTH = 10;
export const REQUEST_REJECTION_MIN_LENGTH = 20;
export const LIFT_REASON_MIN_LENGTH = 20;
export const COMPELLING_GROUNDS_MIN_LENGTH = 50;

// ─── Kind definition ─────────────────────────────────────────────────────────

export interface RequestKindDefinition<R extends JsonObject, I extends JsonObject> {
  kind: RequestKind;
  /** Sequence-code prefix, e.g. `ERASE`. */
  prefix: string;
  /** Status an item reaches when applied. */
  appliedStatus: 'APPLIED' | 'EXECUTED';
  /** Whether applied items can be lifted again. */
  liftable: boolean;
  /** Whether the request can be closed by override. */
  overridable: boolean;
  /** Exceptions a rejection may cite. Empty when the kind takes none. */
  rejectionExceptions: readonly string[];

  parseRequestDetails(value: unknown): R;
  parseItemDetails(value: unknown): I;

  /** Kind data stamped on an item when it is applied. */
  applyOutcome(details: I, parameters: JsonObject): JsonObject;

  /** A reason the request can never be rejected or overridden, or null. */
  absoluteRight(details: R): string | null;
  /** A reason applied items cannot be lifted, or null. */
  liftBlocker(details: R): string | null;
  /** A kind-specific completion precondition that is not met, or null. */
  completionBlocker(request: RightsRequest<R>): string | null;
}

// ─── Entities ────────────────────────────────────────────────────────────────

export interface RightsRequest<R extends JsonObject = JsonObject> {
  id: string;
  kind: RequestKind;
  requestNumber: string;
  subjectId: string;
  subjectName: string;
  subjectEmail: string | null;
  details: R;
  status: RequestStatus;
  /** `YYYY-MM-DD` */
  receivedDate: string;
  dueDate: string;
  extendedDueDate: string | null;
  extensionReason: string | null;
  decision: RequestDecision | null;
  decisionReason: string | null;
  rejectionException: string | null;
  decidedBy: string | null;
  decidedAt: string | null;
  completedAt: string | null;
  completedBy: string | null;
  completionNotes: string | null;
  createdBy: string;
  createdAt: string;
  updatedAt: string;
  hash: string;
  previousHash: string;
}

export interface RightsItem<I extends JsonObject = JsonObject> {
  id: string;
  requestId: string;
  kind: RequestKind;
  tableName: string;
  recordId: string;
  dataCategory: DataCategory;
  details: I;
  status: ItemStatus;
  reviewedBy: string | null;
  reviewedAt: string | null;
  rejectionReason: string | null;
  appliedBy: string | null;
  appliedAt: string | null;
  outcome: JsonObject | null;
  verificationHash: string | null;
  liftedBy: string | null;
  liftedAt: string | null;
  liftReason: string | null;
  createdAt: string;
  updatedAt: string;
}

// ─── Inputs ──────────────────────────────────────────────────────────────────

export interface CreateRequestInput<R extends JsonObject = JsonObject> {
  subjectId: string;
  subjectName: string;
  subjectEmail?: string;
  details: R;
  /** Defaults to today. */
  receivedDate?: string;
  createdBy: string;
}

export interface AddItemInput<I extends JsonObject = JsonObject> {
  tableName: string;
  recordId: string;
  dataCategory: DataCategory;
  details: I;
  addedBy: string;
}

export interface ReviewItemInput {
  decision: ReviewDecision;
  rejectionReason?: string;
  reviewedBy: string;
}

export interface ApplyItemInput {
  appliedBy: string;
  /** Kind parameters, e.g. the erasure method. */
  parameters?: JsonObject;
}

export interface LiftItemInput {
  reason: string;
  liftedBy: string;
}

export interface ExtendDeadlineInput {
  days: number;
  reason: string;
  extendedBy: string;
}

export interface CompleteRequestInput {
  completedBy: string;
  notes?: string;
}

export interface RejectRequestInput {
  reason: string;
  rejectedBy: string;
  exception?: string;
}

export interface OverrideRequestInput {
  compellingGrounds: string;
  overriddenBy: string;
}

// ─── Results ─────────────────────────────────────────────────────────────────

export interface CompletionResult<R extends JsonObject = JsonObject> {
  request: RightsRequest<R>;
  /** True when the request was already completed, by this or a concurrent caller. */
  alreadyCompleted: boolean;
  itemsExecuted: number;
  itemsRejected: number;
  itemsLifted: number;
}

export interface PendingRequest<R extends JsonObject = JsonObject> extends RightsRequest<R> {
  effectiveDueDate: string;
  daysRemaining: number;
  overdue: boolean;
}

export interface RightsStatistics {
  total: number;
  byStatus: Record<RequestStatus, number>;
  itemsByStatus: Record<ItemStatus, number>;
  overdue: number;
  extended: number;
}
