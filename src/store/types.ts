/**
 * Store contract and table row shapes.
 *
 * The store is the single serialization point: every business mutation and
 * its ledger append run inside one `transaction()`. Rows are plain records
 * with camelCase columns; dates are ISO-8601 strings so that values read
 * back hash exactly as they were written.
 *
 * @module store/types
 */

import type { JsonObject } from '../utils/json.js';

// ─── Rows ────────────────────────────────────────────────────────────────────

export type LedgerEntryRow = {
  id: string;
  scopeKey: string;
  sequence: number;
  payload: string;
  hash: string;
  previousHash: string;
  algorithm: string;
  recordedAt: string;
};

export type LegalHoldRow = {
  id: string;
  holdNumber: string;
  holdType: string;
  allSubjects: boolean;
  subjects: string[];
  allCategories: boolean;
  categories: string[];
  reason: string;
  legalBasis: string;
  isActive: boolean;
  createdBy: string;
  createdAt: string;
  releasedBy: string | null;
  releasedAt: string | null;
  releaseReason: string | null;
  hash: string;
  previousHash: string;
};

export type RetentionPolicyRow = {
  id: string;
  code: string;
  name: string;
  dataCategory: string;
  retentionDays: number;
  legalBasis: string;
  actionOnExpiry: string;
  isActive: boolean;
  createdBy: string;
  createdAt: string;
};

export type RetentionRecordRow = {
  id: string;
  policyId: string;
  tableName: string;
  recordKey: string;
  subjectId: string | null;
  dataCategory: string;
  createdDate: string;
  expiryDate: string;
  status: string;
  extensionCount: number;
  onHold: boolean;
  holdReason: string | null;
  heldBy: string | null;
  heldAt: string | null;
  registeredBy: string;
  /** Last review that acted on the record or awaits a decision on it. */
  reviewId: string | null;
  updatedAt: string;
};

export type RetentionReviewRow = {
  id: string;
  policyId: string | null;
  reviewType: string;
  scope: string;
  startedBy: string;
  startedAt: string;
  completedBy: string | null;
  completedAt: string | null;
  notes: string | null;
  recordsReviewed: number;
  recordsExtended: number;
  recordsDeleted: number;
  recordsAnonymized: number;
  hash: string;
};

export type RightsRequestRow = {
  id: string;
  kind: string;
  requestNumber: string;
  subjectId: string;
  subjectName: string;
  subjectEmail: string | null;
  details: JsonObject;
  status: string;
  receivedDate: string;
  dueDate: string;
  extendedDueDate: string | null;
  extensionReason: string | null;
  decision: string | null;
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
};

export type RightsItemRow = {
  id: string;
  requestId: string;
  kind: string;
  tableName: string;
  recordId: string;
  dataCategory: string;
  details: JsonObject;
  status: string;
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
};

export type ThirdPartyRecipientRow = {
  id: string;
  requestId: string;
  kind: string;
  name: string;
  recipientType: string;
  contact: string | null;
  dataShared: string | null;
  notificationRequired: boolean;
  method: string | null;
  notifiedAt: string | null;
  notifiedBy: string | null;
  confirmedAt: string | null;
  confirmedBy: string | null;
  createdAt: string;
};

export type MarketingPreferenceRow = {
  id: string;
  subjectId: string;
  channel: string;
  optedOut: boolean;
  source: string;
  updatedAt: string;
};

export type ProcessingAttemptRow = {
  id: string;
  requestId: string | null;
  itemId: string | null;
  subjectId: string | null;
  tableName: string;
  recordId: string;
  operation: string;
  operationDetails: string | null;
  attemptedBy: string;
  attemptedAt: string;
  wasBlocked: boolean;
  overrideReason: string | null;
  overrideAuthorizedBy: string | null;
  attemptHash: string;
};

export type RecordLockRow = {
  id: string;
  tableName: string;
  recordId: string;
  lockedBy: string;
  reason: string | null;
  lockedAt: string;
};

export type Tables = {
  ledger_entries: LedgerEntryRow;
  legal_holds: LegalHoldRow;
  retention_policies: RetentionPolicyRow;
  retention_records: RetentionRecordRow;
  retention_reviews: RetentionReviewRow;
  rights_requests: RightsRequestRow;
  rights_items: RightsItemRow;
  third_party_recipients: ThirdPartyRecipientRow;
  marketing_preferences: MarketingPreferenceRow;
  processing_attempts: ProcessingAttemptRow;
  record_locks: RecordLockRow;
};

export type TableName = keyof Tables;

export type Row<T extends TableName> = Tables[T];

// ─── Filters ─────────────────────────────────────────────────────────────────

export type Scalar = string | number | boolean | null;

/** Column names whose values are scalars and therefore filterable. */
export type ScalarColumn<R> = {
  [K in keyof R]-?: R[K] extends Scalar ? K : never;
}[keyof R] &
  string;

export type Operator<V> =
  | { lte: V }
  | { gte: V }
  | { between: readonly [V, V] }
  | { in: readonly V[] }
  | { not: V };

export type Filter<R> = {
  [K in ScalarColumn<R>]?: R[K] | Operator<R[K]>;
};

export interface FindOptions<R> {
  orderBy?: ScalarColumn<R>;
  direction?: 'asc' | 'desc';
  limit?: number;
}

// ─── Contract ────────────────────────────────────────────────────────────────

export interface StoreSession {
  insert<T extends TableName>(table: T, row: Row<T>): Promise<Row<T>>;
  get<T extends TableName>(table: T, id: string): Promise<Row<T> | null>;
  find<T extends TableName>(
    table: T,
    filter?: Filter<Row<T>>,
    options?: FindOptions<Row<T>>,
  ): Promise<Row<T>[]>;
  count<T extends TableName>(table: T, filter?: Filter<Row<T>>): Promise<number>;
  /**
   * Update one row. When `expected` is given the write only happens if every
   * expected column still holds its value (compare-and-swap).
   *
   * @returns Number of rows written, 0 or 1.
   */
  update<T extends TableName>(
    table: T,
    id: string,
    patch: Partial<Row<T>>,
    expected?: Filter<Row<T>>,
  ): Promise<number>;
  remove<T extends TableName>(table: T, id: string): Promise<number>;
  /**
   * Serialize writers of one ledger scope until the unit of work ends.
   * Appends take it before reading the chain head.
   */
  lockScope(scopeKey: string): Promise<void>;
}

export interface Store {
  /** Run `work` as one atomic unit. Rolls back when `work` throws. */
  transaction<R>(work: (session: StoreSession) => Promise<R>): Promise<R>;
  /** Lock-free read-committed access. */
  read<R>(work: (session: StoreSession) => Promise<R>): Promise<R>;
}

// ─── Filter evaluation ───────────────────────────────────────────────────────

function compare(a: unknown, b: unknown): number | null {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  return null;
}

/** Evaluate one filter condition against a column value. */
export function matchesCondition(actual: unknown, condition: unknown): boolean {
  if (typeof condition !== 'object' || condition === null) return actual === condition;
  if ('in' in condition && Array.isArray(condition.in)) return condition.in.includes(actual);
  if ('not' in condition) return actual !== condition.not;
  if ('lte' in condition) {
    const order = compare(actual, condition.lte);
    return order !== null && order <= 0;
  }
  if ('gte' in condition) {
    const order = compare(actual, condition.gte);
    return order !== null && order >= 0;
  }
  if ('between' in condition && Array.isArray(condition.between)) {
    const low = compare(actual, condition.between[0]);
    const high = compare(actual, condition.between[1]);
    return low !== null && high !== null && low >= 0 && high <= 0;
  }
  return false;
}
