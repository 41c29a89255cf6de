/**
 * Types for the Retention Policy & Expiry Engine.
 *
 * @module retention/types
 */

import type { DataCategory } from '../types/vocabulary.js';

export const RETENTION_BASES = [
  'LEGAL_REQUIREMENT',
  'CONTRACT',
  'LEGITIMATE_INTEREST',
  'CONSENT',
  'RESEARCH',
  'PUBLIC_INTEREST',
  'LEGAL_CLAIMS',
] as const;

export type RetentionBasis = (typeof RETENTION_BASES)[number];

export const EXPIRY_ACTIONS = ['DELETE', 'ANONYMIZE', 'ARCHIVE', 'REVIEW', 'EXTEND'] as const;

export type ExpiryAction = (typeof EXPIRY_ACTIONS)[number];

export const RETENTION_STATUSES = ['ACTIVE', 'EXPIRED', 'DELETED', 'ANONYMIZED', 'LEGAL_HOLD'] as const;

export type RetentionStatus = (typeof RETENTION_STATUSES)[number];

export const REVIEW_TYPES = ['SCHEDULED', 'MANUAL', 'TRIGGERED', 'AUDIT'] as const;

export type ReviewType = (typeof REVIEW_TYPES)[number];

/** Statuses no transition leaves. */
export const TERMINAL_RETENTION_STATUSES: readonly RetentionStatus[] = ['DELETED', 'ANONYMIZED'];

export interface RetentionPolicy {
  id: string;
  code: string;
  name: string;
  dataCategory: DataCategory;
  retentionDays: number;
  legalBasis: RetentionBasis;
  actionOnExpiry: ExpiryAction;
  isActive: boolean;
  createdBy: string;
  createdAt: string;
}

export interface RetentionRecord {
  id: string;
  policyId: string;
  tableName: string;
  recordKey: string;
  subjectId: string | null;
  dataCategory: DataCategory;
  /** `YYYY-MM-DD` */
  createdDate: string;
  /** `createdDate` plus the policy period plus every extension. */
  expiryDate: string;
  status: RetentionStatus;
  extensionCount: number;
  onHold: boolean;
  holdReason: string | null;
  heldBy: string | null;
  heldAt: string | null;
  registeredBy: string;
  reviewId: string | null;
  updatedAt: string;
}

/**
 * A review session. Records flagged by a REVIEW policy join the review that
 * enforcement opened for them; extensions and disposals made under a review
 * are counted against it.
 */
export interface RetentionReview {
  id: string;
  policyId: string | null;
  reviewType: ReviewType;
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
}

export interface CreatePolicyInput {
  code: string;
  name: string;
  dataCategory: DataCategory;
  retentionDays: number;
  legalBasis: RetentionBasis;
  actionOnExpiry: ExpiryAction;
  createdBy: string;
}

export interface RegisterRecordInput {
  policyCode: string;
  tableName: string;
  recordKey: string;
  createdDate: string;
  subjectId?: string;
  registeredBy: string;
}

export interface ExtendRetentionInput {
  days: number;
  reason: string;
  extendedBy: string;
  reviewId?: string;
}

export interface RecordHoldInput {
  reason: string;
  heldBy: string;
}

export interface ActorInput {
  performedBy: string;
  notes?: string;
}

export interface DisposalInput extends ActorInput {
  reviewId?: string;
}

export interface CreateReviewInput {
  reviewType: ReviewType;
  scope: string;
  startedBy: string;
  /** Limits the review to one policy's records. */
  policyCode?: string;
}

export interface CompleteReviewInput {
  completedBy: string;
  notes?: string;
}

export interface EnforcementReport {
  asOf: string;
  /** Review opened for records whose policy action is REVIEW, if any were flagged. */
  reviewId: string | null;
  deleted: string[];
  anonymized: string[];
  flagged: string[];
  skipped: { recordId: string; reason: string }[];
}

export interface RetentionStatistics {
  total: number;
  byStatus: Record<RetentionStatus, number>;
  onHold: number;
  /** ACTIVE, not held and at or past expiry on the reporting date. */
  dueForAction: number;
  totalExtensions: number;
}
