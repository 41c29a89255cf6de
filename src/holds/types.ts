/**
 * Types for the Legal Hold Registry.
 *
 * @module holds/types
 */

import type { DataCategory } from '../types/vocabulary.js';

export const HOLD_TYPES = ['REGULATORY', 'LITIGATION', 'AUDIT', 'INVESTIGATION', 'OTHER'] as const;

export type HoldType = (typeof HOLD_TYPES)[number];

/** Minimum length for hold creation and release reasons. */
export const HOLD_REASON_MIN_LENGTH = 20;

/** One dimension of a hold's scope: everything, or the listed values. */
export type HoldDimension<T extends string = string> = 'ALL' | readonly T[];

export interface LegalHold {
  id: string;
  holdNumber: string;
  holdType: HoldType;
  /** Null when the hold does not constrain subjects. */
  subjects: HoldDimension | null;
  /** Null when the hold does not constrain categories. */
  categories: HoldDimension<DataCategory> | null;
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
}

export interface CreateHoldInput {
  subjects?: HoldDimension;
  categories?: HoldDimension<DataCategory>;
  holdType: HoldType;
  reason: string;
  legalBasis: string;
  createdBy: string;
}

export interface ReleaseHoldInput {
  reason: string;
  releasedBy: string;
}

export interface HoldQuery {
  subjectId?: string;
  category?: string;
}

export interface HoldCheck {
  isHeld: boolean;
  matchingHolds: LegalHold[];
}

export interface HoldStatistics {
  total: number;
  active: number;
  released: number;
  activeByType: Record<HoldType, number>;
}
