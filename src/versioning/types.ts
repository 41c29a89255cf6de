/**
 * Types for the record version log.
 *
 * @module versioning/types
 */

import type { JsonObject, JsonValue } from '../utils/json.js';

export const CHANGE_TYPES = ['CREATE', 'UPDATE', 'DELETE', 'RESTORE'] as const;

export type ChangeType = (typeof CHANGE_TYPES)[number];

export interface RecordVersionInput {
  data: JsonObject;
  changeType?: ChangeType;
  reason: string;
  changedBy: string;
}

export interface RestoreVersionInput {
  reason: string;
  restoredBy: string;
}

export interface RecordVersion {
  tableName: string;
  recordId: string;
  /** Starts at 1. */
  versionNumber: number;
  data: JsonObject;
  changeType: ChangeType;
  reason: string;
  changedBy: string;
  changedAt: string;
  hash: string;
  previousHash: string;
}

export type FieldChangeType = 'ADDED' | 'REMOVED' | 'MODIFIED';

export interface FieldDifference {
  field: string;
  before: JsonValue | null;
  after: JsonValue | null;
  changeType: FieldChangeType;
}

export interface VersionComparison {
  tableName: string;
  recordId: string;
  from: number;
  to: number;
  differences: FieldDifference[];
  identical: boolean;
}
