/**
 * Types for advisory record locks.
 *
 * @module locks/types
 */

export interface RecordLock {
  tableName: string;
  recordId: string;
  lockedBy: string;
  reason: string | null;
  lockedAt: string;
}

export interface LockInput {
  holder: string;
  reason?: string;
}

export interface UnlockInput {
  holder: string;
  /** Release a lock held by someone else. */
  force?: boolean;
}

export type LockAction = 'ACQUIRED' | 'EXTENDED';

export interface LockResult {
  action: LockAction;
  lock: RecordLock;
}

export interface UnlockResult {
  released: boolean;
  message: string;
  /** Holder of the released lock, when there was one. */
  previousHolder: string | null;
}

export interface LockStatus {
  isLocked: boolean;
  lock: RecordLock | null;
}
