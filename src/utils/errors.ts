/**
 * Error classes shared by every compliance engine.
 *
 * Validation and state errors are recoverable and travel back to callers
 * inside the result envelope. Integrity errors mean a hash chain can no
 * longer be trusted; they are logged at fatal level and rethrown.
 *
 * @module utils/errors
 */

export const ERROR_CODES = {
  VALIDATION: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  STATE: 'STATE_ERROR',
  LEGAL_HOLD: 'LEGAL_HOLD',
  RECORD_LOCKED: 'RECORD_LOCKED',
  INTEGRITY: 'INTEGRITY_ERROR',
  CONCURRENCY_CONFLICT: 'CONCURRENCY_CONFLICT',
  INTERNAL: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export abstract class ComplianceError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad enum value, missing field, reason too short. */
export class ValidationError extends ComplianceError {
  readonly code = ERROR_CODES.VALIDATION;
}

export class NotFoundError extends ComplianceError {
  readonly code = ERROR_CODES.NOT_FOUND;

  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`);
  }
}

/** Illegal transition. The message names the violated precondition. */
export class StateError extends ComplianceError {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode = ERROR_CODES.STATE) {
    super(message);
    this.code = code;
  }
}

/** A destructive transition refused because a legal hold matches. */
export class LegalHoldError extends StateError {
  constructor(message: string) {
    super(message, ERROR_CODES.LEGAL_HOLD);
  }
}

/** A write refused because another holder has the advisory lock. */
export class RecordLockedError extends StateError {
  constructor(message: string) {
    super(message, ERROR_CODES.RECORD_LOCKED);
  }
}

/** Chain mismatch or missing predecessor. Fatal for the affected scope. */
export class IntegrityError extends ComplianceError {
  readonly code = ERROR_CODES.INTEGRITY;

  constructor(
    message: string,
    readonly scopeKey: string,
  ) {
    super(message);
  }
}

/** Lost compare-and-swap on a terminal write. */
export class ConcurrencyConflict extends ComplianceError {
  readonly code = ERROR_CODES.CONCURRENCY_CONFLICT;
}

export function isComplianceError(err: unknown): err is ComplianceError {
  return err instanceof ComplianceError;
}
