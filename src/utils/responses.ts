/**
 * Result envelope returned by every compliance operation.
 *
 * - Success results carry `success: true` and the operation's data
 * - Failure results carry `success: false` and an `{ code, message }` error
 *
 * @module utils/responses
 */

import type { Logger } from '../logging/logger.js';
import { ERROR_CODES, IntegrityError, isComplianceError } from './errors.js';

// ─── Envelope Types ──────────────────────────────────────────────────────────

export interface SuccessResult<T> {
  success: true;
  data: T;
}

export interface ErrorDetail {
  code: string;
  message: string;
}

export interface FailureResult {
  success: false;
  error: ErrorDetail;
}

export type Result<T> = SuccessResult<T> | FailureResult;

// ─── Error Code to HTTP Status Mapping ───────────────────────────────────────

const ERROR_STATUS_MAP: Record<string, number> = {
  [ERROR_CODES.VALIDATION]: 400,
  [ERROR_CODES.NOT_FOUND]: 404,
  [ERROR_CODES.STATE]: 409,
  [ERROR_CODES.LEGAL_HOLD]: 423,
  [ERROR_CODES.RECORD_LOCKED]: 423,
  [ERROR_CODES.CONCURRENCY_CONFLICT]: 409,
  [ERROR_CODES.INTEGRITY]: 500,
  [ERROR_CODES.INTERNAL]: 500,
};

/** Default HTTP status for unknown error codes. */
const DEFAULT_ERROR_STATUS = 500;

export function getHttpStatusForError(code: string): number {
  return ERROR_STATUS_MAP[code] ?? DEFAULT_ERROR_STATUS;
}

// ─── Formatters ──────────────────────────────────────────────────────────────

export function ok<T>(data: T): SuccessResult<T> {
  return { success: true, data };
}

export function fail(code: string, message: string): FailureResult {
  return { success: false, error: { code, message } };
}

/**
 * Run an operation and fold recoverable compliance errors into a failure
 * envelope.
 *
 * Integrity errors are logged at fatal level and rethrown so they reach an
 * operator. Anything that is not a compliance error is rethrown unchanged.
 */
export async function toResult<T>(
  logger: Logger,
  operation: string,
  work: () => Promise<T>,
): Promise<Result<T>> {
  try {
    return ok(await work());
  } catch (err) {
    if (err instanceof IntegrityError) {
      logger.fatal('Hash chain integrity failure', err, { operation, scopeKey: err.scopeKey });
      throw err;
    }
    if (isComplianceError(err)) {
      logger.warn(`${operation} refused`, { code: err.code, reason: err.message });
      return fail(err.code, err.message);
    }
    throw err;
  }
}
