/**
 * Test setup helpers.
 *
 * Builds a fully wired set of engines over an in-process store with a
 * fixed clock, so each suite gets isolated state and deterministic dates.
 *
 * @module test/setup
 */

import { createComplianceLedger, type ComplianceLedger } from '../complianceLedger.js';
import { createLogger, silentOutput } from '../logging/logger.js';
import { InMemoryStore } from '../store/inMemoryStore.js';
import type { Store } from '../store/types.js';
import type { Clock } from '../utils/dates.js';
import type { Result } from '../utils/responses.js';

/** Default "now" for suites that do not care about dates. */
export const TEST_NOW = '2025-03-03T10:00:00.000Z';

export interface TestContext extends ComplianceLedger {
  clock: Clock;
}

/** A clock that always answers `iso`. */
export function fixedClock(iso: string = TEST_NOW): Clock {
  return () => new Date(iso);
}

export function createTestContext(options: { clock?: Clock; store?: Store } = {}): TestContext {
  const clock = options.clock ?? fixedClock();
  const ledger = createComplianceLedger({
    store: options.store ?? new InMemoryStore(),
    logger: createLogger({ output: silentOutput }),
    clock,
  });
  return { ...ledger, clock };
}

/** Data of a successful result; a failure fails the test with its code and message. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.success) throw new Error(`${result.error.code}: ${result.error.message}`);
  return result.data;
}

/** Error of a failed result; a success fails the test. */
export function failure<T>(result: Result<T>): { code: string; message: string } {
  if (result.success) throw new Error('Expected the operation to fail');
  return result.error;
}
