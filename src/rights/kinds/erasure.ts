/**
 * Right to erasure.
 *
 * Applying an item executes it with one of the erasure methods. Erasure
 * is final, so items are never lifted.
 *
 * @module rights/kinds/erasure
 */

import type { JsonObject } from '../../utils/json.js';
import { optionalText, requireOneOf, requireRecord } from '../../utils/validation.js';
import type { RequestKindDefinition } from '../types.js';

export const ERASURE_GROUNDS = [
  'NO_LONGER_NECESSARY',
  'CONSENT_WITHDRAWN',
  'OBJECTION',
  'UNLAWFUL_PROCESSING',
  'LEGAL_OBLIGATION',
  'CHILD_DATA',
] as const;

export type ErasureGrounds = (typeof ERASURE_GROUNDS)[number];

export const ERASURE_METHODS = ['DELETE', 'ANONYMIZE', 'PSEUDONYMIZE'] as const;

export type ErasureMethod = (typeof ERASURE_METHODS)[number];

/** Grounds on which an erasure request may be refused. */
export const ERASURE_EXCEPTIONS = [
  'FREE_EXPRESSION',
  'LEGAL_OBLIGATION',
  'PUBLIC_HEALTH',
  'ARCHIVING',
  'LEGAL_CLAIMS',
] as const;

export type ErasureException = (typeof ERASURE_EXCEPTIONS)[number];

export type ErasureRequestDetails = {
  grounds: ErasureGrounds;
  description?: string;
};

export type ErasureItemDetails = {
  description?: string;
};

export const erasureKind: RequestKindDefinition<ErasureRequestDetails, ErasureItemDetails> = {
  kind: 'erasure',
  prefix: 'ERASE',
  appliedStatus: 'EXECUTED',
  liftable: false,
  overridable: false,
  rejectionExceptions: ERASURE_EXCEPTIONS,

  parseRequestDetails(value: unknown): ErasureRequestDetails {
    const body = requireRecord(value, 'details');
    const details: ErasureRequestDetails = { grounds: requireOneOf(body['grounds'], ERASURE_GROUNDS, 'grounds') };
    const description = optionalText(body['description'], 'description');
    if (description !== null) details.description = description;
    return details;
  },

  parseItemDetails(value: unknown): ErasureItemDetails {
    if (value === undefined || value === null) return {};
    const description = optionalText(requireRecord(value, 'details')['description'], 'description');
    return description === null ? {} : { description };
  },

  applyOutcome(_details: ErasureItemDetails, parameters: JsonObject): JsonObject {
    return { method: requireOneOf(parameters['method'], ERASURE_METHODS, 'method') };
  },

  absoluteRight: () => null,
  liftBlocker: () => null,
  completionBlocker: () => null,
};
