/**
 * Right to restriction of processing. Applied items are active
 * restrictions until lifted.
 *
 * @module rights/kinds/restriction
 */

import type { JsonObject } from '../../utils/json.js';
import { optionalText, requireOneOf, requireRecord } from '../../utils/validation.js';
import type { RequestKindDefinition } from '../types.js';

export const RESTRICTION_GROUNDS = [
  'ACCURACY_CONTESTED',
  'UNLAWFUL_PROCESSING',
  'LEGAL_CLAIMS',
  'OBJECTION_PENDING',
] as const;

export type RestrictionGrounds = (typeof RESTRICTION_GROUNDS)[number];

export const RESTRICTION_SCOPES = [
  'FULL',
  'STORAGE_ONLY',
  'CONSENT_ONLY',
  'LEGAL_CLAIMS',
  'RIGHTS_PROTECTION',
  'PUBLIC_INTEREST',
] as const;

export type RestrictionScope = (typeof RESTRICTION_SCOPES)[number];

export type RestrictionRequestDetails = {
  grounds: RestrictionGrounds;
  description?: string;
};

export type RestrictionItemDetails = {
  scope: RestrictionScope;
};

export const restrictionKind: RequestKindDefinition<RestrictionRequestDetails, RestrictionItemDetails> = {
  kind: 'restriction',
  prefix: 'RESTRICT',
  appliedStatus: 'APPLIED',
  liftable: true,
  overridable: false,
  rejectionExceptions: [],

  parseRequestDetails(value: unknown): RestrictionRequestDetails {
    const body = requireRecord(value, 'details');
    const details: RestrictionRequestDetails = {
      grounds: requireOneOf(body['grounds'], RESTRICTION_GROUNDS, 'grounds'),
    };
    const description = optionalText(body['description'], 'description');
    if (description !== null) details.description = description;
    return details;
  },

  parseItemDetails(value: unknown): RestrictionItemDetails {
    const body = requireRecord(value, 'details');
    return { scope: requireOneOf(body['scope'], RESTRICTION_SCOPES, 'scope') };
  },

  applyOutcome(details: RestrictionItemDetails): JsonObject {
    return { restricted: true, scope: details.scope };
  },

  absoluteRight: () => null,
  liftBlocker: () => null,
  completionBlocker: () => null,
};
