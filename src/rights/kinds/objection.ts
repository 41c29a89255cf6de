/**
 * Right to object.
 *
 * Items are processing activities; applying one stops the activity and
 * lifting it resumes processing. Objections to direct marketing are
 * absolute: they cannot be rejected or overridden, and stopped marketing
 * never resumes. Only objections can be overridden on compelling grounds,
 * and an objection completes only once it has been upheld.
 *
 * @module rights/kinds/objection
 */

import type { JsonObject } from '../../utils/json.js';
import { optionalText, requireMinLength, requireOneOf, requireRecord, requireText } from '../../utils/validation.js';
import type { RequestKindDefinition } from '../types.js';

export const OBJECTION_TYPES = [
  'LEGITIMATE_INTEREST',
  'PUBLIC_TASK',
  'DIRECT_MARKETING',
  'PROFILING_MARKETING',
  'RESEARCH',
] as const;

export type ObjectionType = (typeof OBJECTION_TYPES)[number];

/** Legal bases of processing a subject can object to. */
export const OBJECTION_LEGAL_BASES = ['LEGITIMATE_INTEREST', 'PUBLIC_TASK', 'DIRECT_MARKETING', 'RESEARCH'] as const;

export type ObjectionLegalBasis = (typeof OBJECTION_LEGAL_BASES)[number];

/** Objection types that opt the subject out of marketing once upheld. */
export const MARKETING_OBJECTION_TYPES: readonly ObjectionType[] = ['DIRECT_MARKETING', 'PROFILING_MARKETING'];

export const OBJECTION_GROUNDS_MIN_LENGTH = 10;

export type ObjectionRequestDetails = {
  objectionType: ObjectionType;
  processingPurpose: string;
  grounds: string;
  situationDetails?: string;
};

export type ObjectionItemDetails = {
  activity: string;
  legalBasis: ObjectionLegalBasis;
};

export const objectionKind: RequestKindDefinition<ObjectionRequestDetails, ObjectionItemDetails> = {
  kind: 'objection',
  prefix: 'OBJ',
  appliedStatus: 'APPLIED',
  liftable: true,
  overridable: true,
  rejectionExceptions: [],

  parseRequestDetails(value: unknown): ObjectionRequestDetails {
    const body = requireRecord(value, 'details');
    const details: ObjectionRequestDetails = {
      objectionType: requireOneOf(body['objectionType'], OBJECTION_TYPES, 'objectionType'),
      processingPurpose: requireText(body['processingPurpose'], 'processingPurpose'),
      grounds: requireMinLength(body['grounds'], 'grounds', OBJECTION_GROUNDS_MIN_LENGTH),
    };
    const situationDetails = optionalText(body['situationDetails'], 'situationDetails');
    if (situationDetails !== null) details.situationDetails = situationDetails;
    return details;
  },

  parseItemDetails(value: unknown): ObjectionItemDetails {
    const body = requireRecord(value, 'details');
    return {
      activity: requireText(body['activity'], 'activity'),
      legalBasis: requireOneOf(body['legalBasis'], OBJECTION_LEGAL_BASES, 'legalBasis'),
    };
  },

  applyOutcome(details: ObjectionItemDetails): JsonObject {
    return { processingStopped: true, activity: details.activity };
  },

  absoluteRight(details: ObjectionRequestDetails): string | null {
    return details.objectionType === 'DIRECT_MARKETING' ? 'direct marketing objection' : null;
  },

  liftBlocker(details: ObjectionRequestDetails): string | null {
    return details.objectionType === 'DIRECT_MARKETING'
      ? 'Processing cannot resume after a direct marketing objection'
      : null;
  },

  completionBlocker(request): string | null {
    return request.decision === 'UPHELD' ? null : 'Objection must be upheld before completing';
  },
};
