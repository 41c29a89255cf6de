/**
 * Right to rectification. Each item names one field and the value the
 * subject asks for; applying it stamps the previous and new values.
 *
 * @module rights/kinds/rectification
 */

import type { JsonObject } from '../../utils/json.js';
import { optionalText, requireOneOf, requireRecord, requireText } from '../../utils/validation.js';
import type { RequestKindDefinition } from '../types.js';

export const RECTIFICATION_REQUEST_TYPES = ['CORRECTION', 'COMPLETION', 'BOTH'] as const;

export type RectificationRequestType = (typeof RECTIFICATION_REQUEST_TYPES)[number];

export const RECTIFICATION_TYPES = ['CORRECTION', 'COMPLETION'] as const;

export type RectificationType = (typeof RECTIFICATION_TYPES)[number];

export type RectificationRequestDetails = {
  requestType: RectificationRequestType;
  description?: string;
};

export type RectificationItemDetails = {
  fieldName: string;
  /** Null when the field is being completed. */
  currentValue: string | null;
  requestedValue: string;
  rectificationType: RectificationType;
  justification?: string;
  evidence?: string;
};

export const rectificationKind: RequestKindDefinition<RectificationRequestDetails, RectificationItemDetails> = {
  kind: 'rectification',
  prefix: 'RECT',
  appliedStatus: 'APPLIED',
  liftable: false,
  overridable: false,
  rejectionExceptions: [],

  parseRequestDetails(value: unknown): RectificationRequestDetails {
    const body = requireRecord(value, 'details');
    const details: RectificationRequestDetails = {
      requestType: requireOneOf(body['requestType'], RECTIFICATION_REQUEST_TYPES, 'requestType'),
    };
    const description = optionalText(body['description'], 'description');
    if (description !== null) details.description = description;
    return details;
  },

  parseItemDetails(value: unknown): RectificationItemDetails {
    const body = requireRecord(value, 'details');
    const details: RectificationItemDetails = {
      fieldName: requireText(body['fieldName'], 'fieldName'),
      currentValue: optionalText(body['currentValue'], 'currentValue'),
      requestedValue: requireText(body['requestedValue'], 'requestedValue'),
      rectificationType: requireOneOf(body['rectificationType'], RECTIFICATION_TYPES, 'rectificationType'),
    };
    const justification = optionalText(body['justification'], 'justification');
    if (justification !== null) details.justification = justification;
    const evidence = optionalText(body['evidence'], 'evidence');
    if (evidence !== null) details.evidence = evidence;
    return details;
  },

  /** The applied value defaults to the requested one. */
  applyOutcome(details: RectificationItemDetails, parameters: JsonObject): JsonObject {
    return {
      fieldName: details.fieldName,
      previousValue: details.currentValue,
      newValue: optionalText(parameters['newValue'], 'newValue') ?? details.requestedValue,
    };
  },

  absoluteRight: () => null,
  liftBlocker: () => null,
  completionBlocker: () => null,
};
