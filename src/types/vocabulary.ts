/**
 * Vocabularies shared across modules.
 *
 * @module types/vocabulary
 */

/** Categories of personal data tracked by holds, retention and requests. */
export const DATA_CATEGORIES = [
  'IDENTITY',
  'CONTACT',
  'HEALTH',
  'FINANCIAL',
  'BEHAVIORAL',
  'CONSENT',
  'AUDIT',
  'RESEARCH',
  'COMMUNICATIONS',
] as const;

export type DataCategory = (typeof DATA_CATEGORIES)[number];
