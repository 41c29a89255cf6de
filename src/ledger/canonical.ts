/**
 * Deterministic JSON serialization for hashed payloads.
 *
 * Object keys are sorted recursively and `undefined` members are dropped,
 * so the same logical payload always yields the same bytes.
 *
 * @module ledger/canonical
 */

import { ValidationError } from '../utils/errors.js';
import type { JsonValue } from '../utils/json.js';

export function canonicalize(value: JsonValue): string {
  if (value === null || typeof value === 'boolean' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ValidationError('Hashed payloads cannot contain non-finite numbers');
    }
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(canonicalize).join(',')}]`;
  }
  const members: string[] = [];
  for (const key of Object.keys(value).sort()) {
    const member = value[key];
    if (member === undefined) continue;
    members.push(`${JSON.stringify(key)}:${canonicalize(member)}`);
  }
  return `{${members.join(',')}}`;
}
