/**
 * Field validators shared by the engines. Each throws a ValidationError
 * naming the field, and returns the cleaned value.
 *
 * @module utils/validation
 */

import { ValidationError } from './errors.js';

export function requireText(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`${field} is required`);
  }
  return value.trim();
}

export function optionalText(value: unknown, field: string): string | null {
  if (value === undefined || value === null || value === '') return null;
  return requireText(value, field);
}

/** Reasons and justifications carry a minimum length, counted after trimming. */
export function requireMinLength(value: unknown, field: string, min: number): string {
  const text = typeof value === 'string' ? value.trim() : '';
  if (text.length < min) {
    throw new ValidationError(`${field} must be at least ${min} characters`);
  }
  return text;
}

export function requireOneOf<T extends string>(
  value: unknown,
  allowed: readonly T[],
  field: string,
): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ValidationError(`${field} must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

export function optionalOneOf<T extends string>(
  value: unknown,
  allowed: readonly T[],
  field: string,
): T | null {
  if (value === undefined || value === null || value === '') return null;
  return requireOneOf(value, allowed, field);
}

export function requireIntegerInRange(value: unknown, field: string, min: number, max = Infinity): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    const bound = max === Infinity ? `at least ${min}` : `between ${min} and ${max}`;
    throw new ValidationError(`${field} must be a whole number ${bound}`);
  }
  return value;
}

const EMAIL_PATTERN = /^[^\s@"]+@[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?(?:\.[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?)*\.[A-Za-z]{2,}$/;

/** Emails are checked for shape and length (RFC 5321 limits). */
export function optionalEmail(value: unknown, field: string): string | null {
  const text = optionalText(value, field);
  if (text === null) return null;
  const local = text.slice(0, text.lastIndexOf('@'));
  if (text.length > 254 || local.length > 64 || !EMAIL_PATTERN.test(text)) {
    throw new ValidationError(`${field} is not a valid email address`);
  }
  return text.toLowerCase();
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function requireRecord(value: unknown, field: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ValidationError(`${field} must be an object`);
  }
  return value;
}
