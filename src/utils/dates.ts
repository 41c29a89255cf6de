/**
 * Calendar date helpers.
 *
 * Statutory deadlines and retention expiry are whole calendar days, kept as
 * `YYYY-MM-DD` strings in UTC so they compare lexically and hash the same
 * everywhere.
 *
 * @module utils/dates
 */

import { ValidationError } from './errors.js';

/** Milliseconds in one day. */
export const MS_PER_DAY = 24 * 60 * 60 * 1000;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Parse a `YYYY-MM-DD` string into a UTC midnight timestamp. */
export function parseIsoDate(value: string, field = 'date'): number {
  const match = ISO_DATE.exec(value);
  if (!match) {
    throw new ValidationError(`${field} must be a date in YYYY-MM-DD format`);
  }
  const [, y, m, d] = match;
  const time = Date.UTC(Number(y), Number(m) - 1, Number(d));
  if (toIsoDate(new Date(time)) !== value) {
    throw new ValidationError(`${field} is not a valid calendar date`);
  }
  return time;
}

export function addDays(isoDate: string, days: number): string {
  return toIsoDate(new Date(parseIsoDate(isoDate) + days * MS_PER_DAY));
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: string, to: string): number {
  return Math.round((parseIsoDate(to) - parseIsoDate(from)) / MS_PER_DAY);
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
