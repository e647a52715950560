/**
 * Calendar date helpers
 *
 * Days are local calendar days, keyed as YYYY-MM-DD.
 */

import type { DateKey } from '../types/index.js';

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a timestamp as its local calendar date
 */
export function toDateKey(date: Date): DateKey {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Check a string is a well-formed YYYY-MM-DD key
 */
export function isDateKey(value: string): value is DateKey {
  return DATE_KEY_PATTERN.test(value);
}

/**
 * Shift a date key by a number of days (negative = past)
 */
export function shiftDateKey(key: DateKey, days: number): DateKey {
  const match = DATE_KEY_PATTERN.exec(key);
  if (!match) {
    throw new RangeError(`Invalid date key: ${key}`);
  }
  const [, year, month, day] = match;
  const date = new Date(Number(year), Number(month) - 1, Number(day) + days);
  return toDateKey(date);
}

/**
 * The calendar day before the given one
 */
export function previousDateKey(key: DateKey): DateKey {
  return shiftDateKey(key, -1);
}
