/**
 * Time utilities for consistent date handling
 */

import { format, fromUnixTime, isValid, parseISO } from 'date-fns';

export function getCurrentDate(): Date {
  return new Date();
}

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/** Null when the epoch falls outside the representable date range. */
export function formatEpochSeconds(seconds: number): string | null {
  const date = fromUnixTime(seconds);
  return isValid(date) ? formatDate(date) : null;
}

/**
 * Accepts epoch seconds or an ISO date string. Returns null for anything
 * that does not describe a valid date.
 */
export function toDateString(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return formatEpochSeconds(value);
  }
  if (typeof value === 'string' && value.trim()) {
    const parsed = parseISO(value.trim());
    return isValid(parsed) ? formatDate(parsed) : null;
  }
  return null;
}
