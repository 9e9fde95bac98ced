/**
 * =============================================================================
 * DATE UTILITIES
 * =============================================================================
 *
 * Calendar-date helpers for the `date` column (YYYY-MM-DD).
 * "Today" is always the process-local calendar date of a given instant.
 * =============================================================================
 */

import { WEEK_WINDOW_DAYS } from '../../core/constants';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface DateRange {
  /** Inclusive, YYYY-MM-DD */
  startDate: string;
  /** Inclusive, YYYY-MM-DD */
  endDate: string;
}

const pad = (value: number, width: number = 2): string => String(value).padStart(width, '0');

/**
 * Local calendar date of an instant, as YYYY-MM-DD
 */
export function formatLocalDate(instant: Date): string {
  return `${pad(instant.getFullYear(), 4)}-${pad(instant.getMonth() + 1)}-${pad(instant.getDate())}`;
}

/**
 * Check that a string is a real calendar date in YYYY-MM-DD form
 */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;

  const [, year, month, day] = match;
  const probe = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  return probe.getUTCFullYear() === Number(year)
    && probe.getUTCMonth() === Number(month) - 1
    && probe.getUTCDate() === Number(day);
}

/**
 * Move a YYYY-MM-DD date by whole calendar days (negative goes back)
 */
export function shiftIsoDate(isoDate: string, days: number): string {
  const match = ISO_DATE_PATTERN.exec(isoDate);
  if (!match || !isIsoDate(isoDate)) {
    throw new RangeError(`Not a YYYY-MM-DD date: ${isoDate}`);
  }

  const [, year, month, day] = match;
  // Calendar arithmetic in UTC so DST shifts never skip or repeat a day
  const shifted = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day) + days));
  return `${pad(shifted.getUTCFullYear(), 4)}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
}

/**
 * Trailing window of WEEK_WINDOW_DAYS calendar days ending on (and including) `today`
 */
export function getTrailingWeek(today: string): DateRange {
  return {
    startDate: shiftIsoDate(today, -(WEEK_WINDOW_DAYS - 1)),
    endDate: today
  };
}
