/**
 * Calendar Date Utilities
 *
 * Single source of truth for reading, writing and walking `YYYY-MM-DD`
 * calendar dates. Every backend funnels its date values through here so
 * they compare and sort identically.
 *
 * All arithmetic is done in UTC to stay clear of local DST shifts.
 */

import type { CalendarDate } from '../types';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Current instant. Timestamps are always stored as UTC instants.
 */
export function utcNow(): Date {
  return new Date();
}

/**
 * Format year/month/day as a calendar date. Does not validate.
 */
export function formatCalendarDate(year: number, month: number, day: number): CalendarDate {
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

/**
 * Split a calendar date into its numeric parts.
 * Returns null if the string is malformed or names a day that does not exist.
 */
export function parseCalendarDate(value: string): { year: number; month: number; day: number } | null {
  const match = CALENDAR_DATE_PATTERN.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  if (year < 1 || month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;

  return { year, month, day };
}

export function isCalendarDate(value: unknown): value is CalendarDate {
  return typeof value === 'string' && parseCalendarDate(value) !== null;
}

/**
 * Gregorian leap year rule
 */
export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Number of days in a month (month is 1-12)
 */
export function daysInMonth(year: number, month: number): number {
  const lengths = [31, isLeapYear(year) ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];
  return lengths[month - 1] ?? 0;
}

/**
 * Shift a calendar date by a number of days (negative allowed).
 */
export function addDays(date: CalendarDate, days: number): CalendarDate {
  const parts = parseCalendarDate(date);
  if (!parts) {
    throw new RangeError(`Invalid calendar date: ${date}`);
  }
  // setUTCFullYear, unlike Date.UTC, does not remap years 0-99 to 19xx
  const base = new Date(0);
  base.setUTCFullYear(parts.year, parts.month - 1, parts.day);
  const shifted = new Date(base.getTime() + days * MS_PER_DAY);
  return formatCalendarDate(shifted.getUTCFullYear(), shifted.getUTCMonth() + 1, shifted.getUTCDate());
}

/**
 * Inclusive list of calendar dates from start to end.
 * @throws RangeError if start is after end
 */
export function dateRange(start: CalendarDate, end: CalendarDate): CalendarDate[] {
  if (start > end) {
    throw new RangeError(`start date (${start}) must be <= end date (${end})`);
  }

  const result: CalendarDate[] = [];
  let current = start;
  while (current <= end) {
    result.push(current);
    current = addDays(current, 1);
  }
  return result;
}

/**
 * First and last day of a month.
 */
export function monthBounds(year: number, month: number): { start: CalendarDate; end: CalendarDate } {
  return {
    start: formatCalendarDate(year, month, 1),
    end: formatCalendarDate(year, month, daysInMonth(year, month)),
  };
}

/**
 * Normalize a date value coming out of a database driver.
 * Drivers hand back either the ISO text or a Date at midnight UTC.
 */
export function toCalendarDate(value: unknown): CalendarDate {
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return formatCalendarDate(value.getUTCFullYear(), value.getUTCMonth() + 1, value.getUTCDate());
  }
  if (typeof value === 'string') {
    const text = value.slice(0, 10);
    if (isCalendarDate(text)) return text;
  }
  throw new TypeError(`Unreadable calendar date value: ${String(value)}`);
}

/**
 * Normalize a timestamp coming out of a database driver (Date or ISO text).
 */
export function toTimestamp(value: unknown): Date {
  const date = value instanceof Date ? value : typeof value === 'string' ? new Date(value) : null;
  if (!date || Number.isNaN(date.getTime())) {
    throw new TypeError(`Unreadable timestamp value: ${String(value)}`);
  }
  return date;
}
