import { err, ok, type Result } from 'neverthrow';

import { InvalidDateFormatError } from '../errors/index.js';

import type { CalendarDate } from './types.js';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;
const DAYS_PER_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) {
    return 29;
  }
  return DAYS_PER_MONTH[month - 1] ?? 0;
}

export function isValidCalendarDate(date: CalendarDate): boolean {
  const { year, month, day } = date;
  return (
    Number.isInteger(year) &&
    Number.isInteger(month) &&
    Number.isInteger(day) &&
    year >= 1 &&
    year <= 9999 &&
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= daysInMonth(year, month)
  );
}

/**
 * Parse `YYYY-MM-DD`. Month and day may drop their leading zero.
 */
export function parseCalendarDate(text: string): Result<CalendarDate, InvalidDateFormatError> {
  const match = ISO_DATE_PATTERN.exec(text);
  if (!match) {
    return err(new InvalidDateFormatError(text));
  }

  const date: CalendarDate = {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
  };

  if (!isValidCalendarDate(date)) {
    return err(new InvalidDateFormatError(text));
  }

  return ok(date);
}

/**
 * Today's date on the local clock
 */
export function todayCalendarDate(now: Date = new Date()): CalendarDate {
  return {
    year: now.getFullYear(),
    month: now.getMonth() + 1,
    day: now.getDate(),
  };
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  // Date.UTC treats years 0-99 as 1900-1999; setUTCFullYear does not.
  const base = new Date(0);
  base.setUTCFullYear(date.year, date.month - 1, date.day);
  const shifted = new Date(base.getTime() + days * MS_PER_DAY);

  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  };
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Format as YYYY-MM-DD (the form hashed into the digest)
 */
export function formatIsoDate(date: CalendarDate): string {
  return `${pad(date.year, 4)}-${pad(date.month, 2)}-${pad(date.day, 2)}`;
}

/**
 * Format as YYYY/MM/DD (the path segment index sources are keyed by)
 */
export function formatSlashDate(date: CalendarDate): string {
  return `${pad(date.year, 4)}/${pad(date.month, 2)}/${pad(date.day, 2)}`;
}
