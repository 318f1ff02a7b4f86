/**
 * Site-Local Time Helpers
 *
 * Hourly series arrive as site-local wall-clock strings ("2026-07-14T13:00")
 * with no offset. They are never converted through the server's timezone:
 * date and hour are read straight off the string, so the result is the same
 * whatever TZ the process runs in.
 */

import { addDays, eachDayOfInterval, format, isValid, parseISO } from 'date-fns';

const LOCAL_TIMESTAMP_PATTERN = /^(\d{4}-\d{2}-\d{2})T(\d{2}):(\d{2})$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parsed site-local timestamp
 */
export interface LocalTimestamp {
  /** Service date in local timezone (YYYY-MM-DD) */
  date: string;
  /** Hour in local time (0-23) */
  hour: number;
  /** Minute in local time (0-59) */
  minute: number;
}

/**
 * Parse a "YYYY-MM-DDTHH:mm" wall-clock string.
 *
 * Returns null when the string is malformed or names an impossible date/time.
 */
export function parseLocalTimestamp(value: string): LocalTimestamp | null {
  const match = value.match(LOCAL_TIMESTAMP_PATTERN);
  if (!match) return null;

  const [, date, hourStr, minuteStr] = match;
  const hour = parseInt(hourStr, 10);
  const minute = parseInt(minuteStr, 10);

  if (hour > 23 || minute > 59 || !isValidDateString(date)) {
    return null;
  }

  return { date, hour, minute };
}

/**
 * Check a YYYY-MM-DD string names a real calendar day
 */
export function isValidDateString(value: string): boolean {
  if (!DATE_PATTERN.test(value)) return false;
  const parsed = parseISO(value);
  return isValid(parsed) && format(parsed, 'yyyy-MM-dd') === value;
}

/**
 * Get today's date string in a specific timezone (YYYY-MM-DD)
 */
export function getTodayInTimezone(timezone: string, now: Date = new Date()): string {
  const dateFormatter = new Intl.DateTimeFormat('en-CA', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });
  return dateFormatter.format(now);
}

/**
 * Shift a YYYY-MM-DD string by whole calendar days
 */
export function shiftDate(date: string, days: number): string {
  return format(addDays(parseISO(date), days), 'yyyy-MM-dd');
}

/**
 * List every calendar day from start to end, inclusive
 */
export function listDates(startDate: string, endDate: string): string[] {
  return eachDayOfInterval({ start: parseISO(startDate), end: parseISO(endDate) }).map((day) =>
    format(day, 'yyyy-MM-dd')
  );
}

/**
 * Format an hour for display in 12-hour format ("1 PM")
 */
export function formatHourForDisplay(hour24: number): string {
  const period = hour24 >= 12 ? 'PM' : 'AM';
  const hour12 = hour24 % 12 || 12;
  return `${hour12} ${period}`;
}

/**
 * Format an hour as "HH:00"
 */
export function formatHour24(hour24: number): string {
  return `${hour24.toString().padStart(2, '0')}:00`;
}
