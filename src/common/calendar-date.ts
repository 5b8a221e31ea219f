import { isISO8601 } from 'class-validator';

/**
 * Calendar date in `YYYY-MM-DD` form, interpreted as a whole UTC day.
 */
export type CalendarDate = string;

export const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Parse a calendar date into a day number (days since 1970-01-01).
 * Returns null for anything that is not a real `YYYY-MM-DD` day.
 */
export function parseCalendarDate(value: unknown): number | null {
  if (typeof value !== 'string' || !CALENDAR_DATE_PATTERN.test(value)) {
    return null;
  }
  if (!isISO8601(value, { strict: true })) {
    return null;
  }

  const ms = new Date(`${value}T00:00:00Z`).getTime();
  if (Number.isNaN(ms)) {
    return null;
  }

  const day = ms / MS_PER_DAY;
  // Rejects days the Date parser rolls over (e.g. 2013-02-30)
  return formatDayNumber(day) === value ? day : null;
}

export function formatDayNumber(day: number): CalendarDate {
  return new Date(day * MS_PER_DAY).toISOString().split('T')[0];
}
