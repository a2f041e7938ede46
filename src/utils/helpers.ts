// ============================================================================
// TELEHEALTH SCHEDULER - DATE AND TIME HELPERS
// ============================================================================
//
// Scheduling works on UTC calendar dates (YYYY-MM-DD) and times of day (HH:mm).

import { addMinutes } from 'date-fns';

export const TIME_OF_DAY_PATTERN = /^([01][0-9]|2[0-3]):[0-5][0-9](:[0-5][0-9])?$/;
export const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const MINUTES_PER_DAY = 24 * 60;

export function isValidTimeOfDay(value: string): boolean {
  return TIME_OF_DAY_PATTERN.test(value);
}

/**
 * Minutes since midnight for `HH:mm` or `HH:mm:ss` (seconds are dropped)
 */
export function parseTimeOfDay(value: string): number {
  if (!isValidTimeOfDay(value)) {
    throw new RangeError(`Invalid time of day: ${value}`);
  }
  const [hours, minutes] = value.split(':').map(Number);
  return hours * 60 + minutes;
}

export function formatTimeOfDay(totalMinutes: number): string {
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/**
 * Normalize a stored time (`HH:mm:ss` from PostgreSQL) to `HH:mm`
 */
export function normalizeTimeOfDay(value: string): string {
  return formatTimeOfDay(parseTimeOfDay(value));
}

export function isValidCalendarDate(value: string): boolean {
  if (!CALENDAR_DATE_PATTERN.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
}

/**
 * Midnight UTC of a `YYYY-MM-DD` date
 */
export function parseCalendarDate(value: string): Date {
  if (!isValidCalendarDate(value)) {
    throw new RangeError(`Invalid calendar date: ${value}`);
  }
  return new Date(`${value}T00:00:00.000Z`);
}

export function toCalendarDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Weekday of a date, 0 = Monday .. 6 = Sunday
 */
export function dayOfWeek(date: Date): number {
  return (date.getUTCDay() + 6) % 7;
}

export function minutesOfDay(date: Date): number {
  return date.getUTCHours() * 60 + date.getUTCMinutes() + date.getUTCSeconds() / 60 + date.getUTCMilliseconds() / 60000;
}

export function atTimeOfDay(calendarDate: string, totalMinutes: number): Date {
  return addMinutes(parseCalendarDate(calendarDate), totalMinutes);
}

/**
 * First and last instant of a calendar day (inclusive)
 */
export function dayBounds(calendarDate: string): { start: Date; end: Date } {
  const start = parseCalendarDate(calendarDate);
  const end = new Date(start.getTime() + MINUTES_PER_DAY * 60_000 - 1);
  return { start, end };
}

/**
 * Half-open interval overlap: [aStart, aEnd) against [bStart, bEnd)
 */
export function rangesOverlap(aStart: Date, aEnd: Date, bStart: Date, bEnd: Date): boolean {
  return aStart.getTime() < bEnd.getTime() && aEnd.getTime() > bStart.getTime();
}
