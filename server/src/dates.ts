// Calendar-day helpers for a configured zone. formatToParts keeps them DST-safe
// and independent of the host zone.
import { ParseError } from './errors.js';
import type { CalendarDate } from './types.js';

function zonedParts(input: Date, timeZone: string) {
  if (isNaN(input.getTime())) throw new ParseError('Invalid Date input');
  const fmt = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });
  const map: Record<string, string> = {};
  for (const p of fmt.formatToParts(input)) map[p.type] = p.value;
  return { year: Number(map.year), month: Number(map.month), day: Number(map.day) };
}

export function formatCalendarDate(year: number, month: number, day: number): CalendarDate {
  const yyyy = String(year).padStart(4, '0');
  const mm = String(month).padStart(2, '0');
  const dd = String(day).padStart(2, '0');
  return `${yyyy}-${mm}-${dd}`;
}

export function isValidDay(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false;
  if (month < 1 || month > 12 || day < 1) return false;
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

/** The calendar day an instant falls on in `timeZone`. */
export function calendarDateIn(input: Date, timeZone: string): CalendarDate {
  const p = zonedParts(input, timeZone);
  return formatCalendarDate(p.year, p.month, p.day);
}

export function currentYearIn(timeZone: string, now: Date = new Date()): number {
  return zonedParts(now, timeZone).year;
}

/** Parses an ISO-8601 instant ('Z' or offset); null when absent or invalid. */
export function parseInstant(value: string | null | undefined): Date | null {
  if (!value) return null;
  const d = new Date(value);
  return isNaN(d.getTime()) ? null : d;
}
