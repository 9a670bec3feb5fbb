// shared/src/dates.ts
// Calendar-date helpers. Dates travel as YYYY-MM-DD strings everywhere.

import {
  addDays,
  differenceInCalendarDays,
  endOfMonth,
  format,
  isValid,
  parseISO,
  startOfMonth,
} from "date-fns";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATE_FORMAT = "yyyy-MM-dd";

/**
 * True for a well-formed calendar date such as "2026-02-28".
 * Rejects impossible dates ("2026-02-30") that a regex alone would accept.
 */
export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const parsed = parseISO(value);
  return isValid(parsed) && format(parsed, ISO_DATE_FORMAT) === value;
}

export function toIsoDate(date: Date): string {
  return format(date, ISO_DATE_FORMAT);
}

export function todayIso(now: Date = new Date()): string {
  return toIsoDate(now);
}

export function addDaysIso(date: string, days: number): string {
  return toIsoDate(addDays(parseISO(date), days));
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: string, to: string): number {
  return differenceInCalendarDays(parseISO(to), parseISO(from));
}

export function monthWindow(date: string): { from: string; to: string } {
  const parsed = parseISO(date);
  return {
    from: toIsoDate(startOfMonth(parsed)),
    to: toIsoDate(endOfMonth(parsed)),
  };
}

// ISO dates compare correctly as strings
export function periodsOverlap(
  a: { start: string; end: string },
  b: { start: string; end: string }
): boolean {
  return a.start <= b.end && b.start <= a.end;
}
