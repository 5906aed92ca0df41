import type { UsageDate } from "./types.js";

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 86_400_000;

/** True for a real `YYYY-MM-DD` date (rejects 2025-02-30). */
export function isCalendarDate(value: string): boolean {
  const match = CALENDAR_DATE.exec(value);
  if (!match) return false;
  const parsed = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
  return parsed.toISOString().slice(0, 10) === value;
}

/**
 * Reduce a provider timestamp (`2025-11-03T00:00:00.0000000Z`) to its calendar day.
 * Returns null when the value does not start with a valid date.
 */
export function toCalendarDate(value: string): UsageDate | null {
  const day = value.slice(0, 10);
  return isCalendarDate(day) ? day : null;
}

export function addDays(date: UsageDate, days: number): UsageDate {
  return new Date(Date.parse(`${date}T00:00:00Z`) + days * DAY_MS).toISOString().slice(0, 10);
}

/** Inclusive day count between two calendar dates. */
export function daysBetween(start: UsageDate, end: UsageDate): number {
  return Math.round((Date.parse(`${end}T00:00:00Z`) - Date.parse(`${start}T00:00:00Z`)) / DAY_MS) + 1;
}
