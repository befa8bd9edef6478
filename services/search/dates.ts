import type { DateRange } from "./types.js";

export const MS_PER_MINUTE = 60 * 1000;
export const MS_PER_DAY = 24 * 60 * MS_PER_MINUTE;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Parse `YYYY-MM-DD` as a UTC midnight; undefined for anything that is not a real calendar day. */
export function parseCalendarDate(value: string): Date | undefined {
  const m = ISO_DATE.exec(value);
  if (!m) return undefined;
  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const d = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC rolls 2024-02-30 over to March; reject instead.
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return undefined;
  }
  return d;
}

export function toCalendarDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

export function startOfUtcDay(d: Date): Date {
  return new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()));
}

export function addDays(d: Date, days: number): Date {
  return new Date(d.getTime() + days * MS_PER_DAY);
}

/** Whole days from `from` to `to` (both UTC midnights). */
export function daysBetween(from: Date, to: Date): number {
  return Math.round((to.getTime() - from.getTime()) / MS_PER_DAY);
}

export function minutesBetween(from: Date, to: Date): number {
  return Math.round((to.getTime() - from.getTime()) / MS_PER_MINUTE);
}

/** Every calendar day of a range, start and end included. Assumes a validated range. */
export function eachDate(range: DateRange): string[] {
  const start = parseCalendarDate(range.start);
  const end = parseCalendarDate(range.end);
  if (!start || !end) return [];
  const out: string[] = [];
  for (let d = start; d.getTime() <= end.getTime(); d = addDays(d, 1)) {
    out.push(toCalendarDate(d));
  }
  return out;
}

/** True when `instant` falls on one of the range's UTC days. */
export function isWithinRange(instant: Date, range: DateRange): boolean {
  const day = toCalendarDate(instant);
  return day >= range.start && day <= range.end;
}

/** Shift the end of a range by `days`. */
export function extendRange(range: DateRange, days: number): DateRange {
  const end = parseCalendarDate(range.end);
  if (!end) return range;
  return { start: range.start, end: toCalendarDate(addDays(end, days)) };
}
