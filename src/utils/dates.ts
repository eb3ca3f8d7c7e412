// Calendar dates travel as `YYYY-MM-DD` strings and are interpreted in UTC.

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;
// Latest year `parseDate` accepts; later dates would step past 9999-12-31.
const MAX_YEAR = 9998;

export function isoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

export function today(): string {
  return isoDate(new Date());
}

export function nowIso(): string {
  return new Date().toISOString();
}

function toUtc(date: string): Date {
  return new Date(`${date}T00:00:00.000Z`);
}

/** Returns the date unchanged when it is a real `YYYY-MM-DD` calendar date. */
export function parseDate(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const m = DATE_RE.exec(value.trim());
  if (!m || Number(m[1]) > MAX_YEAR) return undefined;
  const d = toUtc(m[0]);
  if (Number.isNaN(d.getTime()) || isoDate(d) !== m[0]) return undefined;
  return m[0];
}

/** Accepts an ISO-8601 instant and normalises it to `toISOString()` form. */
export function parseInstant(value: unknown): string | undefined {
  if (typeof value !== 'string' || value.trim() === '') return undefined;
  const d = new Date(value);
  return Number.isNaN(d.getTime()) ? undefined : d.toISOString();
}

export function addDays(date: string, days: number): string {
  return isoDate(new Date(toUtc(date).getTime() + days * DAY_MS));
}

export function daysBetween(from: string, to: string): number {
  return Math.round((toUtc(to).getTime() - toUtc(from).getTime()) / DAY_MS);
}

/** Longest inclusive range a leave request or report may cover. */
export const MAX_RANGE_DAYS = 366;

export function exceedsMaxRange(start: string, end: string): boolean {
  return daysBetween(start, end) + 1 > MAX_RANGE_DAYS;
}

/** Every date from `start` to `end`, both inclusive; empty when `end` precedes `start`. */
export function eachDay(start: string, end: string): string[] {
  const count = daysBetween(start, end) + 1;
  return Array.from({ length: Math.max(0, count) }, (_, i) => addDays(start, i));
}

export function isWeekday(date: string): boolean {
  const dow = toUtc(date).getUTCDay();
  return dow >= 1 && dow <= 5;
}

/** Monday to Friday count between two dates, inclusive; order does not matter. */
export function businessDays(start: string, end: string): number {
  const [from, to] = start <= end ? [start, end] : [end, start];
  return eachDay(from, to).filter(isWeekday).length;
}

export function monthStart(date: string): string {
  return `${date.slice(0, 7)}-01`;
}

export function monthEnd(date: string): string {
  const d = toUtc(monthStart(date));
  return isoDate(new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth() + 1, 0)));
}

export function yearOf(date: string): number {
  return Number(date.slice(0, 4));
}

/** Whole years elapsed from `from` to `to`, counting the anniversary day. */
export function fullYearsBetween(from: string, to: string): number {
  let years = yearOf(to) - yearOf(from);
  if (to.slice(5) < from.slice(5)) years -= 1;
  return Math.max(0, years);
}

export function hoursBetween(startIso: string | null, endIso: string | null): number {
  if (!startIso || !endIso) return 0;
  const ms = new Date(endIso).getTime() - new Date(startIso).getTime();
  return round2(ms / 3_600_000);
}

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}
