/**
 * Calendar date helpers. Dates are UTC days in YYYY-MM-DD form.
 */

const DAY_MS = 86_400_000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a YYYY-MM-DD string to epoch milliseconds at UTC midnight;
 * null for malformed or impossible dates (2024-02-30).
 */
export function parseIsoDate(value: string): number | null {
  const match = ISO_DATE.exec(value);
  if (!match) return null;
  const ms = Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  return formatIsoDate(ms) === value ? ms : null;
}

export function formatIsoDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

export function addDays(date: string, days: number): string {
  const ms = parseIsoDate(date);
  if (ms === null) {
    throw new RangeError(`Invalid date: ${date}`);
  }
  return formatIsoDate(ms + days * DAY_MS);
}

/**
 * Inclusive number of days from start to end; 0 when end is before start
 */
export function daysInRange(start: string, end: string): number {
  const a = parseIsoDate(start);
  const b = parseIsoDate(end);
  if (a === null || b === null || b < a) return 0;
  return Math.round((b - a) / DAY_MS) + 1;
}

export function eachDay(start: string, end: string): string[] {
  const days: string[] = [];
  const count = daysInRange(start, end);
  for (let i = 0; i < count; i++) {
    days.push(addDays(start, i));
  }
  return days;
}

export function todayUtc(now: number = Date.now()): string {
  return formatIsoDate(now);
}
