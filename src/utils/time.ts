export const DAY_MS = 24 * 60 * 60 * 1000;

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local calendar date as YYYY-MM-DD. */
export function toCalendarDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Local midnight of a YYYY-MM-DD date, or null if the date does not exist. */
export function parseCalendarDate(value: string): Date | null {
  const match = CALENDAR_DATE.exec(value);
  if (!match) return null;

  const [year, month, day] = [Number(match[1]), Number(match[2]) - 1, Number(match[3])];
  const date = new Date(year, month, day);
  if (date.getFullYear() !== year || date.getMonth() !== month || date.getDate() !== day) return null;
  return date;
}

/**
 * Normalize a registry date (date-only or full ISO timestamp) to YYYY-MM-DD.
 * Returns null for blank or unparseable input.
 */
export function normalizeCalendarDate(raw: string | null | undefined): string | null {
  const value = raw?.trim();
  if (!value) return null;

  // Date-only strings would parse as UTC midnight
  if (CALENDAR_DATE.test(value)) {
    return parseCalendarDate(value) ? value : null;
  }

  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : toCalendarDate(parsed);
}

function startOfLocalDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

/** Whole local calendar days from `now` until the expiry date. Negative once expired. */
export function daysUntil(expiryDate: string, now: Date): number {
  const expiry = parseCalendarDate(expiryDate);
  if (!expiry) return Number.NaN;
  // Rounded so a DST shift inside the range does not lose a day
  return Math.round((expiry.getTime() - startOfLocalDay(now).getTime()) / DAY_MS);
}

/** A license is usable through the whole of its expiry day. */
export function isPastExpiry(expiryDate: string | null, now: Date): boolean {
  return expiryDate !== null && daysUntil(expiryDate, now) < 0;
}

export function nextLocalMidnight(now: Date): Date {
  return new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1);
}

export function addGraceDays(now: Date, days: number): Date {
  return new Date(now.getTime() + days * DAY_MS);
}
