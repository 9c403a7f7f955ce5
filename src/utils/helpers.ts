const MS_PER_DAY = 1000 * 60 * 60 * 24;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a `YYYY-MM-DD` calendar date into a day number (days since 1970-01-01).
 * Returns null for anything that is not a real calendar day, e.g. `2025-02-30`.
 */
export function toDayNumber(value: string): number | null {
  const match = ISO_DATE.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1) return null;

  // Date.UTC would read years 0-99 as 1900-1999.
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date.getTime() / MS_PER_DAY;
}

export function isIsoDate(value: unknown): value is string {
  return typeof value === 'string' && toDayNumber(value) !== null;
}

/**
 * Format a Date as a local `YYYY-MM-DD` calendar date.
 */
export function formatLocalDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * Signed number of days from `from` to `to`. Both must be valid ISO dates.
 */
export function daysBetween(from: string, to: string): number {
  return requireDayNumber(to) - requireDayNumber(from);
}

/**
 * Calendar days covered by an inclusive range. Zero or negative when end precedes start.
 */
export function leaveDuration(start: string, end: string): number {
  return daysBetween(start, end) + 1;
}

/**
 * Check if two inclusive date ranges overlap.
 */
export function datesOverlap(
  start1: string, end1: string,
  start2: string, end2: string
): boolean {
  return requireDayNumber(start1) <= requireDayNumber(end2) &&
    requireDayNumber(end1) >= requireDayNumber(start2);
}

function requireDayNumber(value: string): number {
  const day = toDayNumber(value);
  if (day === null) throw new Error(`Invalid ISO date: ${value}`);
  return day;
}
