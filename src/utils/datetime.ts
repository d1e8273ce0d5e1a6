/**
 * Date/Time Utilities
 *
 * Counts are recorded in local wall-clock time with no zone attached. Every `Date` in the
 * engine carries that wall-clock value in its UTC fields, so arithmetic never crosses a
 * daylight-saving shift. Calendar dates are passed around as `YYYY-MM-DD` strings.
 */

const MS_PER_MINUTE = 60_000;
const MS_PER_DAY = 86_400_000;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATETIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Build a wall-clock datetime
 *
 * @example
 * wallClock(2023, 11, 7, 13, 45)
 * // => 2023-11-07T13:45:00.000Z
 */
export function wallClock(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
): Date {
  return new Date(Date.UTC(year, month - 1, day, hour, minute, second));
}

/**
 * Parse a `YYYY-MM-DD HH:MM[:SS]` (or `T`-separated) string into a wall-clock datetime.
 * Returns null when the string is not a valid datetime.
 */
export function parseDateTime(value: string): Date | null {
  const match = DATETIME_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, y, mo, d, h, mi, s] = match;
  const date = wallClock(Number(y), Number(mo), Number(d), Number(h), Number(mi), Number(s ?? 0));
  return toDateString(date) === `${y}-${mo}-${d}` && Number(h) < 24 && Number(mi) < 60 && Number(s ?? 0) < 60
    ? date
    : null;
}

/**
 * Check that a string is a real calendar date in `YYYY-MM-DD` form
 */
export function isDateString(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const [, y, m, d] = match;
  return toDateString(wallClock(Number(y), Number(m), Number(d))) === value;
}

/**
 * Calendar date of a wall-clock datetime
 *
 * @example
 * toDateString(wallClock(2023, 11, 7, 13, 45))
 * // => "2023-11-07"
 */
export function toDateString(date: Date): string {
  return date.toISOString().substring(0, 10);
}

/**
 * Format a wall-clock datetime as `YYYY-MM-DDTHH:MM:SS`
 */
export function formatDateTime(date: Date): string {
  return date.toISOString().substring(0, 19);
}

/**
 * Midnight of a calendar date
 */
export function startOfDate(date: string): Date {
  return new Date(`${date}T00:00:00.000Z`);
}

/**
 * Move a calendar date by a whole number of days
 *
 * @example
 * addDays("2023-12-31", 1)
 * // => "2024-01-01"
 */
export function addDays(date: string, days: number): string {
  return toDateString(new Date(startOfDate(date).getTime() + days * MS_PER_DAY));
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * MS_PER_MINUTE);
}

/**
 * Combine the calendar date of one value with the time of day of another.
 * Older rows stored the date and the time of day in separate fields.
 */
export function combineDateAndTime(date: string, time: Date): Date {
  const day = startOfDate(date);
  day.setUTCHours(time.getUTCHours(), time.getUTCMinutes(), time.getUTCSeconds(), 0);
  return day;
}

/**
 * Truncate a wall-clock datetime to the top of its hour
 */
export function truncateToHour(date: Date): Date {
  const hour = new Date(date.getTime());
  hour.setUTCMinutes(0, 0, 0);
  return hour;
}

/**
 * Day of week numbered 1 (Sunday) to 7 (Saturday), as the factor tables key it
 */
export function dayOfWeekFromSunday(date: string): number {
  return startOfDate(date).getUTCDay() + 1;
}

/**
 * Monday through Friday
 */
export function isWeekday(date: string): boolean {
  const day = startOfDate(date).getUTCDay();
  return day >= 1 && day <= 5;
}

/**
 * Today's calendar date in local time
 */
export function today(clock: () => Date = () => new Date()): string {
  const now = clock();
  return toDateString(
    wallClock(now.getFullYear(), now.getMonth() + 1, now.getDate()),
  );
}

/**
 * Format duration in milliseconds to human-readable string
 *
 * @example
 * formatDuration(5432)
 * // => "5.43s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}
