/**
 * Full-Day Window Detector
 *
 * Sensors rarely start or stop at midnight. Only calendar days with a complete set of
 * intervals can feed an annual average, so the partial first and last days are trimmed.
 */

import { BadIntervalCountError } from '../errors.js';
import type { CountTimestamp } from '../types.js';
import { addDays, combineDateAndTime, createLogger, isWeekday, LOG_NAMESPACES, toDateString } from '../utils/index.js';

const logger = createLogger(LOG_NAMESPACES.FULL_DAYS);

/** Minute of the last interval of the day, by number of rows on a full day */
const LAST_INTERVAL_MINUTE: ReadonlyMap<number, number> = new Map([
  [24, 0], // hourly, one direction
  [48, 0], // hourly, two directions
  [96, 45], // fifteen-minute, one direction
  [192, 45], // fifteen-minute, two directions
]);

/**
 * Dates with a complete set of intervals, in order.
 *
 * @param timestamps - rows of one record, ordered by date then time
 * @throws {BadIntervalCountError} if the first full day has neither an hourly nor a
 * fifteen-minute number of rows
 */
export function getFullDates(timestamps: readonly CountTimestamp[]): string[] {
  if (timestamps.length === 0) {
    return [];
  }

  const datetimes = timestamps.map(({ countdate, counttime }) => combineDateAndTime(countdate, counttime));
  const first = datetimes[0];
  const last = datetimes[datetimes.length - 1];

  let firstFullDate = toDateString(first);
  if (first.getUTCHours() !== 0) {
    firstFullDate = addDays(firstFullDate, 1);
  }

  const rowsOnFirstFullDate = datetimes.filter((dt) => toDateString(dt) === firstFullDate).length;
  const lastMinute = LAST_INTERVAL_MINUTE.get(rowsOnFirstFullDate);
  if (lastMinute === undefined) {
    throw new BadIntervalCountError(rowsOnFirstFullDate, firstFullDate);
  }

  let lastFullDate = toDateString(last);
  if (last.getUTCHours() !== 23 || last.getUTCMinutes() !== lastMinute) {
    lastFullDate = addDays(lastFullDate, -1);
  }

  const dates: string[] = [];
  for (let date = firstFullDate; date <= lastFullDate; date = addDays(date, 1)) {
    dates.push(date);
  }

  logger.debug(`Full dates ${firstFullDate}..${lastFullDate} (${dates.length})`);
  return dates;
}

/**
 * Date that represents a count: the first weekday after the first (partial) day.
 * Returns null when there is no such date.
 */
export function determineDate(dates: Iterable<string>): string | null {
  const unique = [...new Set(dates)].sort();
  return unique.slice(1).find(isWeekday) ?? null;
}
