/**
 * Interval Binner
 *
 * Maps timestamps onto fixed-width buckets and enumerates every bucket in a span.
 */

import type { TimeInterval } from '../types.js';
import { addMinutes } from '../utils/datetime.js';

/**
 * Start of the bucket containing `datetime`. Seconds are dropped and the minute snaps
 * down to a multiple of the interval.
 *
 * @example
 * binTime(wallClock(2023, 11, 7, 10, 29, 59), 15)
 * // => 2023-11-07T10:15:00
 */
export function binTime(datetime: Date, interval: TimeInterval): Date {
  const binned = new Date(datetime.getTime());
  const minute = binned.getUTCMinutes();
  binned.setUTCMinutes(minute - (minute % interval), 0, 0);
  return binned;
}

/**
 * Every bucket start from `binTime(first)` through `binTime(last)`, inclusive, including
 * buckets with no observations.
 */
export function createTimeBins(first: Date, last: Date, interval: TimeInterval): Date[] {
  const bins: Date[] = [];
  const end = binTime(last, interval).getTime();

  for (let bin = binTime(first, interval); bin.getTime() <= end; bin = addMinutes(bin, interval)) {
    bins.push(bin);
  }

  return bins;
}
