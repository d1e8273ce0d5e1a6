/**
 * Data Checker
 *
 * Post-import sanity checks. Failing checks never stop an import; they are logged and
 * written to the record's import log for someone to review.
 */

import { DbError } from '../errors.js';
import type { CountStore } from '../storage.js';
import type {
  BinnedBikePedRow,
  BinnedVolumeRow,
  Direction,
  ImportLogLevel,
  NonNormalVolCount,
  VehicleClassTally,
} from '../types.js';
import {
  combineDateAndTime,
  createRecordLogger,
  DATA_CHECKS,
  formatDateTime,
  LOG_NAMESPACES,
  truncateToHour,
} from '../utils/index.js';

export interface CheckResult {
  level: ImportLogLevel;
  message: string;
}

/**
 * Volume of one direction in one hour
 */
export interface HourlyVolume {
  direction: string;
  hour: Date;
  volume: number;
}

const LOWER_PERCENT = Math.round(DATA_CHECKS.DIR_PROPORTION_LOWER_BOUND * 100);
const UPPER_PERCENT = 100 - LOWER_PERCENT;

const EMPTY_COUNT: CheckResult = { level: 'info', message: 'Count is empty' };
const ONE_DIRECTION: CheckResult = {
  level: 'info',
  message: 'Skipping disproportional directionality check - count only one direction.',
};

function percent(part: number, whole: number): number {
  return (part / whole) * 100;
}

function sumOf<T>(rows: readonly T[], field: (row: T) => number): number {
  return rows.reduce((acc, row) => acc + field(row), 0);
}

function disproportion(smaller: [string, number], larger: [string, number]): CheckResult {
  const total = smaller[1] + larger[1];
  return {
    level: 'warn',
    message:
      `Abnormal direction proportions: ${smaller[0]} has ${percent(smaller[1], total).toFixed(1)}% of total, ` +
      `${larger[0]} has ${percent(larger[1], total).toFixed(1)}%. ` +
      `(Expectation is that proportions are no less/more than ${LOWER_PERCENT}%/${UPPER_PERCENT}%.)`,
  };
}

export function checkShareClass2(counts: readonly VehicleClassTally[]): CheckResult {
  const total = sumOf(counts, (count) => count.total);
  if (total === 0) {
    return EMPTY_COUNT;
  }
  const share = percent(sumOf(counts, (count) => count.c2), total);
  if (share < DATA_CHECKS.MIN_CLASS2_PERCENT) {
    return {
      level: 'warn',
      message: `Class 2 vehicles are less than ${DATA_CHECKS.MIN_CLASS2_PERCENT}% (${share.toFixed(1)}%) of total.`,
    };
  }
  return { level: 'info', message: 'Share of class 2 vehicles is within expectations' };
}

export function checkShareUnclassed(counts: readonly VehicleClassTally[]): CheckResult {
  const total = sumOf(counts, (count) => count.total);
  if (total === 0) {
    return EMPTY_COUNT;
  }
  const share = percent(sumOf(counts, (count) => count.c15), total);
  if (share > DATA_CHECKS.MAX_UNCLASSED_PERCENT) {
    return {
      level: 'warn',
      message: `Unclassed vehicles are greater than ${DATA_CHECKS.MAX_UNCLASSED_PERCENT}% (${share.toFixed(1)}%) of total.`,
    };
  }
  return { level: 'info', message: 'Share of unclassed vehicles is within expectations' };
}

/**
 * Compare the least and most counted directions of the hourly volume rows
 */
export function checkVehicleDirProportion(volCounts: readonly NonNormalVolCount[]): CheckResult {
  const byDirection = new Map<Direction, number>();
  for (const row of volCounts) {
    byDirection.set(row.direction, (byDirection.get(row.direction) ?? 0) + (row.totalcount ?? 0));
  }

  if (byDirection.size === 0) {
    return EMPTY_COUNT;
  }
  if (byDirection.size === 1) {
    return ONE_DIRECTION;
  }

  const entries = [...byDirection];
  let smaller = entries[0];
  let larger = entries[0];
  for (const entry of entries) {
    if (entry[1] < smaller[1]) {
      smaller = entry;
    }
    if (entry[1] > larger[1]) {
      larger = entry;
    }
  }

  const total = smaller[1] + larger[1];
  if (total > 0 && smaller[1] / total < DATA_CHECKS.DIR_PROPORTION_LOWER_BOUND) {
    return disproportion(smaller, larger);
  }
  return { level: 'info', message: 'Direction proportions is within expectations' };
}

export function checkBikeDirProportion(
  rows: readonly BinnedBikePedRow[],
  indir: Direction | null,
  outdir: Direction | null,
): CheckResult {
  if (!indir || !outdir || indir === outdir) {
    return ONE_DIRECTION;
  }

  const incount = sumOf(rows, (row) => row.incount);
  const outcount = sumOf(rows, (row) => row.outcount);
  const total = incount + outcount;
  if (total === 0) {
    return EMPTY_COUNT;
  }

  const bound = DATA_CHECKS.DIR_PROPORTION_LOWER_BOUND;
  if (incount / total < bound || outcount / total < bound) {
    const [smaller, larger]: Array<[string, number]> =
      incount <= outcount ? [[indir, incount], [outdir, outcount]] : [[outdir, outcount], [indir, incount]];
    return disproportion(smaller, larger);
  }
  return { level: 'info', message: 'Direction proportions is within expectations' };
}

/**
 * Hourly volumes per direction of rows with a direction column
 */
export function vehicleHourlyVolumes(rows: readonly BinnedVolumeRow[]): HourlyVolume[] {
  return hourlyVolumes(
    rows.map((row) => ({
      direction: row.direction ?? 'none',
      hour: truncateToHour(combineDateAndTime(row.countdate, row.counttime)),
      volume: row.total,
    })),
  );
}

/**
 * Hourly volumes of in/out rows, per direction when the header names both, otherwise of
 * the totals
 */
export function bikePedHourlyVolumes(
  rows: readonly BinnedBikePedRow[],
  indir: Direction | null,
  outdir: Direction | null,
): HourlyVolume[] {
  return hourlyVolumes(
    rows.flatMap((row): HourlyVolume[] => {
      const hour = truncateToHour(combineDateAndTime(row.countdate, row.counttime));
      if (!indir || !outdir) {
        return [{ direction: 'total', hour, volume: row.total }];
      }
      return [
        { direction: indir, hour, volume: row.incount },
        { direction: outdir, hour, volume: row.outcount },
      ];
    }),
  );
}

/**
 * Sum volumes per (direction, hour), ordered by direction then hour
 */
function hourlyVolumes(volumes: readonly HourlyVolume[]): HourlyVolume[] {
  const sums = new Map<string, HourlyVolume>();
  for (const { direction, hour, volume } of volumes) {
    const key = `${direction}|${hour.getTime()}`;
    const existing = sums.get(key);
    if (existing) {
      existing.volume += volume;
    } else {
      sums.set(key, { direction, hour, volume });
    }
  }
  return [...sums.values()].sort(
    (a, b) => a.direction.localeCompare(b.direction) || a.hour.getTime() - b.hour.getTime(),
  );
}

/**
 * Look for two or more consecutive zero-volume hours of one direction during the day
 */
export function checkZeroHours(volumes: readonly HourlyVolume[]): CheckResult {
  const { ZERO_HOUR_START: start, ZERO_HOUR_END: end } = DATA_CHECKS;
  let consecutive = 0;
  let direction: string | null = null;

  for (const entry of volumes) {
    const hour = entry.hour.getUTCHours();
    if (hour < start || hour > end) {
      continue;
    }
    if (entry.direction !== direction) {
      direction = entry.direction;
      consecutive = 0;
    }
    consecutive = entry.volume === 0 ? consecutive + 1 : 0;
    if (consecutive > 1) {
      return {
        level: 'warn',
        message: `Consecutive periods between the hours of ${start}:00 and ${end}:00 with zero volumes.`,
      };
    }
  }
  return { level: 'info', message: 'No counts with consecutive hourly periods of 0 volume counted.' };
}

export function checkExcessiveBicycles(
  rows: readonly BinnedBikePedRow[],
  indir: Direction | null,
  outdir: Direction | null,
): CheckResult {
  const periods: string[] = [];
  const max = DATA_CHECKS.BIKE_COUNT_MAX;

  for (const row of rows) {
    const datetime = formatDateTime(combineDateAndTime(row.countdate, row.counttime)).replace('T', ' ');
    const volumes: Array<[string, number]> =
      indir && outdir ? [[indir, row.incount], [outdir, row.outcount]] : [['total', row.total]];
    for (const [direction, volume] of volumes) {
      if (volume > max) {
        periods.push(`${datetime}: ${volume} (${direction})`);
      }
    }
  }

  if (periods.length === 0) {
    return { level: 'info', message: 'All counts under excessive threshold' };
  }
  return {
    level: 'warn',
    message: `Found more than ${max} bicycles counted in the following periods: ${periods.join('; ')}`,
  };
}

/**
 * Runs the checks that apply to a count's kind against stored rows
 */
export class DataChecker {
  constructor(
    private readonly store: CountStore,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  private async runChecks(recordnum: number): Promise<CheckResult[]> {
    const header = await this.store.getHeader(recordnum);
    if (!header) {
      throw new DbError(`${recordnum} not found in tc_header table`);
    }

    switch (header.countKind) {
      case 'class': {
        const classCounts = await this.store.getClassCounts(recordnum);
        return [
          checkShareUnclassed(classCounts),
          checkShareClass2(classCounts),
          checkVehicleDirProportion(await this.store.getNonNormalVolCounts(recordnum)),
          checkZeroHours(vehicleHourlyVolumes(await this.store.getBinnedVolumes(recordnum, 'class'))),
        ];
      }
      case 'fifteen-minute-volume':
        return [
          checkVehicleDirProportion(await this.store.getNonNormalVolCounts(recordnum)),
          checkZeroHours(
            vehicleHourlyVolumes(await this.store.getBinnedVolumes(recordnum, 'fifteen-minute-volume')),
          ),
        ];
      case 'bicycle': {
        const rows = await this.store.getBikePedCounts(recordnum, 'bicycle');
        const { indir, outdir } = header;
        return [
          checkBikeDirProportion(rows, indir, outdir),
          checkExcessiveBicycles(rows, indir, outdir),
          checkZeroHours(bikePedHourlyVolumes(rows, indir, outdir)),
        ];
      }
      case 'pedestrian':
        return [];
    }
  }

  /**
   * Run every check for a record. Warnings are logged and appended to its import log.
   *
   * @returns the warnings
   */
  async check(recordnum: number): Promise<CheckResult[]> {
    const logger = createRecordLogger(LOG_NAMESPACES.CHECKS, recordnum);
    const results = await this.runChecks(recordnum);

    const warnings = results.filter((result) => result.level === 'warn');
    for (const warning of warnings) {
      logger.warn(warning.message);
      await this.store.appendImportLog({
        recordnum,
        datetime: this.clock().toISOString(),
        level: warning.level,
        message: warning.message,
      });
    }

    results
      .filter((result) => result.level !== 'warn')
      .forEach((result) => logger.debug(result.message));
    return warnings;
  }
}
