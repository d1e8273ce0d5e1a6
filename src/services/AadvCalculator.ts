/**
 * AADV Calculator
 *
 * Annual average daily volume of a count: full-day totals per direction, weighted by
 * seasonal, axle and equipment factors, then averaged over the days of the count.
 */

import { DbError, InvalidMcdError } from '../errors.js';
import type { CountStore } from '../storage.js';
import type {
  AadvEntry,
  BinnedBikePedRow,
  BinnedVolumeRow,
  CountHeader,
  CountKindName,
  Direction,
  SeasonalFactorRow,
} from '../types.js';
import { createLogger, dayOfWeekFromSunday, LOG_NAMESPACES, today } from '../utils/index.js';
import { COUNT_KINDS, isVehicleKind } from './CountKinds.js';
import { getFullDates } from './FullDayDetector.js';

const logger = createLogger(LOG_NAMESPACES.AADV);

/**
 * Total of one full day. A null direction is the total of the day over all directions.
 */
export interface DayTotal {
  date: string;
  direction: Direction | null;
  total: number;
}

export type AadvByDirection = Map<Direction | null, number>;

interface SeasonalColumns {
  factor: keyof Pick<SeasonalFactorRow, 'paFactor' | 'njFactor'>;
  axle: keyof Pick<SeasonalFactorRow, 'paAxle' | 'njAxle'>;
}

/** Factor columns by state code, the first two digits of the mcd */
const SEASONAL_COLUMNS = new Map<string, SeasonalColumns>([
  ['42', { factor: 'paFactor', axle: 'paAxle' }],
  ['34', { factor: 'njFactor', axle: 'njAxle' }],
]);

/**
 * @throws {InvalidMcdError} if the region has no factor columns
 */
function seasonalColumns(mcd: string | null): SeasonalColumns {
  const columns = SEASONAL_COLUMNS.get((mcd ?? '').substring(0, 2));
  if (!columns) {
    throw new InvalidMcdError(mcd ?? '');
  }
  return columns;
}

function dayKey(date: string, direction: Direction | null): string {
  return `${date}|${direction ?? ''}`;
}

function compareDayTotals(a: DayTotal, b: DayTotal): number {
  return a.date.localeCompare(b.date) || (a.direction ?? '').localeCompare(b.direction ?? '');
}

/**
 * Sum rows with a direction column per (date, direction) on full dates. Every row also
 * adds to the overall total of its date.
 */
export function totalsByDate(rows: readonly BinnedVolumeRow[], fullDates: readonly string[]): DayTotal[] {
  const dates = new Set(fullDates);
  const totals = new Map<string, DayTotal>();

  const add = (date: string, direction: Direction | null, count: number): void => {
    const key = dayKey(date, direction);
    const existing = totals.get(key);
    if (existing) {
      existing.total += count;
    } else {
      totals.set(key, { date, direction, total: count });
    }
  };

  for (const row of rows) {
    if (!dates.has(row.countdate)) {
      continue;
    }
    if (row.direction) {
      add(row.countdate, row.direction, row.total);
    }
    add(row.countdate, null, row.total);
  }

  return [...totals.values()].sort(compareDayTotals);
}

/**
 * Sum in/out rows per date on full dates: incount goes to `indir`, outcount to `outdir`
 * and total to the overall total.
 */
export function bikePedTotalsByDate(
  rows: readonly BinnedBikePedRow[],
  fullDates: readonly string[],
  indir: Direction,
  outdir: Direction,
): DayTotal[] {
  const dates = new Set(fullDates);
  const sums = new Map<string, { total: number; incount: number; outcount: number }>();

  for (const row of rows) {
    if (!dates.has(row.countdate)) {
      continue;
    }
    const sum = sums.get(row.countdate) ?? { total: 0, incount: 0, outcount: 0 };
    sum.total += row.total;
    sum.incount += row.incount;
    sum.outcount += row.outcount;
    sums.set(row.countdate, sum);
  }

  const totals = new Map<string, DayTotal>();
  for (const [date, sum] of sums) {
    totals.set(dayKey(date, indir), { date, direction: indir, total: sum.incount });
    totals.set(dayKey(date, outdir), { date, direction: outdir, total: sum.outcount });
    totals.set(dayKey(date, null), { date, direction: null, total: sum.total });
  }

  return [...totals.values()].sort(compareDayTotals);
}

/**
 * Average weighted day totals per direction key.
 *
 * The divisor is the whole number of entries per distinct direction key, so every key is
 * averaged over the same number of days.
 */
export function averageWeighted(weighted: readonly DayTotal[]): AadvByDirection {
  const directions = new Set(weighted.map(({ direction }) => direction));
  const aadv: AadvByDirection = new Map();
  if (directions.size === 0) {
    return aadv;
  }

  const divisor = Math.floor(weighted.length / directions.size);
  for (const direction of directions) {
    const sum = weighted
      .filter((day) => day.direction === direction)
      .reduce((acc, day) => acc + day.total, 0);
    aadv.set(direction, Math.round(sum / divisor));
  }
  return aadv;
}

/**
 * Calculates and stores AADVs through a `CountStore`
 */
export class AadvCalculator {
  constructor(
    private readonly store: CountStore,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  private async requireHeader(recordnum: number): Promise<CountHeader> {
    const header = await this.store.getHeader(recordnum);
    if (!header) {
      throw new DbError(`${recordnum} not found in tc_header table`);
    }
    return header;
  }

  /**
   * Full-day totals of a count, without excluded days
   *
   * @throws {BadIntervalCountError} if the count is neither hourly nor fifteen-minute
   * @throws {DbError} if an in/out count has no in or out direction on its header
   */
  async dayTotals(header: CountHeader, kind: CountKindName = header.countKind): Promise<DayTotal[]> {
    let totals: DayTotal[];

    if (isVehicleKind(kind)) {
      const rows = await this.store.getBinnedVolumes(header.recordnum, kind);
      totals = totalsByDate(rows, getFullDates(rows));
    } else {
      const { indir, outdir } = header;
      if (!indir || !outdir) {
        throw new DbError(
          `NULL value for 'indir' or 'outdir' field in tc_header table for ${header.recordnum}`,
        );
      }
      const rows = await this.store.getBikePedCounts(header.recordnum, kind);
      totals = bikePedTotalsByDate(rows, getFullDates(rows), indir, outdir);
    }

    const excluded = new Set(await this.store.getExcludedDays());
    return totals.filter((day) => !excluded.has(day.date));
  }

  /**
   * Weighting factor of one date, equipment factor excluded
   */
  private async dayFactor(header: CountHeader, kind: CountKindName, date: string): Promise<number> {
    const year = Number(date.substring(0, 4));
    const month = Number(date.substring(5, 7));
    const dayOfWeek = dayOfWeekFromSunday(date);

    switch (COUNT_KINDS[kind].factorSource) {
      case 'seasonal': {
        const columns = seasonalColumns(header.mcd);
        const { fc } = header;
        if (fc === null) {
          throw new DbError(`NULL value for 'fc' field in tc_header table for ${header.recordnum}`);
        }
        const row = await this.store.getSeasonalFactor(fc, year, month, dayOfWeek);
        if (!row) {
          throw new DbError(`no seasonal factor for fc ${fc} on ${date}`);
        }
        return COUNT_KINDS[kind].axleFactor ? row[columns.factor] * row[columns.axle] : row[columns.factor];
      }
      case 'bicycle': {
        const group = header.bikePedGroup;
        if (group === null) {
          throw new DbError(`NULL value for 'bikepedgroup' field in tc_header table for ${header.recordnum}`);
        }
        const factor = await this.store.getBicycleFactor(group, year, month, dayOfWeek);
        if (factor === null) {
          throw new DbError(`no bicycle factor for group '${group}' on ${date}`);
        }
        return factor;
      }
      case 'pedestrian': {
        const factor = await this.store.getPedestrianFactor(month);
        if (factor === null) {
          throw new DbError(`no pedestrian factor for month ${month}`);
        }
        return factor;
      }
    }
  }

  /**
   * AADV of a count per direction, with the overall value under a null key.
   * Empty when the count has no full days left to average.
   *
   * @throws {DbError} if the header or a factor is missing
   * @throws {InvalidMcdError} if no factor columns exist for the header's region
   */
  async calculate(recordnum: number, kind?: CountKindName): Promise<AadvByDirection> {
    const header = await this.requireHeader(recordnum);
    const countKind = kind ?? header.countKind;

    if (COUNT_KINDS[countKind].factorSource === 'seasonal') {
      seasonalColumns(header.mcd);
    }

    const days = await this.dayTotals(header, countKind);
    const equipmentFactor = header.countType === null ? null : await this.store.getEquipmentFactor(header.countType);

    const factors = new Map<string, number>();
    const weighted: DayTotal[] = [];
    for (const day of days) {
      let factor = factors.get(day.date);
      if (factor === undefined) {
        factor = await this.dayFactor(header, countKind, day.date);
        factors.set(day.date, factor);
      }
      const value = day.total * factor;
      weighted.push({ ...day, total: equipmentFactor === null ? value : value * equipmentFactor });
    }

    const aadv = averageWeighted(weighted);
    logger.debug(`AADV of ${recordnum} from ${days.length} day total(s)`, { aadv: Object.fromEntries(aadv) });
    return aadv;
  }

  /**
   * Calculate the AADV of a count and replace anything stored for it today
   */
  async insertAadv(recordnum: number, kind?: CountKindName): Promise<AadvByDirection> {
    const aadv = await this.calculate(recordnum, kind);
    const dateCalculated = today(this.clock);

    if (aadv.size === 0) {
      logger.warn(`No full days to calculate AADV for ${recordnum}`);
      return aadv;
    }

    const entries: AadvEntry[] = [...aadv]
      .map(([direction, value]) => ({ recordnum, direction, aadv: value, dateCalculated }))
      .sort((a, b) => (a.direction ?? '').localeCompare(b.direction ?? ''));

    await this.store.replaceAadv(recordnum, dateCalculated, entries);
    logger.info(`AADV of ${recordnum}: ${aadv.get(null) ?? 'n/a'}`);
    return aadv;
  }
}
