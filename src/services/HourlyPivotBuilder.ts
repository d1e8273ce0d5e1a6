/**
 * Hourly Pivot Builder
 *
 * Pivots counts into one row per (record, date, direction, lane) with a column per hour
 * of the day. Counts rarely run midnight to midnight, so an hour without data is null
 * rather than zero.
 */

import { DbError } from '../errors.js';
import {
  HOUR_SLOTS,
  type BinnedVolumeRow,
  type FieldMetadata,
  type HourlyCount,
  type HourlySlots,
  type HourSlot,
  type IndividualVehicle,
  type NonNormalAvgSpeedCount,
  type NonNormalCountKey,
  type NonNormalVolCount,
} from '../types.js';
import {
  combineDateAndTime,
  createLogger,
  LOG_NAMESPACES,
  toDateString,
  truncateToHour,
} from '../utils/index.js';
import { directionForLane } from './FieldMetadata.js';

const logger = createLogger(LOG_NAMESPACES.PIVOT);

/**
 * Column for an hour of the day: 0 → am12, 13 → pm1, 23 → pm11
 */
export function hourSlot(hour: number): HourSlot {
  const slot = HOUR_SLOTS[hour];
  if (slot === undefined) {
    throw new RangeError(`hour out of range: ${hour}`);
  }
  return slot;
}

function emptySlots<T>(): HourlySlots<T> {
  return {
    am12: null, am1: null, am2: null, am3: null, am4: null, am5: null,
    am6: null, am7: null, am8: null, am9: null, am10: null, am11: null,
    pm12: null, pm1: null, pm2: null, pm3: null, pm4: null, pm5: null,
    pm6: null, pm7: null, pm8: null, pm9: null, pm10: null, pm11: null,
  };
}

function keyString({ recordnum, date, direction, lane }: NonNormalCountKey): string {
  return `${recordnum}|${date}|${direction}|${lane}`;
}

function compareKeys(a: NonNormalCountKey, b: NonNormalCountKey): number {
  return (
    a.recordnum - b.recordnum ||
    a.date.localeCompare(b.date) ||
    a.lane - b.lane ||
    a.direction.localeCompare(b.direction)
  );
}

/**
 * Vehicles outside the first and last hour of the count, each paired with its row key.
 * The edge hours are unlikely to be complete.
 */
function keyedInnerHours(
  metadata: FieldMetadata,
  vehicles: readonly IndividualVehicle[],
): Array<{ key: NonNormalCountKey; hour: number; vehicle: IndividualVehicle }> {
  if (vehicles.length === 0) {
    return [];
  }

  let first = vehicles[0].datetime;
  let last = vehicles[0].datetime;
  for (const { datetime } of vehicles) {
    if (datetime < first) first = datetime;
    if (datetime > last) last = datetime;
  }
  const firstHour = truncateToHour(first).getTime();
  const lastHour = truncateToHour(last).getTime();

  const keyed: Array<{ key: NonNormalCountKey; hour: number; vehicle: IndividualVehicle }> = [];
  for (const vehicle of vehicles) {
    const hour = truncateToHour(vehicle.datetime).getTime();
    if (hour === firstHour || hour === lastHour) {
      continue;
    }

    const direction = directionForLane(metadata.directions, vehicle.lane);
    if (!direction) {
      logger.error(`Unable to determine direction of lane ${vehicle.lane} for ${metadata.recordnum}`);
      continue;
    }

    keyed.push({
      key: {
        recordnum: metadata.recordnum,
        date: toDateString(vehicle.datetime),
        direction,
        lane: vehicle.lane,
      },
      hour: vehicle.datetime.getUTCHours(),
      vehicle,
    });
  }
  return keyed;
}

/**
 * Hourly volume rows from individual vehicles
 */
export function createNonNormalVolCount(
  metadata: FieldMetadata,
  vehicles: readonly IndividualVehicle[],
): NonNormalVolCount[] {
  const rows = new Map<string, NonNormalVolCount>();

  for (const { key, hour } of keyedInnerHours(metadata, vehicles)) {
    const id = keyString(key);
    let row = rows.get(id);
    if (!row) {
      row = { ...key, setflag: null, totalcount: 0, ...emptySlots<number>() };
      rows.set(id, row);
    }
    const slot = hourSlot(hour);
    row.totalcount = (row.totalcount ?? 0) + 1;
    row[slot] = (row[slot] ?? 0) + 1;
  }

  return [...rows.values()].sort(compareKeys);
}

/**
 * Hourly average speed rows from individual vehicles
 */
export function createNonNormalAvgSpeedCount(
  metadata: FieldMetadata,
  vehicles: readonly IndividualVehicle[],
): NonNormalAvgSpeedCount[] {
  const speeds = new Map<string, { key: NonNormalCountKey; byHour: Map<HourSlot, number[]> }>();

  for (const { key, hour, vehicle } of keyedInnerHours(metadata, vehicles)) {
    const id = keyString(key);
    let entry = speeds.get(id);
    if (!entry) {
      entry = { key, byHour: new Map() };
      speeds.set(id, entry);
    }
    const slot = hourSlot(hour);
    const list = entry.byHour.get(slot) ?? [];
    list.push(vehicle.speed);
    entry.byHour.set(slot, list);
  }

  return [...speeds.values()]
    .map(({ key, byHour }) => {
      const row: NonNormalAvgSpeedCount = { ...key, ...emptySlots<number>() };
      for (const [slot, list] of byHour) {
        row[slot] = list.reduce((sum, speed) => sum + speed, 0) / list.length;
      }
      return row;
    })
    .sort(compareKeys);
}

/**
 * Sum stored binned volumes to the top of each hour, per direction and lane
 *
 * @throws {DbError} if a row has no direction
 */
export function hourlyCounts(recordnum: number, rows: readonly BinnedVolumeRow[]): HourlyCount[] {
  const hours = new Map<string, HourlyCount>();

  for (const row of rows) {
    if (row.direction === null) {
      throw new DbError(`NULL direction in binned counts for ${recordnum}`);
    }
    const datetime = truncateToHour(combineDateAndTime(row.countdate, row.counttime));
    const id = `${datetime.getTime()}|${row.direction}|${row.lane}`;
    const hour = hours.get(id);
    if (hour) {
      hour.count += row.total;
    } else {
      hours.set(id, { recordnum, datetime, count: row.total, direction: row.direction, lane: row.lane });
    }
  }

  return [...hours.values()].sort((a, b) => a.datetime.getTime() - b.datetime.getTime());
}

/**
 * Hourly volume rows from stored binned volumes
 */
export function denormalizeVolCount(recordnum: number, rows: readonly BinnedVolumeRow[]): NonNormalVolCount[] {
  const pivoted = new Map<string, NonNormalVolCount>();

  for (const count of hourlyCounts(recordnum, rows)) {
    const key: NonNormalCountKey = {
      recordnum: count.recordnum,
      date: toDateString(count.datetime),
      direction: count.direction,
      lane: count.lane,
    };
    const id = keyString(key);
    let row = pivoted.get(id);
    if (!row) {
      row = { ...key, setflag: null, totalcount: 0, ...emptySlots<number>() };
      pivoted.set(id, row);
    }
    row.totalcount = (row.totalcount ?? 0) + count.count;
    row[hourSlot(count.datetime.getUTCHours())] = count.count;
  }

  logger.debug(`Denormalized ${rows.length} binned rows of ${recordnum} into ${pivoted.size} rows`);
  return [...pivoted.values()].sort(compareKeys);
}
