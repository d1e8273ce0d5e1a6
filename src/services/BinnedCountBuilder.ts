/**
 * Binned Count Builder
 *
 * Folds individual vehicles into fifteen-minute speed range and vehicle class rows.
 */

import type {
  Direction,
  FieldMetadata,
  IndividualVehicle,
  TimeBinnedSpeedRangeCount,
  TimeBinnedVehicleClassCount,
  TimeInterval,
} from '../types.js';
import { createLogger, formatDateTime, LOG_NAMESPACES } from '../utils/index.js';
import { SpeedRangeCount, VehicleClassCount } from './accumulators.js';
import { directionForLane } from './FieldMetadata.js';
import { binTime, createTimeBins } from './IntervalBinner.js';

const logger = createLogger(LOG_NAMESPACES.BINNER);

export interface SpeedAndClassCounts {
  speedRangeCounts: TimeBinnedSpeedRangeCount[];
  vehicleClassCounts: TimeBinnedVehicleClassCount[];
}

interface BinnedAccumulators {
  datetime: Date;
  lane: number;
  speed: SpeedRangeCount;
  vehicleClass: VehicleClassCount;
}

function binKey(datetime: Date, lane: number): string {
  return `${datetime.getTime()}|${lane}`;
}

/**
 * Bin vehicles by (bucket start, lane).
 *
 * Every bucket between the first and last vehicle gets a row for each lane, zero-valued
 * when nothing was counted. The first and last bucket of each lane are then dropped, as
 * they only cover part of their period.
 */
export function createSpeedAndClassCount(
  metadata: FieldMetadata,
  vehicles: readonly IndividualVehicle[],
  interval: TimeInterval = 15,
): SpeedAndClassCounts {
  const bins = new Map<string, BinnedAccumulators>();
  const lanes = new Map<number, Direction>();
  let first: Date | null = null;
  let last: Date | null = null;

  for (const vehicle of vehicles) {
    const direction = directionForLane(metadata.directions, vehicle.lane);
    if (!direction) {
      logger.error(`Unable to determine direction of lane ${vehicle.lane} for ${metadata.recordnum}`);
      continue;
    }
    lanes.set(vehicle.lane, direction);

    if (!first || vehicle.datetime < first) {
      first = vehicle.datetime;
    }
    if (!last || vehicle.datetime > last) {
      last = vehicle.datetime;
    }

    const datetime = binTime(vehicle.datetime, interval);
    const key = binKey(datetime, vehicle.lane);
    let bin = bins.get(key);
    if (!bin) {
      bin = {
        datetime,
        lane: vehicle.lane,
        speed: new SpeedRangeCount(metadata.recordnum, direction),
        vehicleClass: new VehicleClassCount(metadata.recordnum, direction),
      };
      bins.set(key, bin);
    }
    bin.speed.insert(vehicle.speed);
    bin.vehicleClass.insert(vehicle.vehicleClass);
  }

  if (!first || !last) {
    return { speedRangeCounts: [], vehicleClassCounts: [] };
  }

  const periods = createTimeBins(first, last, interval);
  for (const datetime of periods) {
    for (const [lane, direction] of lanes) {
      const key = binKey(datetime, lane);
      if (!bins.has(key)) {
        bins.set(key, {
          datetime,
          lane,
          speed: new SpeedRangeCount(metadata.recordnum, direction),
          vehicleClass: new VehicleClassCount(metadata.recordnum, direction),
        });
      }
    }
  }

  const firstPeriod = periods[0].getTime();
  const lastPeriod = periods[periods.length - 1].getTime();
  const kept = [...bins.values()]
    .filter(({ datetime }) => datetime.getTime() !== firstPeriod && datetime.getTime() !== lastPeriod)
    .sort((a, b) => a.datetime.getTime() - b.datetime.getTime() || a.lane - b.lane);

  logger.debug(
    `Binned ${vehicles.length} vehicles into ${kept.length} rows from ${formatDateTime(periods[0])}`,
  );

  return {
    speedRangeCounts: kept.map(({ datetime, lane, speed }) => ({
      recordnum: metadata.recordnum,
      datetime,
      lane,
      direction: speed.direction,
      ...speed.tally(),
    })),
    vehicleClassCounts: kept.map(({ datetime, lane, vehicleClass }) => ({
      recordnum: metadata.recordnum,
      datetime,
      lane,
      direction: vehicleClass.direction,
      ...vehicleClass.tally(),
    })),
  };
}
