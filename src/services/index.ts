/**
 * Services Index
 *
 * Central export point for all service modules.
 */

export { FileService } from './FileService.js';
export { binTime, createTimeBins } from './IntervalBinner.js';
export { determineDate, getFullDates } from './FullDayDetector.js';
export { SpeedRangeCount, VehicleClassCount, speedBand, vehicleClassFromCode } from './accumulators.js';
export { createSpeedAndClassCount } from './BinnedCountBuilder.js';
export type { SpeedAndClassCounts } from './BinnedCountBuilder.js';
export {
  createNonNormalAvgSpeedCount,
  createNonNormalVolCount,
  denormalizeVolCount,
  hourlyCounts,
  hourSlot,
} from './HourlyPivotBuilder.js';
export { directionForLane, parseDirection, parseDirectionCode, parseFieldMetadata } from './FieldMetadata.js';
export { COUNT_KINDS, isVehicleKind } from './CountKinds.js';
export type { CountKind } from './CountKinds.js';
export { AadvCalculator, averageWeighted, bikePedTotalsByDate, totalsByDate } from './AadvCalculator.js';
export type { AadvByDirection, DayTotal } from './AadvCalculator.js';
export { DataChecker } from './DataChecker.js';
export type { CheckResult } from './DataChecker.js';
