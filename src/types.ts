/**
 * Type definitions for the traffic count engine
 *
 * Raw inputs, binned and pivoted rows, reference factors and processing results.
 */

// ============================================================================
// Directions & metadata
// ============================================================================

export const DIRECTIONS = ['north', 'east', 'south', 'west'] as const;

/**
 * Compass direction of a lane
 */
export type Direction = (typeof DIRECTIONS)[number];

/**
 * Direction of each counter channel. Channel 1 is always present.
 */
export interface Directions {
  direction1: Direction;
  direction2: Direction | null;
  direction3: Direction | null;
}

/**
 * Metadata encoded in an input filename
 * (`technician-recordnum-directions-counterid-speedlimit`)
 */
export interface FieldMetadata {
  technician: string;
  recordnum: number;
  directions: Directions;
  counterId: string;
  speedLimit: number | null;
}

// ============================================================================
// Count kinds
// ============================================================================

export const COUNT_KIND_NAMES = ['class', 'fifteen-minute-volume', 'bicycle', 'pedestrian'] as const;

export type CountKindName = (typeof COUNT_KIND_NAMES)[number];

/**
 * Kinds whose binned rows carry a single direction column
 */
export type VehicleKindName = Extract<CountKindName, 'class' | 'fifteen-minute-volume'>;

/**
 * Kinds whose binned rows carry in/out columns
 */
export type BikePedKindName = Extract<CountKindName, 'bicycle' | 'pedestrian'>;

// ============================================================================
// Raw inputs
// ============================================================================

export type TimeInterval = 15 | 60;

/**
 * FHWA vehicle classes 1-13, plus vehicles the counter could not classify
 */
export type VehicleClass =
  | 'motorcycles'
  | 'passengerCars'
  | 'otherFourTireSingleUnit'
  | 'buses'
  | 'twoAxleSixTireSingleUnits'
  | 'threeAxleSingleUnits'
  | 'fourOrMoreAxleSingleUnits'
  | 'fourOrFewerAxleSingleTrailers'
  | 'fiveAxleSingleTrailers'
  | 'sixOrMoreAxleSingleTrailers'
  | 'fiveOrFewerAxleMultiTrailers'
  | 'sixAxleMultiTrailers'
  | 'sevenOrMoreAxleMultiTrailers'
  | 'unclassified';

/**
 * One observed vehicle, prior to any binning
 */
export interface IndividualVehicle {
  datetime: Date;
  lane: number;
  vehicleClass: VehicleClass;
  speed: number;
}

/**
 * Pre-binned fifteen-minute motor vehicle volume
 */
export interface FifteenMinuteVehicle {
  datetime: Date;
  count: number;
  direction: Direction;
  lane: number;
}

/**
 * Pre-binned fifteen-minute bicycle or pedestrian volume with in/out columns
 */
export interface FifteenMinuteBikePed {
  datetime: Date;
  total: number;
  incount: number;
  outcount: number;
}

// ============================================================================
// Binned rows
// ============================================================================

export interface VehicleClassTally {
  c1: number;
  c2: number;
  c3: number;
  c4: number;
  c5: number;
  c6: number;
  c7: number;
  c8: number;
  c9: number;
  c10: number;
  c11: number;
  c12: number;
  c13: number;
  c15: number;
  total: number;
}

export interface SpeedRangeTally {
  s1: number;
  s2: number;
  s3: number;
  s4: number;
  s5: number;
  s6: number;
  s7: number;
  s8: number;
  s9: number;
  s10: number;
  s11: number;
  s12: number;
  s13: number;
  s14: number;
  total: number;
}

export interface TimeBinnedVehicleClassCount extends VehicleClassTally {
  recordnum: number;
  datetime: Date;
  lane: number;
  direction: Direction;
}

export interface TimeBinnedSpeedRangeCount extends SpeedRangeTally {
  recordnum: number;
  datetime: Date;
  lane: number;
  direction: Direction;
}

/**
 * Date and time of a stored binned row. Older rows kept the time of day in `counttime`
 * with a placeholder date, so only its time of day is meaningful.
 */
export interface CountTimestamp {
  countdate: string;
  counttime: Date;
}

/**
 * Volume of a stored binned row with a direction column
 */
export interface BinnedVolumeRow extends CountTimestamp {
  lane: number;
  direction: Direction | null;
  total: number;
}

/**
 * Stored binned bicycle/pedestrian row
 */
export interface BinnedBikePedRow extends CountTimestamp {
  total: number;
  incount: number;
  outcount: number;
}

// ============================================================================
// Pivoted (non-normalized) rows
// ============================================================================

export const HOUR_SLOTS = [
  'am12', 'am1', 'am2', 'am3', 'am4', 'am5', 'am6', 'am7', 'am8', 'am9', 'am10', 'am11',
  'pm12', 'pm1', 'pm2', 'pm3', 'pm4', 'pm5', 'pm6', 'pm7', 'pm8', 'pm9', 'pm10', 'pm11',
] as const;

export type HourSlot = (typeof HOUR_SLOTS)[number];

/**
 * One optional value per hour of the day; null when the hour has no data
 */
export type HourlySlots<T> = { [slot in HourSlot]: T | null };

/**
 * Volume aggregated to the top of the hour
 */
export interface HourlyCount {
  recordnum: number;
  datetime: Date;
  count: number;
  direction: Direction;
  lane: number;
}

/**
 * Identifies one pivoted hourly row
 */
export interface NonNormalCountKey {
  recordnum: number;
  date: string;
  direction: Direction;
  lane: number;
}

export interface NonNormalVolCount extends NonNormalCountKey, HourlySlots<number> {
  setflag: number | null;
  totalcount: number | null;
}

export interface NonNormalAvgSpeedCount extends NonNormalCountKey, HourlySlots<number> {}

// ============================================================================
// Header & reference tables
// ============================================================================

/**
 * Count header, one per recordnum
 */
export interface CountHeader {
  recordnum: number;
  countKind: CountKindName;
  /** Municipality code; the first two digits are the state code */
  mcd: string | null;
  /** Road functional classification */
  fc: number | null;
  countType: string | null;
  bikePedGroup: string | null;
  indir: Direction | null;
  outdir: Direction | null;
  aadv: number | null;
  representativeDate: string | null;
  importDataDate: string | null;
  status: string | null;
  counterId: string | null;
  speedLimit: number | null;
}

export interface SeasonalFactorRow {
  fc: number;
  year: number;
  month: number;
  dayOfWeek: number;
  paFactor: number;
  paAxle: number;
  njFactor: number;
  njAxle: number;
}

// ============================================================================
// Results
// ============================================================================

export interface AadvEntry {
  recordnum: number;
  direction: Direction | null;
  aadv: number;
  dateCalculated: string;
}

export type ImportLogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface ImportLogEntry {
  recordnum: number;
  datetime: string;
  level: ImportLogLevel;
  message: string;
}

/**
 * Result of processing a single import file
 */
export interface ImportResult {
  fileName: string;
  recordnum: number | null;
  success: boolean;
  rowsWritten: number;
  aadv: number | null;
  /** Steps after the rows were stored that failed without failing the import */
  problems: string[];
  error?: string;
}

/**
 * Summary of a whole batch
 */
export interface ImportSummary {
  totalFiles: number;
  successfulFiles: number;
  failedFiles: number;
  results: ImportResult[];
  startTime: string;
  endTime: string;
}
