/**
 * Histogram Accumulators
 *
 * Running totals of vehicle class and speed range for one bucket.
 */

import { BadVehicleClassError } from '../errors.js';
import type { Direction, SpeedRangeTally, VehicleClass, VehicleClassTally } from '../types.js';

type ClassField = Exclude<keyof VehicleClassTally, 'total'>;
type SpeedField = Exclude<keyof SpeedRangeTally, 'total'>;

const CLASS_FIELDS: Record<VehicleClass, ClassField> = {
  motorcycles: 'c1',
  passengerCars: 'c2',
  otherFourTireSingleUnit: 'c3',
  buses: 'c4',
  twoAxleSixTireSingleUnits: 'c5',
  threeAxleSingleUnits: 'c6',
  fourOrMoreAxleSingleUnits: 'c7',
  fourOrFewerAxleSingleTrailers: 'c8',
  fiveAxleSingleTrailers: 'c9',
  sixOrMoreAxleSingleTrailers: 'c10',
  fiveOrFewerAxleMultiTrailers: 'c11',
  sixAxleMultiTrailers: 'c12',
  sevenOrMoreAxleMultiTrailers: 'c13',
  unclassified: 'c15',
};

const CLASSES_BY_CODE: readonly VehicleClass[] = [
  'motorcycles',
  'passengerCars',
  'otherFourTireSingleUnit',
  'buses',
  'twoAxleSixTireSingleUnits',
  'threeAxleSingleUnits',
  'fourOrMoreAxleSingleUnits',
  'fourOrFewerAxleSingleTrailers',
  'fiveAxleSingleTrailers',
  'sixOrMoreAxleSingleTrailers',
  'fiveOrFewerAxleMultiTrailers',
  'sixAxleMultiTrailers',
  'sevenOrMoreAxleMultiTrailers',
];

/** Upper bound (inclusive) of bands s1..s13; anything faster lands in s14 */
const SPEED_BAND_CEILINGS: ReadonlyArray<[number, SpeedField]> = [
  [15, 's1'],
  [20, 's2'],
  [25, 's3'],
  [30, 's4'],
  [35, 's5'],
  [40, 's6'],
  [45, 's7'],
  [50, 's8'],
  [55, 's9'],
  [60, 's10'],
  [65, 's11'],
  [70, 's12'],
  [75, 's13'],
];

/**
 * Vehicle class from the counter's numeric code.
 * Codes 1-13 are FHWA classes; 0, 14 and 15 are vehicles the counter could not classify.
 *
 * @throws {BadVehicleClassError} for any other code
 */
export function vehicleClassFromCode(code: number): VehicleClass {
  if (code === 0 || code === 14 || code === 15) {
    return 'unclassified';
  }
  const vehicleClass = Number.isInteger(code) ? CLASSES_BY_CODE[code - 1] : undefined;
  if (vehicleClass === undefined) {
    throw new BadVehicleClassError(code);
  }
  return vehicleClass;
}

/**
 * Speed range band for a speed in mph. Non-positive readings (including -0.0) fall in
 * the lowest band.
 */
export function speedBand(speed: number): SpeedField {
  const band = SPEED_BAND_CEILINGS.find(([ceiling]) => speed <= ceiling);
  return band ? band[1] : 's14';
}

export class VehicleClassCount implements VehicleClassTally {
  c1 = 0;
  c2 = 0;
  c3 = 0;
  c4 = 0;
  c5 = 0;
  c6 = 0;
  c7 = 0;
  c8 = 0;
  c9 = 0;
  c10 = 0;
  c11 = 0;
  c12 = 0;
  c13 = 0;
  c15 = 0;
  total = 0;

  constructor(
    public readonly recordnum: number,
    public readonly direction: Direction,
  ) {}

  /**
   * Count one vehicle. Unclassified vehicles are also counted as class 2, while the
   * total only goes up by one.
   */
  insert(vehicleClass: VehicleClass): void {
    this[CLASS_FIELDS[vehicleClass]] += 1;
    if (vehicleClass === 'unclassified') {
      this.c2 += 1;
    }
    this.total += 1;
  }

  tally(): VehicleClassTally {
    const { c1, c2, c3, c4, c5, c6, c7, c8, c9, c10, c11, c12, c13, c15, total } = this;
    return { c1, c2, c3, c4, c5, c6, c7, c8, c9, c10, c11, c12, c13, c15, total };
  }
}

export class SpeedRangeCount implements SpeedRangeTally {
  s1 = 0;
  s2 = 0;
  s3 = 0;
  s4 = 0;
  s5 = 0;
  s6 = 0;
  s7 = 0;
  s8 = 0;
  s9 = 0;
  s10 = 0;
  s11 = 0;
  s12 = 0;
  s13 = 0;
  s14 = 0;
  total = 0;

  constructor(
    public readonly recordnum: number,
    public readonly direction: Direction,
  ) {}

  insert(speed: number): void {
    this[speedBand(speed)] += 1;
    this.total += 1;
  }

  tally(): SpeedRangeTally {
    const { s1, s2, s3, s4, s5, s6, s7, s8, s9, s10, s11, s12, s13, s14, total } = this;
    return { s1, s2, s3, s4, s5, s6, s7, s8, s9, s10, s11, s12, s13, s14, total };
  }
}
