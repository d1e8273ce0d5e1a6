/**
 * Count Kinds
 *
 * The fixed set of binned count kinds. Each one names where its rows are stored, how its
 * rows carry direction, and which factors weight its daily totals.
 */

import type { CountKindName, TimeInterval, VehicleKindName } from '../types.js';

export type BinnedTable = 'classCounts' | 'fifteenMinuteVolumes' | 'bicycleCounts' | 'pedestrianCounts';

/**
 * `column`: one row per direction with a direction field.
 * `in-out`: one row per period with in, out and total fields; the header says which
 * directions in and out are.
 */
export type DirectionShape = 'column' | 'in-out';

/**
 * `seasonal`: seasonal factor by functional class, year, month and day of week.
 * `bicycle`: bicycle factor by bike/ped group, year, month and day of week.
 * `pedestrian`: pedestrian factor by month.
 */
export type FactorSource = 'seasonal' | 'bicycle' | 'pedestrian';

export interface CountKind {
  name: CountKindName;
  table: BinnedTable;
  directionShape: DirectionShape;
  factorSource: FactorSource;
  /** Weight by the axle correction factor as well as the seasonal factor */
  axleFactor: boolean;
  interval: TimeInterval;
}

export const COUNT_KINDS = {
  class: {
    name: 'class',
    table: 'classCounts',
    directionShape: 'column',
    factorSource: 'seasonal',
    axleFactor: false,
    interval: 15,
  },
  'fifteen-minute-volume': {
    name: 'fifteen-minute-volume',
    table: 'fifteenMinuteVolumes',
    directionShape: 'column',
    factorSource: 'seasonal',
    axleFactor: true,
    interval: 15,
  },
  bicycle: {
    name: 'bicycle',
    table: 'bicycleCounts',
    directionShape: 'in-out',
    factorSource: 'bicycle',
    axleFactor: false,
    interval: 15,
  },
  pedestrian: {
    name: 'pedestrian',
    table: 'pedestrianCounts',
    directionShape: 'in-out',
    factorSource: 'pedestrian',
    axleFactor: false,
    interval: 15,
  },
} as const satisfies { [N in CountKindName]: CountKind & { name: N } };

/**
 * Kinds whose rows carry a direction column
 */
export function isVehicleKind(name: CountKindName): name is VehicleKindName {
  return COUNT_KINDS[name].directionShape === 'column';
}
