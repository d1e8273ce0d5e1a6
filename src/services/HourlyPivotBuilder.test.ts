import {
  createNonNormalAvgSpeedCount,
  createNonNormalVolCount,
  denormalizeVolCount,
  hourlyCounts,
  hourSlot,
} from './HourlyPivotBuilder.js';
import { DbError } from '../errors.js';
import { HOUR_SLOTS, type BinnedVolumeRow, type FieldMetadata, type IndividualVehicle } from '../types.js';
import { formatDateTime, wallClock } from '../utils/datetime.js';

const metadata: FieldMetadata = {
  technician: 'jd',
  recordnum: 165367,
  directions: { direction1: 'east', direction2: 'west', direction3: null },
  counterId: '31',
  speedLimit: null,
};

function vehicle(day: number, hour: number, minute: number, lane: number, speed: number): IndividualVehicle {
  return { datetime: wallClock(2023, 11, day, hour, minute), lane, vehicleClass: 'passengerCars', speed };
}

const vehicles: IndividualVehicle[] = [
  vehicle(6, 10, 5, 1, 40),
  vehicle(6, 9, 55, 1, 30),
  vehicle(6, 10, 40, 1, 50),
  vehicle(6, 10, 50, 2, 35),
  vehicle(6, 11, 15, 1, 20),
  vehicle(6, 23, 10, 1, 30),
  vehicle(7, 0, 30, 1, 44),
  vehicle(7, 1, 20, 2, 25),
];

function filledSlots(row: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(row).filter(([key, value]) => HOUR_SLOTS.some((slot) => slot === key) && value !== null),
  );
}

describe('hourSlot', () => {
  it('maps hours onto am/pm columns', () => {
    expect(hourSlot(0)).toBe('am12');
    expect(hourSlot(11)).toBe('am11');
    expect(hourSlot(12)).toBe('pm12');
    expect(hourSlot(13)).toBe('pm1');
    expect(hourSlot(23)).toBe('pm11');
  });

  it('rejects hours outside the day', () => {
    expect(() => hourSlot(24)).toThrow(RangeError);
  });
});

describe('createNonNormalVolCount', () => {
  const rows = createNonNormalVolCount(metadata, vehicles);

  it('emits one row per date, direction and lane, in key order', () => {
    expect(rows.map(({ date, direction, lane }) => [date, direction, lane])).toEqual([
      ['2023-11-06', 'east', 1],
      ['2023-11-06', 'west', 2],
      ['2023-11-07', 'east', 1],
    ]);
  });

  it('excludes the first and last hour of the count', () => {
    expect(rows[0].am9).toBeNull();
    expect(rows[2].am1).toBeNull();
  });

  it('counts vehicles per hour and in total', () => {
    expect(filledSlots(rows[0])).toEqual({ am10: 2, am11: 1, pm11: 1 });
    expect(rows[0].totalcount).toBe(4);
    expect(filledSlots(rows[1])).toEqual({ am10: 1 });
    expect(rows[1].totalcount).toBe(1);
    expect(filledSlots(rows[2])).toEqual({ am12: 1 });
    expect(rows[2].setflag).toBeNull();
  });

  it('returns nothing for no vehicles', () => {
    expect(createNonNormalVolCount(metadata, [])).toEqual([]);
  });
});

describe('createNonNormalAvgSpeedCount', () => {
  const rows = createNonNormalAvgSpeedCount(metadata, vehicles);

  it('averages speeds per hour and leaves empty hours null', () => {
    expect(rows).toHaveLength(3);
    expect(filledSlots(rows[0])).toEqual({ am10: 45, am11: 20, pm11: 30 });
    expect(filledSlots(rows[1])).toEqual({ am10: 35 });
    expect(filledSlots(rows[2])).toEqual({ am12: 44 });
    expect(rows[0].pm1).toBeNull();
  });
});

describe('denormalizeVolCount', () => {
  const stored: BinnedVolumeRow[] = [
    { countdate: '2023-11-06', counttime: wallClock(2023, 11, 6, 10, 0), lane: 1, direction: 'east', total: 5 },
    { countdate: '2023-11-06', counttime: wallClock(2023, 11, 6, 10, 15), lane: 1, direction: 'east', total: 7 },
    { countdate: '2023-11-06', counttime: wallClock(2023, 11, 6, 10, 30), lane: 2, direction: 'west', total: 3 },
    { countdate: '2023-11-06', counttime: wallClock(2023, 11, 6, 11, 45), lane: 1, direction: 'east', total: 4 },
    { countdate: '2023-11-07', counttime: wallClock(1899, 12, 30, 0, 15), lane: 1, direction: 'east', total: 6 },
  ];

  it('sums binned rows to the hour', () => {
    expect(
      hourlyCounts(165367, stored).map((count) => [formatDateTime(count.datetime), count.direction, count.count]),
    ).toEqual([
      ['2023-11-06T10:00:00', 'east', 12],
      ['2023-11-06T10:00:00', 'west', 3],
      ['2023-11-06T11:00:00', 'east', 4],
      ['2023-11-07T00:00:00', 'east', 6],
    ]);
  });

  it('pivots hourly sums with a running total', () => {
    const rows = denormalizeVolCount(165367, stored);
    expect(rows.map(({ date, direction, lane, totalcount }) => [date, direction, lane, totalcount])).toEqual([
      ['2023-11-06', 'east', 1, 16],
      ['2023-11-06', 'west', 2, 3],
      ['2023-11-07', 'east', 1, 6],
    ]);
    expect(filledSlots(rows[0])).toEqual({ am10: 12, am11: 4 });
    expect(filledSlots(rows[2])).toEqual({ am12: 6 });
  });

  it('rejects rows without a direction', () => {
    const undirected: BinnedVolumeRow[] = [{ ...stored[0], direction: null }];
    expect(() => denormalizeVolCount(165367, undirected)).toThrow(DbError);
  });
});
