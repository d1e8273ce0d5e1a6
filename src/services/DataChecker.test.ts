import {
  bikePedHourlyVolumes,
  checkBikeDirProportion,
  checkExcessiveBicycles,
  checkShareClass2,
  checkShareUnclassed,
  checkVehicleDirProportion,
  checkZeroHours,
  DataChecker,
  vehicleHourlyVolumes,
  type HourlyVolume,
} from './DataChecker.js';
import { MemoryCountStore } from '../testing/MemoryCountStore.js';
import type { BinnedBikePedRow, Direction, NonNormalVolCount, VehicleClassTally } from '../types.js';
import { wallClock } from '../utils/datetime.js';

function tally(c2: number, c15: number, total: number): VehicleClassTally {
  return { c1: 0, c2, c3: 0, c4: 0, c5: 0, c6: 0, c7: 0, c8: 0, c9: 0, c10: 0, c11: 0, c12: 0, c13: 0, c15, total };
}

function volCount(direction: Direction, lane: number, totalcount: number): NonNormalVolCount {
  return {
    recordnum: 1,
    date: '2023-11-07',
    direction,
    lane,
    am12: null, am1: null, am2: null, am3: null, am4: null, am5: null,
    am6: null, am7: null, am8: null, am9: null, am10: null, am11: null,
    pm12: null, pm1: null, pm2: null, pm3: null, pm4: null, pm5: null,
    pm6: null, pm7: null, pm8: null, pm9: null, pm10: null, pm11: null,
    setflag: null,
    totalcount,
  };
}

function bikeRow(hour: number, minute: number, incount: number, outcount: number): BinnedBikePedRow {
  return {
    countdate: '2023-11-22',
    counttime: wallClock(2023, 11, 22, hour, minute),
    total: incount + outcount,
    incount,
    outcount,
  };
}

function hours(direction: string, volumes: number[], firstHour = 4): HourlyVolume[] {
  return volumes.map((volume, i) => ({ direction, hour: wallClock(2023, 11, 7, firstHour + i), volume }));
}

describe('class share checks', () => {
  it('warns when class 2 vehicles are under three quarters of the total', () => {
    expect(checkShareClass2([tally(40, 0, 60), tally(30, 0, 40)])).toEqual({
      level: 'warn',
      message: 'Class 2 vehicles are less than 75% (70.0%) of total.',
    });
    expect(checkShareClass2([tally(80, 0, 100)]).level).toBe('info');
  });

  it('warns when more than a tenth of vehicles are unclassified', () => {
    expect(checkShareUnclassed([tally(80, 12, 100)])).toEqual({
      level: 'warn',
      message: 'Unclassed vehicles are greater than 10% (12.0%) of total.',
    });
    expect(checkShareUnclassed([tally(80, 10, 100)]).level).toBe('info');
  });

  it('treats an empty count as nothing to check', () => {
    expect(checkShareClass2([]).message).toBe('Count is empty');
  });
});

describe('checkVehicleDirProportion', () => {
  it('warns when one direction has under 40% of the volume', () => {
    expect(checkVehicleDirProportion([volCount('east', 1, 20), volCount('east', 1, 10), volCount('west', 2, 70)])).toEqual({
      level: 'warn',
      message:
        'Abnormal direction proportions: east has 30.0% of total, west has 70.0%. ' +
        '(Expectation is that proportions are no less/more than 40%/60%.)',
    });
  });

  it('accepts balanced directions', () => {
    expect(checkVehicleDirProportion([volCount('east', 1, 45), volCount('west', 2, 55)]).level).toBe('info');
  });

  it('skips counts of one direction', () => {
    expect(checkVehicleDirProportion([volCount('north', 1, 10)]).message).toBe(
      'Skipping disproportional directionality check - count only one direction.',
    );
  });
});

describe('checkBikeDirProportion', () => {
  it('names the smaller direction first', () => {
    expect(checkBikeDirProportion([bikeRow(8, 0, 30, 5), bikeRow(8, 15, 5, 10)], 'east', 'west')).toEqual({
      level: 'warn',
      message:
        'Abnormal direction proportions: west has 30.0% of total, east has 70.0%. ' +
        '(Expectation is that proportions are no less/more than 40%/60%.)',
    });
  });

  it('skips counts without both directions', () => {
    expect(checkBikeDirProportion([bikeRow(8, 0, 30, 5)], 'east', null).level).toBe('info');
  });
});

describe('checkZeroHours', () => {
  it('warns on two zero hours in a row during the day', () => {
    expect(checkZeroHours(hours('east', [5, 0, 0, 3]))).toEqual({
      level: 'warn',
      message: 'Consecutive periods between the hours of 4:00 and 22:00 with zero volumes.',
    });
  });

  it('ignores zero hours at night', () => {
    expect(checkZeroHours(hours('east', [0, 0, 0, 4], 1)).level).toBe('info');
  });

  it('does not carry zero hours over to the next direction', () => {
    expect(checkZeroHours([...hours('east', [3, 0]), ...hours('west', [0, 3])]).level).toBe('info');
  });
});

describe('hourly volumes', () => {
  it('sums binned rows per direction and hour', () => {
    const volumes = vehicleHourlyVolumes([
      { countdate: '2023-11-07', counttime: wallClock(2023, 11, 7, 4, 0), lane: 2, direction: 'west', total: 1 },
      { countdate: '2023-11-07', counttime: wallClock(2023, 11, 7, 4, 45), lane: 2, direction: 'west', total: 2 },
      { countdate: '2023-11-07', counttime: wallClock(2023, 11, 7, 4, 15), lane: 1, direction: 'east', total: 4 },
    ]);
    expect(volumes.map(({ direction, volume }) => [direction, volume])).toEqual([
      ['east', 4],
      ['west', 3],
    ]);
  });

  it('splits in/out rows into the header directions', () => {
    const volumes = bikePedHourlyVolumes([bikeRow(9, 0, 2, 1), bikeRow(9, 30, 3, 0)], 'north', 'south');
    expect(volumes.map(({ direction, volume }) => [direction, volume])).toEqual([
      ['north', 5],
      ['south', 1],
    ]);
  });
});

describe('checkExcessiveBicycles', () => {
  it('lists every period over the limit', () => {
    expect(checkExcessiveBicycles([bikeRow(8, 0, 25, 3), bikeRow(8, 15, 20, 21)], 'east', 'west')).toEqual({
      level: 'warn',
      message:
        'Found more than 20 bicycles counted in the following periods: ' +
        '2023-11-22 08:00:00: 25 (east); 2023-11-22 08:15:00: 21 (west)',
    });
  });

  it('accepts periods at the limit', () => {
    expect(checkExcessiveBicycles([bikeRow(8, 0, 20, 20)], 'east', 'west').level).toBe('info');
  });
});

describe('DataChecker', () => {
  it('logs the warnings of a bicycle count to its import log', async () => {
    const store = new MemoryCountStore();
    store.addHeader({ recordnum: 7, countKind: 'bicycle', indir: 'east', outdir: 'west' });
    await store.replaceBikePedCounts(7, 'bicycle', [
      { datetime: wallClock(2023, 11, 22, 2, 0), total: 30, incount: 25, outcount: 5 },
    ]);

    const checker = new DataChecker(store, () => new Date('2024-01-15T12:00:00.000Z'));
    const warnings = await checker.check(7);

    expect(warnings.map(({ message }) => message)).toEqual([
      'Abnormal direction proportions: west has 16.7% of total, east has 83.3%. ' +
        '(Expectation is that proportions are no less/more than 40%/60%.)',
      'Found more than 20 bicycles counted in the following periods: 2023-11-22 02:00:00: 25 (east)',
    ]);
    expect(await store.getImportLog(7)).toEqual(
      warnings.map(({ message }) => ({ recordnum: 7, datetime: '2024-01-15T12:00:00.000Z', level: 'warn', message })),
    );
  });

  it('runs no checks for pedestrian counts', async () => {
    const store = new MemoryCountStore();
    store.addHeader({ recordnum: 8, countKind: 'pedestrian' });
    expect(await new DataChecker(store).check(8)).toEqual([]);
  });

  it('fails for a record without a header', async () => {
    await expect(new DataChecker(new MemoryCountStore()).check(9)).rejects.toThrow('9 not found in tc_header table');
  });
});
