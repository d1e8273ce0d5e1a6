import { SpeedRangeCount, VehicleClassCount, speedBand, vehicleClassFromCode } from './accumulators.js';
import { BadVehicleClassError } from '../errors.js';

describe('vehicleClassFromCode', () => {
  it('maps FHWA codes to classes', () => {
    expect(vehicleClassFromCode(1)).toBe('motorcycles');
    expect(vehicleClassFromCode(2)).toBe('passengerCars');
    expect(vehicleClassFromCode(13)).toBe('sevenOrMoreAxleMultiTrailers');
  });

  it('treats 0, 14 and 15 as unclassified', () => {
    expect(vehicleClassFromCode(0)).toBe('unclassified');
    expect(vehicleClassFromCode(14)).toBe('unclassified');
    expect(vehicleClassFromCode(15)).toBe('unclassified');
  });

  it('rejects codes outside the range', () => {
    expect(() => vehicleClassFromCode(16)).toThrow(BadVehicleClassError);
    expect(() => vehicleClassFromCode(-1)).toThrow("no such vehicle class '-1'");
  });
});

describe('VehicleClassCount', () => {
  it('counts a classified vehicle once', () => {
    const count = new VehicleClassCount(166905, 'east');
    count.insert('buses');
    expect(count.c4).toBe(1);
    expect(count.total).toBe(1);
  });

  it('also counts an unclassified vehicle as class 2 without doubling the total', () => {
    const count = new VehicleClassCount(166905, 'east');
    count.insert('unclassified');
    expect(count.c2).toBe(1);
    expect(count.c15).toBe(1);
    expect(count.total).toBe(1);
  });

  it('returns a plain tally', () => {
    const count = new VehicleClassCount(166905, 'west');
    count.insert('passengerCars');
    count.insert('passengerCars');
    count.insert('motorcycles');
    expect(count.tally()).toEqual({
      c1: 1,
      c2: 2,
      c3: 0,
      c4: 0,
      c5: 0,
      c6: 0,
      c7: 0,
      c8: 0,
      c9: 0,
      c10: 0,
      c11: 0,
      c12: 0,
      c13: 0,
      c15: 0,
      total: 3,
    });
  });
});

describe('SpeedRangeCount', () => {
  it('puts non-positive and low speeds in the first band', () => {
    const count = new SpeedRangeCount(166905, 'north');
    for (const speed of [-0.0, 0.1, 15.0]) {
      count.insert(speed);
    }
    expect(count.s1).toBe(3);
    expect(count.total).toBe(3);
  });

  it('puts speeds above 75 in the last band', () => {
    const count = new SpeedRangeCount(166905, 'north');
    for (const speed of [75.1, 100.0, 120.0]) {
      count.insert(speed);
    }
    expect(count.s14).toBe(3);
    expect(count.total).toBe(3);
  });

  it('fills each band once across the whole range', () => {
    const count = new SpeedRangeCount(166905, 'south');
    const speeds = [0.0, -0.0, 0.1, 15.0, 15.1, 20.0, 20.1, 25.0, 25.1, 30.0, 30.1, 35.0, 35.1, 40.0];
    speeds.push(40.1, 45.0, 45.1, 50.0, 50.1, 55.0, 55.1, 60.0, 60.1, 65.0, 65.1, 70.0, 70.1, 75.0);
    speeds.push(75.1, 100.0, 120.0);
    for (const speed of speeds) {
      count.insert(speed);
    }
    const { total, ...bands } = count.tally();
    expect(bands).toEqual({
      s1: 4,
      s2: 2,
      s3: 2,
      s4: 2,
      s5: 2,
      s6: 2,
      s7: 2,
      s8: 2,
      s9: 2,
      s10: 2,
      s11: 2,
      s12: 2,
      s13: 2,
      s14: 3,
    });
    expect(total).toBe(31);
  });

  it('places values between tenths on the band boundaries', () => {
    expect(speedBand(15.05)).toBe('s2');
    expect(speedBand(75.05)).toBe('s14');
    expect(speedBand(-12)).toBe('s1');
  });
});
