/**
 * Field Metadata
 *
 * Technicians name each count file `technician-recordnum-directions-counterid-speedlimit`,
 * e.g. `rc-166905-ew-40972-35.txt`.
 */

import path from 'path';
import { BadDirectionError, InvalidFileNameError } from '../errors.js';
import { DIRECTIONS, type Direction, type Directions, type FieldMetadata } from '../types.js';

const DIRECTION_LETTERS: ReadonlyMap<string, Direction> = new Map<string, Direction>([
  ['n', 'north'],
  ['e', 'east'],
  ['s', 'south'],
  ['w', 'west'],
]);

const TWO_DIRECTION_CODES = new Set(['ns', 'sn', 'ew', 'we', 'nn', 'ss', 'ee', 'ww']);

/**
 * Parse the metadata out of a count file's name (any directory and extension are ignored).
 *
 * @throws {InvalidFileNameError} naming the part of the filename that is wrong
 */
export function parseFieldMetadata(filePath: string): FieldMetadata {
  const fileName = path.basename(filePath);
  const stem = path.parse(fileName).name;
  const parts = stem.split('-');

  if (parts.length < 5) {
    throw new InvalidFileNameError('TooFewParts', fileName);
  }
  if (parts.length > 5) {
    throw new InvalidFileNameError('TooManyParts', fileName);
  }

  const [technician, recordnumPart, directionsPart, counterId, speedLimitPart] = parts;

  if (technician === '' || /^[-+]?\d+$/.test(technician)) {
    throw new InvalidFileNameError('InvalidTech', fileName);
  }
  if (!/^\d+$/.test(recordnumPart)) {
    throw new InvalidFileNameError('InvalidRecordNum', fileName);
  }

  const directions = parseDirectionCode(directionsPart);
  if (!directions) {
    throw new InvalidFileNameError('InvalidDirections', fileName);
  }

  if (!/^[A-Za-z0-9]+$/.test(counterId)) {
    throw new InvalidFileNameError('InvalidCounterId', fileName);
  }

  let speedLimit: number | null = null;
  if (speedLimitPart !== 'na') {
    if (!/^\d+$/.test(speedLimitPart)) {
      throw new InvalidFileNameError('InvalidSpeedLimit', fileName);
    }
    speedLimit = Number(speedLimitPart);
  }

  return {
    technician,
    recordnum: Number(recordnumPart),
    directions,
    counterId,
    speedLimit,
  };
}

/**
 * Directions from a filename code: one letter, a two-letter pair, or three identical
 * letters for three lanes in the same direction.
 */
export function parseDirectionCode(code: string): Directions | null {
  const letters: Direction[] = [];
  for (const letter of code) {
    const direction = DIRECTION_LETTERS.get(letter);
    if (!direction) {
      return null;
    }
    letters.push(direction);
  }

  const [direction1, direction2, direction3] = letters;
  switch (code.length) {
    case 1:
      return { direction1, direction2: null, direction3: null };
    case 2:
      return TWO_DIRECTION_CODES.has(code) ? { direction1, direction2, direction3: null } : null;
    case 3:
      return direction1 === direction2 && direction2 === direction3
        ? { direction1, direction2, direction3 }
        : null;
    default:
      return null;
  }
}

/**
 * Direction of a counter lane (channel), or null when the filename did not give one
 */
export function directionForLane(directions: Directions, lane: number): Direction | null {
  switch (lane) {
    case 1:
      return directions.direction1;
    case 2:
      return directions.direction2;
    case 3:
      return directions.direction3;
    default:
      return null;
  }
}

/**
 * Parse a stored direction name (`north`, `East`, `w`, ...)
 *
 * @throws {BadDirectionError}
 */
export function parseDirection(value: string): Direction {
  const normalized = value.trim().toLowerCase();
  const direction = DIRECTIONS.find((name) => name === normalized) ?? DIRECTION_LETTERS.get(normalized);
  if (direction === undefined) {
    throw new BadDirectionError(value);
  }
  return direction;
}
