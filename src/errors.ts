/**
 * Errors raised while processing a count.
 *
 * Every error carries a `kind` so callers can branch without `instanceof` chains.
 */

export type CountErrorKind =
  | 'BadIntervalCount'
  | 'InvalidMcd'
  | 'DbError'
  | 'BadVehicleClass'
  | 'BadDirection'
  | 'InvalidFileName';

export class CountError extends Error {
  constructor(
    message: string,
    public readonly kind: CountErrorKind,
  ) {
    super(message);
    this.name = 'CountError';
  }
}

/**
 * The rows on the first full day do not match an hourly or fifteen-minute count
 */
export class BadIntervalCountError extends CountError {
  constructor(
    public readonly rowsOnDay: number,
    public readonly date: string,
  ) {
    super(`unable to determine interval: ${rowsOnDay} rows on ${date}`, 'BadIntervalCount');
    this.name = 'BadIntervalCountError';
  }
}

/**
 * No seasonal factor columns for the region code
 */
export class InvalidMcdError extends CountError {
  constructor(public readonly mcd: string) {
    super(`no factor columns for mcd '${mcd}'`, 'InvalidMcd');
    this.name = 'InvalidMcdError';
  }
}

export class DbError extends CountError {
  constructor(message: string) {
    super(message, 'DbError');
    this.name = 'DbError';
  }
}

export class BadVehicleClassError extends CountError {
  constructor(public readonly code: number) {
    super(`no such vehicle class '${code}'`, 'BadVehicleClass');
    this.name = 'BadVehicleClassError';
  }
}

export class BadDirectionError extends CountError {
  constructor(public readonly value: string) {
    super(`unable to parse direction '${value}'`, 'BadDirection');
    this.name = 'BadDirectionError';
  }
}

export type FileNameProblem =
  | 'TooFewParts'
  | 'TooManyParts'
  | 'InvalidTech'
  | 'InvalidRecordNum'
  | 'InvalidDirections'
  | 'InvalidCounterId'
  | 'InvalidSpeedLimit';

export class InvalidFileNameError extends CountError {
  constructor(
    public readonly problem: FileNameProblem,
    public readonly fileName: string,
  ) {
    super(`the filename '${fileName}' is not to specification: ${problem}`, 'InvalidFileName');
    this.name = 'InvalidFileNameError';
  }
}

/**
 * Format an error message for logging and result summaries
 */
export function formatError(error: unknown): string {
  if (error instanceof CountError) {
    return `${error.kind}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
