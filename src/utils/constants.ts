/**
 * Application Constants
 *
 * Environment variable names, logger namespaces, file layout and data check thresholds.
 */

/**
 * Environment variable names
 */
export const ENV = {
  DATA_DIR: 'DATA_DIR',
  INPUT_DIR: 'INPUT_DIR',
  CLEANUP_FILES: 'CLEANUP_FILES',
  LOG_LEVEL: 'LOG_LEVEL',
  LOG_FORMAT: 'LOG_FORMAT',
} as const;

/**
 * Logger namespaces, one per component
 */
export const LOG_NAMESPACES = {
  BINNER: 'binner',
  FULL_DAYS: 'full-days',
  PIVOT: 'pivot',
  AADV: 'aadv',
  CHECKS: 'checks',
  STORAGE: 'storage',
  PROCESSOR: 'processor',
} as const;

/**
 * File system layout of the JSON count store
 */
export const FILESYSTEM = {
  ENCODING: 'utf-8',
  JSON_INDENT: 2,
  RECORDS_DIR: 'records',
  REFERENCE_FILE: 'reference.json',
  IMPORT_EXTENSION: '.json',
  TEMP_SUFFIX: '.tmp',
} as const;

/**
 * Defaults used when the environment leaves a setting out
 */
export const DEFAULTS = {
  DATA_DIR: './data',
  INPUT_DIR: './data/imports',
} as const;

/**
 * Thresholds for post-import data checks
 */
export const DATA_CHECKS = {
  MIN_CLASS2_PERCENT: 75,
  MAX_UNCLASSED_PERCENT: 10,
  DIR_PROPORTION_LOWER_BOUND: 0.4,
  BIKE_COUNT_MAX: 20,
  ZERO_HOUR_START: 4,
  ZERO_HOUR_END: 22,
} as const;
