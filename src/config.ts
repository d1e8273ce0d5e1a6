/**
 * Configuration
 *
 * Settings come from the environment (a `.env` file is loaded by the entry point).
 */

import { z } from 'zod';
import { DEFAULTS, ENV } from './utils/constants.js';
import { formatZodIssues } from './utils/validation.js';

export interface AppConfig {
  /** Root of the JSON count store */
  dataDir: string;
  /** Directory scanned for import files */
  inputDir: string;
  /** Delete import files once they are imported */
  cleanupFiles: boolean;
}

const configSchema = z.object({
  [ENV.DATA_DIR]: z.string().min(1).default(DEFAULTS.DATA_DIR),
  [ENV.INPUT_DIR]: z.string().min(1).default(DEFAULTS.INPUT_DIR),
  [ENV.CLEANUP_FILES]: z
    .enum(['true', 'false'], { errorMap: () => ({ message: "Expected 'true' or 'false'" }) })
    .default('false'),
});

/**
 * Read and validate configuration from environment variables
 *
 * @throws {Error} if a variable has an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${formatZodIssues(parsed.error)}`);
  }

  return {
    dataDir: parsed.data.DATA_DIR,
    inputDir: parsed.data.INPUT_DIR,
    cleanupFiles: parsed.data.CLEANUP_FILES === 'true',
  };
}
