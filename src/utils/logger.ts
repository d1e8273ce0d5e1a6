/**
 * Logging
 *
 * One winston logger for the process; components log through a child labelled with their
 * namespace, and per-record messages also carry the recordnum.
 * Pretty lines read `<timestamp> [processor #500] info: ...`.
 */

import {
  createLogger as winstonCreateLogger,
  format as winstonFormat,
  transports,
  type Logger as WinstonLogger,
  type Logform,
} from 'winston';
import { ENV } from './constants.js';
import { isRecord } from './validation.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';
export type Logger = WinstonLogger;
export type LogFormat = 'json' | 'pretty';

const FALLBACK_LEVEL: LogLevel = 'info';
const DEFAULT_FORMAT: LogFormat = process.stdout.isTTY ? 'pretty' : 'json';
const ALLOWED_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];
const ALLOWED_FORMATS: readonly LogFormat[] = ['json', 'pretty'];
const METADATA_EXCLUDE = ['message', 'level', 'timestamp', 'label', 'recordnum', 'stack'];

const baseLogger = winstonCreateLogger({
  level: resolveLogLevel(process.env[ENV.LOG_LEVEL]),
  format: winstonFormat.combine(
    winstonFormat.errors({ stack: true }),
    winstonFormat.splat(),
    winstonFormat.metadata({ fillExcept: METADATA_EXCLUDE }),
  ),
  transports: [
    new transports.Console({
      handleExceptions: true,
      handleRejections: true,
      format: buildTransportFormat(resolveLogFormat(process.env[ENV.LOG_FORMAT])),
    }),
  ],
});

export function createLogger(namespace: string): Logger {
  return baseLogger.child({ label: namespace });
}

/**
 * Child logger for one count record.
 */
export function createRecordLogger(namespace: string, recordnum: number): Logger {
  return baseLogger.child({ label: namespace, recordnum });
}

function resolveLogLevel(input: string | undefined): LogLevel {
  const normalized = input?.toLowerCase();
  return isLogLevel(normalized) ? normalized : FALLBACK_LEVEL;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return ALLOWED_LEVELS.some((level) => level === value);
}

function resolveLogFormat(input: string | undefined): LogFormat {
  const normalized = input?.toLowerCase();
  return isLogFormat(normalized) ? normalized : DEFAULT_FORMAT;
}

function isLogFormat(value: string | undefined): value is LogFormat {
  return ALLOWED_FORMATS.some((format) => format === value);
}

function buildTransportFormat(logFormat: LogFormat): Logform.Format {
  if (logFormat === 'json') {
    return winstonFormat.combine(
      winstonFormat.timestamp(),
      winstonFormat.json({ replacer: errorReplacer }),
    );
  }

  return winstonFormat.combine(
    winstonFormat.colorize({ all: true }),
    winstonFormat.timestamp(),
    winstonFormat.printf(prettyPrint),
  );
}

function prettyPrint(info: Logform.TransformableInfo): string {
  const timestamp = typeof info.timestamp === 'string' ? info.timestamp : new Date().toISOString();
  const label = typeof info.label === 'string' ? info.label : 'engine';
  const tag = typeof info.recordnum === 'number' ? `${label} #${info.recordnum}` : label;
  const stack = typeof info.stack === 'string' ? info.stack : undefined;
  const metadata = isRecord(info.metadata) ? info.metadata : {};

  const meta = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata, errorReplacer)}` : '';

  const base = `${timestamp} [${tag}] ${info.level}: ${String(info.message)}`;
  return stack ? `${base}${meta}\n${stack}` : `${base}${meta}`;
}

function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return {
      message: value.message,
      stack: value.stack,
    };
  }
  return value;
}
