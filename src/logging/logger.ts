/**
 * Structured logging.
 *
 * One pino root logger per registry; components log through child loggers
 * tagged with `component`.
 */

import { pino, type DestinationStream, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export type LogLevel = LevelWithSilent;

export const LOG_LEVELS: readonly LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

export interface LoggerOptions {
  /** Default: LOG_LEVEL env var, else 'info' */
  level?: LogLevel;
  name?: string;
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info');

  const pinoOptions = {
    name: options.name ?? 'tool-registry',
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return options.destination
    ? pino(pinoOptions, options.destination)
    : pino(pinoOptions);
}

/**
 * Child logger for one component of the runtime.
 */
export function componentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}
