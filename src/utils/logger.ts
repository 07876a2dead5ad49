/**
 * Logger construction and lazy logging helpers
 *
 * Debug lines on the admission path are emitted through lazyLog so their
 * context object is only built when the level is enabled.
 */

import { pino } from 'pino';
import type { DestinationStream, Logger } from 'pino';
import { LOGGING } from '../config/defaults.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

export interface CreateLoggerOptions {
  level?: LogLevel | 'silent';
  name?: string;
  /** Alternate destination, mainly for capturing output in tests */
  destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const settings = {
    name: options.name ?? LOGGING.DEFAULT_NAME,
    level: options.level ?? LOGGING.DEFAULT_LEVEL,
  };
  return options.destination ? pino(settings, options.destination) : pino(settings);
}

/**
 * Log with a context object that is only built if the level is enabled
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ tag, running }), 'Task dispatched');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
