import pino from 'pino';
import type { Logger, DestinationStream } from 'pino';
import type { LogLevel } from './config.js';

export interface LoggerOptions {
  readonly level?: LogLevel;
  readonly name?: string;
  /** Alternate sink, e.g. an in-memory stream in tests. Defaults to stdout. */
  readonly destination?: DestinationStream;
}

/**
 * Builds the pino logger handed to formatters and the payload decoder.
 * Library code never creates its own logger.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const config = {
    name: options.name ?? 'eventwire',
    level: options.level ?? 'info',
  };
  return options.destination ? pino(config, options.destination) : pino(config);
}
