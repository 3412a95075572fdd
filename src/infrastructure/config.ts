import { z } from 'zod';
import { ConfigError } from '../domain/index.js';
import { isTrue } from '../application/conversions.js';
import { toValidationIssues } from '../application/event-schema.js';
import type { HecFormatOptions } from '../application/hec-formatter.js';
import type { XmlFormatOptions } from '../application/xml-formatter.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  EVENTWIRE_MAX_EVENTS_PER_BATCH: z.coerce.number().int().positive().optional(),
  EVENTWIRE_MAX_BATCH_BYTES: z.coerce.number().int().positive().optional(),
  EVENTWIRE_ESCAPE_CONTROL_CHARS: z.string().optional().transform((value) => isTrue(value)),
});

export interface EncodingConfig {
  readonly logLevel: LogLevel;
  readonly maxEventsPerBatch?: number;
  readonly maxBatchBytes?: number;
  readonly escapeControlChars: boolean;
}

/**
 * Loads encoding settings from environment variables.
 *
 * Unset variables take their defaults; an unparseable value throws a
 * ConfigError naming every offending variable.
 */
export function loadEncodingConfig(
  env: Record<string, string | undefined> = process.env,
): EncodingConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(toValidationIssues(result.error.issues));
  }

  const data = result.data;
  return {
    logLevel: data.LOG_LEVEL,
    maxEventsPerBatch: data.EVENTWIRE_MAX_EVENTS_PER_BATCH,
    maxBatchBytes: data.EVENTWIRE_MAX_BATCH_BYTES,
    escapeControlChars: data.EVENTWIRE_ESCAPE_CONTROL_CHARS,
  };
}

/** HEC formatter options from the loaded config. */
export function hecOptionsFromConfig(
  config: EncodingConfig,
  extra: Pick<HecFormatOptions, 'log'> = {},
): HecFormatOptions {
  return {
    maxEventsPerBatch: config.maxEventsPerBatch,
    maxBatchBytes: config.maxBatchBytes,
    escapeControlChars: config.escapeControlChars,
    ...extra,
  };
}

/** XML streams only honour the event count cap. */
export function xmlOptionsFromConfig(config: EncodingConfig): XmlFormatOptions {
  return { maxEventsPerStream: config.maxEventsPerBatch };
}
