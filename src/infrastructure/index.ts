export { createLogger } from './logger.js';
export type { LoggerOptions } from './logger.js';
export { loadEncodingConfig, hecOptionsFromConfig, xmlOptionsFromConfig, LOG_LEVELS } from './config.js';
export type { EncodingConfig, LogLevel } from './config.js';
