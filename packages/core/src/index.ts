// @relaybot/core: shared config, errors and logging
export * from './config.js';
export * from './errors.js';
export * from './i18n-types.js';
export { envSchema } from './config-schema.js';
export type { ParsedEnv } from './config-schema.js';
export {
  logger,
  createLogger,
  logEmitter,
  getLogBuffer,
  clearLogBuffer,
  setLogLevel,
  getLogLevel,
} from './logger.js';
export type { LogEntry, LogLevel, Logger } from './logger.js';
export { formatError, sleep, abortError } from './utils.js';
