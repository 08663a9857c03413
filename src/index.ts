/**
 * flextime-ledger
 *
 * Flex-time accounting and working-time compliance for small teams.
 */

export * from './types';
export * from './lib/services';
export * from './lib/repositories';
export { Database, openDatabase, flushDatabase, DEFAULT_DATABASE_FILE, SCHEMA } from './lib/database';
export type { ExecuteResult } from './lib/database';
export { CoreError, toApiError, createError, getErrorCategory, ok, fail, runOperation } from './lib/errors';
export { createLogger, configureLogger, getLoggerConfig, LogLevel, parseLogLevel } from './lib/logger';
export type { Logger, LoggerConfig } from './lib/logger';
export {
  DEFAULT_TIMEZONE,
  TIMEZONE_OPTIONS,
  isValidTimezone,
  toLocalDateTime,
  createSystemClock,
  createFixedClock,
  formatTime,
} from './lib/utils/timezone';
export * from './lib/utils/dates';
