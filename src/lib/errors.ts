/**
 * Typed failures and their mapping onto ApiResponse
 */

import BetterSqlite3 from 'better-sqlite3';
import { ErrorCodes } from '../types/api';
import type { ApiError, ApiResponse, ErrorCategory, ErrorCode } from '../types/api';
import type { Logger } from './logger';

const ERROR_CATEGORIES: Record<ErrorCode, ErrorCategory> = {
  [ErrorCodes.INVALID_INPUT]: 'validation',
  [ErrorCodes.INVALID_DATE]: 'validation',
  [ErrorCodes.INVALID_TIME]: 'validation',
  [ErrorCodes.INVALID_DATE_RANGE]: 'validation',
  [ErrorCodes.FUTURE_STAMP]: 'validation',
  [ErrorCodes.DUPLICATE_STAMP]: 'validation',
  [ErrorCodes.DUPLICATE_ENTRY]: 'validation',
  [ErrorCodes.ABSENCE_CONFLICT]: 'validation',
  [ErrorCodes.STAMP_CONFLICT]: 'validation',
  [ErrorCodes.INVALID_WEEKLY_HOURS]: 'validation',
  [ErrorCodes.THRESHOLD_ORDER]: 'validation',
  [ErrorCodes.AGE_RESTRICTION]: 'validation',
  [ErrorCodes.FORBIDDEN]: 'validation',
  [ErrorCodes.NOT_FOUND]: 'lookup',
  [ErrorCodes.PERSISTENCE_ERROR]: 'persistence',
  [ErrorCodes.INTERNAL_ERROR]: 'logic',
};

/**
 * Thrown inside services to abort the surrounding transaction
 */
export class CoreError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CoreError';
  }

  get category(): ErrorCategory {
    return ERROR_CATEGORIES[this.code];
  }
}

export function getErrorCategory(code: ErrorCode): ErrorCategory {
  return ERROR_CATEGORIES[code];
}

export function createError(code: ErrorCode, message: string, details?: Record<string, unknown>): ApiError {
  const error: ApiError = { code, category: ERROR_CATEGORIES[code], message };
  if (details) {
    error.details = details;
  }
  return error;
}

export function toApiError(error: unknown): ApiError {
  if (error instanceof CoreError) {
    return createError(error.code, error.message, error.details);
  }
  if (error instanceof BetterSqlite3.SqliteError) {
    return createError(ErrorCodes.PERSISTENCE_ERROR, 'The operation could not be saved', {
      sqliteCode: error.code,
    });
  }
  return createError(ErrorCodes.INTERNAL_ERROR, 'An unexpected error occurred', {
    reason: error instanceof Error ? error.message : String(error),
  });
}

export function ok<T>(data: T): ApiResponse<T> {
  return { success: true, data };
}

export function fail<T>(error: ApiError): ApiResponse<T> {
  return { success: false, error };
}

/**
 * Run an operation and convert any thrown failure into an ApiResponse.
 * Validation and lookup failures log at WARN, everything else at ERROR.
 */
export function runOperation<T>(log: Logger, operation: string, fn: () => T): ApiResponse<T> {
  try {
    return ok(fn());
  } catch (error) {
    const apiError = toApiError(error);
    if (apiError.category === 'validation' || apiError.category === 'lookup') {
      log.warn(`${operation} rejected: ${apiError.message}`);
    } else {
      log.error(`${operation} failed`, error);
    }
    return fail(apiError);
  }
}
