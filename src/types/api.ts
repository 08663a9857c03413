/**
 * Result, error and database row types
 */

// ============================================================================
// Generic API Response Types
// ============================================================================

export type ErrorCategory = 'validation' | 'lookup' | 'persistence' | 'logic';

export interface ApiError {
  code: ErrorCode;
  category: ErrorCategory;
  message: string;
  details?: Record<string, unknown>;
}

export type ApiResponse<T> =
  | { success: true; data: T }
  | { success: false; error: ApiError };

// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCodes = {
  // Validation errors
  INVALID_INPUT: 'INVALID_INPUT',
  INVALID_DATE: 'INVALID_DATE',
  INVALID_TIME: 'INVALID_TIME',
  INVALID_DATE_RANGE: 'INVALID_DATE_RANGE',
  FUTURE_STAMP: 'FUTURE_STAMP',
  DUPLICATE_STAMP: 'DUPLICATE_STAMP',
  DUPLICATE_ENTRY: 'DUPLICATE_ENTRY',
  ABSENCE_CONFLICT: 'ABSENCE_CONFLICT',
  STAMP_CONFLICT: 'STAMP_CONFLICT',
  INVALID_WEEKLY_HOURS: 'INVALID_WEEKLY_HOURS',
  THRESHOLD_ORDER: 'THRESHOLD_ORDER',
  AGE_RESTRICTION: 'AGE_RESTRICTION',
  FORBIDDEN: 'FORBIDDEN',

  // Lookup errors
  NOT_FOUND: 'NOT_FOUND',

  // Database errors
  PERSISTENCE_ERROR: 'PERSISTENCE_ERROR',

  // General errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

// ============================================================================
// Database Row Types (snake_case as stored in SQLite)
// ============================================================================

export interface EmployeeRow {
  id: string;
  name: string;
  credential: string;
  weekly_hours: number;
  birth_date: string;
  flex_balance: number;
  green_threshold: number;
  red_threshold: number;
  last_settled_login: string;
  supervisor_id: string | null;
  created_at: string;
  updated_at: string;
}

export interface WeeklyHoursRow {
  id: string;
  employee_id: string;
  effective_from: string;
  weekly_hours: number;
  created_at: string;
}

export interface TimeStampRow {
  id: string;
  employee_id: string;
  date: string;
  time: string;
  settled: number;
  created_at: string;
}

export interface AbsenceRow {
  id: string;
  employee_id: string;
  date: string;
  type: string;
  approved: number;
  created_at: string;
}

export interface NotificationRow {
  id: string;
  employee_id: string;
  code: number;
  date: string;
  is_popup: number;
  popup_time: string | null;
  created_at: string;
}

export interface HolidayRow {
  id: string;
  date: string;
  name: string;
  created_at: string;
}

export interface SettingRow {
  key: string;
  value: string;
  updated_at: string;
}
