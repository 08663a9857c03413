/**
 * Type exports
 */

// Data models
export type {
  Employee,
  CreateEmployeeInput,
  WeeklyHoursEntry,
  TimeStamp,
  StampCount,
  AbsenceType,
  Absence,
  NotificationCode,
  Notification,
  CreateNotificationInput,
  RenderedNotification,
  TrafficLight,
  FlexTimeAverage,
  FlexTimeRollups,
  FlexOverview,
  DayStampDetail,
  DayDetail,
  Holiday,
  CreateHolidayInput,
  ComplianceSettings,
  TimezoneSettings,
  AppSettings,
  FlexReportRow,
  FlexReport,
  ExportSettings,
} from './models';

export { NotificationCodes, ABSENCE_TYPES } from './models';

// Service interfaces
export type {
  LocalDateTime,
  Clock,
  CredentialHasher,
  HolidayChecker,
  NewEmployeeRecord,
  EmployeeRepository,
  WeeklyHoursRepository,
  TimeStampRepository,
  AbsenceRepository,
  NotificationListOptions,
  NotificationRepository,
  HolidayRepository,
  SettingsRepository,
} from './services';

// API types
export type {
  ApiResponse,
  ApiError,
  ErrorCode,
  ErrorCategory,
} from './api';

export { ErrorCodes } from './api';
