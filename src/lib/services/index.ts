/**
 * Services exports
 */

export {
  WORK_WINDOW_START,
  ADULT_WORK_WINDOW_END,
  MINOR_WORK_WINDOW_END,
  FULL_DEDUCTIONS,
  BREAKS_ONLY,
  RAW_DURATION,
  getWorkWindow,
  legalBreakSeconds,
  outsideWindowSeconds,
  isOutsideWorkWindow,
  calculateInterval,
} from './interval-calculator';

export type { StampPoint, IntervalOptions, WorkInterval, WorkWindow } from './interval-calculator';

export { sortStamps, pairStamps, accumulateDays, workedSecondsOn } from './day-accumulator';

export type { PairingResult, DayAccumulation } from './day-accumulator';

export {
  QuotaResolver,
  WORKDAYS_PER_WEEK,
  DEFAULT_DAILY_HOURS,
  calculateDailyTargetSeconds,
} from './quota-resolver';

export { FlexTimeLedger } from './flex-time-ledger';

export type { SettlementResult, RevertResult, FlexTimeLedgerDeps } from './flex-time-ledger';

export { createHolidayCalendar } from './holiday-calendar';

export type { HolidayCalendar, HolidayCalendarOptions, StatutoryHoliday } from './holiday-calendar';

export {
  ComplianceMonitor,
  ADULT_REST_PERIOD_HOURS,
  MINOR_REST_PERIOD_HOURS,
  ADULT_DAILY_MAXIMUM_HOURS,
  MINOR_DAILY_MAXIMUM_HOURS,
  AVERAGE_DAILY_LIMIT_HOURS,
  MINOR_WEEKLY_LIMIT_HOURS,
  MINOR_WEEKLY_WORKDAY_LIMIT,
  requiredRestSeconds,
  dailyMaximumSeconds,
  restGapSeconds,
} from './compliance-monitor';

export type {
  ComplianceMonitorDeps,
  ComplianceReport,
  DateWindow,
  StampAdvisory,
  StampAdvisoryKind,
} from './compliance-monitor';

export { PopupScheduler, maximumRawDailySeconds } from './popup-scheduler';

export type { PopupSchedulerDeps } from './popup-scheduler';

export { getNotificationText, renderNotification } from './notification-text';

export { getTrafficLight, buildOverview, countTrafficLights } from './dashboard';

export {
  ReportGenerator,
  DEFAULT_EXPORT_SETTINGS,
  escapeCSVValue,
  exportFlexReportToCSV,
  exportFlexReportToExcel,
  getRowFill,
} from './report-generator';

export type { ReportGeneratorDeps } from './report-generator';

export { TimeTrackingService } from './time-tracking';

export type {
  TimeTrackingServiceOptions,
  ReevaluationResult,
  LoginResult,
  ClockResult,
  StampChangeResult,
} from './time-tracking';
