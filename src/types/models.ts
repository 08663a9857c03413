/**
 * Core data models for flex-time accounting and working-time compliance
 */

// ============================================================================
// Employee Types
// ============================================================================

export interface Employee {
  id: string;
  name: string;
  /** Opaque credential produced by the CredentialHasher */
  credential: string;
  /** Currently contracted weekly hours */
  weeklyHours: number;
  birthDate: string;
  /** Signed running balance in hours */
  flexBalance: number;
  greenThreshold: number;
  redThreshold: number;
  lastSettledLogin: string;
  supervisorId: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface CreateEmployeeInput {
  name: string;
  credential: string;
  weeklyHours: number;
  birthDate: string;
  greenThreshold?: number;
  redThreshold?: number;
  supervisorName?: string;
}

export interface WeeklyHoursEntry {
  id: string;
  employeeId: string;
  effectiveFrom: string;
  weeklyHours: number;
  createdAt: string;
}

// ============================================================================
// Time Stamp Types
// ============================================================================

export interface TimeStamp {
  id: string;
  employeeId: string;
  /** YYYY-MM-DD */
  date: string;
  /** HH:mm:ss */
  time: string;
  settled: boolean;
  createdAt: string;
}

export interface StampCount {
  date: string;
  count: number;
}

// ============================================================================
// Absence Types
// ============================================================================

export type AbsenceType = 'vacation' | 'sick' | 'training' | 'other';

export const ABSENCE_TYPES: readonly AbsenceType[] = ['vacation', 'sick', 'training', 'other'];

export interface Absence {
  id: string;
  employeeId: string;
  date: string;
  type: AbsenceType;
  approved: boolean;
  createdAt: string;
}

// ============================================================================
// Notification Types
// ============================================================================

export const NotificationCodes = {
  MISSING_WORKDAY: 1,
  ODD_STAMP_COUNT: 2,
  REST_PERIOD: 3,
  SIX_MONTH_AVERAGE: 4,
  DAILY_MAXIMUM: 5,
  SUNDAY_HOLIDAY_WORK: 6,
  MINOR_WEEKLY_HOURS: 7,
  MINOR_WORKDAYS: 8,
  WORK_WINDOW_END: 9,
  MAX_HOURS_WARNING: 10,
} as const;

export type NotificationCode = typeof NotificationCodes[keyof typeof NotificationCodes];

export interface Notification {
  id: string;
  employeeId: string;
  code: NotificationCode;
  date: string;
  isPopup: boolean;
  popupTime: string | null;
  createdAt: string;
}

export interface CreateNotificationInput {
  employeeId: string;
  code: NotificationCode;
  date: string;
  isPopup?: boolean;
  popupTime?: string | null;
}

export interface RenderedNotification {
  id: string;
  code: NotificationCode;
  date: string;
  message: string;
}

// ============================================================================
// Flex-Time Types
// ============================================================================

export type TrafficLight = 'green' | 'yellow' | 'red';

export interface FlexTimeAverage {
  averageHours: number;
  totalHours: number;
  dayCount: number;
  days: string[];
}

export interface FlexTimeRollups {
  month: number;
  quarter: number;
  year: number;
}

export interface FlexOverview {
  employeeId: string;
  name: string;
  balance: number;
  trafficLight: TrafficLight;
  notifications: RenderedNotification[];
  rollups: FlexTimeRollups;
}

export interface DayStampDetail {
  id: string;
  time: string;
  settled: boolean;
  outsideWorkWindow: boolean;
}

export interface DayDetail {
  date: string;
  stamps: DayStampDetail[];
  workedHours: number;
  targetHours: number;
  deltaHours: number;
  absence: AbsenceType | null;
  notifications: RenderedNotification[];
}

// ============================================================================
// Holiday Types
// ============================================================================

export interface Holiday {
  id: string;
  date: string;
  name: string;
  createdAt: string;
}

export interface CreateHolidayInput {
  date: string;
  name: string;
}

// ============================================================================
// Settings Types
// ============================================================================

export interface ComplianceSettings {
  holidayCountry: string;
  holidayState: string | null;
  popupLeadMinutes: number;
  averageWindowWeeks: number;
  requireApprovedAbsence: boolean;
  minimumRegistrationAge: number;
  defaultGreenThreshold: number;
  defaultRedThreshold: number;
}

export interface TimezoneSettings {
  /** IANA timezone identifier, e.g. 'Europe/Berlin' */
  timezone: string;
  timeFormat: '12h' | '24h';
}

export interface AppSettings {
  compliance: ComplianceSettings;
  timezone: TimezoneSettings;
}

// ============================================================================
// Report Types
// ============================================================================

export interface FlexReportRow {
  date: string;
  weekday: string;
  stamps: string[];
  workedHours: number;
  targetHours: number;
  deltaHours: number;
  absence: AbsenceType | null;
  notificationCodes: NotificationCode[];
}

export interface FlexReport {
  employeeId: string;
  employeeName: string;
  startDate: string;
  endDate: string;
  rows: FlexReportRow[];
  totals: {
    workedHours: number;
    targetHours: number;
    deltaHours: number;
    absenceDays: number;
  };
}

export interface ExportSettings {
  colors: {
    positive: string;
    negative: string;
    absence: string;
    weekend: string;
    header: string;
  };
}
