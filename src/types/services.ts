/**
 * Repository and collaborator interfaces
 */

import type {
  Employee,
  WeeklyHoursEntry,
  TimeStamp,
  StampCount,
  Absence,
  AbsenceType,
  Notification,
  NotificationCode,
  CreateNotificationInput,
  Holiday,
  CreateHolidayInput,
  AppSettings,
} from './models';

// ============================================================================
// Collaborators
// ============================================================================

export interface LocalDateTime {
  /** YYYY-MM-DD */
  date: string;
  /** HH:mm:ss */
  time: string;
}

/** Supplies "now"; evaluation logic never reads the system clock directly */
export interface Clock {
  now(): LocalDateTime;
}

/** Turns a plain credential into the opaque value stored on the employee */
export interface CredentialHasher {
  hash(plain: string): string;
}

/** Returns true when the date is a statutory or company holiday */
export type HolidayChecker = (date: string) => boolean;

// ============================================================================
// Repository Interfaces
// ============================================================================

export interface NewEmployeeRecord {
  name: string;
  credential: string;
  weeklyHours: number;
  birthDate: string;
  greenThreshold: number;
  redThreshold: number;
  supervisorId: string | null;
  lastSettledLogin: string;
}

export interface EmployeeRepository {
  getEmployee(id: string): Employee | null;
  getEmployeeByName(name: string): Employee | null;
  createEmployee(record: NewEmployeeRecord): Employee;
  listSubordinates(supervisorId: string): Employee[];
  adjustFlexBalance(id: string, deltaHours: number): void;
  setLastSettledLogin(id: string, date: string): void;
  setWeeklyHours(id: string, weeklyHours: number): void;
  setThresholds(id: string, green: number, red: number): void;
  setCredential(id: string, credential: string): void;
}

export interface WeeklyHoursRepository {
  getWeeklyHoursOn(employeeId: string, date: string): number | null;
  upsertWeeklyHours(employeeId: string, effectiveFrom: string, weeklyHours: number): WeeklyHoursEntry;
  listHistory(employeeId: string): WeeklyHoursEntry[];
}

export interface TimeStampRepository {
  getStamp(id: string): TimeStamp | null;
  listStampsForDate(employeeId: string, date: string): TimeStamp[];
  listStampsInRange(employeeId: string, startDate: string, endDate: string): TimeStamp[];
  listUnsettledStamps(employeeId: string, upTo: string): TimeStamp[];
  listStampedDates(employeeId: string, startDate: string, endDate: string): string[];
  listStampCounts(employeeId: string, upTo: string): StampCount[];
  findStamp(employeeId: string, date: string, time: string): TimeStamp | null;
  findLastStampBefore(employeeId: string, date: string): TimeStamp | null;
  createStamp(employeeId: string, date: string, time: string): TimeStamp;
  updateStampTime(id: string, time: string): void;
  deleteStamp(id: string): boolean;
  markSettled(ids: string[]): number;
  markDateUnsettled(employeeId: string, date: string): number;
}

export interface AbsenceRepository {
  createAbsence(employeeId: string, date: string, type: AbsenceType, approved?: boolean): Absence;
  getAbsenceOnDate(employeeId: string, date: string): Absence | null;
  hasAbsence(employeeId: string, date: string, approvedOnly?: boolean): boolean;
  listAbsencesInRange(employeeId: string, startDate: string, endDate: string, type?: AbsenceType): Absence[];
  deleteAbsencesOnDate(employeeId: string, date: string, type?: AbsenceType): number;
  approveAbsence(id: string): boolean;
}

export interface NotificationListOptions {
  includeRegular?: boolean;
  includePopups?: boolean;
}

export interface NotificationRepository {
  addNotification(input: CreateNotificationInput): boolean;
  getNotification(id: string): Notification | null;
  findNotification(employeeId: string, code: NotificationCode, date: string): Notification | null;
  listNotifications(employeeId: string, options?: NotificationListOptions): Notification[];
  listNotificationsByCodes(employeeId: string, codes: NotificationCode[]): Notification[];
  listPopupsForDate(employeeId: string, date: string): Notification[];
  deleteNotification(id: string): boolean;
  deleteNotificationFor(employeeId: string, code: NotificationCode, date: string): boolean;
  deletePopupsForDate(employeeId: string, date: string): number;
}

export interface HolidayRepository {
  listHolidays(year?: number): Holiday[];
  getHolidayByDate(date: string): Holiday | null;
  createHoliday(input: CreateHolidayInput): Holiday;
  deleteHoliday(id: string): boolean;
  isHoliday(date: string): boolean;
  getHolidaysInRange(startDate: string, endDate: string): Holiday[];
}

export interface SettingsRepository {
  getSetting(key: string): string | null;
  setSetting(key: string, value: string): void;
  getAppSettings(): AppSettings;
  updateAppSettings(settings: Partial<AppSettings>): AppSettings;
  resetToDefaults(): AppSettings;
}
