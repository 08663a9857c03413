/**
 * Compliance Monitor
 *
 * Rule checks over an employee's history. Unless noted otherwise each
 * check looks at [lastSettledLogin, yesterday]; today is still in
 * progress. Notifications are unique per (employee, code, date), so every
 * check can be re-run freely.
 */

import type { Database } from '../database';
import type { ComplianceSettings, Employee, Notification, NotificationCode, TimeStamp } from '../../types';
import { NotificationCodes } from '../../types';
import type {
  AbsenceRepository,
  EmployeeRepository,
  HolidayChecker,
  NotificationRepository,
  TimeStampRepository,
} from '../../types/services';
import { createLogger } from '../logger';
import {
  SECONDS_PER_DAY,
  SECONDS_PER_HOUR,
  addDays,
  diffInDays,
  eachDay,
  getWeekEnd,
  getWeekStart,
  isMinorOn,
  isSunday,
  isWeekday,
  parseTimeToSeconds,
  secondsToHours,
} from '../utils/dates';
import { accumulateDays } from './day-accumulator';
import { BREAKS_ONLY, isOutsideWorkWindow } from './interval-calculator';
import type { QuotaResolver } from './quota-resolver';

const log = createLogger('compliance-monitor');

export const ADULT_REST_PERIOD_HOURS = 11;
export const MINOR_REST_PERIOD_HOURS = 12;
export const ADULT_DAILY_MAXIMUM_HOURS = 10;
export const MINOR_DAILY_MAXIMUM_HOURS = 8;
export const AVERAGE_DAILY_LIMIT_HOURS = 8;
export const MINOR_WEEKLY_LIMIT_HOURS = 40;
export const MINOR_WEEKLY_WORKDAY_LIMIT = 5;

const CORRECTABLE_CODES: NotificationCode[] = [
  NotificationCodes.REST_PERIOD,
  NotificationCodes.SIX_MONTH_AVERAGE,
  NotificationCodes.DAILY_MAXIMUM,
  NotificationCodes.SUNDAY_HOLIDAY_WORK,
  NotificationCodes.MINOR_WEEKLY_HOURS,
  NotificationCodes.MINOR_WORKDAYS,
];

export interface ComplianceMonitorDeps {
  db: Database;
  employees: EmployeeRepository;
  stamps: TimeStampRepository;
  absences: AbsenceRepository;
  notifications: NotificationRepository;
  quota: QuotaResolver;
  isHoliday: HolidayChecker;
  settings: ComplianceSettings;
}

export interface DateWindow {
  start: string;
  end: string;
}

export interface ComplianceReport {
  restPeriodViolations: string[];
  averageExceeded: boolean;
  dailyMaximumViolations: string[];
  sundayHolidayWork: string[];
  minorWeeklyHours: string[];
  minorWorkdays: string[];
}

export type StampAdvisoryKind = 'outside-work-window' | 'rest-period' | 'minor-sixth-workday' | 'sunday-or-holiday';

export interface StampAdvisory {
  kind: StampAdvisoryKind;
  message: string;
}

export function requiredRestSeconds(minor: boolean): number {
  return (minor ? MINOR_REST_PERIOD_HOURS : ADULT_REST_PERIOD_HOURS) * SECONDS_PER_HOUR;
}

export function dailyMaximumSeconds(minor: boolean): number {
  return (minor ? MINOR_DAILY_MAXIMUM_HOURS : ADULT_DAILY_MAXIMUM_HOURS) * SECONDS_PER_HOUR;
}

/**
 * Seconds between the end of one stamped day and the start of a later one
 */
export function restGapSeconds(last: TimeStamp, first: TimeStamp): number {
  return diffInDays(last.date, first.date) * SECONDS_PER_DAY + parseTimeToSeconds(first.time) - parseTimeToSeconds(last.time);
}

function groupByDate(stamps: readonly TimeStamp[]): Map<string, TimeStamp[]> {
  const byDate = new Map<string, TimeStamp[]>();
  for (const stamp of stamps) {
    const list = byDate.get(stamp.date);
    if (list) {
      list.push(stamp);
    } else {
      byDate.set(stamp.date, [stamp]);
    }
  }
  return byDate;
}

export class ComplianceMonitor {
  constructor(private readonly deps: ComplianceMonitorDeps) {}

  /**
   * [lastSettledLogin, yesterday], or null when that is empty
   */
  evaluationWindow(employee: Employee, today: string): DateWindow | null {
    const end = addDays(today, -1);
    const start = employee.lastSettledLogin;
    return start <= end ? { start, end } : null;
  }

  // ==========================================================================
  // Code 1: missing workday
  // ==========================================================================

  /**
   * Charge the daily target for every weekday without stamps or absence.
   * Returns the dates that were newly charged.
   */
  checkMissingWorkdays(employee: Employee, today: string): string[] {
    const window = this.evaluationWindow(employee, today);
    if (!window) return [];

    const { db, stamps, absences, notifications, employees, quota, settings } = this.deps;
    const stamped = new Set(stamps.listStampedDates(employee.id, window.start, window.end));
    const charged: string[] = [];

    for (const date of eachDay(window.start, window.end)) {
      if (!isWeekday(date) || stamped.has(date)) continue;
      if (absences.hasAbsence(employee.id, date, settings.requireApprovedAbsence)) continue;

      db.transaction(() => {
        const created = notifications.addNotification({
          employeeId: employee.id,
          code: NotificationCodes.MISSING_WORKDAY,
          date,
        });
        if (!created) return;
        const target = quota.dailyTargetSeconds(employee, date);
        if (target > 0) {
          employees.adjustFlexBalance(employee.id, -secondsToHours(target));
        }
        charged.push(date);
      });
    }

    if (charged.length > 0) {
      log.info(`Charged ${charged.length} missing workdays for ${employee.id}`);
    }
    return charged;
  }

  // ==========================================================================
  // Code 2: odd stamp count
  // ==========================================================================

  /**
   * Flag every past date whose stamp count is odd. Looks at the whole history up to yesterday.
   */
  checkOddStampCounts(employee: Employee, today: string): string[] {
    const { stamps } = this.deps;
    const odd = stamps
      .listStampCounts(employee.id, addDays(today, -1))
      .filter(entry => entry.count % 2 !== 0)
      .map(entry => entry.date);
    for (const date of odd) {
      this.notify(employee, NotificationCodes.ODD_STAMP_COUNT, date);
    }
    return odd;
  }

  // ==========================================================================
  // Codes 3-8
  // ==========================================================================

  /**
   * Code 3: rest between the last stamp of a day and the first stamp of the
   * next stamped day (at most one day later). The day before the window
   * serves as reference for the window's first day.
   */
  checkRestPeriods(employee: Employee, today: string): string[] {
    const window = this.evaluationWindow(employee, today);
    if (!window) return [];

    const stamps = this.deps.stamps.listStampsInRange(employee.id, addDays(window.start, -1), window.end);
    const byDate = groupByDate(stamps);
    const dates = [...byDate.keys()];
    const violations: string[] = [];

    for (let i = 1; i < dates.length; i++) {
      const previousDate = dates[i - 1];
      const date = dates[i];
      if (previousDate === undefined || date === undefined || date < window.start) continue;
      if (diffInDays(previousDate, date) > 1) continue;

      const last = byDate.get(previousDate)?.at(-1);
      const first = byDate.get(date)?.[0];
      if (!last || !first) continue;

      const required = requiredRestSeconds(isMinorOn(employee.birthDate, previousDate));
      if (restGapSeconds(last, first) < required) {
        this.notify(employee, NotificationCodes.REST_PERIOD, date);
        violations.push(date);
      }
    }
    return violations;
  }

  /**
   * Code 4: average break-adjusted worked time per worked day over the trailing weeks
   */
  averageDailySeconds(employee: Employee, today: string): number {
    const end = addDays(today, -1);
    const start = addDays(end, -7 * this.deps.settings.averageWindowWeeks);
    const stamps = this.deps.stamps.listStampsInRange(employee.id, start, end);
    const { workedByDate } = accumulateDays(stamps, employee.birthDate, BREAKS_ONLY);
    if (workedByDate.size === 0) return 0;

    let total = 0;
    for (const seconds of workedByDate.values()) total += seconds;
    return total / workedByDate.size;
  }

  checkAverageWorkingTime(employee: Employee, today: string): boolean {
    const exceeded = this.averageDailySeconds(employee, today) > AVERAGE_DAILY_LIMIT_HOURS * SECONDS_PER_HOUR;
    if (exceeded) {
      this.notify(employee, NotificationCodes.SIX_MONTH_AVERAGE, today);
    }
    return exceeded;
  }

  /**
   * Break-adjusted worked seconds of one date, no window clipping
   */
  dailyWorkedSeconds(employee: Employee, date: string): number {
    const stamps = this.deps.stamps.listStampsForDate(employee.id, date);
    return accumulateDays(stamps, employee.birthDate, BREAKS_ONLY).workedByDate.get(date) ?? 0;
  }

  /**
   * Code 5: daily maximum of 10h (adult) or 8h (minor)
   */
  checkDailyMaximum(employee: Employee, today: string): string[] {
    const window = this.evaluationWindow(employee, today);
    if (!window) return [];

    const stamps = this.deps.stamps.listStampsInRange(employee.id, window.start, window.end);
    const { workedByDate } = accumulateDays(stamps, employee.birthDate, BREAKS_ONLY);
    const violations: string[] = [];

    for (const [date, worked] of workedByDate) {
      if (worked > dailyMaximumSeconds(isMinorOn(employee.birthDate, date))) {
        this.notify(employee, NotificationCodes.DAILY_MAXIMUM, date);
        violations.push(date);
      }
    }
    return violations;
  }

  isSundayOrHoliday(date: string): boolean {
    return isSunday(date) || this.deps.isHoliday(date);
  }

  /**
   * Code 6: any stamp on a Sunday or holiday
   */
  checkSundayHolidayWork(employee: Employee, today: string): string[] {
    const window = this.evaluationWindow(employee, today);
    if (!window) return [];

    const violations = this.deps.stamps
      .listStampedDates(employee.id, window.start, window.end)
      .filter(date => this.isSundayOrHoliday(date));
    for (const date of violations) {
      this.notify(employee, NotificationCodes.SUNDAY_HOLIDAY_WORK, date);
    }
    return violations;
  }

  /**
   * Week starts of complete ISO weeks touching the window
   */
  private completeWeeks(employee: Employee, today: string): string[] {
    const window = this.evaluationWindow(employee, today);
    if (!window) return [];

    const weeks: string[] = [];
    for (let weekStart = getWeekStart(window.start); getWeekEnd(weekStart) <= window.end; weekStart = addDays(weekStart, 7)) {
      weeks.push(weekStart);
    }
    return weeks;
  }

  weeklyWorkedSeconds(employee: Employee, weekStart: string): number {
    const stamps = this.deps.stamps.listStampsInRange(employee.id, weekStart, getWeekEnd(weekStart));
    let total = 0;
    for (const seconds of accumulateDays(stamps, employee.birthDate, BREAKS_ONLY).workedByDate.values()) {
      total += seconds;
    }
    return total;
  }

  weeklyWorkdays(employee: Employee, weekStart: string): number {
    return this.deps.stamps.listStampedDates(employee.id, weekStart, getWeekEnd(weekStart)).length;
  }

  /**
   * Code 7: more than 40 break-adjusted hours in a week while a minor
   */
  checkMinorWeeklyHours(employee: Employee, today: string): string[] {
    const violations = this.completeWeeks(employee, today).filter(
      weekStart =>
        isMinorOn(employee.birthDate, weekStart) &&
        this.weeklyWorkedSeconds(employee, weekStart) > MINOR_WEEKLY_LIMIT_HOURS * SECONDS_PER_HOUR
    );
    for (const weekStart of violations) {
      this.notify(employee, NotificationCodes.MINOR_WEEKLY_HOURS, weekStart);
    }
    return violations;
  }

  /**
   * Code 8: more than five stamped days in a week while a minor
   */
  checkMinorWorkdays(employee: Employee, today: string): string[] {
    const violations = this.completeWeeks(employee, today).filter(
      weekStart =>
        isMinorOn(employee.birthDate, weekStart) &&
        this.weeklyWorkdays(employee, weekStart) > MINOR_WEEKLY_WORKDAY_LIMIT
    );
    for (const weekStart of violations) {
      this.notify(employee, NotificationCodes.MINOR_WORKDAYS, weekStart);
    }
    return violations;
  }

  /**
   * Run codes 3 to 8
   */
  evaluate(employee: Employee, today: string): ComplianceReport {
    return this.deps.db.transaction(() => ({
      restPeriodViolations: this.checkRestPeriods(employee, today),
      averageExceeded: this.checkAverageWorkingTime(employee, today),
      dailyMaximumViolations: this.checkDailyMaximum(employee, today),
      sundayHolidayWork: this.checkSundayHolidayWork(employee, today),
      minorWeeklyHours: this.checkMinorWeeklyHours(employee, today),
      minorWorkdays: this.checkMinorWorkdays(employee, today),
    }));
  }

  // ==========================================================================
  // Correction sweep
  // ==========================================================================

  /**
   * Whether the condition behind a stored notification of codes 3-8 still holds
   */
  stillViolated(employee: Employee, notification: Notification, today: string): boolean {
    const { date } = notification;
    switch (notification.code) {
      case NotificationCodes.REST_PERIOD: {
        const first = this.deps.stamps.listStampsForDate(employee.id, date)[0];
        const last = this.deps.stamps.findLastStampBefore(employee.id, date);
        if (!first || !last || diffInDays(last.date, date) > 1) return false;
        return restGapSeconds(last, first) < requiredRestSeconds(isMinorOn(employee.birthDate, last.date));
      }
      case NotificationCodes.SIX_MONTH_AVERAGE:
        return this.averageDailySeconds(employee, today) > AVERAGE_DAILY_LIMIT_HOURS * SECONDS_PER_HOUR;
      case NotificationCodes.DAILY_MAXIMUM:
        return this.dailyWorkedSeconds(employee, date) > dailyMaximumSeconds(isMinorOn(employee.birthDate, date));
      case NotificationCodes.SUNDAY_HOLIDAY_WORK:
        return this.isSundayOrHoliday(date) && this.deps.stamps.listStampsForDate(employee.id, date).length > 0;
      case NotificationCodes.MINOR_WEEKLY_HOURS:
        return (
          isMinorOn(employee.birthDate, date) &&
          this.weeklyWorkedSeconds(employee, date) > MINOR_WEEKLY_LIMIT_HOURS * SECONDS_PER_HOUR
        );
      case NotificationCodes.MINOR_WORKDAYS:
        return isMinorOn(employee.birthDate, date) && this.weeklyWorkdays(employee, date) > MINOR_WEEKLY_WORKDAY_LIMIT;
      default:
        return true;
    }
  }

  /**
   * Delete notifications of codes 3-8 whose condition was resolved by later edits.
   * Returns the number of deleted notifications.
   */
  resolveCorrectedNotifications(employee: Employee, today: string): number {
    const { db, notifications } = this.deps;
    return db.transaction(() => {
      let removed = 0;
      for (const notification of notifications.listNotificationsByCodes(employee.id, CORRECTABLE_CODES)) {
        if (!this.stillViolated(employee, notification, today) && notifications.deleteNotification(notification.id)) {
          removed++;
        }
      }
      if (removed > 0) {
        log.info(`Removed ${removed} resolved notifications for ${employee.id}`);
      }
      return removed;
    });
  }

  // ==========================================================================
  // Pre-stamp advisories
  // ==========================================================================

  /**
   * Non-blocking warnings for a stamp about to be recorded
   */
  previewStamp(employee: Employee, date: string, time: string): StampAdvisory[] {
    const { stamps } = this.deps;
    const minor = isMinorOn(employee.birthDate, date);
    const advisories: StampAdvisory[] = [];

    if (isOutsideWorkWindow(time, minor)) {
      advisories.push({
        kind: 'outside-work-window',
        message: minor
          ? 'Minors may only work between 06:00 and 20:00.'
          : 'Working time outside 06:00 to 22:00 does not count.',
      });
    }

    if (stamps.listStampsForDate(employee.id, date).length === 0) {
      const last = stamps.findLastStampBefore(employee.id, date);
      if (last && diffInDays(last.date, date) <= 1) {
        const gap = restGapSeconds(last, { ...last, date, time });
        const required = requiredRestSeconds(isMinorOn(employee.birthDate, last.date));
        if (gap < required) {
          advisories.push({
            kind: 'rest-period',
            message: `Only ${(gap / SECONDS_PER_HOUR).toFixed(1)}h of rest since the last stamp; ${required / SECONDS_PER_HOUR}h are required.`,
          });
        }
      }
    }

    if (minor) {
      const weekDates = stamps.listStampedDates(employee.id, getWeekStart(date), getWeekEnd(date));
      if (!weekDates.includes(date) && weekDates.length >= MINOR_WEEKLY_WORKDAY_LIMIT) {
        advisories.push({
          kind: 'minor-sixth-workday',
          message: 'Minors may work on at most five days per week.',
        });
      }
    }

    if (this.isSundayOrHoliday(date)) {
      advisories.push({
        kind: 'sunday-or-holiday',
        message: 'Work on Sundays and public holidays is generally not permitted.',
      });
    }

    return advisories;
  }

  private notify(employee: Employee, code: NotificationCode, date: string): void {
    if (this.deps.notifications.addNotification({ employeeId: employee.id, code, date })) {
      log.debug(`Notification ${code} on ${date} for ${employee.id}`);
    }
  }
}
