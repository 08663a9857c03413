/**
 * Time Tracking Service
 *
 * Entry point for the presentation layer. Every operation validates its
 * input, runs in a single transaction and returns an ApiResponse; a
 * failure anywhere rolls back all of the operation's writes.
 *
 * Changes to an existing day always follow the same order:
 * revert the day, mutate, then re-evaluate (missing days, odd stamps,
 * settlement, rules 3-8, correction sweep).
 */

import type { Database } from '../database';
import type {
  Absence,
  AbsenceType,
  ComplianceSettings,
  CreateEmployeeInput,
  DayDetail,
  Employee,
  FlexOverview,
  FlexReport,
  FlexTimeAverage,
  Notification,
  TimeStamp,
  WeeklyHoursEntry,
} from '../../types';
import { ABSENCE_TYPES, NotificationCodes } from '../../types';
import { ErrorCodes } from '../../types/api';
import type { ApiResponse } from '../../types/api';
import type { Clock, CredentialHasher, HolidayChecker, LocalDateTime } from '../../types/services';
import { CoreError, runOperation } from '../errors';
import { createLogger } from '../logger';
import { createRepositories, isAbsenceType } from '../repositories';
import type { Repositories } from '../repositories';
import {
  ageOn,
  compareDateTime,
  getMonthDates,
  isMinorOn,
  isValidDate,
  normalizeTime,
  roundHours,
  secondsToHours,
} from '../utils/dates';
import { ComplianceMonitor } from './compliance-monitor';
import type { ComplianceReport, StampAdvisory } from './compliance-monitor';
import { buildOverview } from './dashboard';
import { workedSecondsOn } from './day-accumulator';
import { FlexTimeLedger } from './flex-time-ledger';
import type { SettlementResult } from './flex-time-ledger';
import { createHolidayCalendar } from './holiday-calendar';
import { isOutsideWorkWindow } from './interval-calculator';
import { renderNotification } from './notification-text';
import { PopupScheduler } from './popup-scheduler';
import { QuotaResolver } from './quota-resolver';
import { ReportGenerator } from './report-generator';

const log = createLogger('time-tracking');

export interface TimeTrackingServiceOptions {
  db: Database;
  clock: Clock;
  hasher: CredentialHasher;
  /** Defaults to the stored compliance settings */
  settings?: ComplianceSettings;
  /** Defaults to the statutory calendar of settings.holidayCountry plus company holidays */
  holidayChecker?: HolidayChecker;
}

export interface ReevaluationResult {
  missingDays: string[];
  oddStampDays: string[];
  settlement: SettlementResult;
  compliance: ComplianceReport;
  resolvedNotifications: number;
}

export interface LoginResult extends ReevaluationResult {
  overview: FlexOverview;
}

export interface ClockResult {
  stamp: TimeStamp;
  clockedIn: boolean;
  advisories: StampAdvisory[];
  popups: Notification[];
  balance: number;
}

export interface StampChangeResult {
  stamp: TimeStamp | null;
  advisories: StampAdvisory[];
  reevaluation: ReevaluationResult;
  balance: number;
}

export class TimeTrackingService {
  readonly repositories: Repositories;
  readonly quota: QuotaResolver;
  readonly ledger: FlexTimeLedger;
  readonly monitor: ComplianceMonitor;
  readonly popups: PopupScheduler;
  readonly reports: ReportGenerator;
  readonly settings: ComplianceSettings;

  private readonly db: Database;
  private readonly timeSource: Clock;
  private readonly hasher: CredentialHasher;

  constructor(options: TimeTrackingServiceOptions) {
    this.db = options.db;
    this.timeSource = options.clock;
    this.hasher = options.hasher;
    this.repositories = createRepositories(options.db);

    const repos = this.repositories;
    this.settings = options.settings ?? repos.settings.getAppSettings().compliance;
    const holidayChecker =
      options.holidayChecker ??
      createHolidayCalendar({
        country: this.settings.holidayCountry,
        state: this.settings.holidayState,
        companyHolidays: repos.holidays,
      }).isHoliday;

    this.quota = new QuotaResolver(repos.weeklyHours);
    this.ledger = new FlexTimeLedger({
      db: options.db,
      employees: repos.employees,
      stamps: repos.stamps,
      notifications: repos.notifications,
      quota: this.quota,
    });
    this.monitor = new ComplianceMonitor({
      db: options.db,
      employees: repos.employees,
      stamps: repos.stamps,
      absences: repos.absences,
      notifications: repos.notifications,
      quota: this.quota,
      isHoliday: holidayChecker,
      settings: this.settings,
    });
    this.popups = new PopupScheduler({
      stamps: repos.stamps,
      notifications: repos.notifications,
      leadMinutes: this.settings.popupLeadMinutes,
    });
    this.reports = new ReportGenerator({
      stamps: repos.stamps,
      absences: repos.absences,
      notifications: repos.notifications,
      quota: this.quota,
    });
  }

  // ==========================================================================
  // Registration and login
  // ==========================================================================

  registerEmployee(input: CreateEmployeeInput): ApiResponse<Employee> {
    return runOperation(log, 'registerEmployee', () => {
      const today = this.timeSource.now().date;
      const name = input.name.trim();
      if (!name) {
        throw new CoreError(ErrorCodes.INVALID_INPUT, 'A name is required');
      }
      if (!input.credential) {
        throw new CoreError(ErrorCodes.INVALID_INPUT, 'A password is required');
      }
      if (!isValidDate(input.birthDate) || input.birthDate > today) {
        throw new CoreError(ErrorCodes.INVALID_DATE, 'The birth date must be a past date in YYYY-MM-DD format');
      }
      if (ageOn(input.birthDate, today) < this.settings.minimumRegistrationAge) {
        throw new CoreError(
          ErrorCodes.AGE_RESTRICTION,
          `Employees must be at least ${this.settings.minimumRegistrationAge} years old`
        );
      }
      assertWeeklyHours(input.weeklyHours);

      const green = input.greenThreshold ?? this.settings.defaultGreenThreshold;
      const red = input.redThreshold ?? this.settings.defaultRedThreshold;
      assertThresholds(green, red);

      const { employees, weeklyHours } = this.repositories;
      return this.db.transaction(() => {
        if (employees.getEmployeeByName(name)) {
          throw new CoreError(ErrorCodes.DUPLICATE_ENTRY, `An employee named "${name}" already exists`);
        }

        let supervisorId: string | null = null;
        if (input.supervisorName) {
          const supervisor = employees.getEmployeeByName(input.supervisorName.trim());
          if (!supervisor) {
            throw new CoreError(ErrorCodes.NOT_FOUND, `Supervisor "${input.supervisorName}" not found`);
          }
          supervisorId = supervisor.id;
        }

        const employee = employees.createEmployee({
          name,
          credential: this.hasher.hash(input.credential),
          weeklyHours: input.weeklyHours,
          birthDate: input.birthDate,
          greenThreshold: green,
          redThreshold: red,
          supervisorId,
          lastSettledLogin: today,
        });
        weeklyHours.upsertWeeklyHours(employee.id, today, input.weeklyHours);
        log.info(`Registered employee ${employee.id}`);
        return employee;
      });
    });
  }

  /**
   * Settle everything since the last login and evaluate the compliance rules
   */
  login(employeeId: string): ApiResponse<LoginResult> {
    return runOperation(log, 'login', () =>
      this.db.transaction(() => {
        const today = this.timeSource.now().date;
        const result = this.reevaluate(employeeId, today);
        this.repositories.employees.setLastSettledLogin(employeeId, today);
        return { ...result, overview: this.overview(this.requireEmployee(employeeId), today) };
      })
    );
  }

  // ==========================================================================
  // Stamps
  // ==========================================================================

  /**
   * Record a stamp at the current time
   */
  clock(employeeId: string): ApiResponse<ClockResult> {
    return runOperation(log, 'clock', () =>
      this.db.transaction(() => {
        const now = this.timeSource.now();
        const employee = this.requireEmployee(employeeId);
        this.assertStampAllowed(employee, now.date, now.time);

        const advisories = this.monitor.previewStamp(employee, now.date, now.time);
        const stamp = this.repositories.stamps.createStamp(employee.id, now.date, now.time);
        this.ledger.settle(employee, now.date);
        const popups = this.refreshPopups(employee, now);

        return {
          stamp,
          clockedIn: this.popups.isClockedIn(employee.id, now.date),
          advisories,
          popups,
          balance: this.requireEmployee(employeeId).flexBalance,
        };
      })
    );
  }

  /**
   * Back-enter a stamp for a past moment
   */
  addManualStamp(employeeId: string, date: string, time: string): ApiResponse<StampChangeResult> {
    return runOperation(log, 'addManualStamp', () => {
      const normalized = this.validateStampMoment(date, time);
      return this.db.transaction(() => {
        const now = this.timeSource.now();
        const employee = this.requireEmployee(employeeId);
        this.assertStampAllowed(employee, date, normalized);

        const advisories = this.monitor.previewStamp(employee, date, normalized);
        this.ledger.revertDay(employee, date);
        const stamp = this.repositories.stamps.createStamp(employee.id, date, normalized);
        return this.finishStampChange(employeeId, date, stamp, advisories, now);
      });
    });
  }

  editStamp(employeeId: string, stampId: string, time: string): ApiResponse<StampChangeResult> {
    return runOperation(log, 'editStamp', () =>
      this.db.transaction(() => {
        const now = this.timeSource.now();
        const employee = this.requireEmployee(employeeId);
        const stamp = this.requireOwnStamp(employee, stampId);
        const normalized = this.validateStampMoment(stamp.date, time);

        const duplicate = this.repositories.stamps.findStamp(employee.id, stamp.date, normalized);
        if (duplicate && duplicate.id !== stamp.id) {
          throw new CoreError(ErrorCodes.DUPLICATE_STAMP, `A stamp at ${normalized} on ${stamp.date} already exists`);
        }

        this.ledger.revertDay(employee, stamp.date);
        this.repositories.stamps.updateStampTime(stamp.id, normalized);
        return this.finishStampChange(employeeId, stamp.date, this.repositories.stamps.getStamp(stamp.id), [], now);
      })
    );
  }

  deleteStamp(employeeId: string, stampId: string): ApiResponse<StampChangeResult> {
    return runOperation(log, 'deleteStamp', () =>
      this.db.transaction(() => {
        const now = this.timeSource.now();
        const employee = this.requireEmployee(employeeId);
        const stamp = this.requireOwnStamp(employee, stampId);

        this.ledger.revertDay(employee, stamp.date);
        this.repositories.stamps.deleteStamp(stamp.id);
        return this.finishStampChange(employeeId, stamp.date, null, [], now);
      })
    );
  }

  previewStamp(employeeId: string, date?: string, time?: string): ApiResponse<StampAdvisory[]> {
    return runOperation(log, 'previewStamp', () => {
      const now = this.timeSource.now();
      const targetDate = date ?? now.date;
      const normalized = time === undefined ? now.time : normalizeTime(time);
      if (!isValidDate(targetDate) || normalized === null) {
        throw new CoreError(ErrorCodes.INVALID_INPUT, 'Date or time is not valid');
      }
      return this.monitor.previewStamp(this.requireEmployee(employeeId), targetDate, normalized);
    });
  }

  // ==========================================================================
  // Absences
  // ==========================================================================

  registerAbsence(employeeId: string, date: string, type: string): ApiResponse<Absence> {
    return runOperation(log, 'registerAbsence', () => {
      if (!isValidDate(date)) {
        throw new CoreError(ErrorCodes.INVALID_DATE, 'The date must be in YYYY-MM-DD format');
      }
      if (!isAbsenceType(type)) {
        throw new CoreError(ErrorCodes.INVALID_INPUT, `Absence type must be one of ${ABSENCE_TYPES.join(', ')}`);
      }

      const { stamps, absences, notifications, employees } = this.repositories;
      return this.db.transaction(() => {
        const employee = this.requireEmployee(employeeId);
        if (stamps.listStampsForDate(employee.id, date).length > 0) {
          throw new CoreError(ErrorCodes.STAMP_CONFLICT, `Time was already recorded on ${date}`);
        }
        if (absences.getAbsenceOnDate(employee.id, date)) {
          throw new CoreError(ErrorCodes.DUPLICATE_ENTRY, `An absence is already registered on ${date}`);
        }

        const penalty = notifications.findNotification(employee.id, NotificationCodes.MISSING_WORKDAY, date);
        if (penalty) {
          employees.adjustFlexBalance(employee.id, secondsToHours(this.quota.dailyTargetSeconds(employee, date)));
          notifications.deleteNotification(penalty.id);
        }
        return absences.createAbsence(employee.id, date, type);
      });
    });
  }

  /**
   * Remove the absences of a date; the next login charges the day if it stays empty
   */
  removeAbsence(employeeId: string, date: string, type?: AbsenceType): ApiResponse<number> {
    return runOperation(log, 'removeAbsence', () =>
      this.db.transaction(() => {
        const employee = this.requireEmployee(employeeId);
        const removed = this.repositories.absences.deleteAbsencesOnDate(employee.id, date, type);
        if (removed === 0) {
          throw new CoreError(ErrorCodes.NOT_FOUND, `No absence registered on ${date}`);
        }
        if (date < employee.lastSettledLogin) {
          this.repositories.employees.setLastSettledLogin(employee.id, date);
        }
        return removed;
      })
    );
  }

  countAbsenceDays(employeeId: string, year: number, month: number): ApiResponse<Record<AbsenceType, number>> {
    return runOperation(log, 'countAbsenceDays', () => {
      if (!Number.isInteger(year) || !Number.isInteger(month) || month < 1 || month > 12) {
        throw new CoreError(ErrorCodes.INVALID_INPUT, 'Year and month (1-12) are required');
      }
      const employee = this.requireEmployee(employeeId);
      const dates = getMonthDates(year, month);
      const counts: Record<AbsenceType, number> = { vacation: 0, sick: 0, training: 0, other: 0 };
      const first = dates[0];
      const last = dates.at(-1);
      if (!first || !last) return counts;
      for (const absence of this.repositories.absences.listAbsencesInRange(employee.id, first, last)) {
        counts[absence.type]++;
      }
      return counts;
    });
  }

  // ==========================================================================
  // Settings
  // ==========================================================================

  updateWeeklyHours(employeeId: string, hours: number, effectiveFrom?: string): ApiResponse<WeeklyHoursEntry> {
    return runOperation(log, 'updateWeeklyHours', () => {
      assertWeeklyHours(hours);
      const from = effectiveFrom ?? this.timeSource.now().date;
      if (!isValidDate(from)) {
        throw new CoreError(ErrorCodes.INVALID_DATE, 'The effective date must be in YYYY-MM-DD format');
      }
      return this.db.transaction(() => {
        const employee = this.requireEmployee(employeeId);
        const entry = this.repositories.weeklyHours.upsertWeeklyHours(employee.id, from, hours);
        this.repositories.employees.setWeeklyHours(employee.id, hours);
        return entry;
      });
    });
  }

  updateThresholds(employeeId: string, green: number, red: number): ApiResponse<Employee> {
    return runOperation(log, 'updateThresholds', () => {
      assertThresholds(green, red);
      return this.db.transaction(() => {
        const employee = this.requireEmployee(employeeId);
        this.repositories.employees.setThresholds(employee.id, green, red);
        return this.requireEmployee(employeeId);
      });
    });
  }

  changeCredential(employeeId: string, credential: string, confirmation: string): ApiResponse<true> {
    return runOperation(log, 'changeCredential', () => {
      if (!credential) {
        throw new CoreError(ErrorCodes.INVALID_INPUT, 'The new password must not be empty');
      }
      if (credential !== confirmation) {
        throw new CoreError(ErrorCodes.INVALID_INPUT, 'The passwords do not match');
      }
      return this.db.transaction(() => {
        const employee = this.requireEmployee(employeeId);
        this.repositories.employees.setCredential(employee.id, this.hasher.hash(credential));
        return true;
      });
    });
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  getOverview(employeeId: string): ApiResponse<FlexOverview> {
    return runOperation(log, 'getOverview', () =>
      this.overview(this.requireEmployee(employeeId), this.timeSource.now().date)
    );
  }

  getDayDetail(employeeId: string, date: string): ApiResponse<DayDetail> {
    return runOperation(log, 'getDayDetail', () => {
      if (!isValidDate(date)) {
        throw new CoreError(ErrorCodes.INVALID_DATE, 'The date must be in YYYY-MM-DD format');
      }
      const employee = this.requireEmployee(employeeId);
      const { stamps, absences, notifications } = this.repositories;
      const dayStamps = stamps.listStampsForDate(employee.id, date);
      const absence = absences.getAbsenceOnDate(employee.id, date);
      const minor = isMinorOn(employee.birthDate, date);

      const workedSeconds = workedSecondsOn(dayStamps, date, employee.birthDate);
      const targetSeconds = absence ? 0 : this.quota.chargedTargetSeconds(employee, date, dayStamps.length > 0);
      const dayNotifications = notifications
        .listNotifications(employee.id)
        .filter(notification => notification.date === date);

      return {
        date,
        stamps: dayStamps.map(stamp => ({
          id: stamp.id,
          time: stamp.time,
          settled: stamp.settled,
          outsideWorkWindow: isOutsideWorkWindow(stamp.time, minor),
        })),
        workedHours: roundHours(secondsToHours(workedSeconds)),
        targetHours: roundHours(secondsToHours(targetSeconds)),
        deltaHours: roundHours(secondsToHours(workedSeconds - targetSeconds)),
        absence: absence ? absence.type : null,
        notifications: dayNotifications.map(renderNotification),
      };
    });
  }

  getFlexTimeAverage(
    employeeId: string,
    startDate: string,
    endDate: string,
    includeMissingDays: boolean
  ): ApiResponse<FlexTimeAverage> {
    return runOperation(log, 'getFlexTimeAverage', () =>
      this.ledger.averageFlexTime(this.requireEmployee(employeeId), startDate, endDate, includeMissingDays)
    );
  }

  getFlexReport(employeeId: string, startDate: string, endDate: string): ApiResponse<FlexReport> {
    return runOperation(log, 'getFlexReport', () =>
      this.reports.generateFlexReport(this.requireEmployee(employeeId), startDate, endDate)
    );
  }

  listSubordinates(supervisorId: string): ApiResponse<FlexOverview[]> {
    return runOperation(log, 'listSubordinates', () => {
      const supervisor = this.requireEmployee(supervisorId);
      const today = this.timeSource.now().date;
      return this.repositories.employees
        .listSubordinates(supervisor.id)
        .map(employee => this.overview(employee, today));
    });
  }

  pendingPopups(employeeId: string): ApiResponse<Notification[]> {
    return runOperation(log, 'pendingPopups', () =>
      this.popups.pendingPopups(this.requireEmployee(employeeId).id, this.timeSource.now())
    );
  }

  duePopups(employeeId: string): ApiResponse<Notification[]> {
    return runOperation(log, 'duePopups', () =>
      this.popups.duePopups(this.requireEmployee(employeeId).id, this.timeSource.now())
    );
  }

  dismissPopup(employeeId: string, notificationId: string): ApiResponse<true> {
    return runOperation(log, 'dismissPopup', () =>
      this.db.transaction(() => {
        this.popups.dismissPopup(this.requireEmployee(employeeId).id, notificationId);
        return true;
      })
    );
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private requireEmployee(employeeId: string): Employee {
    const employee = this.repositories.employees.getEmployee(employeeId);
    if (!employee) {
      throw new CoreError(ErrorCodes.NOT_FOUND, 'Employee not found', { employeeId });
    }
    return employee;
  }

  private requireOwnStamp(employee: Employee, stampId: string): TimeStamp {
    const stamp = this.repositories.stamps.getStamp(stampId);
    if (!stamp) {
      throw new CoreError(ErrorCodes.NOT_FOUND, 'Stamp not found', { stampId });
    }
    if (stamp.employeeId !== employee.id) {
      throw new CoreError(ErrorCodes.FORBIDDEN, 'The stamp belongs to another employee', { stampId });
    }
    return stamp;
  }

  /**
   * Validate format and reject moments in the future. Returns the normalized time.
   */
  private validateStampMoment(date: string, time: string): string {
    if (!isValidDate(date)) {
      throw new CoreError(ErrorCodes.INVALID_DATE, 'The date must be in YYYY-MM-DD format', { date });
    }
    const normalized = normalizeTime(time);
    if (normalized === null) {
      throw new CoreError(ErrorCodes.INVALID_TIME, 'The time must be in HH:mm format', { time });
    }
    if (compareDateTime({ date, time: normalized }, this.timeSource.now()) > 0) {
      throw new CoreError(ErrorCodes.FUTURE_STAMP, 'Stamps cannot be recorded in the future', { date, time });
    }
    return normalized;
  }

  private assertStampAllowed(employee: Employee, date: string, time: string): void {
    if (this.repositories.absences.getAbsenceOnDate(employee.id, date)) {
      throw new CoreError(ErrorCodes.ABSENCE_CONFLICT, `An absence is registered on ${date}`);
    }
    if (this.repositories.stamps.findStamp(employee.id, date, time)) {
      throw new CoreError(ErrorCodes.DUPLICATE_STAMP, `A stamp at ${time} on ${date} already exists`);
    }
  }

  /**
   * Missing days, odd stamps, settlement, rules 3-8 and the correction sweep
   */
  private reevaluate(employeeId: string, today: string): ReevaluationResult {
    const employee = this.requireEmployee(employeeId);
    const missingDays = this.monitor.checkMissingWorkdays(employee, today);
    const oddStampDays = this.monitor.checkOddStampCounts(employee, today);
    const settlement = this.ledger.settle(employee, today);
    const compliance = this.monitor.evaluate(employee, today);
    const resolvedNotifications = this.monitor.resolveCorrectedNotifications(employee, today);
    return { missingDays, oddStampDays, settlement, compliance, resolvedNotifications };
  }

  private finishStampChange(
    employeeId: string,
    date: string,
    stamp: TimeStamp | null,
    advisories: StampAdvisory[],
    now: LocalDateTime
  ): StampChangeResult {
    const reevaluation = this.reevaluate(employeeId, now.date);
    const employee = this.requireEmployee(employeeId);
    if (date === now.date) {
      this.refreshPopups(employee, now);
    }
    return {
      stamp: stamp ? this.repositories.stamps.getStamp(stamp.id) : null,
      advisories,
      reevaluation,
      balance: employee.flexBalance,
    };
  }

  /**
   * Popups follow the clock state: rescheduled while clocked in, cleared otherwise
   */
  private refreshPopups(employee: Employee, now: LocalDateTime): Notification[] {
    this.popups.clearWarnings(employee.id, now.date);
    return this.popups.scheduleWarnings(employee, now);
  }

  private overview(employee: Employee, today: string): FlexOverview {
    return buildOverview(
      employee,
      this.repositories.notifications.listNotifications(employee.id),
      this.ledger.cumulativeFlexTime(employee, today)
    );
  }
}

function assertWeeklyHours(hours: number): void {
  if (!Number.isInteger(hours) || hours <= 0) {
    throw new CoreError(ErrorCodes.INVALID_WEEKLY_HOURS, 'Weekly hours must be a positive whole number', { hours });
  }
}

function assertThresholds(green: number, red: number): void {
  if (!Number.isFinite(green) || !Number.isFinite(red) || red >= green) {
    throw new CoreError(ErrorCodes.THRESHOLD_ORDER, 'The red threshold must be below the green threshold', {
      green,
      red,
    });
  }
}
