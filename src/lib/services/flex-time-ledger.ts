/**
 * Flex-Time Ledger
 *
 * Settles paired stamps into the employee's flex-time balance. Each
 * calendar day is charged its daily target at most once:
 *
 * - a day with a missing-workday penalty already paid its target, so
 *   work added later counts in full
 * - a day with settled stamps already paid its target, so newly paired
 *   work counts in full
 * - otherwise the day contributes worked time minus target
 *
 * revertDay() is the exact inverse for one day and must run before a
 * stamp of that day is changed.
 */

import type { Database } from '../database';
import type { Employee, FlexTimeAverage, FlexTimeRollups } from '../../types';
import { NotificationCodes } from '../../types';
import { ErrorCodes } from '../../types/api';
import type { EmployeeRepository, NotificationRepository, TimeStampRepository } from '../../types/services';
import { CoreError } from '../errors';
import { createLogger } from '../logger';
import {
  eachDay,
  isValidDate,
  isWeekday,
  roundHours,
  secondsToHours,
  startOfMonth,
  startOfQuarter,
  startOfYear,
} from '../utils/dates';
import { accumulateDays } from './day-accumulator';
import { BREAKS_ONLY } from './interval-calculator';
import type { QuotaResolver } from './quota-resolver';

const log = createLogger('flex-time-ledger');

export interface SettlementResult {
  deltaHours: number;
  settledDates: string[];
  settledStampIds: string[];
  /** Stamps left open because they have no partner */
  openStampIds: string[];
}

export interface RevertResult {
  date: string;
  deltaHours: number;
  unsettledStamps: number;
  penaltyRemoved: boolean;
}

export interface FlexTimeLedgerDeps {
  db: Database;
  employees: EmployeeRepository;
  stamps: TimeStampRepository;
  notifications: NotificationRepository;
  quota: QuotaResolver;
}

export class FlexTimeLedger {
  constructor(private readonly deps: FlexTimeLedgerDeps) {}

  /**
   * Settle every unsettled stamp dated on or before upTo.
   * Stamp flags and balance are written in one transaction.
   */
  settle(employee: Employee, upTo: string): SettlementResult {
    const { db, employees, stamps } = this.deps;

    return db.transaction(() => {
      const unsettled = stamps.listUnsettledStamps(employee.id, upTo);
      const { workedByDate, consumed, skipped } = accumulateDays(unsettled, employee.birthDate);

      let deltaSeconds = 0;
      for (const [date, workedSeconds] of workedByDate) {
        deltaSeconds += this.settlementDelta(employee, date, workedSeconds);
      }

      const settledStampIds = consumed.map(stamp => stamp.id);
      stamps.markSettled(settledStampIds);

      const deltaHours = secondsToHours(deltaSeconds);
      if (deltaSeconds !== 0) {
        employees.adjustFlexBalance(employee.id, deltaHours);
      }

      if (settledStampIds.length > 0) {
        log.debug(`Settled ${settledStampIds.length} stamps for ${employee.id}, delta ${deltaHours.toFixed(2)}h`);
      }

      return {
        deltaHours,
        settledDates: [...workedByDate.keys()],
        settledStampIds,
        openStampIds: skipped.map(stamp => stamp.id),
      };
    });
  }

  /**
   * Undo what settlement added for one date and mark the date's stamps unsettled.
   * Also clears the date's odd-count notice and reopens the compliance
   * window at that date so the next evaluation covers it again.
   */
  revertDay(employee: Employee, date: string): RevertResult {
    const { db, employees, stamps, notifications, quota } = this.deps;

    return db.transaction(() => {
      const dayStamps = stamps.listStampsForDate(employee.id, date);
      const settled = dayStamps.filter(stamp => stamp.settled);
      const settledWorked = accumulateDays(settled, employee.birthDate).workedByDate.get(date) ?? 0;
      const target = quota.dailyTargetSeconds(employee, date);
      const penalty = notifications.findNotification(employee.id, NotificationCodes.MISSING_WORKDAY, date);

      let deltaSeconds = 0;
      if (penalty) {
        // The penalty charged the target; later work was added in full
        deltaSeconds = target - settledWorked;
        notifications.deleteNotification(penalty.id);
      } else if (settled.length > 0) {
        deltaSeconds = -(settledWorked - target);
      }

      notifications.deleteNotificationFor(employee.id, NotificationCodes.ODD_STAMP_COUNT, date);
      const unsettledStamps = stamps.markDateUnsettled(employee.id, date);

      const deltaHours = secondsToHours(deltaSeconds);
      if (deltaSeconds !== 0) {
        employees.adjustFlexBalance(employee.id, deltaHours);
      }

      const current = employees.getEmployee(employee.id);
      if (current && current.lastSettledLogin > date) {
        employees.setLastSettledLogin(employee.id, date);
      }

      log.debug(`Reverted ${date} for ${employee.id}, delta ${deltaHours.toFixed(2)}h`);
      return { date, deltaHours, unsettledStamps, penaltyRemoved: penalty !== null };
    });
  }

  /**
   * Signed contribution of a date's newly paired work
   */
  private settlementDelta(employee: Employee, date: string, workedSeconds: number): number {
    const { stamps, notifications, quota } = this.deps;

    if (notifications.findNotification(employee.id, NotificationCodes.MISSING_WORKDAY, date)) {
      return workedSeconds;
    }
    if (stamps.listStampsForDate(employee.id, date).some(stamp => stamp.settled)) {
      return workedSeconds;
    }
    return workedSeconds - quota.dailyTargetSeconds(employee, date);
  }

  /**
   * Average and total flex time over the weekdays of [startDate, endDate].
   * Days without paired work count -target only when includeMissingDays is set.
   */
  averageFlexTime(employee: Employee, startDate: string, endDate: string, includeMissingDays: boolean): FlexTimeAverage {
    if (!isValidDate(startDate) || !isValidDate(endDate)) {
      throw new CoreError(ErrorCodes.INVALID_DATE, 'Start and end must be dates in YYYY-MM-DD format', {
        startDate,
        endDate,
      });
    }
    if (startDate > endDate) {
      throw new CoreError(ErrorCodes.INVALID_DATE_RANGE, 'The start date must not be after the end date', {
        startDate,
        endDate,
      });
    }

    const { stamps, quota } = this.deps;
    const rangeStamps = stamps.listStampsInRange(employee.id, startDate, endDate);
    const { workedByDate } = accumulateDays(rangeStamps, employee.birthDate, BREAKS_ONLY);

    const days: string[] = [];
    let totalSeconds = 0;
    for (const date of eachDay(startDate, endDate)) {
      if (!isWeekday(date)) continue;
      const worked = workedByDate.get(date);
      const target = quota.dailyTargetSeconds(employee, date);
      if (worked !== undefined) {
        totalSeconds += worked - target;
      } else if (includeMissingDays) {
        totalSeconds -= target;
      } else {
        continue;
      }
      days.push(date);
    }

    if (days.length === 0) {
      return { averageHours: 0, totalHours: 0, dayCount: 0, days: [] };
    }

    const totalHours = secondsToHours(totalSeconds);
    return {
      averageHours: roundHours(totalHours / days.length),
      totalHours: roundHours(totalHours),
      dayCount: days.length,
      days,
    };
  }

  /**
   * Flex-time totals from the start of the current month, quarter and year up to today
   */
  cumulativeFlexTime(employee: Employee, today: string, includeMissingDays = false): FlexTimeRollups {
    return {
      month: this.averageFlexTime(employee, startOfMonth(today), today, includeMissingDays).totalHours,
      quarter: this.averageFlexTime(employee, startOfQuarter(today), today, includeMissingDays).totalHours,
      year: this.averageFlexTime(employee, startOfYear(today), today, includeMissingDays).totalHours,
    };
  }
}
