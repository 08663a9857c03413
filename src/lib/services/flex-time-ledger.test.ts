/**
 * Tests for the Flex Time Ledger
 * Settlement must be idempotent and revertDay must be its exact inverse.
 */

import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import * as fc from 'fast-check';
import { initTestDatabase, closeTestDatabase, resetTestDatabase, seedEmployee } from '../test-utils';
import { createRepositories } from '../repositories';
import { CoreError } from '../errors';
import { ErrorCodes } from '../../types/api';
import { NotificationCodes } from '../../types';
import type { Employee } from '../../types';
import { formatSecondsAsTime } from '../utils/dates';
import { FlexTimeLedger } from './flex-time-ledger';
import { QuotaResolver } from './quota-resolver';

const db = initTestDatabase();
const repos = createRepositories(db);
const ledger = new FlexTimeLedger({
  db,
  employees: repos.employees,
  stamps: repos.stamps,
  notifications: repos.notifications,
  quota: new QuotaResolver(repos.weeklyHours),
});

function balanceOf(employee: Employee): number {
  return repos.employees.getEmployee(employee.id)?.flexBalance ?? Number.NaN;
}

describe('FlexTimeLedger', () => {
  let employee: Employee;

  beforeEach(() => {
    resetTestDatabase();
    employee = seedEmployee(db, { lastSettledLogin: '2024-06-20' });
  });

  afterAll(() => {
    closeTestDatabase();
  });

  describe('settle', () => {
    it('credits worked time minus the daily target', () => {
      repos.stamps.createStamp(employee.id, '2024-06-10', '08:00:00');
      repos.stamps.createStamp(employee.id, '2024-06-10', '16:45:00');

      // 8h45 gross, 30 min break: 8h15 against an 8h target
      const result = ledger.settle(employee, '2024-06-10');

      expect(result.deltaHours).toBe(0.25);
      expect(result.settledDates).toEqual(['2024-06-10']);
      expect(result.settledStampIds).toHaveLength(2);
      expect(balanceOf(employee)).toBe(0.25);
    });

    it('is idempotent', () => {
      repos.stamps.createStamp(employee.id, '2024-06-10', '08:00:00');
      repos.stamps.createStamp(employee.id, '2024-06-10', '16:45:00');

      ledger.settle(employee, '2024-06-10');
      const second = ledger.settle(employee, '2024-06-10');

      expect(second.deltaHours).toBe(0);
      expect(second.settledStampIds).toEqual([]);
      expect(balanceOf(employee)).toBe(0.25);
    });

    it('leaves an unpaired stamp open', () => {
      const open = repos.stamps.createStamp(employee.id, '2024-06-10', '08:00:00');

      const result = ledger.settle(employee, '2024-06-10');

      expect(result.deltaHours).toBe(0);
      expect(result.openStampIds).toEqual([open.id]);
      expect(repos.stamps.getStamp(open.id)?.settled).toBe(false);
    });

    it('does not charge the target twice for a partly settled day', () => {
      repos.stamps.createStamp(employee.id, '2024-06-10', '08:00:00');
      repos.stamps.createStamp(employee.id, '2024-06-10', '12:00:00');
      ledger.settle(employee, '2024-06-10');
      expect(balanceOf(employee)).toBe(-4);

      repos.stamps.createStamp(employee.id, '2024-06-10', '13:00:00');
      repos.stamps.createStamp(employee.id, '2024-06-10', '17:00:00');
      ledger.settle(employee, '2024-06-10');

      expect(balanceOf(employee)).toBe(0);
    });

    it('adds work in full to a day already charged as missing', () => {
      repos.notifications.addNotification({
        employeeId: employee.id,
        code: NotificationCodes.MISSING_WORKDAY,
        date: '2024-06-11',
      });
      repos.employees.adjustFlexBalance(employee.id, -8);
      repos.stamps.createStamp(employee.id, '2024-06-11', '09:00:00');
      repos.stamps.createStamp(employee.id, '2024-06-11', '13:00:00');

      ledger.settle(employee, '2024-06-11');

      expect(balanceOf(employee)).toBe(-4);
    });

    it('charges the daily target against weekend work', () => {
      repos.stamps.createStamp(employee.id, '2024-06-08', '09:00:00');
      repos.stamps.createStamp(employee.id, '2024-06-08', '13:00:00');

      expect(ledger.settle(employee, '2024-06-08').deltaHours).toBe(-4);
      expect(balanceOf(employee)).toBe(-4);
    });

    it('reverts weekend work by the same amount', () => {
      repos.stamps.createStamp(employee.id, '2024-06-08', '09:00:00');
      repos.stamps.createStamp(employee.id, '2024-06-08', '13:00:00');
      ledger.settle(employee, '2024-06-08');

      expect(ledger.revertDay(employee, '2024-06-08').deltaHours).toBe(4);
      expect(balanceOf(employee)).toBe(0);
    });
  });

  describe('revertDay', () => {
    it('undoes a settlement exactly', () => {
      repos.stamps.createStamp(employee.id, '2024-06-10', '08:00:00');
      repos.stamps.createStamp(employee.id, '2024-06-10', '16:45:00');
      ledger.settle(employee, '2024-06-10');

      const result = ledger.revertDay(employee, '2024-06-10');

      expect(result.deltaHours).toBe(-0.25);
      expect(result.unsettledStamps).toBe(2);
      expect(balanceOf(employee)).toBe(0);
      expect(repos.stamps.listStampsForDate(employee.id, '2024-06-10').every(stamp => !stamp.settled)).toBe(true);
    });

    it('removes a missing-day penalty together with the work settled on top of it', () => {
      repos.notifications.addNotification({
        employeeId: employee.id,
        code: NotificationCodes.MISSING_WORKDAY,
        date: '2024-06-11',
      });
      repos.employees.adjustFlexBalance(employee.id, -8);
      repos.stamps.createStamp(employee.id, '2024-06-11', '09:00:00');
      repos.stamps.createStamp(employee.id, '2024-06-11', '13:00:00');
      ledger.settle(employee, '2024-06-11');

      const result = ledger.revertDay(employee, '2024-06-11');

      expect(result.penaltyRemoved).toBe(true);
      expect(balanceOf(employee)).toBe(0);
      expect(repos.notifications.findNotification(employee.id, NotificationCodes.MISSING_WORKDAY, '2024-06-11')).toBeNull();
    });

    it('clears the odd-count notice and reopens the evaluation window', () => {
      repos.notifications.addNotification({
        employeeId: employee.id,
        code: NotificationCodes.ODD_STAMP_COUNT,
        date: '2024-06-10',
      });

      ledger.revertDay(employee, '2024-06-10');

      expect(repos.notifications.findNotification(employee.id, NotificationCodes.ODD_STAMP_COUNT, '2024-06-10')).toBeNull();
      expect(repos.employees.getEmployee(employee.id)?.lastSettledLogin).toBe('2024-06-10');
    });

    it('property: settle followed by revert restores the balance', () => {
      const second = fc.integer({ min: 0, max: 86_399 });
      fc.assert(
        fc.property(fc.array(second, { minLength: 1, maxLength: 6 }), seconds => {
          resetTestDatabase();
          const subject = seedEmployee(db);
          const times = [...new Set(seconds.map(formatSecondsAsTime))];
          for (const time of times) {
            repos.stamps.createStamp(subject.id, '2024-06-12', time);
          }
          ledger.settle(subject, '2024-06-12');
          ledger.revertDay(subject, '2024-06-12');
          expect(balanceOf(subject)).toBeCloseTo(0, 9);
        }),
        { numRuns: 50 }
      );
    });
  });

  describe('averageFlexTime', () => {
    beforeEach(() => {
      // Monday: 9h15 gross, 45 min break -> +0.5h
      repos.stamps.createStamp(employee.id, '2024-06-10', '08:00:00');
      repos.stamps.createStamp(employee.id, '2024-06-10', '17:15:00');
      // Wednesday: 7h30 gross, 30 min break -> -1h
      repos.stamps.createStamp(employee.id, '2024-06-12', '08:00:00');
      repos.stamps.createStamp(employee.id, '2024-06-12', '15:30:00');
    });

    it('averages over worked weekdays', () => {
      const result = ledger.averageFlexTime(employee, '2024-06-10', '2024-06-16', false);
      expect(result).toEqual({
        averageHours: -0.25,
        totalHours: -0.5,
        dayCount: 2,
        days: ['2024-06-10', '2024-06-12'],
      });
    });

    it('counts missing weekdays when asked', () => {
      const result = ledger.averageFlexTime(employee, '2024-06-10', '2024-06-16', true);
      // Tue, Thu and Fri each -8h
      expect(result.totalHours).toBe(-24.5);
      expect(result.dayCount).toBe(5);
      expect(result.averageHours).toBe(-4.9);
    });

    it('returns zeros for a weekend-only range', () => {
      expect(ledger.averageFlexTime(employee, '2024-06-15', '2024-06-16', true)).toEqual({
        averageHours: 0,
        totalHours: 0,
        dayCount: 0,
        days: [],
      });
    });

    it('rejects a start after the end', () => {
      expect(() => ledger.averageFlexTime(employee, '2024-06-16', '2024-06-10', false)).toThrow(CoreError);
      try {
        ledger.averageFlexTime(employee, '2024-06-16', '2024-06-10', false);
      } catch (error) {
        expect(error instanceof CoreError ? error.code : null).toBe(ErrorCodes.INVALID_DATE_RANGE);
      }
    });

    it('rolls up month, quarter and year', () => {
      const rollups = ledger.cumulativeFlexTime(employee, '2024-06-14');
      expect(rollups).toEqual({ month: -0.5, quarter: -0.5, year: -0.5 });
    });
  });
});
