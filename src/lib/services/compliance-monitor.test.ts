/**
 * Tests for the Compliance Monitor
 * Each rule is driven through an in-memory database.
 */

import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import { initTestDatabase, closeTestDatabase, resetTestDatabase, seedEmployee } from '../test-utils';
import { createRepositories, DEFAULT_COMPLIANCE_SETTINGS } from '../repositories';
import { NotificationCodes } from '../../types';
import type { ComplianceSettings, Employee, NotificationCode } from '../../types';
import { ComplianceMonitor, restGapSeconds } from './compliance-monitor';
import { QuotaResolver } from './quota-resolver';

const db = initTestDatabase();
const repos = createRepositories(db);

// 15 years old throughout 2024
const MINOR_BIRTH_DATE = '2009-01-01';

function createMonitor(overrides: Partial<ComplianceSettings> = {}): ComplianceMonitor {
  return new ComplianceMonitor({
    db,
    employees: repos.employees,
    stamps: repos.stamps,
    absences: repos.absences,
    notifications: repos.notifications,
    quota: new QuotaResolver(repos.weeklyHours),
    isHoliday: date => date === '2024-10-03',
    settings: { ...DEFAULT_COMPLIANCE_SETTINGS, ...overrides },
  });
}

function stampDay(employee: Employee, date: string, ...times: string[]): void {
  for (const time of times) {
    repos.stamps.createStamp(employee.id, date, time);
  }
}

function codesOn(employee: Employee, date: string): NotificationCode[] {
  return repos.notifications
    .listNotifications(employee.id)
    .filter(notification => notification.date === date)
    .map(notification => notification.code);
}

const monitor = createMonitor();

describe('ComplianceMonitor', () => {
  beforeEach(() => {
    resetTestDatabase();
  });

  afterAll(() => {
    closeTestDatabase();
  });

  it('computes rest gaps across midnight', () => {
    const last = { id: 'a', employeeId: 'e', date: '2024-06-10', time: '22:00:00', settled: true, createdAt: '' };
    const first = { ...last, id: 'b', date: '2024-06-11', time: '07:00:00' };
    expect(restGapSeconds(last, first)).toBe(9 * 3600);
  });

  describe('missing workdays (code 1)', () => {
    it('charges the target for weekdays without stamps or absence', () => {
      const employee = seedEmployee(db, { lastSettledLogin: '2024-06-10' });
      stampDay(employee, '2024-06-10', '08:00:00', '16:30:00');
      repos.absences.createAbsence(employee.id, '2024-06-11', 'vacation');

      const charged = monitor.checkMissingWorkdays(employee, '2024-06-13');

      expect(charged).toEqual(['2024-06-12']);
      expect(repos.employees.getEmployee(employee.id)?.flexBalance).toBe(-8);
      expect(codesOn(employee, '2024-06-12')).toEqual([NotificationCodes.MISSING_WORKDAY]);
    });

    it('charges each day only once', () => {
      const employee = seedEmployee(db, { lastSettledLogin: '2024-06-12' });

      monitor.checkMissingWorkdays(employee, '2024-06-13');
      expect(monitor.checkMissingWorkdays(employee, '2024-06-13')).toEqual([]);

      expect(repos.employees.getEmployee(employee.id)?.flexBalance).toBe(-8);
    });

    it('skips weekends', () => {
      const employee = seedEmployee(db, { lastSettledLogin: '2024-06-15' });
      expect(monitor.checkMissingWorkdays(employee, '2024-06-17')).toEqual([]);
    });

    it('ignores unapproved absences when approval is required', () => {
      const strict = createMonitor({ requireApprovedAbsence: true });
      const employee = seedEmployee(db, { lastSettledLogin: '2024-06-11' });
      repos.absences.createAbsence(employee.id, '2024-06-11', 'sick');

      expect(strict.checkMissingWorkdays(employee, '2024-06-12')).toEqual(['2024-06-11']);
    });
  });

  describe('odd stamp counts (code 2)', () => {
    it('flags past dates with an odd number of stamps but not today', () => {
      const employee = seedEmployee(db);
      stampDay(employee, '2024-06-10', '08:00:00');
      stampDay(employee, '2024-06-11', '08:00:00', '16:00:00');
      stampDay(employee, '2024-06-13', '08:00:00');

      expect(monitor.checkOddStampCounts(employee, '2024-06-13')).toEqual(['2024-06-10']);
      expect(codesOn(employee, '2024-06-10')).toEqual([NotificationCodes.ODD_STAMP_COUNT]);
    });
  });

  describe('rest periods (code 3)', () => {
    it('uses the day before the window as reference', () => {
      const employee = seedEmployee(db, { lastSettledLogin: '2024-06-11' });
      stampDay(employee, '2024-06-10', '14:00:00', '22:00:00');
      stampDay(employee, '2024-06-11', '07:00:00', '15:00:00');
      stampDay(employee, '2024-06-12', '09:00:00', '17:00:00');

      expect(monitor.checkRestPeriods(employee, '2024-06-13')).toEqual(['2024-06-11']);
      expect(codesOn(employee, '2024-06-11')).toEqual([NotificationCodes.REST_PERIOD]);
    });

    it('requires twelve hours for minors', () => {
      const employee = seedEmployee(db, { birthDate: MINOR_BIRTH_DATE, lastSettledLogin: '2024-06-11' });
      // 11.5h of rest
      stampDay(employee, '2024-06-10', '10:00:00', '18:30:00');
      stampDay(employee, '2024-06-11', '06:00:00', '12:00:00');

      expect(monitor.checkRestPeriods(employee, '2024-06-12')).toEqual(['2024-06-11']);
    });
  });

  describe('six-month average (code 4)', () => {
    it('notifies when the average worked day exceeds eight hours', () => {
      const employee = seedEmployee(db);
      // 11h gross, 45 min break
      stampDay(employee, '2024-06-10', '08:00:00', '19:00:00');
      stampDay(employee, '2024-06-11', '08:00:00', '19:00:00');

      expect(monitor.averageDailySeconds(employee, '2024-06-13')).toBe(10.25 * 3600);
      expect(monitor.checkAverageWorkingTime(employee, '2024-06-13')).toBe(true);
      expect(codesOn(employee, '2024-06-13')).toEqual([NotificationCodes.SIX_MONTH_AVERAGE]);
    });
  });

  describe('daily maximum (code 5)', () => {
    it('allows ten hours for adults', () => {
      const employee = seedEmployee(db, { lastSettledLogin: '2024-06-11' });
      // 10h45 gross, 45 min break: exactly 10h
      stampDay(employee, '2024-06-11', '08:00:00', '18:45:00');

      expect(monitor.checkDailyMaximum(employee, '2024-06-12')).toEqual([]);
    });

    it('flags more than eight hours for minors', () => {
      const employee = seedEmployee(db, { birthDate: MINOR_BIRTH_DATE, lastSettledLogin: '2024-06-11' });
      // 11h gross, 60 min break: 10h
      stampDay(employee, '2024-06-11', '08:00:00', '19:00:00');

      expect(monitor.checkDailyMaximum(employee, '2024-06-12')).toEqual(['2024-06-11']);
      expect(monitor.dailyWorkedSeconds(employee, '2024-06-11')).toBe(10 * 3600);
    });
  });

  describe('Sunday and holiday work (code 6)', () => {
    it('flags stamps on Sundays and holidays', () => {
      const employee = seedEmployee(db, { lastSettledLogin: '2024-09-30' });
      stampDay(employee, '2024-10-03', '09:00:00', '12:00:00');
      stampDay(employee, '2024-10-04', '09:00:00', '12:00:00');
      stampDay(employee, '2024-10-06', '09:00:00', '12:00:00');

      expect(monitor.checkSundayHolidayWork(employee, '2024-10-07')).toEqual(['2024-10-03', '2024-10-06']);
    });
  });

  describe('minor weekly limits (codes 7 and 8)', () => {
    it('flags more than forty hours and more than five days in a complete week', () => {
      const employee = seedEmployee(db, { birthDate: MINOR_BIRTH_DATE, lastSettledLogin: '2024-06-10' });
      // Monday to Saturday, 8h gross minus 60 min break: 42h
      for (const date of ['2024-06-10', '2024-06-11', '2024-06-12', '2024-06-13', '2024-06-14', '2024-06-15']) {
        stampDay(employee, date, '08:00:00', '16:00:00');
      }

      expect(monitor.weeklyWorkedSeconds(employee, '2024-06-10')).toBe(42 * 3600);
      expect(monitor.checkMinorWeeklyHours(employee, '2024-06-17')).toEqual(['2024-06-10']);
      expect(monitor.checkMinorWorkdays(employee, '2024-06-17')).toEqual(['2024-06-10']);
    });

    it('waits until the week is complete', () => {
      const employee = seedEmployee(db, { birthDate: MINOR_BIRTH_DATE, lastSettledLogin: '2024-06-10' });
      for (const date of ['2024-06-10', '2024-06-11', '2024-06-12', '2024-06-13', '2024-06-14', '2024-06-15']) {
        stampDay(employee, date, '08:00:00', '16:00:00');
      }

      expect(monitor.checkMinorWorkdays(employee, '2024-06-16')).toEqual([]);
    });

    it('does not apply to adults', () => {
      const employee = seedEmployee(db, { lastSettledLogin: '2024-06-10' });
      for (const date of ['2024-06-10', '2024-06-11', '2024-06-12', '2024-06-13', '2024-06-14', '2024-06-15']) {
        stampDay(employee, date, '08:00:00', '16:00:00');
      }

      expect(monitor.checkMinorWorkdays(employee, '2024-06-17')).toEqual([]);
    });
  });

  describe('evaluate', () => {
    it('runs codes 3 to 8 together', () => {
      const employee = seedEmployee(db, { lastSettledLogin: '2024-10-01' });
      stampDay(employee, '2024-10-03', '08:00:00', '19:00:00');

      const report = monitor.evaluate(employee, '2024-10-04');

      expect(report).toEqual({
        restPeriodViolations: [],
        averageExceeded: true,
        dailyMaximumViolations: ['2024-10-03'],
        sundayHolidayWork: ['2024-10-03'],
        minorWeeklyHours: [],
        minorWorkdays: [],
      });
    });
  });

  describe('resolveCorrectedNotifications', () => {
    it('removes notifications whose condition no longer holds', () => {
      const employee = seedEmployee(db, { lastSettledLogin: '2024-06-11' });
      stampDay(employee, '2024-06-11', '08:00:00', '19:30:00');
      monitor.checkDailyMaximum(employee, '2024-06-12');
      expect(codesOn(employee, '2024-06-11')).toEqual([NotificationCodes.DAILY_MAXIMUM]);

      const end = repos.stamps.findStamp(employee.id, '2024-06-11', '19:30:00');
      if (end) repos.stamps.updateStampTime(end.id, '17:00:00');

      expect(monitor.resolveCorrectedNotifications(employee, '2024-06-12')).toBe(1);
      expect(codesOn(employee, '2024-06-11')).toEqual([]);
    });

    it('keeps notifications that still apply', () => {
      const employee = seedEmployee(db, { lastSettledLogin: '2024-10-06' });
      stampDay(employee, '2024-10-06', '09:00:00', '12:00:00');
      monitor.checkSundayHolidayWork(employee, '2024-10-07');

      expect(monitor.resolveCorrectedNotifications(employee, '2024-10-07')).toBe(0);
      expect(codesOn(employee, '2024-10-06')).toEqual([NotificationCodes.SUNDAY_HOLIDAY_WORK]);
    });

    it('leaves missing-day and odd-count notices alone', () => {
      const employee = seedEmployee(db, { lastSettledLogin: '2024-06-12' });
      monitor.checkMissingWorkdays(employee, '2024-06-13');

      expect(monitor.resolveCorrectedNotifications(employee, '2024-06-13')).toBe(0);
    });
  });

  describe('previewStamp', () => {
    it('warns about the work window and a short rest', () => {
      const employee = seedEmployee(db);
      stampDay(employee, '2024-06-10', '14:00:00', '22:00:00');

      const kinds = monitor.previewStamp(employee, '2024-06-11', '05:30:00').map(advisory => advisory.kind);

      expect(kinds).toEqual(['outside-work-window', 'rest-period']);
    });

    it('warns a minor before a sixth workday', () => {
      const employee = seedEmployee(db, { birthDate: MINOR_BIRTH_DATE });
      for (const date of ['2024-06-10', '2024-06-11', '2024-06-12', '2024-06-13', '2024-06-14']) {
        stampDay(employee, date, '08:00:00', '16:00:00');
      }

      const kinds = monitor.previewStamp(employee, '2024-06-15', '10:00:00').map(advisory => advisory.kind);

      expect(kinds).toEqual(['minor-sixth-workday']);
    });

    it('warns about Sundays', () => {
      const employee = seedEmployee(db);
      expect(monitor.previewStamp(employee, '2024-06-16', '10:00:00').map(advisory => advisory.kind)).toEqual([
        'sunday-or-holiday',
      ]);
    });

    it('returns nothing for an ordinary stamp', () => {
      const employee = seedEmployee(db);
      expect(monitor.previewStamp(employee, '2024-06-12', '08:00:00')).toEqual([]);
    });
  });
});
