import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  addDays,
  ageOn,
  compareDateTime,
  diffInDays,
  eachDay,
  formatDisplayDate,
  formatSecondsAsTime,
  getMonthDates,
  getWeekEnd,
  getWeekStart,
  getWeekdayName,
  isMinorOn,
  isValidDate,
  isWeekday,
  normalizeTime,
  parseTimeToSeconds,
  roundHours,
  startOfQuarter,
} from './dates';

describe('date helpers', () => {
  it('validates calendar dates', () => {
    expect(isValidDate('2024-02-29')).toBe(true);
    expect(isValidDate('2023-02-29')).toBe(false);
    expect(isValidDate('2024-13-01')).toBe(false);
    expect(isValidDate('2024-1-01')).toBe(false);
  });

  it('adds days across month and year boundaries', () => {
    expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
    expect(addDays('2024-12-31', 1)).toBe('2025-01-01');
    expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
  });

  it('is not shifted by daylight saving changes', () => {
    expect(addDays('2024-03-30', 1)).toBe('2024-03-31');
    expect(addDays('2024-03-31', 1)).toBe('2024-04-01');
    expect(diffInDays('2024-10-26', '2024-10-28')).toBe(2);
  });

  it('finds the ISO week around a date', () => {
    // 2024-06-12 is a Wednesday
    expect(getWeekStart('2024-06-12')).toBe('2024-06-10');
    expect(getWeekEnd('2024-06-12')).toBe('2024-06-16');
    // Sunday belongs to the week that started on the Monday before
    expect(getWeekStart('2024-06-16')).toBe('2024-06-10');
  });

  it('names weekdays', () => {
    expect(getWeekdayName('2024-06-10')).toBe('Mon');
    expect(isWeekday('2024-06-14')).toBe(true);
    expect(isWeekday('2024-06-15')).toBe(false);
  });

  it('lists inclusive ranges and months', () => {
    expect(eachDay('2024-06-10', '2024-06-12')).toEqual(['2024-06-10', '2024-06-11', '2024-06-12']);
    expect(eachDay('2024-06-12', '2024-06-10')).toEqual([]);
    expect(getMonthDates(2024, 2)).toHaveLength(29);
    expect(startOfQuarter('2024-08-20')).toBe('2024-07-01');
  });

  it('formats dates for display', () => {
    expect(formatDisplayDate('2024-10-03')).toBe('03.10.2024');
  });

  it('property: adding then subtracting days is the identity', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 36_500 }),
        fc.integer({ min: -1000, max: 1000 }),
        (offset, days) => {
          const start = addDays('2000-01-01', offset);
          const shifted = addDays(start, days);
          expect(addDays(shifted, -days)).toBe(start);
          expect(diffInDays(start, shifted)).toBe(days);
        }
      )
    );
  });
});

describe('time helpers', () => {
  it('normalizes HH:mm to HH:mm:ss', () => {
    expect(normalizeTime('07:30')).toBe('07:30:00');
    expect(normalizeTime(' 23:59:59 ')).toBe('23:59:59');
    expect(normalizeTime('24:00')).toBeNull();
    expect(normalizeTime('7:30')).toBeNull();
  });

  it('converts between times and seconds', () => {
    expect(parseTimeToSeconds('01:02:03')).toBe(3723);
    expect(formatSecondsAsTime(3723)).toBe('01:02:03');
    expect(formatSecondsAsTime(-5)).toBe('00:00:00');
    expect(formatSecondsAsTime(90_000)).toBe('23:59:59');
  });

  it('orders date-time points', () => {
    expect(compareDateTime({ date: '2024-06-10', time: '23:00:00' }, { date: '2024-06-11', time: '01:00:00' })).toBeLessThan(0);
    expect(compareDateTime({ date: '2024-06-10', time: '10:00:00' }, { date: '2024-06-10', time: '09:00:00' })).toBe(3600);
  });

  it('rounds hours to two decimals', () => {
    expect(roundHours(8.256)).toBe(8.26);
    expect(roundHours(-0.3333)).toBe(-0.33);
  });
});

describe('age helpers', () => {
  it('counts completed years', () => {
    expect(ageOn('2008-06-15', '2024-06-14')).toBe(15);
    expect(ageOn('2008-06-15', '2024-06-15')).toBe(16);
  });

  it('treats the 18th birthday as the first adult day', () => {
    expect(isMinorOn('2006-06-15', '2024-06-14')).toBe(true);
    expect(isMinorOn('2006-06-15', '2024-06-15')).toBe(false);
  });
});
