/**
 * Quota Resolver
 * Resolves the weekly hours in force on a date and the daily target derived from them.
 */

import type { Employee } from '../../types';
import type { WeeklyHoursRepository } from '../../types/services';
import { SECONDS_PER_HOUR, isWeekday } from '../utils/dates';

export const WORKDAYS_PER_WEEK = 5;
/** Daily hours used when the contract carries no usable value */
export const DEFAULT_DAILY_HOURS = 8;

/**
 * Weekly hours / 5. Falls back to fallbackHours (or zero) when weekly hours are not positive.
 */
export function calculateDailyTargetSeconds(weeklyHours: number | null, fallbackHours?: number): number {
  if (weeklyHours !== null && weeklyHours > 0) {
    return Math.round((weeklyHours / WORKDAYS_PER_WEEK) * SECONDS_PER_HOUR);
  }
  return Math.round((fallbackHours ?? 0) * SECONDS_PER_HOUR);
}

export class QuotaResolver {
  constructor(private readonly history: WeeklyHoursRepository) {}

  /**
   * Latest history entry effective on or before the date, else the fallback
   */
  resolveWeeklyHours(employeeId: string, date: string, fallbackWeeklyHours: number): number {
    return this.history.getWeeklyHoursOn(employeeId, date) ?? fallbackWeeklyHours;
  }

  dailyTargetSeconds(employee: Employee, date: string): number {
    const weeklyHours = this.resolveWeeklyHours(employee.id, date, employee.weeklyHours);
    const fallbackHours = employee.weeklyHours > 0 ? undefined : DEFAULT_DAILY_HOURS;
    return calculateDailyTargetSeconds(weeklyHours, fallbackHours);
  }

  /**
   * Target a date ends up charged with: weekdays through settlement or the
   * missing-day penalty, weekends only once work was stamped on them.
   */
  chargedTargetSeconds(employee: Employee, date: string, stamped: boolean): number {
    return isWeekday(date) || stamped ? this.dailyTargetSeconds(employee, date) : 0;
  }
}
