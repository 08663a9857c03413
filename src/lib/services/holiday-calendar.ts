/**
 * Holiday Calendar
 * Statutory public holidays from date-holidays, plus company holidays from the holidays table.
 */

import Holidays from 'date-holidays';
import type { HolidayChecker, HolidayRepository } from '../../types/services';
import { createLogger } from '../logger';

const log = createLogger('holiday-calendar');

export interface HolidayCalendarOptions {
  /** ISO country code, e.g. 'DE' */
  country: string;
  /** State or region code, e.g. 'BY' for Bavaria */
  state?: string | null;
  companyHolidays?: Pick<HolidayRepository, 'isHoliday'>;
}

export interface StatutoryHoliday {
  date: string;
  name: string;
}

export interface HolidayCalendar {
  isHoliday: HolidayChecker;
  isStatutoryHoliday(date: string): boolean;
  listStatutoryHolidays(year: number): StatutoryHoliday[];
}

export function createHolidayCalendar(options: HolidayCalendarOptions): HolidayCalendar {
  const calendar = options.state ? new Holidays(options.country, options.state) : new Holidays(options.country);
  const cache = new Map<number, StatutoryHoliday[]>();

  function listStatutoryHolidays(year: number): StatutoryHoliday[] {
    const cached = cache.get(year);
    if (cached) return cached;

    const holidays = calendar
      .getHolidays(year)
      .filter(holiday => holiday.type === 'public')
      .map(holiday => ({ date: holiday.date.slice(0, 10), name: holiday.name }));
    if (holidays.length === 0) {
      log.warn(`No public holidays known for ${options.country} in ${year}`);
    }
    cache.set(year, holidays);
    return holidays;
  }

  function isStatutoryHoliday(date: string): boolean {
    const year = Number(date.slice(0, 4));
    return listStatutoryHolidays(year).some(holiday => holiday.date === date);
  }

  function isHoliday(date: string): boolean {
    return isStatutoryHoliday(date) || (options.companyHolidays?.isHoliday(date) ?? false);
  }

  return { isHoliday, isStatutoryHoliday, listStatutoryHolidays };
}
