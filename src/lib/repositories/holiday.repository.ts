/**
 * Holiday Repository
 *
 * Company-specific days off. Statutory holidays come from the holiday
 * calendar service and are not stored here.
 */

import type { Database } from '../database';
import type { Holiday, CreateHolidayInput } from '../../types/models';
import type { HolidayRow } from '../../types/api';
import type { HolidayRepository } from '../../types/services';
import { generateId } from './helpers';

function rowToHoliday(row: HolidayRow): Holiday {
  return {
    id: row.id,
    date: row.date,
    name: row.name,
    createdAt: row.created_at,
  };
}

export function createHolidayRepository(db: Database): HolidayRepository {
  /**
   * List holidays, optionally restricted to one year
   */
  function listHolidays(year?: number): Holiday[] {
    if (year !== undefined) {
      return getHolidaysInRange(`${year}-01-01`, `${year}-12-31`);
    }
    return db
      .select<HolidayRow>('SELECT id, date, name, created_at FROM holidays ORDER BY date ASC')
      .map(rowToHoliday);
  }

  function getHoliday(id: string): Holiday | null {
    const row = db.selectOne<HolidayRow>('SELECT id, date, name, created_at FROM holidays WHERE id = ?', [id]);
    return row ? rowToHoliday(row) : null;
  }

  function getHolidayByDate(date: string): Holiday | null {
    const row = db.selectOne<HolidayRow>('SELECT id, date, name, created_at FROM holidays WHERE date = ?', [date]);
    return row ? rowToHoliday(row) : null;
  }

  function createHoliday(data: CreateHolidayInput): Holiday {
    const id = generateId();
    db.execute(
      `INSERT INTO holidays (id, date, name, created_at)
       VALUES (?, ?, ?, datetime('now'))`,
      [id, data.date, data.name]
    );
    const holiday = getHoliday(id);
    if (!holiday) {
      throw new Error('Failed to create holiday');
    }
    return holiday;
  }

  function deleteHoliday(id: string): boolean {
    return db.execute('DELETE FROM holidays WHERE id = ?', [id]).rowsAffected > 0;
  }

  function isHoliday(date: string): boolean {
    const row = db.selectOne<{ count: number }>('SELECT COUNT(*) as count FROM holidays WHERE date = ?', [date]);
    return (row?.count ?? 0) > 0;
  }

  function getHolidaysInRange(startDate: string, endDate: string): Holiday[] {
    return db
      .select<HolidayRow>(
        'SELECT id, date, name, created_at FROM holidays WHERE date >= ? AND date <= ? ORDER BY date ASC',
        [startDate, endDate]
      )
      .map(rowToHoliday);
  }

  return {
    listHolidays,
    getHolidayByDate,
    createHoliday,
    deleteHoliday,
    isHoliday,
    getHolidaysInRange,
  };
}
