/**
 * Weekly Hours Repository
 * Time-versioned contracted hours, one entry per (employee, effective_from)
 */

import type { Database } from '../database';
import type { WeeklyHoursEntry } from '../../types';
import type { WeeklyHoursRow } from '../../types/api';
import type { WeeklyHoursRepository } from '../../types/services';
import { generateId, now } from './helpers';

function mapRowToEntry(row: WeeklyHoursRow): WeeklyHoursEntry {
  return {
    id: row.id,
    employeeId: row.employee_id,
    effectiveFrom: row.effective_from,
    weeklyHours: row.weekly_hours,
    createdAt: row.created_at,
  };
}

export function createWeeklyHoursRepository(db: Database): WeeklyHoursRepository {
  /**
   * Hours of the latest entry that took effect on or before the date
   */
  function getWeeklyHoursOn(employeeId: string, date: string): number | null {
    const row = db.selectOne<Pick<WeeklyHoursRow, 'weekly_hours'>>(
      `SELECT weekly_hours FROM weekly_hours_history
       WHERE employee_id = ? AND effective_from <= ?
       ORDER BY effective_from DESC LIMIT 1`,
      [employeeId, date]
    );
    return row ? row.weekly_hours : null;
  }

  function upsertWeeklyHours(employeeId: string, effectiveFrom: string, weeklyHours: number): WeeklyHoursEntry {
    db.execute(
      `INSERT INTO weekly_hours_history (id, employee_id, effective_from, weekly_hours, created_at)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(employee_id, effective_from) DO UPDATE SET weekly_hours = excluded.weekly_hours`,
      [generateId(), employeeId, effectiveFrom, weeklyHours, now()]
    );
    const row = db.selectOne<WeeklyHoursRow>(
      'SELECT * FROM weekly_hours_history WHERE employee_id = ? AND effective_from = ?',
      [employeeId, effectiveFrom]
    );
    if (!row) {
      throw new Error('Failed to store weekly hours');
    }
    return mapRowToEntry(row);
  }

  function listHistory(employeeId: string): WeeklyHoursEntry[] {
    return db
      .select<WeeklyHoursRow>(
        'SELECT * FROM weekly_hours_history WHERE employee_id = ? ORDER BY effective_from ASC',
        [employeeId]
      )
      .map(mapRowToEntry);
  }

  return { getWeeklyHoursOn, upsertWeeklyHours, listHistory };
}
