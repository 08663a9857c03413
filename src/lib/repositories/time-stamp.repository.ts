/**
 * Time Stamp Repository
 * Raw clock events, ordered by date then time-of-day
 */

import type { Database } from '../database';
import type { TimeStamp, StampCount } from '../../types';
import type { TimeStampRow } from '../../types/api';
import type { TimeStampRepository } from '../../types/services';
import { generateId, now, placeholders } from './helpers';

function mapRowToStamp(row: TimeStampRow): TimeStamp {
  return {
    id: row.id,
    employeeId: row.employee_id,
    date: row.date,
    time: row.time,
    settled: row.settled === 1,
    createdAt: row.created_at,
  };
}

export function createTimeStampRepository(db: Database): TimeStampRepository {
  function getStamp(id: string): TimeStamp | null {
    const row = db.selectOne<TimeStampRow>('SELECT * FROM time_stamps WHERE id = ?', [id]);
    return row ? mapRowToStamp(row) : null;
  }

  function listStampsForDate(employeeId: string, date: string): TimeStamp[] {
    return db
      .select<TimeStampRow>(
        'SELECT * FROM time_stamps WHERE employee_id = ? AND date = ? ORDER BY time ASC',
        [employeeId, date]
      )
      .map(mapRowToStamp);
  }

  function listStampsInRange(employeeId: string, startDate: string, endDate: string): TimeStamp[] {
    return db
      .select<TimeStampRow>(
        `SELECT * FROM time_stamps
         WHERE employee_id = ? AND date >= ? AND date <= ?
         ORDER BY date ASC, time ASC`,
        [employeeId, startDate, endDate]
      )
      .map(mapRowToStamp);
  }

  function listUnsettledStamps(employeeId: string, upTo: string): TimeStamp[] {
    return db
      .select<TimeStampRow>(
        `SELECT * FROM time_stamps
         WHERE employee_id = ? AND settled = 0 AND date <= ?
         ORDER BY date ASC, time ASC`,
        [employeeId, upTo]
      )
      .map(mapRowToStamp);
  }

  function listStampedDates(employeeId: string, startDate: string, endDate: string): string[] {
    return db
      .select<{ date: string }>(
        `SELECT DISTINCT date FROM time_stamps
         WHERE employee_id = ? AND date >= ? AND date <= ?
         ORDER BY date ASC`,
        [employeeId, startDate, endDate]
      )
      .map(row => row.date);
  }

  function listStampCounts(employeeId: string, upTo: string): StampCount[] {
    return db.select<StampCount>(
      `SELECT date, COUNT(*) AS count FROM time_stamps
       WHERE employee_id = ? AND date <= ?
       GROUP BY date ORDER BY date ASC`,
      [employeeId, upTo]
    );
  }

  function findStamp(employeeId: string, date: string, time: string): TimeStamp | null {
    const row = db.selectOne<TimeStampRow>(
      'SELECT * FROM time_stamps WHERE employee_id = ? AND date = ? AND time = ?',
      [employeeId, date, time]
    );
    return row ? mapRowToStamp(row) : null;
  }

  /**
   * Latest stamp strictly before the given date
   */
  function findLastStampBefore(employeeId: string, date: string): TimeStamp | null {
    const row = db.selectOne<TimeStampRow>(
      `SELECT * FROM time_stamps WHERE employee_id = ? AND date < ?
       ORDER BY date DESC, time DESC LIMIT 1`,
      [employeeId, date]
    );
    return row ? mapRowToStamp(row) : null;
  }

  function createStamp(employeeId: string, date: string, time: string): TimeStamp {
    const id = generateId();
    db.execute(
      'INSERT INTO time_stamps (id, employee_id, date, time, settled, created_at) VALUES (?, ?, ?, ?, 0, ?)',
      [id, employeeId, date, time, now()]
    );
    const stamp = getStamp(id);
    if (!stamp) {
      throw new Error('Failed to create time stamp');
    }
    return stamp;
  }

  function updateStampTime(id: string, time: string): void {
    db.execute('UPDATE time_stamps SET time = ? WHERE id = ?', [time, id]);
  }

  function deleteStamp(id: string): boolean {
    return db.execute('DELETE FROM time_stamps WHERE id = ?', [id]).rowsAffected > 0;
  }

  function markSettled(ids: string[]): number {
    if (ids.length === 0) return 0;
    return db.execute(
      `UPDATE time_stamps SET settled = 1 WHERE id IN (${placeholders(ids.length)})`,
      ids
    ).rowsAffected;
  }

  function markDateUnsettled(employeeId: string, date: string): number {
    return db.execute(
      'UPDATE time_stamps SET settled = 0 WHERE employee_id = ? AND date = ?',
      [employeeId, date]
    ).rowsAffected;
  }

  return {
    getStamp,
    listStampsForDate,
    listStampsInRange,
    listUnsettledStamps,
    listStampedDates,
    listStampCounts,
    findStamp,
    findLastStampBefore,
    createStamp,
    updateStampTime,
    deleteStamp,
    markSettled,
    markDateUnsettled,
  };
}
