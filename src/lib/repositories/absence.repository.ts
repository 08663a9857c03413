/**
 * Absence Repository
 * Vacation, sick, training and other absence days
 */

import type { Database } from '../database';
import { ABSENCE_TYPES } from '../../types';
import type { Absence, AbsenceType } from '../../types';
import type { AbsenceRow } from '../../types/api';
import type { AbsenceRepository } from '../../types/services';
import { generateId, now, toFlag } from './helpers';

export function isAbsenceType(value: string): value is AbsenceType {
  return ABSENCE_TYPES.some(type => type === value);
}

function mapRowToAbsence(row: AbsenceRow): Absence {
  return {
    id: row.id,
    employeeId: row.employee_id,
    date: row.date,
    // The CHECK constraint keeps unknown types out of the table
    type: isAbsenceType(row.type) ? row.type : 'other',
    approved: row.approved === 1,
    createdAt: row.created_at,
  };
}

export function createAbsenceRepository(db: Database): AbsenceRepository {
  function getAbsence(id: string): Absence | null {
    const row = db.selectOne<AbsenceRow>('SELECT * FROM absences WHERE id = ?', [id]);
    return row ? mapRowToAbsence(row) : null;
  }

  function createAbsence(employeeId: string, date: string, type: AbsenceType, approved = false): Absence {
    const id = generateId();
    db.execute(
      'INSERT INTO absences (id, employee_id, date, type, approved, created_at) VALUES (?, ?, ?, ?, ?, ?)',
      [id, employeeId, date, type, toFlag(approved), now()]
    );
    const absence = getAbsence(id);
    if (!absence) {
      throw new Error('Failed to create absence');
    }
    return absence;
  }

  function getAbsenceOnDate(employeeId: string, date: string): Absence | null {
    const row = db.selectOne<AbsenceRow>(
      'SELECT * FROM absences WHERE employee_id = ? AND date = ? ORDER BY created_at ASC LIMIT 1',
      [employeeId, date]
    );
    return row ? mapRowToAbsence(row) : null;
  }

  function hasAbsence(employeeId: string, date: string, approvedOnly = false): boolean {
    const row = db.selectOne<{ count: number }>(
      `SELECT COUNT(*) AS count FROM absences
       WHERE employee_id = ? AND date = ?${approvedOnly ? ' AND approved = 1' : ''}`,
      [employeeId, date]
    );
    return (row?.count ?? 0) > 0;
  }

  function listAbsencesInRange(employeeId: string, startDate: string, endDate: string, type?: AbsenceType): Absence[] {
    let query = 'SELECT * FROM absences WHERE employee_id = ? AND date >= ? AND date <= ?';
    const params: unknown[] = [employeeId, startDate, endDate];
    if (type) {
      query += ' AND type = ?';
      params.push(type);
    }
    query += ' ORDER BY date ASC';
    return db.select<AbsenceRow>(query, params).map(mapRowToAbsence);
  }

  function deleteAbsencesOnDate(employeeId: string, date: string, type?: AbsenceType): number {
    if (type) {
      return db.execute(
        'DELETE FROM absences WHERE employee_id = ? AND date = ? AND type = ?',
        [employeeId, date, type]
      ).rowsAffected;
    }
    return db.execute('DELETE FROM absences WHERE employee_id = ? AND date = ?', [employeeId, date]).rowsAffected;
  }

  function approveAbsence(id: string): boolean {
    return db.execute('UPDATE absences SET approved = 1 WHERE id = ?', [id]).rowsAffected > 0;
  }

  return {
    createAbsence,
    getAbsenceOnDate,
    hasAbsence,
    listAbsencesInRange,
    deleteAbsencesOnDate,
    approveAbsence,
  };
}
