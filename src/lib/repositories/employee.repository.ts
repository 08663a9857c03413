/**
 * Employee Repository
 * CRUD operations for the employees table
 */

import type { Database } from '../database';
import type { Employee } from '../../types';
import type { EmployeeRow } from '../../types/api';
import type { EmployeeRepository, NewEmployeeRecord } from '../../types/services';
import { generateId, now } from './helpers';

/**
 * Map database row to Employee model
 */
function mapRowToEmployee(row: EmployeeRow): Employee {
  return {
    id: row.id,
    name: row.name,
    credential: row.credential,
    weeklyHours: row.weekly_hours,
    birthDate: row.birth_date,
    flexBalance: row.flex_balance,
    greenThreshold: row.green_threshold,
    redThreshold: row.red_threshold,
    lastSettledLogin: row.last_settled_login,
    supervisorId: row.supervisor_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function createEmployeeRepository(db: Database): EmployeeRepository {
  function getEmployee(id: string): Employee | null {
    const row = db.selectOne<EmployeeRow>('SELECT * FROM employees WHERE id = ?', [id]);
    return row ? mapRowToEmployee(row) : null;
  }

  function getEmployeeByName(name: string): Employee | null {
    const row = db.selectOne<EmployeeRow>('SELECT * FROM employees WHERE name = ?', [name]);
    return row ? mapRowToEmployee(row) : null;
  }

  function createEmployee(record: NewEmployeeRecord): Employee {
    const id = generateId();
    const timestamp = now();
    db.execute(
      `INSERT INTO employees (
        id, name, credential, weekly_hours, birth_date, flex_balance,
        green_threshold, red_threshold, last_settled_login, supervisor_id,
        created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, 0, ?, ?, ?, ?, ?, ?)`,
      [
        id,
        record.name,
        record.credential,
        record.weeklyHours,
        record.birthDate,
        record.greenThreshold,
        record.redThreshold,
        record.lastSettledLogin,
        record.supervisorId,
        timestamp,
        timestamp,
      ]
    );
    const employee = getEmployee(id);
    if (!employee) {
      throw new Error('Failed to create employee');
    }
    return employee;
  }

  /**
   * Employees who name the given employee as their supervisor
   */
  function listSubordinates(supervisorId: string): Employee[] {
    return db
      .select<EmployeeRow>('SELECT * FROM employees WHERE supervisor_id = ? ORDER BY name ASC', [supervisorId])
      .map(mapRowToEmployee);
  }

  /**
   * Add a signed delta to the stored balance in a single statement
   */
  function adjustFlexBalance(id: string, deltaHours: number): void {
    db.execute(
      'UPDATE employees SET flex_balance = flex_balance + ?, updated_at = ? WHERE id = ?',
      [deltaHours, now(), id]
    );
  }

  function setLastSettledLogin(id: string, date: string): void {
    db.execute('UPDATE employees SET last_settled_login = ?, updated_at = ? WHERE id = ?', [date, now(), id]);
  }

  function setWeeklyHours(id: string, weeklyHours: number): void {
    db.execute('UPDATE employees SET weekly_hours = ?, updated_at = ? WHERE id = ?', [weeklyHours, now(), id]);
  }

  function setThresholds(id: string, green: number, red: number): void {
    db.execute(
      'UPDATE employees SET green_threshold = ?, red_threshold = ?, updated_at = ? WHERE id = ?',
      [green, red, now(), id]
    );
  }

  function setCredential(id: string, credential: string): void {
    db.execute('UPDATE employees SET credential = ?, updated_at = ? WHERE id = ?', [credential, now(), id]);
  }

  return {
    getEmployee,
    getEmployeeByName,
    createEmployee,
    listSubordinates,
    adjustFlexBalance,
    setLastSettledLogin,
    setWeeklyHours,
    setThresholds,
    setCredential,
  };
}
