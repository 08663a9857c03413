/**
 * Test database utilities using better-sqlite3
 * This provides an in-memory SQLite database for testing repositories and services
 */

import { Database, flushDatabase, openDatabase } from '../database';
import { createEmployeeRepository } from '../repositories/employee.repository';
import { createWeeklyHoursRepository } from '../repositories/weekly-hours.repository';
import type { Employee } from '../../types';
import type { Clock, CredentialHasher, LocalDateTime, NewEmployeeRecord } from '../../types/services';

let testDb: Database | null = null;

/**
 * Initialize an in-memory test database
 */
export function initTestDatabase(): Database {
  if (testDb) {
    return testDb;
  }
  testDb = openDatabase(':memory:');
  return testDb;
}

/**
 * Get the test database instance
 */
export function getTestDatabase(): Database {
  if (!testDb) {
    throw new Error('Test database not initialized. Call initTestDatabase() first.');
  }
  return testDb;
}

/**
 * Close and reset the test database
 */
export function closeTestDatabase(): void {
  if (testDb) {
    testDb.close();
    testDb = null;
  }
}

/**
 * Reset the test database (clear all data but keep schema)
 */
export function resetTestDatabase(): void {
  if (testDb) {
    flushDatabase(testDb);
  }
}

/**
 * Insert an employee with a weekly-hours history entry.
 * Defaults: 40h per week, adult, last settled login 2024-01-01.
 */
export function seedEmployee(db: Database, overrides: Partial<NewEmployeeRecord> = {}): Employee {
  const record: NewEmployeeRecord = {
    name: `employee-${Math.random().toString(36).slice(2, 10)}`,
    credential: 'hashed:test-secret',
    weeklyHours: 40,
    birthDate: '1990-05-15',
    greenThreshold: -5,
    redThreshold: -10,
    supervisorId: null,
    lastSettledLogin: '2024-01-01',
    ...overrides,
  };
  const employee = createEmployeeRepository(db).createEmployee(record);
  createWeeklyHoursRepository(db).upsertWeeklyHours(employee.id, '2000-01-01', record.weeklyHours);
  return employee;
}

export interface TestClock extends Clock {
  set(date: string, time: string): void;
}

/**
 * Clock that tests can move forward
 */
export function createTestClock(date: string, time: string): TestClock {
  let current: LocalDateTime = { date, time };
  return {
    now: () => ({ ...current }),
    set: (nextDate, nextTime) => {
      current = { date: nextDate, time: nextTime };
    },
  };
}

export const testHasher: CredentialHasher = {
  hash: plain => `hashed:${plain}`,
};
