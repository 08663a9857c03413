import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import { initTestDatabase, closeTestDatabase, resetTestDatabase, seedEmployee } from '../test-utils';
import { createAbsenceRepository, isAbsenceType } from './absence.repository';

const db = initTestDatabase();
const absences = createAbsenceRepository(db);

describe('Absence Repository', () => {
  beforeEach(() => {
    resetTestDatabase();
  });

  afterAll(() => {
    closeTestDatabase();
  });

  it('accepts only the known absence types', () => {
    expect(isAbsenceType('vacation')).toBe(true);
    expect(isAbsenceType('training')).toBe(true);
    expect(isAbsenceType('holiday')).toBe(false);
  });

  it('creates unapproved absences by default', () => {
    const employee = seedEmployee(db);
    const absence = absences.createAbsence(employee.id, '2024-06-11', 'sick');

    expect(absence.type).toBe('sick');
    expect(absence.approved).toBe(false);
    expect(absences.getAbsenceOnDate(employee.id, '2024-06-11')?.id).toBe(absence.id);
    expect(absences.getAbsenceOnDate(employee.id, '2024-06-12')).toBeNull();
  });

  it('counts only approved absences when asked to', () => {
    const employee = seedEmployee(db);
    const absence = absences.createAbsence(employee.id, '2024-06-11', 'vacation');

    expect(absences.hasAbsence(employee.id, '2024-06-11')).toBe(true);
    expect(absences.hasAbsence(employee.id, '2024-06-11', true)).toBe(false);
    expect(absences.approveAbsence(absence.id)).toBe(true);
    expect(absences.hasAbsence(employee.id, '2024-06-11', true)).toBe(true);
    expect(absences.approveAbsence('missing')).toBe(false);
  });

  it('lists and deletes by range and type', () => {
    const employee = seedEmployee(db);
    absences.createAbsence(employee.id, '2024-06-12', 'training');
    absences.createAbsence(employee.id, '2024-06-11', 'vacation');
    absences.createAbsence(employee.id, '2024-07-01', 'vacation');

    expect(absences.listAbsencesInRange(employee.id, '2024-06-01', '2024-06-30').map(a => a.date)).toEqual([
      '2024-06-11',
      '2024-06-12',
    ]);
    expect(absences.listAbsencesInRange(employee.id, '2024-06-01', '2024-07-31', 'vacation')).toHaveLength(2);
    expect(absences.deleteAbsencesOnDate(employee.id, '2024-06-12', 'vacation')).toBe(0);
    expect(absences.deleteAbsencesOnDate(employee.id, '2024-06-12')).toBe(1);
  });

  it('rejects unknown types at the database level', () => {
    const employee = seedEmployee(db);
    expect(() =>
      db.execute('INSERT INTO absences (id, employee_id, date, type) VALUES (?, ?, ?, ?)', [
        'a1',
        employee.id,
        '2024-06-11',
        'holiday',
      ])
    ).toThrow();
  });
});
