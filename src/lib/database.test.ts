import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import { closeTestDatabase, initTestDatabase, resetTestDatabase } from './test-utils';

const db = initTestDatabase();

function holidayCount(): number {
  return db.selectOne<{ count: number }>('SELECT COUNT(*) AS count FROM holidays')?.count ?? -1;
}

describe('Database', () => {
  beforeEach(() => {
    resetTestDatabase();
  });

  afterAll(() => {
    closeTestDatabase();
  });

  it('commits the writes of a transaction', () => {
    const result = db.transaction(() => {
      db.execute('INSERT INTO holidays (id, date, name) VALUES (?, ?, ?)', ['h1', '2024-12-24', 'Christmas Eve']);
      return 'done';
    });

    expect(result).toBe('done');
    expect(holidayCount()).toBe(1);
    expect(db.inTransaction).toBe(false);
  });

  it('rolls back every write when the transaction throws', () => {
    expect(() =>
      db.transaction(() => {
        db.execute('INSERT INTO holidays (id, date, name) VALUES (?, ?, ?)', ['h1', '2024-12-24', 'Christmas Eve']);
        throw new Error('abort');
      })
    ).toThrow('abort');

    expect(holidayCount()).toBe(0);
  });

  it('rolls back only the inner part of a nested transaction', () => {
    db.transaction(() => {
      db.execute('INSERT INTO holidays (id, date, name) VALUES (?, ?, ?)', ['h1', '2024-12-24', 'Christmas Eve']);
      try {
        db.transaction(() => {
          db.execute('INSERT INTO holidays (id, date, name) VALUES (?, ?, ?)', ['h2', '2024-12-31', 'New Year']);
          throw new Error('inner');
        });
      } catch (error) {
        expect(error).toBeInstanceOf(Error);
      }
    });

    expect(db.select<{ id: string }>('SELECT id FROM holidays')).toEqual([{ id: 'h1' }]);
  });

  it('reports affected rows', () => {
    db.execute('INSERT INTO holidays (id, date, name) VALUES (?, ?, ?)', ['h1', '2024-12-24', 'Christmas Eve']);

    expect(db.execute('DELETE FROM holidays WHERE date >= ?', ['2024-01-01']).rowsAffected).toBe(1);
    expect(db.selectOne('SELECT * FROM holidays WHERE id = ?', ['h1'])).toBeNull();
  });
});
