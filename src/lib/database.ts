import BetterSqlite3 from 'better-sqlite3';
import { createLogger } from './logger';

const log = createLogger('database');

export const DEFAULT_DATABASE_FILE = 'flextime.db';

export const SCHEMA = `
-- Employees with their running flex-time balance
CREATE TABLE IF NOT EXISTS employees (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL UNIQUE,
    credential TEXT NOT NULL,
    weekly_hours REAL NOT NULL,
    birth_date TEXT NOT NULL,
    flex_balance REAL NOT NULL DEFAULT 0,
    green_threshold REAL NOT NULL DEFAULT -5,
    red_threshold REAL NOT NULL DEFAULT -10,
    last_settled_login TEXT NOT NULL,
    supervisor_id TEXT REFERENCES employees(id) ON DELETE SET NULL,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Time-versioned contracted hours
CREATE TABLE IF NOT EXISTS weekly_hours_history (
    id TEXT PRIMARY KEY,
    employee_id TEXT NOT NULL REFERENCES employees(id) ON DELETE CASCADE,
    effective_from TEXT NOT NULL,
    weekly_hours REAL NOT NULL,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    UNIQUE(employee_id, effective_from)
);

-- Raw clock events
CREATE TABLE IF NOT EXISTS time_stamps (
    id TEXT PRIMARY KEY,
    employee_id TEXT NOT NULL REFERENCES employees(id) ON DELETE CASCADE,
    date TEXT NOT NULL,
    time TEXT NOT NULL,
    settled INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS absences (
    id TEXT PRIMARY KEY,
    employee_id TEXT NOT NULL REFERENCES employees(id) ON DELETE CASCADE,
    date TEXT NOT NULL,
    type TEXT NOT NULL CHECK (type IN ('vacation', 'sick', 'training', 'other')),
    approved INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS notifications (
    id TEXT PRIMARY KEY,
    employee_id TEXT NOT NULL REFERENCES employees(id) ON DELETE CASCADE,
    code INTEGER NOT NULL CHECK (code BETWEEN 1 AND 10),
    date TEXT NOT NULL,
    is_popup INTEGER NOT NULL DEFAULT 0,
    popup_time TEXT,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    UNIQUE(employee_id, code, date)
);

-- Company holidays on top of the statutory calendar
CREATE TABLE IF NOT EXISTS holidays (
    id TEXT PRIMARY KEY,
    date TEXT NOT NULL UNIQUE,
    name TEXT NOT NULL,
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS settings (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE INDEX IF NOT EXISTS idx_time_stamps_employee_date ON time_stamps(employee_id, date, time);
CREATE INDEX IF NOT EXISTS idx_absences_employee_date ON absences(employee_id, date);
CREATE INDEX IF NOT EXISTS idx_notifications_employee ON notifications(employee_id, date);
CREATE INDEX IF NOT EXISTS idx_weekly_hours_employee ON weekly_hours_history(employee_id, effective_from);
`;

export interface ExecuteResult {
  rowsAffected: number;
}

/**
 * Persistence context handed to every repository and service.
 * All calls are synchronous; transaction() nests through savepoints.
 */
export class Database {
  constructor(private readonly connection: BetterSqlite3.Database) {}

  /**
   * Execute a SQL statement that doesn't return rows (INSERT, UPDATE, DELETE).
   */
  execute(query: string, bindValues: unknown[] = []): ExecuteResult {
    const result = this.connection.prepare<unknown[]>(query).run(...bindValues);
    return { rowsAffected: result.changes };
  }

  /**
   * Execute a SQL query that returns rows (SELECT).
   */
  select<T>(query: string, bindValues: unknown[] = []): T[] {
    return this.connection.prepare<unknown[], T>(query).all(...bindValues);
  }

  selectOne<T>(query: string, bindValues: unknown[] = []): T | null {
    return this.connection.prepare<unknown[], T>(query).get(...bindValues) ?? null;
  }

  /**
   * Run fn inside a transaction. A thrown error rolls back every write made by fn.
   */
  transaction<T>(fn: () => T): T {
    return this.connection.transaction(fn)();
  }

  get inTransaction(): boolean {
    return this.connection.inTransaction;
  }

  get open(): boolean {
    return this.connection.open;
  }

  close(): void {
    if (this.connection.open) {
      this.connection.close();
    }
  }
}

/**
 * Open (or create) a database file and apply pragmas and schema.
 */
export function openDatabase(filename: string = DEFAULT_DATABASE_FILE): Database {
  const connection = new BetterSqlite3(filename);
  connection.pragma('journal_mode = WAL');
  connection.pragma('busy_timeout = 5000');
  connection.pragma('synchronous = NORMAL');
  // SQLite has foreign keys off by default
  connection.pragma('foreign_keys = ON');
  connection.exec(SCHEMA);
  log.info(`Opened database ${filename}`);
  return new Database(connection);
}

/**
 * Delete all records but keep the schema intact.
 */
export function flushDatabase(db: Database): void {
  db.transaction(() => {
    // Children first to respect foreign keys
    db.execute('DELETE FROM notifications');
    db.execute('DELETE FROM absences');
    db.execute('DELETE FROM time_stamps');
    db.execute('DELETE FROM weekly_hours_history');
    db.execute('DELETE FROM employees');
    db.execute('DELETE FROM holidays');
    db.execute('DELETE FROM settings');
  });
  log.info('Database flushed');
}
