import { describe, it, expect, vi } from 'vitest';
import BetterSqlite3 from 'better-sqlite3';
import { CoreError, createError, runOperation, toApiError } from './errors';
import { ErrorCodes } from '../types/api';
import type { Logger } from './logger';

function createSpyLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('toApiError', () => {
  it('keeps the code and details of a CoreError', () => {
    const error = toApiError(new CoreError(ErrorCodes.NOT_FOUND, 'Employee not found', { employeeId: 'e1' }));
    expect(error).toEqual({
      code: ErrorCodes.NOT_FOUND,
      category: 'lookup',
      message: 'Employee not found',
      details: { employeeId: 'e1' },
    });
  });

  it('maps SQLite failures to a persistence error', () => {
    const db = new BetterSqlite3(':memory:');
    db.exec('CREATE TABLE t (id TEXT PRIMARY KEY)');
    db.exec("INSERT INTO t VALUES ('a')");
    let caught: unknown = null;
    try {
      db.exec("INSERT INTO t VALUES ('a')");
    } catch (error) {
      caught = error;
    }
    db.close();

    const error = toApiError(caught);
    expect(error.code).toBe(ErrorCodes.PERSISTENCE_ERROR);
    expect(error.category).toBe('persistence');
    expect(error.details).toEqual({ sqliteCode: 'SQLITE_CONSTRAINT_PRIMARYKEY' });
  });

  it('treats anything else as internal', () => {
    expect(toApiError(new Error('boom'))).toEqual(
      createError(ErrorCodes.INTERNAL_ERROR, 'An unexpected error occurred', { reason: 'boom' })
    );
  });
});

describe('runOperation', () => {
  it('wraps a result', () => {
    const log = createSpyLogger();
    expect(runOperation(log, 'compute', () => 42)).toEqual({ success: true, data: 42 });
  });

  it('logs validation failures as warnings', () => {
    const log = createSpyLogger();
    const result = runOperation(log, 'register', () => {
      throw new CoreError(ErrorCodes.INVALID_INPUT, 'A name is required');
    });

    expect(result.success).toBe(false);
    expect(log.warn).toHaveBeenCalledWith('register rejected: A name is required');
    expect(log.error).not.toHaveBeenCalled();
  });

  it('logs unexpected failures as errors', () => {
    const log = createSpyLogger();
    const failure = new Error('disk full');
    const result = runOperation(log, 'settle', () => {
      throw failure;
    });

    expect(result.success ? null : result.error.code).toBe(ErrorCodes.INTERNAL_ERROR);
    expect(log.error).toHaveBeenCalledWith('settle failed', failure);
  });
});
