import { describe, it, expect } from 'vitest';
import {
  translateStorageError, ValidationError, ConstraintViolationError, StorageConflictError,
  NotFoundError, constraintMessage,
} from '../src/errors.js';

function sqliteError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('translateStorageError', () => {
  it('maps CHECK failures to constraint violations', () => {
    const err = translateStorageError(sqliteError('SQLITE_CONSTRAINT_CHECK', 'CHECK constraint failed: chk_priority_enum'));
    expect(err).toBeInstanceOf(ConstraintViolationError);
    expect(err).toMatchObject({ constraint: 'chk_priority_enum', message: 'Priority must be one of HIGH, MEDIUM, LOW' });
  });

  it('maps NOT NULL failures to validation errors', () => {
    const err = translateStorageError(sqliteError('SQLITE_CONSTRAINT_NOTNULL', 'NOT NULL constraint failed: tasks.priority'));
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ message: 'priority: is required' });
  });

  it.each(['SQLITE_BUSY', 'SQLITE_BUSY_SNAPSHOT', 'SQLITE_LOCKED', 'SQLITE_FULL'])('marks %s as retryable', (code) => {
    const err = translateStorageError(sqliteError(code, 'database is locked'));
    expect(err).toBeInstanceOf(StorageConflictError);
    expect(err).toMatchObject({ code: 'CONFLICT_OR_TRANSIENT', sqliteCode: code });
    expect(err instanceof StorageConflictError && err.retryable).toBe(true);
  });

  it('passes other errors through unchanged', () => {
    const plain = new Error('boom');
    const io = sqliteError('SQLITE_IOERR', 'disk I/O error');
    expect(translateStorageError(plain)).toBe(plain);
    expect(translateStorageError(io)).toBe(io);
  });
});

describe('error classes', () => {
  it('are not retryable unless transient', () => {
    expect(new NotFoundError(3).retryable).toBe(false);
    expect(new ValidationError([]).message).toBe('Invalid task input');
  });

  it('joins field issues into the message', () => {
    const err = new ValidationError([
      { field: 'date', message: 'is required' },
      { field: 'taskName', message: 'must be a string' },
    ]);
    expect(err.message).toBe('date: is required; taskName: must be a string');
  });

  it('falls back to a generic constraint message', () => {
    expect(constraintMessage('chk_other')).toBe('Constraint chk_other violated');
  });
});
