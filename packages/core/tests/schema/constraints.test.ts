import { describe, it, expect, beforeEach } from 'vitest';
import type Database from 'better-sqlite3';
import { createTestDb, getRawDb } from '../../src/db.js';
import { withStorageErrors, ConstraintViolationError } from '../../src/errors.js';

// Raw SQL on purpose: these rules must hold for writers that skip the data-access layer

let raw: Database.Database;

const INSERT = `INSERT INTO tasks ("date", task_name, comment, deadline, priority, task_type)
  VALUES (@date, @name, NULL, @deadline, @priority, @type)`;

const valid = {
  date: '2099-01-01',
  name: 'Raw task',
  deadline: null,
  priority: 'HIGH',
  type: 'WORK',
};

function insert(overrides: Record<string, unknown> = {}): void {
  raw.prepare(INSERT).run({ ...valid, ...overrides });
}

function count(): number {
  return raw.prepare('SELECT COUNT(*) AS n FROM tasks').pluck().get() as number;
}

beforeEach(() => {
  raw = getRawDb(createTestDb());
});

describe('CHECK constraints', () => {
  it('accepts a valid row with store-assigned timestamps', () => {
    insert();
    const row = raw.prepare('SELECT created_at, updated_at FROM tasks').get() as { created_at: string; updated_at: string };
    expect(row.created_at).toBe(row.updated_at);
  });

  it.each([
    [{ priority: 'URGENT' }, 'chk_priority_enum'],
    [{ priority: 'high' }, 'chk_priority_enum'],
    [{ type: 'SCHOOL' }, 'chk_task_type_enum'],
    [{ name: '' }, 'chk_task_name_not_empty'],
    [{ name: ' \t ' }, 'chk_task_name_not_empty'],
    [{ name: 'y'.repeat(256) }, 'chk_task_name_length'],
    [{ date: '2099-02-30' }, 'chk_date_format'],
    [{ date: '2099-1-1' }, 'chk_date_format'],
    [{ deadline: '2099-01-05 10:00' }, 'chk_deadline_format'],
    [{ deadline: '2000-01-01T00:00:00.000Z' }, 'chk_deadline_future'],
  ])('rejects %j with %s', (overrides, constraint) => {
    expect(() => insert(overrides)).toThrow(`CHECK constraint failed: ${constraint}`);
    expect(count()).toBe(0);
  });

  it('rejects a deadline equal to created_at', () => {
    insert();
    expect(() => raw.prepare('UPDATE tasks SET deadline = created_at WHERE id = 1').run())
      .toThrow('CHECK constraint failed: chk_deadline_future');
    expect(raw.prepare('SELECT deadline FROM tasks WHERE id = 1').pluck().get()).toBeNull();
  });

  it('replaces caller-supplied timestamps on insert', () => {
    raw.prepare(`INSERT INTO tasks ("date", task_name, priority, task_type, created_at, updated_at)
      VALUES ('2099-01-01', 'x', 'LOW', 'HOME', '2001-01-01T00:00:00.000Z', '2098-01-01T00:00:00.000Z')`).run();
    const row = raw.prepare('SELECT id, created_at, updated_at FROM tasks').get() as { id: number; created_at: string; updated_at: string };
    expect(row.id).toBe(1);
    expect(row.created_at).toBe(row.updated_at);
    expect(row.created_at > '2001-01-01T00:00:00.000Z').toBe(true);
    expect(row.created_at < '2098-01-01T00:00:00.000Z').toBe(true);
  });

  it('rejects a missing required column', () => {
    expect(() => raw.prepare("INSERT INTO tasks (\"date\", priority, task_type) VALUES ('2099-01-01', 'LOW', 'HOME')").run())
      .toThrow('NOT NULL constraint failed: tasks.task_name');
  });

  it('translates into the task error taxonomy', () => {
    let caught: unknown;
    try {
      withStorageErrors(() => insert({ type: 'SCHOOL' }));
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConstraintViolationError);
    expect(caught).toMatchObject({ constraint: 'chk_task_type_enum', message: 'Task type must be one of WORK, HOME' });
  });
});

describe('triggers', () => {
  beforeEach(() => {
    insert();
  });

  it('keeps created_at write-once', () => {
    expect(() => raw.prepare("UPDATE tasks SET created_at = '2000-01-01T00:00:00.000Z' WHERE id = 1").run())
      .toThrow('created_at is write-once');
  });

  it('keeps id immutable', () => {
    expect(() => raw.prepare('UPDATE tasks SET id = 100 WHERE id = 1').run()).toThrow('id is immutable');
  });

  it('overrides a backdated updated_at and keeps the rest of the update', () => {
    raw.prepare("UPDATE tasks SET task_name = 'b', updated_at = '2000-01-01T00:00:00.000Z' WHERE id = 1").run();
    const row = raw.prepare('SELECT task_name, created_at, updated_at FROM tasks WHERE id = 1')
      .get() as { task_name: string; created_at: string; updated_at: string };
    expect(row.task_name).toBe('b');
    expect(row.updated_at >= row.created_at).toBe(true);
  });

  it('translates trigger aborts', () => {
    let caught: unknown;
    try {
      withStorageErrors(() => raw.prepare('UPDATE tasks SET id = 100 WHERE id = 1').run());
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toMatchObject({ constraint: 'trg_tasks_id_immutable', code: 'CONSTRAINT_VIOLATION' });
  });
});
