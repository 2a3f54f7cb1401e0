import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import chalk from 'chalk';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  BackupManager, createTask, createTestDb, countTasks, getTaskById, type OrganizerDb,
} from '@organizer/core';
import { createProgram } from '../src/program.js';

let db: OrganizerDb;
let tmpDir: string;
let logSpy: MockInstance<typeof console.log>;
let errorSpy: MockInstance<typeof console.error>;
let warnSpy: MockInstance<typeof console.warn>;

async function run(...args: string[]): Promise<void> {
  const program = createProgram(db, new BackupManager(join(tmpDir, 'backups'), db));
  await program.parseAsync(args, { from: 'user' });
}

function logged(): unknown[] {
  return logSpy.mock.calls.map(call => call[0]);
}

beforeEach(() => {
  chalk.level = 0;
  process.exitCode = undefined;
  db = createTestDb();
  tmpDir = mkdtempSync(join(tmpdir(), 'organizer-cli-test-'));
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  rmSync(tmpDir, { recursive: true, force: true });
  process.exitCode = undefined;
});

describe('add', () => {
  it('creates a task and prints it', async () => {
    await run('add', 'Write report', '-p', 'p1', '-t', 'work', '-d', '2099-01-01', '-c', 'for Q3');

    expect(logged()).toEqual([
      '✓ Task 1 created',
      '(1) HIGH   WORK 2099-01-01 Write report',
    ]);
    expect(getTaskById(db, 1)).toMatchObject({ priority: 'HIGH', taskType: 'WORK', comment: 'for Q3', deadline: null });
  });

  it('reports constraint violations and stores nothing', async () => {
    await run('add', 'Write report', '-p', 'urgent', '-t', 'work');

    expect(errorSpy).toHaveBeenCalledWith('✗ [CONSTRAINT_VIOLATION] Priority must be one of HIGH, MEDIUM, LOW');
    expect(process.exitCode).toBe(1);
    expect(countTasks(db)).toBe(0);
  });

  it('stores a deadline given as an ISO timestamp', async () => {
    await run('add', 'Renew passport', '-p', 'low', '-t', 'home', '-d', '2099-01-01', '--deadline', '2099-03-01T09:00:00');
    expect(getTaskById(db, 1)?.deadline).toBe('2099-03-01T09:00:00.000Z');
  });
});

describe('get', () => {
  it('prints every field', async () => {
    createTask(db, { date: '2099-01-01', taskName: 'Water plants', priority: 'LOW', taskType: 'HOME' });
    await run('get', '1');

    const lines = logged();
    expect(lines[0]).toBe('ID        1');
    expect(lines[1]).toBe('Name      Water plants');
    expect(lines[3]).toBe('Priority  LOW');
    expect(lines[5]).toBe('Comment   (none)');
  });

  it('reports a missing task', async () => {
    await run('get', '9');
    expect(errorSpy).toHaveBeenCalledWith('✗ [NOT_FOUND] Task 9 not found');
  });
});

describe('update', () => {
  beforeEach(() => {
    createTask(db, { date: '2099-01-01', taskName: 'Write report', comment: 'draft', priority: 'HIGH', taskType: 'WORK' });
  });

  it('changes the given fields only', async () => {
    await run('update', '1', '-p', 'low', '--clear-comment');

    expect(logged()[0]).toBe('✓ Task 1 updated');
    expect(getTaskById(db, 1)).toMatchObject({ priority: 'LOW', comment: null, taskName: 'Write report' });
  });

  it('refuses contradictory options', async () => {
    await run('update', '1', '-c', 'final', '--clear-comment');

    expect(errorSpy).toHaveBeenCalledWith('✗ Cannot use both --comment and --clear-comment');
    expect(getTaskById(db, 1)?.comment).toBe('draft');
  });

  it('reports a missing task', async () => {
    await run('update', '5', '--name', 'Other');

    expect(errorSpy).toHaveBeenCalledWith('✗ Task 5 not found');
    expect(process.exitCode).toBe(1);
  });
});

describe('delete', () => {
  it('reports each id without failing on missing ones', async () => {
    createTask(db, { date: '2099-01-01', taskName: 'Old task', priority: 'LOW', taskType: 'HOME' });
    await run('delete', '1', '99');

    expect(logged()).toEqual(['✓ Task 1 deleted']);
    expect(warnSpy).toHaveBeenCalledWith('! Task 99 not found');
    expect(process.exitCode).toBeUndefined();
    expect(countTasks(db)).toBe(0);
  });
});

describe('list and search', () => {
  beforeEach(() => {
    createTask(db, { date: '2099-01-02', taskName: 'Grocery shopping', priority: 'MEDIUM', taskType: 'HOME' });
    createTask(db, { date: '2099-01-01', taskName: 'Quarterly report', priority: 'HIGH', taskType: 'WORK' });
  });

  it('lists with filters', async () => {
    await run('list', '-t', 'home');
    expect(logged()).toEqual(['(1) MEDIUM HOME 2099-01-02 Grocery shopping']);
  });

  it('lists sorted by priority', async () => {
    await run('list', '-s', 'priority');
    expect(logged()).toEqual([
      '(2) HIGH   WORK 2099-01-01 Quarterly report',
      '(1) MEDIUM HOME 2099-01-02 Grocery shopping',
    ]);
  });

  it('says so when nothing matches', async () => {
    await run('list', '--with-deadline');
    expect(logged()).toEqual(['No tasks found... use the add command to create one']);
  });

  it('searches with free text and filters', async () => {
    await run('search', 'report', 'type:work');
    expect(logged()).toEqual(['(2) HIGH   WORK 2099-01-01 Quarterly report']);
  });

  it('shows the list when no command is given', async () => {
    await run();
    expect(logged()).toHaveLength(2);
  });
});

describe('init, seed and system status', () => {
  it('verifies the schema', async () => {
    await run('init');
    expect(logged()).toEqual(['✓ Database ready at :memory:', 'Tasks: 0']);
  });

  it('seeds once unless forced', async () => {
    await run('seed');
    expect(logged()).toEqual(['✓ Inserted 10 sample tasks']);

    await run('seed');
    expect(warnSpy).toHaveBeenCalledWith('! Database already holds 10 task(s); use --force to add the samples anyway');
    expect(countTasks(db)).toBe(10);
  });

  it('prints counts per priority and type', async () => {
    createTask(db, { date: '2099-01-01', taskName: 'A', priority: 'HIGH', taskType: 'WORK', deadline: '2099-02-01T00:00:00Z' });
    createTask(db, { date: '2099-01-01', taskName: 'B', priority: 'LOW', taskType: 'WORK' });
    await run('system', 'status');

    expect(logged()).toContain('  Total: 2 (1 with deadline)');
    expect(logged()).toContain('  By priority: HIGH 1, MEDIUM 0, LOW 1');
    expect(logged()).toContain('  By type: WORK 2, HOME 0');
  });
});

describe('backup', () => {
  it('reports failures as warnings', async () => {
    await run('backup', 'create');
    expect(warnSpy).toHaveBeenCalledWith('! Backup failed: In-memory databases cannot be backed up');
    expect(process.exitCode).toBe(1);
  });

  it('lists an empty backup directory', async () => {
    await run('backup', 'list');
    expect(logged()).toEqual([`No backups in ${join(tmpDir, 'backups')}`]);
  });
});
