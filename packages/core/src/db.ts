import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { mkdirSync } from 'node:fs';
import { StorageConflictError, translateStorageError } from './errors.js';

export type OrganizerDb = BetterSQLite3Database<typeof schema> & { $client: Database.Database };

const APP_DIR = 'organizer';
const DB_FILE = 'organizer.db';

/** Returns the platform-appropriate default database path */
export function getDefaultDbPath(): string {
  const platform = process.platform;
  let dir: string;

  if (platform === 'darwin') {
    dir = join(homedir(), 'Library', 'Application Support', APP_DIR);
  } else if (platform === 'win32') {
    dir = join(process.env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), APP_DIR);
  } else {
    // Linux / other
    dir = join(process.env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), APP_DIR);
  }

  return join(dir, DB_FILE);
}

/** ORGANIZER_DB_PATH wins over the platform default */
export function resolveDbPath(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env['ORGANIZER_DB_PATH']?.trim();
  return fromEnv ? fromEnv : getDefaultDbPath();
}

export const INSERT_STAMP_TRIGGER = 'trg_tasks_stamp_insert';

/**
 * Replaces caller-supplied created_at/updated_at on insert by re-inserting the
 * row with both columns defaulted. 'now' is fixed for the whole statement, so
 * rows that already carry the store's timestamps are left alone.
 */
export const INSERT_STAMP_TRIGGER_SQL = `
CREATE TRIGGER IF NOT EXISTS ${INSERT_STAMP_TRIGGER}
    AFTER INSERT ON tasks
    FOR EACH ROW
    WHEN NEW.created_at IS NOT strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
      OR NEW.updated_at IS NOT strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
BEGIN
    DELETE FROM tasks WHERE id = NEW.id;
    INSERT INTO tasks (id, "date", task_name, comment, deadline, priority, task_type)
    VALUES (NEW.id, NEW."date", NEW.task_name, NEW.comment, NEW.deadline, NEW.priority, NEW.task_type);
END;
`;

/**
 * The raw SQL to create the schema from scratch (for new databases and tests).
 *
 * SQLite has no enum types, so the closed sets are named CHECK constraints.
 * It also cannot assign NEW.* in a BEFORE trigger, so the timestamps are
 * rewritten by AFTER triggers; recursive_triggers stays off so each fires once.
 * updated_at never precedes created_at: inserts stamp both from one clock
 * reading and updates take max(now, previous updated_at).
 */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    "date" TEXT NOT NULL,
    task_name TEXT NOT NULL,
    comment TEXT,
    deadline TEXT,
    priority TEXT NOT NULL,
    task_type TEXT NOT NULL,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    CONSTRAINT chk_priority_enum CHECK (priority IN ('HIGH', 'MEDIUM', 'LOW')),
    CONSTRAINT chk_task_type_enum CHECK (task_type IN ('WORK', 'HOME')),
    CONSTRAINT chk_date_format CHECK (date("date") IS "date"),
    CONSTRAINT chk_task_name_length CHECK (length(task_name) <= 255),
    CONSTRAINT chk_task_name_not_empty CHECK (length(trim(task_name, ' ' || char(9, 10, 11, 12, 13))) > 0),
    CONSTRAINT chk_deadline_format CHECK (deadline IS NULL OR strftime('%Y-%m-%dT%H:%M:%fZ', deadline) IS deadline),
    CONSTRAINT chk_deadline_future CHECK (deadline IS NULL OR deadline > created_at)
);

CREATE INDEX IF NOT EXISTS idx_tasks_date ON tasks("date");
CREATE INDEX IF NOT EXISTS idx_tasks_priority ON tasks(priority);
CREATE INDEX IF NOT EXISTS idx_tasks_task_type ON tasks(task_type);
CREATE INDEX IF NOT EXISTS idx_tasks_deadline ON tasks(deadline);
CREATE INDEX IF NOT EXISTS idx_tasks_task_name ON tasks(task_name COLLATE NOCASE);
CREATE INDEX IF NOT EXISTS idx_tasks_created_at ON tasks(created_at);
CREATE INDEX IF NOT EXISTS idx_tasks_priority_type ON tasks(priority, task_type);
CREATE INDEX IF NOT EXISTS idx_tasks_date_priority ON tasks("date", priority);

CREATE TRIGGER IF NOT EXISTS trg_tasks_id_immutable
    BEFORE UPDATE OF id ON tasks
    FOR EACH ROW WHEN NEW.id IS NOT OLD.id
BEGIN
    SELECT RAISE(ABORT, 'id is immutable');
END;

CREATE TRIGGER IF NOT EXISTS trg_tasks_created_at_immutable
    BEFORE UPDATE OF created_at ON tasks
    FOR EACH ROW WHEN NEW.created_at IS NOT OLD.created_at
BEGIN
    SELECT RAISE(ABORT, 'created_at is write-once');
END;

CREATE TRIGGER IF NOT EXISTS update_tasks_updated_at
    AFTER UPDATE ON tasks
    FOR EACH ROW
BEGIN
    UPDATE tasks
    SET updated_at = max(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'), OLD.updated_at)
    WHERE id = NEW.id;
END;
${INSERT_STAMP_TRIGGER_SQL}`;

/**
 * Create a Drizzle database connection with proper pragmas.
 * If no path is given, uses ORGANIZER_DB_PATH or the platform default.
 * Pass ':memory:' for in-memory databases (tests).
 */
export function createDb(path?: string): OrganizerDb {
  const dbPath = path ?? resolveDbPath();

  // Ensure directory exists for file-based databases
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);

  // Set pragmas — must happen on every connection
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');
  sqlite.pragma('recursive_triggers = OFF');

  // Ensure schema exists (idempotent — all statements use IF NOT EXISTS)
  sqlite.exec(CREATE_SCHEMA_SQL);

  return drizzle(sqlite, { schema });
}

/**
 * Create an in-memory database with schema applied. For tests.
 */
export function createTestDb(): OrganizerDb {
  return createDb(':memory:');
}

/** Sleep utility for retry logic */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Retry wrapper with exponential backoff for transient storage failures.
 * The store itself never retries; this is for the calling application.
 */
export async function withRetry<T>(fn: () => T, maxRetries = 3): Promise<T> {
  for (let i = 0; i < maxRetries; i++) {
    try {
      return fn();
    } catch (err: unknown) {
      const translated = translateStorageError(err);
      if (translated instanceof StorageConflictError && i < maxRetries - 1) {
        await sleep(100 * Math.pow(2, i)); // 100ms, 200ms, 400ms
        continue;
      }
      throw translated;
    }
  }
  throw new Error('withRetry: max retries exceeded');
}

/**
 * Get the raw Database instance from a Drizzle instance.
 * Useful for operations not supported by Drizzle (backup, raw exec, etc).
 */
export function getRawDb(db: OrganizerDb): Database.Database {
  return db.$client;
}

/** Get the file path of the database ('' for in-memory databases) */
export function getDbPath(db: OrganizerDb): string {
  const raw = getRawDb(db);
  const list = raw.pragma('database_list') as Array<{ name: string; file: string }>;
  return list.find(d => d.name === 'main')?.file ?? '';
}

/** Whether the tasks table exists (used by setup checks) */
export function hasTasksTable(db: OrganizerDb): boolean {
  const row = getRawDb(db)
    .prepare("SELECT COUNT(*) AS n FROM sqlite_master WHERE type = 'table' AND name = 'tasks'")
    .get() as { n: number } | undefined;
  return (row?.n ?? 0) === 1;
}
