/**
 * Error taxonomy for the task store.
 *
 * Every failure surfaces synchronously from the operation that caused it.
 * Storage errors raised by better-sqlite3 are translated into the same
 * classes, so callers never need to inspect SQLite codes themselves.
 */

export type TaskErrorCode =
  | 'VALIDATION_ERROR'
  | 'CONSTRAINT_VIOLATION'
  | 'NOT_FOUND'
  | 'CONFLICT_OR_TRANSIENT';

export class TaskStoreError extends Error {
  readonly code: TaskErrorCode;

  constructor(message: string, code: TaskErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TaskStoreError';
    this.code = code;
  }

  /** Whether repeating the same operation may succeed */
  get retryable(): boolean {
    return false;
  }
}

export interface FieldIssue {
  readonly field: string;
  readonly message: string;
}

/** A required field is missing or a value is malformed */
export class ValidationError extends TaskStoreError {
  readonly issues: readonly FieldIssue[];

  constructor(issues: readonly FieldIssue[], options?: { cause?: unknown }) {
    super(formatIssues(issues), 'VALIDATION_ERROR', options);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/** A well-formed value breaks a domain rule (closed set, blank name, deadline) */
export class ConstraintViolationError extends TaskStoreError {
  /** Name of the storage constraint or trigger that guards the rule */
  readonly constraint: string;

  constructor(constraint: string, message: string, options?: { cause?: unknown }) {
    super(message, 'CONSTRAINT_VIOLATION', options);
    this.name = 'ConstraintViolationError';
    this.constraint = constraint;
  }
}

export class NotFoundError extends TaskStoreError {
  readonly taskId: number;

  constructor(taskId: number) {
    super(`Task ${taskId} not found`, 'NOT_FOUND');
    this.name = 'NotFoundError';
    this.taskId = taskId;
  }
}

/** The storage transaction aborted on contention or exhaustion; safe to retry */
export class StorageConflictError extends TaskStoreError {
  readonly sqliteCode: string;

  constructor(sqliteCode: string, message: string, options?: { cause?: unknown }) {
    super(message, 'CONFLICT_OR_TRANSIENT', options);
    this.name = 'StorageConflictError';
    this.sqliteCode = sqliteCode;
  }

  override get retryable(): boolean {
    return true;
  }
}

function formatIssues(issues: readonly FieldIssue[]): string {
  if (issues.length === 0) return 'Invalid task input';
  return issues.map(i => (i.field ? `${i.field}: ${i.message}` : i.message)).join('; ');
}

// ---------------------------------------------------------------------------
// Storage error translation
// ---------------------------------------------------------------------------

const CHECK_FAILED_RE = /CHECK constraint failed: (\w+)/;
const NOT_NULL_FAILED_RE = /NOT NULL constraint failed: \w+\.(\w+)/;

/** Message text for each named storage rule */
const CONSTRAINT_MESSAGES: Record<string, string> = {
  chk_task_name_not_empty: 'Task name must not be empty',
  chk_task_name_length: 'Task name must be at most 255 characters',
  chk_priority_enum: 'Priority must be one of HIGH, MEDIUM, LOW',
  chk_task_type_enum: 'Task type must be one of WORK, HOME',
  chk_deadline_future: 'Deadline must be later than the creation time',
  chk_date_format: 'Date must be a valid yyyy-MM-dd date',
  chk_deadline_format: 'Deadline must be a canonical UTC timestamp',
};

/** Trigger RAISE messages mapped back to the trigger that raised them */
const TRIGGER_MESSAGES: Record<string, string> = {
  'created_at is write-once': 'trg_tasks_created_at_immutable',
  'id is immutable': 'trg_tasks_id_immutable',
};

export function constraintMessage(constraint: string): string {
  return CONSTRAINT_MESSAGES[constraint] ?? `Constraint ${constraint} violated`;
}

function sqliteCodeOf(err: unknown): string | null {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code.startsWith('SQLITE_') ? err.code : null;
  }
  return null;
}

/**
 * Map a better-sqlite3 error onto the task error taxonomy.
 * Errors that are not storage rule violations or transient conditions are
 * returned unchanged so the caller can rethrow them as they are.
 */
export function translateStorageError(err: unknown): unknown {
  const code = sqliteCodeOf(err);
  if (code === null || !(err instanceof Error)) return err;

  if (code === 'SQLITE_CONSTRAINT_CHECK') {
    const constraint = CHECK_FAILED_RE.exec(err.message)?.[1] ?? 'unknown';
    return new ConstraintViolationError(constraint, constraintMessage(constraint), { cause: err });
  }

  if (code === 'SQLITE_CONSTRAINT_TRIGGER') {
    const trigger = TRIGGER_MESSAGES[err.message] ?? 'unknown';
    return new ConstraintViolationError(trigger, err.message, { cause: err });
  }

  if (code === 'SQLITE_CONSTRAINT_NOTNULL') {
    const column = NOT_NULL_FAILED_RE.exec(err.message)?.[1] ?? '';
    return new ValidationError([{ field: column, message: 'is required' }], { cause: err });
  }

  if (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED') || code === 'SQLITE_FULL') {
    return new StorageConflictError(code, `Storage unavailable (${code}): ${err.message}`, { cause: err });
  }

  return err;
}

/** Run a storage call, rethrowing its failure in translated form */
export function withStorageErrors<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err: unknown) {
    throw translateStorageError(err);
  }
}
