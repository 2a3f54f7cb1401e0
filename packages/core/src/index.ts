// Database
export {
  createDb,
  createTestDb,
  getDefaultDbPath,
  resolveDbPath,
  withRetry,
  getRawDb,
  getDbPath,
  hasTasksTable,
  CREATE_SCHEMA_SQL,
} from './db.js';
export type { OrganizerDb } from './db.js';

// Schema
export * from './schema/index.js';

// Types
export * from './types/index.js';

// Errors
export {
  TaskStoreError,
  ValidationError,
  ConstraintViolationError,
  NotFoundError,
  StorageConflictError,
  translateStorageError,
  withStorageErrors,
  constraintMessage,
} from './errors.js';
export type { TaskErrorCode, FieldIssue } from './errors.js';

// Validation
export {
  createTaskSchema,
  updateTaskSchema,
  parseCreateTaskInput,
  parseUpdateTaskInput,
  normalizeTimestamp,
  isCalendarDate,
  checkPriority,
  checkTaskType,
  TASK_NAME_MAX_LENGTH,
} from './validation/task-input.js';
export type { CreateTaskInput, UpdateTaskInput, NewTask, TaskPatch } from './validation/task-input.js';

// Queries
export * from './queries/index.js';

// Parsers
export * from './parsers/index.js';

// Seed data
export { seedSampleTasks, loadSampleTasks } from './seed/sample-data.js';
export type { SampleTask } from './seed/sample-data.js';

// Backup
export { BackupManager, resolveBackupDir } from './backup/backup-manager.js';
export type { BackupInfo } from './backup/backup-manager.js';
