/**
 * Core task CRUD and list operations using Drizzle ORM.
 *
 * Every write runs as a single statement or a single immediate transaction,
 * and every storage failure leaves here already translated into the
 * task error taxonomy.
 */

import { eq, and, asc, desc, count, gte, lte, lt, gt, sql, isNull, isNotNull } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { OrganizerDb } from '../db.js';
import { getRawDb } from '../db.js';
import type { Task, TaskId } from '../types/task.js';
import type { TaskResult, DataResult, BatchResult } from '../types/results.js';
import { Priority, PRIORITY_VALUES, PriorityRank } from '../types/priority.js';
import { TaskType } from '../types/task-type.js';
import { tasks, NOW_SQL } from '../schema/tasks.js';
import type { TaskRow } from '../schema/tasks.js';
import { NotFoundError, withStorageErrors } from '../errors.js';
import {
  parseCreateTaskInput, parseUpdateTaskInput,
  type CreateTaskInput, type UpdateTaskInput, type TaskPatch,
} from '../validation/task-input.js';
import { parseSearchFilters } from '../parsers/search-filter-parser.js';

// ---------------------------------------------------------------------------
// Row mapper
// ---------------------------------------------------------------------------

function toTask(row: TaskRow): Task {
  return { ...row };
}

// ---------------------------------------------------------------------------
// Filters and sorting
// ---------------------------------------------------------------------------

export interface TaskFilter {
  /** Case-insensitive substring of task_name */
  name?: string;
  /** Case-insensitive prefix of task_name */
  namePrefix?: string;
  priority?: Priority;
  taskType?: TaskType;
  /** Exact yyyy-MM-dd */
  date?: string;
  dateFrom?: string;
  dateTo?: string;
  /** true: deadline set; false: no deadline */
  hasDeadline?: boolean;
  deadlineBefore?: string;
  deadlineAfter?: string;
  createdAfter?: string;
  createdBefore?: string;
  limit?: number;
  offset?: number;
}

export type TaskSortField = 'deadline' | 'priority' | 'date' | 'createdAt' | 'updatedAt' | 'id';
export type SortDirection = 'asc' | 'desc';

export interface TaskSort {
  by: TaskSortField;
  direction?: SortDirection;
}

/** Escape LIKE wildcards so user text matches literally */
function escapeLike(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/%/g, '\\%').replace(/_/g, '\\_');
}

function buildConditions(filter: TaskFilter): SQL[] {
  const conditions: SQL[] = [];

  if (filter.name) {
    conditions.push(sql`${tasks.taskName} LIKE ${'%' + escapeLike(filter.name) + '%'} ESCAPE '\\'`);
  }
  if (filter.namePrefix) {
    conditions.push(sql`${tasks.taskName} LIKE ${escapeLike(filter.namePrefix) + '%'} ESCAPE '\\'`);
  }
  if (filter.priority != null) conditions.push(eq(tasks.priority, filter.priority));
  if (filter.taskType != null) conditions.push(eq(tasks.taskType, filter.taskType));
  if (filter.date != null) conditions.push(eq(tasks.date, filter.date));
  if (filter.dateFrom != null) conditions.push(gte(tasks.date, filter.dateFrom));
  if (filter.dateTo != null) conditions.push(lte(tasks.date, filter.dateTo));
  if (filter.hasDeadline === true) conditions.push(isNotNull(tasks.deadline));
  if (filter.hasDeadline === false) conditions.push(isNull(tasks.deadline));
  if (filter.deadlineBefore != null) conditions.push(lt(tasks.deadline, filter.deadlineBefore));
  if (filter.deadlineAfter != null) conditions.push(gt(tasks.deadline, filter.deadlineAfter));
  if (filter.createdAfter != null) conditions.push(gt(tasks.createdAt, filter.createdAfter));
  if (filter.createdBefore != null) conditions.push(lt(tasks.createdAt, filter.createdBefore));

  return conditions;
}

const PRIORITY_RANK_SQL = sql`CASE ${tasks.priority} ${sql.join(
  PRIORITY_VALUES.map(p => sql`WHEN ${p} THEN ${PriorityRank[p]}`),
  sql` `,
)} END`;

function buildOrderBy(sort: TaskSort): SQL[] {
  const dir = sort.direction === 'desc' ? desc : asc;

  switch (sort.by) {
    case 'deadline':
      // Tasks without a deadline go last in either direction
      return [sql`${tasks.deadline} IS NULL`, dir(tasks.deadline), asc(tasks.id)];
    case 'priority':
      return [dir(PRIORITY_RANK_SQL), asc(tasks.id)];
    case 'date':
      return [dir(tasks.date), asc(tasks.id)];
    case 'createdAt':
      return [dir(tasks.createdAt), asc(tasks.id)];
    case 'updatedAt':
      return [dir(tasks.updatedAt), asc(tasks.id)];
    case 'id':
      return [dir(tasks.id)];
  }
}

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

/** Get a single task by ID */
export function getTaskById(db: OrganizerDb, taskId: TaskId): Task | null {
  const row = db.select().from(tasks).where(eq(tasks.id, taskId)).get();
  return row ? toTask(row) : null;
}

/** Get a single task by ID or throw NotFoundError */
export function requireTask(db: OrganizerDb, taskId: TaskId): Task {
  const task = getTaskById(db, taskId);
  if (!task) throw new NotFoundError(taskId);
  return task;
}

/** Predicate-based list. Filters combine with AND; default order is by id */
export function listTasks(db: OrganizerDb, filter: TaskFilter = {}, sort: TaskSort = { by: 'id' }): Task[] {
  const conditions = buildConditions(filter);
  const query = db.select().from(tasks)
    .where(conditions.length > 0 ? and(...conditions) : undefined)
    .orderBy(...buildOrderBy(sort));

  // SQLite needs a LIMIT before an OFFSET, and drizzle drops negative limits
  const limit = filter.limit ?? (filter.offset != null ? Number.MAX_SAFE_INTEGER : undefined);
  const rows = limit != null
    ? query.limit(limit).offset(filter.offset ?? 0).all()
    : query.all();
  return rows.map(toTask);
}

export function getAllTasks(db: OrganizerDb): Task[] {
  return listTasks(db);
}

export function searchTasksByName(db: OrganizerDb, name: string): Task[] {
  return listTasks(db, { name });
}

export function getTasksByPriority(db: OrganizerDb, priority: Priority): Task[] {
  return listTasks(db, { priority });
}

export function getTasksByType(db: OrganizerDb, taskType: TaskType): Task[] {
  return listTasks(db, { taskType });
}

export function getTasksWithDeadline(db: OrganizerDb): Task[] {
  return listTasks(db, { hasDeadline: true }, { by: 'deadline' });
}

export function getTasksWithoutDeadline(db: OrganizerDb): Task[] {
  return listTasks(db, { hasDeadline: false });
}

export function getTasksSortedByDeadline(db: OrganizerDb): Task[] {
  return listTasks(db, {}, { by: 'deadline' });
}

export function getTasksSortedByPriority(db: OrganizerDb): Task[] {
  return listTasks(db, {}, { by: 'priority' });
}

export function getTasksSortedByDate(db: OrganizerDb): Task[] {
  return listTasks(db, {}, { by: 'date' });
}

/**
 * Search with smart filters, e.g. `grocery priority:medium type:home has:deadline sort:deadline`.
 * Free text matches task names.
 */
export function searchTasks(db: OrganizerDb, query: string, now?: Date): Task[] {
  const filters = parseSearchFilters(query, now);

  if (filters.id != null) {
    const task = getTaskById(db, filters.id);
    return task ? [task] : [];
  }

  const filter: TaskFilter = {};
  if (filters.nameQuery) filter.name = filters.nameQuery;
  if (filters.priority != null) filter.priority = filters.priority;
  if (filters.taskType != null) filter.taskType = filters.taskType;
  if (filters.date != null) filter.date = filters.date;
  if (filters.hasDeadline != null) filter.hasDeadline = filters.hasDeadline;

  return listTasks(db, filter, filters.sort ?? { by: 'id' });
}

export function countTasks(db: OrganizerDb): number {
  const row = db.select({ cnt: count() }).from(tasks).get();
  return row?.cnt ?? 0;
}

export interface TaskStats {
  total: number;
  withDeadline: number;
  byPriority: Record<Priority, number>;
  byType: Record<TaskType, number>;
}

/** Totals per priority and type, for status reporting */
export function getStats(db: OrganizerDb): TaskStats {
  const byPriority: Record<Priority, number> = { [Priority.High]: 0, [Priority.Medium]: 0, [Priority.Low]: 0 };
  const byType: Record<TaskType, number> = { [TaskType.Work]: 0, [TaskType.Home]: 0 };

  const priorityRows = db.select({ priority: tasks.priority, cnt: count() })
    .from(tasks).groupBy(tasks.priority).all();
  for (const r of priorityRows) byPriority[r.priority] = r.cnt;

  const typeRows = db.select({ taskType: tasks.taskType, cnt: count() })
    .from(tasks).groupBy(tasks.taskType).all();
  for (const r of typeRows) byType[r.taskType] = r.cnt;

  const deadlineRow = db.select({ cnt: count() }).from(tasks).where(isNotNull(tasks.deadline)).get();

  return {
    total: countTasks(db),
    withDeadline: deadlineRow?.cnt ?? 0,
    byPriority,
    byType,
  };
}

// ---------------------------------------------------------------------------
// Write operations
// ---------------------------------------------------------------------------

/**
 * The single path every UPDATE takes: updated_at is always part of the SET
 * list. The update_tasks_updated_at trigger enforces the same for writers
 * that bypass this module.
 */
function stampUpdate(patch: TaskPatch): TaskPatch & { updatedAt: SQL } {
  return { ...patch, updatedAt: NOW_SQL };
}

/** Validate and insert a new task. created_at and updated_at come from the store */
export function createTask(db: OrganizerDb, input: CreateTaskInput): Task {
  const values = parseCreateTaskInput(input);

  const row = withStorageErrors(() => db.insert(tasks).values({
    date: values.date,
    taskName: values.taskName,
    comment: values.comment,
    deadline: values.deadline,
    priority: values.priority,
    taskType: values.taskType,
  }).returning().get());

  if (!row) throw new Error('Insert returned no row');
  return toTask(row);
}

/**
 * Apply a partial update. Fields absent from `input` keep their value;
 * `comment` and `deadline` can be cleared with null. An empty update still
 * refreshes updated_at.
 */
export function updateTask(db: OrganizerDb, taskId: TaskId, input: UpdateTaskInput): DataResult<Task> {
  const raw = getRawDb(db);

  const apply = raw.transaction((): DataResult<Task> => {
    const current = getTaskById(db, taskId);
    if (!current) return { type: 'not-found', taskId };

    const patch = parseUpdateTaskInput(input, current.createdAt);
    db.update(tasks).set(stampUpdate(patch)).where(eq(tasks.id, taskId)).run();

    // Re-read: the trigger rewrites updated_at after the statement
    const updated = requireTask(db, taskId);
    return { type: 'success', data: updated, message: `Task ${taskId} updated` };
  });

  return withStorageErrors(() => apply.immediate());
}

/** Delete a task permanently. A missing id is reported, not thrown */
export function deleteTask(db: OrganizerDb, taskId: TaskId): TaskResult {
  const result = withStorageErrors(() => db.delete(tasks).where(eq(tasks.id, taskId)).run());
  if (result.changes === 0) return { type: 'not-found', taskId };
  return { type: 'success', message: `Task ${taskId} deleted` };
}

/**
 * Delete several tasks in one transaction; each id reports its own outcome.
 * A failure rolls back the whole batch, so a retry sees every row again.
 */
export function deleteTasks(db: OrganizerDb, taskIds: readonly TaskId[]): BatchResult {
  const apply = getRawDb(db).transaction((): BatchResult => ({
    results: taskIds.map(id => deleteTask(db, id)),
  }));
  return withStorageErrors(() => apply.immediate());
}
