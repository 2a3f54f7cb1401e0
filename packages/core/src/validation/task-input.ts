/**
 * Input validation at the application boundary.
 *
 * Shape problems (missing field, wrong type, unparseable date) become a
 * ValidationError. Domain rules on well-formed values become a
 * ConstraintViolationError named after the storage constraint that enforces
 * the same rule, so both layers report a violation the same way.
 */

import { z } from 'zod';
import { ConstraintViolationError, ValidationError, constraintMessage } from '../errors.js';
import type { FieldIssue } from '../errors.js';
import { isPriority } from '../types/priority.js';
import type { Priority } from '../types/priority.js';
import { isTaskType } from '../types/task-type.js';
import type { TaskType } from '../types/task-type.js';

export const TASK_NAME_MAX_LENGTH = 255;

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const ZONE_SUFFIX_RE = /(Z|[+-]\d{2}:?\d{2})$/i;
const DATE_ONLY_RE = /^\d{4}-\d{2}-\d{2}$/;

/** True for a real calendar date in yyyy-MM-dd form (rejects 2024-02-30) */
export function isCalendarDate(value: string): boolean {
  if (!ISO_DATE_RE.test(value)) return false;
  const d = new Date(`${value}T00:00:00Z`);
  return !isNaN(d.getTime()) && d.toISOString().slice(0, 10) === value;
}

/**
 * Normalise a deadline to the canonical stored form (yyyy-MM-ddTHH:mm:ss.sssZ).
 * A string without a zone designator is read as UTC. Returns null when the
 * value cannot be parsed.
 */
export function normalizeTimestamp(value: string | Date): string | null {
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? null : value.toISOString();
  }

  const trimmed = value.trim();
  if (!trimmed) return null;

  let source = trimmed;
  if (DATE_ONLY_RE.test(trimmed)) {
    source = `${trimmed}T00:00:00Z`;
  } else if (!ZONE_SUFFIX_RE.test(trimmed)) {
    source = `${trimmed}Z`;
  }

  const d = new Date(source);
  return isNaN(d.getTime()) ? null : d.toISOString();
}

const dateField = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a yyyy-MM-dd string' })
  .refine(isCalendarDate, 'must be a valid yyyy-MM-dd date');

const deadlineField = z
  .union([z.string(), z.date()], { invalid_type_error: 'must be a timestamp string or Date' })
  .transform((value, ctx) => {
    const normalized = normalizeTimestamp(value);
    if (normalized === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a valid timestamp' });
      return z.NEVER;
    }
    return normalized;
  });

/**
 * Categorical fields are checked for type here and for membership in the
 * domain rules, so an out-of-set value is a constraint violation.
 */
export const createTaskSchema = z
  .object({
    date: dateField,
    taskName: z.string({ required_error: 'is required', invalid_type_error: 'must be a string' }),
    comment: z.string({ invalid_type_error: 'must be a string' }).nullish(),
    deadline: deadlineField.nullish(),
    priority: z.string({ required_error: 'is required', invalid_type_error: 'must be a string' }),
    taskType: z.string({ required_error: 'is required', invalid_type_error: 'must be a string' }),
  })
  .strict();

export const updateTaskSchema = createTaskSchema.partial().strict();

export type CreateTaskInput = z.input<typeof createTaskSchema>;
export type UpdateTaskInput = z.input<typeof updateTaskSchema>;

/** Fully validated insert values */
export interface NewTask {
  readonly date: string;
  readonly taskName: string;
  readonly comment: string | null;
  readonly deadline: string | null;
  readonly priority: Priority;
  readonly taskType: TaskType;
}

/** Fully validated partial update; absent keys are left unchanged */
export type TaskPatch = { -readonly [K in keyof NewTask]?: NewTask[K] };

function toValidationError(error: z.ZodError): ValidationError {
  const issues: FieldIssue[] = error.issues.map(issue => {
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      return { field: issue.keys.join(', '), message: 'cannot be set by the caller' };
    }
    return { field: issue.path.join('.'), message: issue.message };
  });
  return new ValidationError(issues, { cause: error });
}

function violation(constraint: string): ConstraintViolationError {
  return new ConstraintViolationError(constraint, constraintMessage(constraint));
}

/** Same set as the storage trim: space, tab, LF, VT, FF, CR */
const BLANK_RE = /^[ \t\n\v\f\r]*$/;

/** Length in characters (code points), as SQLite length() counts text */
function charLength(value: string): number {
  return [...value].length;
}

function checkTaskName(taskName: string): void {
  if (BLANK_RE.test(taskName)) throw violation('chk_task_name_not_empty');
  if (charLength(taskName) > TASK_NAME_MAX_LENGTH) throw violation('chk_task_name_length');
}

export function checkPriority(value: string): Priority {
  if (!isPriority(value)) throw violation('chk_priority_enum');
  return value;
}

export function checkTaskType(value: string): TaskType {
  if (!isTaskType(value)) throw violation('chk_task_type_enum');
  return value;
}

/** Deadline must be strictly later than the row's creation time */
function checkDeadline(deadline: string | null, createdAt: string): void {
  if (deadline !== null && !(deadline > createdAt)) throw violation('chk_deadline_future');
}

/**
 * Validate a create request. `now` stands in for the created_at the store is
 * about to assign; the storage CHECK re-verifies against the real value.
 */
export function parseCreateTaskInput(input: unknown, now: Date = new Date()): NewTask {
  const result = createTaskSchema.safeParse(input);
  if (!result.success) throw toValidationError(result.error);

  const data = result.data;
  checkTaskName(data.taskName);
  const priority = checkPriority(data.priority);
  const taskType = checkTaskType(data.taskType);
  const deadline = data.deadline ?? null;
  checkDeadline(deadline, now.toISOString());

  return {
    date: data.date,
    taskName: data.taskName,
    comment: data.comment ?? null,
    deadline,
    priority,
    taskType,
  };
}

/**
 * Validate a partial update against the row's immutable created_at.
 * Only fields present in the input are checked and returned.
 */
export function parseUpdateTaskInput(input: unknown, createdAt: string): TaskPatch {
  const result = updateTaskSchema.safeParse(input);
  if (!result.success) throw toValidationError(result.error);

  const data = result.data;
  const patch: TaskPatch = {};

  if (data.date !== undefined) patch.date = data.date;
  if (data.taskName !== undefined) {
    checkTaskName(data.taskName);
    patch.taskName = data.taskName;
  }
  if (data.comment !== undefined) patch.comment = data.comment;
  if (data.deadline !== undefined) {
    checkDeadline(data.deadline, createdAt);
    patch.deadline = data.deadline;
  }
  if (data.priority !== undefined) patch.priority = checkPriority(data.priority);
  if (data.taskType !== undefined) patch.taskType = checkTaskType(data.taskType);

  return patch;
}
