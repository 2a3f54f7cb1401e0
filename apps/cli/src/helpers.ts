import {
  TaskStoreError, ValidationError, checkPriority, checkTaskType,
  parseDate, parseDeadline,
} from '@organizer/core';
import type { Priority, TaskType, TaskSortField } from '@organizer/core';
import * as out from './output.js';

const PRIORITY_ALIASES: Record<string, Priority> = {
  p1: 'HIGH',
  p2: 'MEDIUM',
  p3: 'LOW',
};

const SORT_ALIASES: Record<string, TaskSortField> = {
  deadline: 'deadline',
  priority: 'priority',
  date: 'date',
  created: 'createdAt',
  updated: 'updatedAt',
  id: 'id',
};

/**
 * Map a priority argument onto the stored spelling. Unknown values pass
 * through upper-cased so the store reports them as constraint violations.
 */
export function normalizePriorityArg(value: string): string {
  const key = value.trim().toLowerCase();
  return PRIORITY_ALIASES[key] ?? key.toUpperCase();
}

export function parsePriorityArg(value: string): Priority {
  return checkPriority(normalizePriorityArg(value));
}

export function normalizeTypeArg(value: string): string {
  return value.trim().toUpperCase();
}

export function parseTypeArg(value: string): TaskType {
  return checkTaskType(normalizeTypeArg(value));
}

export function parseSortArg(value: string): TaskSortField {
  const field = SORT_ALIASES[value.trim().toLowerCase()];
  if (field === undefined) {
    throw new ValidationError([{ field: 'sort', message: `unknown sort field '${value}'` }]);
  }
  return field;
}

export function parseId(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new ValidationError([{ field: 'id', message: `'${value}' is not a task id` }]);
  }
  return parseInt(value, 10);
}

export function parseLimitArg(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new ValidationError([{ field: 'limit', message: 'must be a non-negative integer' }]);
  }
  return parseInt(value, 10);
}

/** yyyy-MM-dd from a human-friendly day (today, +3d, friday, jan15) */
export function parseDateArg(value: string, now?: Date): string {
  const date = parseDate(value, now);
  if (date === null) {
    throw new ValidationError([{ field: 'date', message: `cannot read '${value}' as a date` }]);
  }
  return date;
}

/** Canonical UTC timestamp from an ISO timestamp or an offset (+2h, +3d) */
export function parseDeadlineArg(value: string, now?: Date): string {
  const deadline = parseDeadline(value, now);
  if (deadline === null) {
    throw new ValidationError([{ field: 'deadline', message: `cannot read '${value}' as a timestamp` }]);
  }
  return deadline;
}

/** Print an error as `[CODE] message` and mark the process as failed */
function reportError(err: unknown): void {
  if (err instanceof TaskStoreError) {
    out.error(`[${err.code}] ${err.message}`);
  } else if (err instanceof Error) {
    out.error(err.message);
  } else {
    out.error(String(err));
  }
  process.exitCode = 1;
}

/** Run a command action, reporting any failure instead of crashing */
export async function $try(fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    reportError(err);
  }
}
