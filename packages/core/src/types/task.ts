import type { Priority } from './priority.js';
import type { TaskType } from './task-type.js';

/** Row id assigned by the store (INTEGER PRIMARY KEY AUTOINCREMENT) */
export type TaskId = number;

export interface Task {
  readonly id: TaskId;
  readonly date: string; // yyyy-MM-dd
  readonly taskName: string;
  readonly comment: string | null;
  readonly deadline: string | null; // ISO string, UTC
  readonly priority: Priority;
  readonly taskType: TaskType;
  readonly createdAt: string; // ISO string, UTC, write-once
  readonly updatedAt: string; // ISO string, UTC, stamped on every update
}
