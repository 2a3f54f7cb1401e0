/**
 * Sample tasks for a fresh database. Dates and deadlines are stored as day
 * offsets so the data always lands around "now".
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { OrganizerDb } from '../db.js';
import { getRawDb } from '../db.js';
import type { Task } from '../types/task.js';
import { PRIORITY_VALUES } from '../types/priority.js';
import { TASK_TYPE_VALUES } from '../types/task-type.js';
import { createTask } from '../queries/task-queries.js';
import { addDays, formatDate } from '../parsers/date-parser.js';

const SAMPLE_FILE = new URL('../../data/sample-tasks.json', import.meta.url);

const sampleTaskSchema = z.object({
  dateOffsetDays: z.number().int(),
  taskName: z.string(),
  comment: z.string().nullable(),
  deadlineOffsetDays: z.number().int().positive().nullable(),
  priority: z.enum(PRIORITY_VALUES),
  taskType: z.enum(TASK_TYPE_VALUES),
});

export type SampleTask = z.infer<typeof sampleTaskSchema>;

const DAY_MS = 86_400_000;

export function loadSampleTasks(): SampleTask[] {
  const raw: unknown = JSON.parse(readFileSync(SAMPLE_FILE, 'utf-8'));
  return z.array(sampleTaskSchema).parse(raw);
}

/**
 * Insert the sample tasks through the regular create path, all or none:
 * one rejected sample rolls back the ones before it.
 */
export function seedSampleTasks(db: OrganizerDb, now: Date = new Date()): Task[] {
  const samples = loadSampleTasks();
  const insertAll = getRawDb(db).transaction((): Task[] => samples.map(sample => createTask(db, {
    date: formatDate(addDays(now, sample.dateOffsetDays)),
    taskName: sample.taskName,
    comment: sample.comment,
    deadline: sample.deadlineOffsetDays === null
      ? null
      : new Date(now.getTime() + sample.deadlineOffsetDays * DAY_MS),
    priority: sample.priority,
    taskType: sample.taskType,
  })));
  return insertAll.immediate();
}
