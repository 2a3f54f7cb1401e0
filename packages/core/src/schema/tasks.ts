import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';
import { PRIORITY_VALUES } from '../types/priority.js';
import { TASK_TYPE_VALUES } from '../types/task-type.js';

/** Canonical UTC timestamp as computed by the storage engine's clock */
export const NOW_SQL = sql`(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))`;

export const tasks = sqliteTable('tasks', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  /** yyyy-MM-dd, the day the task is scheduled for */
  date: text('date').notNull(),
  taskName: text('task_name').notNull(),
  comment: text('comment'),
  deadline: text('deadline'),
  priority: text('priority', { enum: PRIORITY_VALUES }).notNull(),
  taskType: text('task_type', { enum: TASK_TYPE_VALUES }).notNull(),
  createdAt: text('created_at').notNull().default(NOW_SQL),
  updatedAt: text('updated_at').notNull().default(NOW_SQL),
}, (table) => [
  index('idx_tasks_date').on(table.date),
  index('idx_tasks_priority').on(table.priority),
  index('idx_tasks_task_type').on(table.taskType),
  index('idx_tasks_deadline').on(table.deadline),
  index('idx_tasks_task_name').on(sql`${table.taskName} COLLATE NOCASE`),
  index('idx_tasks_created_at').on(table.createdAt),
  // Composite: only for predicates that are commonly combined
  index('idx_tasks_priority_type').on(table.priority, table.taskType),
  index('idx_tasks_date_priority').on(table.date, table.priority),
]);

export type TaskRow = typeof tasks.$inferSelect;
