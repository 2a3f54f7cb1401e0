export const TaskType = {
  Work: 'WORK',
  Home: 'HOME',
} as const;

export type TaskType = (typeof TaskType)[keyof typeof TaskType];

/** Mirrors the chk_task_type_enum constraint. */
export const TASK_TYPE_VALUES = [TaskType.Work, TaskType.Home] as const;

export function isTaskType(value: unknown): value is TaskType {
  return typeof value === 'string' && (TASK_TYPE_VALUES as readonly string[]).includes(value);
}
