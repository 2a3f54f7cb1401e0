export { Priority, PriorityRank, PRIORITY_VALUES, isPriority } from './priority.js';
export { TaskType, TASK_TYPE_VALUES, isTaskType } from './task-type.js';
export type { TaskId, Task } from './task.js';
export type { TaskResult, DataResult, BatchResult } from './results.js';
