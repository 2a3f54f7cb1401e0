// Task queries
export {
  getTaskById,
  requireTask,
  listTasks,
  getAllTasks,
  searchTasksByName,
  getTasksByPriority,
  getTasksByType,
  getTasksWithDeadline,
  getTasksWithoutDeadline,
  getTasksSortedByDeadline,
  getTasksSortedByPriority,
  getTasksSortedByDate,
  searchTasks,
  countTasks,
  getStats,
  createTask,
  updateTask,
  deleteTask,
  deleteTasks,
} from './task-queries.js';
export type { TaskFilter, TaskSort, TaskSortField, SortDirection, TaskStats } from './task-queries.js';
