export { tasks, NOW_SQL } from './tasks.js';
export type { TaskRow } from './tasks.js';
