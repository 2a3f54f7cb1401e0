import type { TaskId } from './task.js';

/**
 * Outcome of a write addressed by id. A missing row is a result, not an
 * exception: the caller's intent (row absent or unchanged) may already hold.
 */
export type TaskResult =
  | { readonly type: 'success'; readonly message: string }
  | { readonly type: 'not-found'; readonly taskId: TaskId };

export type DataResult<T> =
  | { readonly type: 'success'; readonly data: T; readonly message: string }
  | { readonly type: 'not-found'; readonly taskId: TaskId };

export interface BatchResult {
  readonly results: readonly TaskResult[];
}

