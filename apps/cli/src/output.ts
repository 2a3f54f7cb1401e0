import chalk from 'chalk';
import type { Task, Priority, TaskType, TaskResult, DataResult, BatchResult } from '@organizer/core';

export function success(message: string): void {
  console.log(chalk.green(`✓ ${message}`));
}

export function error(message: string): void {
  console.error(chalk.red(`✗ ${message}`));
}

export function warning(message: string): void {
  console.warn(chalk.yellow(`! ${message}`));
}

export function info(message: string): void {
  console.log(message);
}

/** Colored priority, padded to a fixed width for task lines */
export function formatPriority(priority: Priority, pad = true): string {
  const label = pad ? priority.padEnd(6) : priority;
  switch (priority) {
    case 'HIGH': return chalk.red.bold(label);
    case 'MEDIUM': return chalk.yellow(label);
    case 'LOW': return chalk.gray(label);
  }
}

export function formatType(taskType: TaskType): string {
  return taskType === 'WORK' ? chalk.blue(taskType) : chalk.magenta(taskType);
}

/** Deadline suffix; overdue deadlines are red */
function formatDeadline(deadline: string | null, now: Date = new Date()): string {
  if (deadline === null) return '';
  const color = deadline < now.toISOString() ? chalk.red : chalk.yellow;
  return ` ${color(`due ${deadline}`)}`;
}

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max - 1) + '…' : text;
}

/** One line per task: `(id) PRIORITY TYPE date name [due deadline]` */
export function formatTaskLine(task: Task, now?: Date): string {
  const taskId = chalk.dim(`(${task.id})`);
  return `${taskId} ${formatPriority(task.priority)} ${formatType(task.taskType)} ${task.date} `
    + `${chalk.bold(truncate(task.taskName, 80))}${formatDeadline(task.deadline, now)}`;
}

export function printTasks(tasks: readonly Task[], emptyMessage = 'No tasks found'): void {
  if (tasks.length === 0) {
    info(emptyMessage);
    return;
  }
  for (const task of tasks) console.log(formatTaskLine(task));
}

export function printTaskDetails(task: Task): void {
  const row = (label: string, value: string) => console.log(`${chalk.dim(label.padEnd(10))}${value}`);
  row('ID', String(task.id));
  row('Name', chalk.bold(task.taskName));
  row('Date', task.date);
  row('Priority', formatPriority(task.priority, false));
  row('Type', formatType(task.taskType));
  row('Comment', task.comment ?? chalk.dim('(none)'));
  row('Deadline', task.deadline ?? chalk.dim('(none)'));
  row('Created', task.createdAt);
  row('Updated', task.updatedAt);
}

function printResult<T>(result: TaskResult | DataResult<T>): void {
  if (result.type === 'success') {
    success(result.message);
  } else {
    warning(`Task ${result.taskId} not found`);
  }
}

export function printBatchResults(batch: BatchResult): void {
  for (const result of batch.results) printResult(result);
}
