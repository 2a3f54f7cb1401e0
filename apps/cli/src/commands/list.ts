import { Command } from 'commander';
import type { OrganizerDb, TaskFilter } from '@organizer/core';
import { listTasks } from '@organizer/core';
import * as out from '../output.js';
import {
  parsePriorityArg, parseTypeArg, parseDateArg, parseSortArg, parseLimitArg, $try,
} from '../helpers.js';

interface ListOptions {
  priority?: string;
  type?: string;
  date?: string;
  name?: string;
  withDeadline?: boolean;
  withoutDeadline?: boolean;
  sort?: string;
  desc?: boolean;
  limit?: string;
}

export function createListCommand(db: OrganizerDb): Command {
  return new Command('list')
    .description('List tasks')
    .option('-p, --priority <level>', 'Filter by priority (high, medium, low)')
    .option('-t, --type <type>', 'Filter by task type (work, home)')
    .option('-d, --date <when>', 'Filter by scheduled day')
    .option('--name <text>', 'Filter by part of the task name')
    .option('--with-deadline', 'Show only tasks that have a deadline')
    .option('--without-deadline', 'Show only tasks without a deadline')
    .option('-s, --sort <field>', 'Sort by deadline, priority, date, created, updated or id', 'id')
    .option('--desc', 'Sort descending')
    .option('--limit <n>', 'Show at most n tasks')
    .action((opts: ListOptions) => $try(() => {
      if (opts.withDeadline && opts.withoutDeadline) {
        out.error('Cannot use both --with-deadline and --without-deadline at the same time');
        process.exitCode = 1;
        return;
      }

      const filter: TaskFilter = {};
      if (opts.priority !== undefined) filter.priority = parsePriorityArg(opts.priority);
      if (opts.type !== undefined) filter.taskType = parseTypeArg(opts.type);
      if (opts.date !== undefined) filter.date = parseDateArg(opts.date);
      if (opts.name !== undefined) filter.name = opts.name;
      if (opts.withDeadline) filter.hasDeadline = true;
      if (opts.withoutDeadline) filter.hasDeadline = false;
      if (opts.limit !== undefined) filter.limit = parseLimitArg(opts.limit);

      const tasks = listTasks(db, filter, {
        by: parseSortArg(opts.sort ?? 'id'),
        direction: opts.desc ? 'desc' : 'asc',
      });
      out.printTasks(tasks, 'No tasks found... use the add command to create one');
    }));
}
