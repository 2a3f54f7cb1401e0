import { Command } from 'commander';
import type { OrganizerDb } from '@organizer/core';
import { createTask, withRetry } from '@organizer/core';
import * as out from '../output.js';
import { normalizePriorityArg, normalizeTypeArg, parseDateArg, parseDeadlineArg, $try } from '../helpers.js';

interface AddOptions {
  priority: string;
  type: string;
  date: string;
  comment?: string;
  deadline?: string;
}

export function createAddCommand(db: OrganizerDb): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<name>', 'Task name')
    .requiredOption('-p, --priority <level>', 'Priority (high, medium, low or p1/p2/p3)')
    .requiredOption('-t, --type <type>', 'Task type (work, home)')
    .option('-d, --date <when>', 'Scheduled day (today, +3d, friday, jan15, yyyy-MM-dd)', 'today')
    .option('-c, --comment <text>', 'Free-form comment')
    .option('--deadline <when>', 'Deadline (ISO timestamp, or +2h, +3d from now)')
    .action((name: string, opts: AddOptions) => $try(async () => {
      const task = await withRetry(() => createTask(db, {
        date: parseDateArg(opts.date),
        taskName: name,
        comment: opts.comment ?? null,
        deadline: opts.deadline !== undefined ? parseDeadlineArg(opts.deadline) : null,
        priority: normalizePriorityArg(opts.priority),
        taskType: normalizeTypeArg(opts.type),
      }));

      out.success(`Task ${task.id} created`);
      console.log(out.formatTaskLine(task));
    }));
}
