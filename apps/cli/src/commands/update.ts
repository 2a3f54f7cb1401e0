import { Command } from 'commander';
import type { OrganizerDb, UpdateTaskInput } from '@organizer/core';
import { updateTask, withRetry } from '@organizer/core';
import * as out from '../output.js';
import {
  normalizePriorityArg, normalizeTypeArg, parseDateArg, parseDeadlineArg, parseId, $try,
} from '../helpers.js';

interface UpdateOptions {
  name?: string;
  date?: string;
  comment?: string;
  clearComment?: boolean;
  deadline?: string;
  clearDeadline?: boolean;
  priority?: string;
  type?: string;
}

export function createUpdateCommand(db: OrganizerDb): Command {
  return new Command('update')
    .description('Change fields of a task; fields not given keep their value')
    .argument('<taskId>', 'The id of the task')
    .option('--name <name>', 'New task name')
    .option('-d, --date <when>', 'New scheduled day')
    .option('-c, --comment <text>', 'New comment')
    .option('--clear-comment', 'Remove the comment')
    .option('--deadline <when>', 'New deadline (ISO timestamp, or +2h, +3d from now)')
    .option('--clear-deadline', 'Remove the deadline')
    .option('-p, --priority <level>', 'New priority')
    .option('-t, --type <type>', 'New task type')
    .action((taskId: string, opts: UpdateOptions) => $try(async () => {
      if (opts.comment !== undefined && opts.clearComment) {
        out.error('Cannot use both --comment and --clear-comment');
        process.exitCode = 1;
        return;
      }
      if (opts.deadline !== undefined && opts.clearDeadline) {
        out.error('Cannot use both --deadline and --clear-deadline');
        process.exitCode = 1;
        return;
      }

      const id = parseId(taskId);
      const patch: UpdateTaskInput = {};
      if (opts.name !== undefined) patch.taskName = opts.name;
      if (opts.date !== undefined) patch.date = parseDateArg(opts.date);
      if (opts.comment !== undefined) patch.comment = opts.comment;
      if (opts.clearComment) patch.comment = null;
      if (opts.deadline !== undefined) patch.deadline = parseDeadlineArg(opts.deadline);
      if (opts.clearDeadline) patch.deadline = null;
      if (opts.priority !== undefined) patch.priority = normalizePriorityArg(opts.priority);
      if (opts.type !== undefined) patch.taskType = normalizeTypeArg(opts.type);

      const result = await withRetry(() => updateTask(db, id, patch));
      if (result.type === 'not-found') {
        out.error(`Task ${result.taskId} not found`);
        process.exitCode = 1;
        return;
      }

      out.success(result.message);
      console.log(out.formatTaskLine(result.data));
    }));
}
