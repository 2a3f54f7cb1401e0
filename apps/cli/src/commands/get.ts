import { Command } from 'commander';
import type { OrganizerDb } from '@organizer/core';
import { requireTask } from '@organizer/core';
import * as out from '../output.js';
import { parseId, $try } from '../helpers.js';

export function createGetCommand(db: OrganizerDb): Command {
  return new Command('get')
    .description('Show every field of a task')
    .argument('<taskId>', 'The id of the task')
    .action((taskId: string) => $try(() => {
      out.printTaskDetails(requireTask(db, parseId(taskId)));
    }));
}
