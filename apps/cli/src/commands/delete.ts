import { Command } from 'commander';
import type { OrganizerDb } from '@organizer/core';
import { deleteTasks, withRetry } from '@organizer/core';
import * as out from '../output.js';
import { parseId, $try } from '../helpers.js';

export function createDeleteCommand(db: OrganizerDb): Command {
  return new Command('delete')
    .description('Delete one or more tasks')
    .argument('<taskIds...>', 'The id(s) of the task(s) to delete')
    .action((taskIds: string[]) => $try(async () => {
      const ids = taskIds.map(parseId);
      const result = await withRetry(() => deleteTasks(db, ids));
      out.printBatchResults(result);
    }));
}
