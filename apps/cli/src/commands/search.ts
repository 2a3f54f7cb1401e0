import { Command } from 'commander';
import type { OrganizerDb } from '@organizer/core';
import { searchTasks } from '@organizer/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createSearchCommand(db: OrganizerDb): Command {
  return new Command('search')
    .description('Search tasks, e.g. "report priority:high type:work has:deadline sort:deadline"')
    .argument('<query...>', 'Name text and filters (priority:, type:, date:, has:/no:deadline, sort:, id:)')
    .action((query: string[]) => $try(() => {
      out.printTasks(searchTasks(db, query.join(' ')));
    }));
}
