import { Command } from 'commander';
import type { OrganizerDb } from '@organizer/core';
import { CREATE_SCHEMA_SQL, countTasks, getDbPath, getRawDb, hasTasksTable, withRetry } from '@organizer/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createInitCommand(db: OrganizerDb): Command {
  return new Command('init')
    .description('Create the schema if needed and verify the database')
    .action(() => $try(async () => {
      await withRetry(() => getRawDb(db).exec(CREATE_SCHEMA_SQL));

      if (!hasTasksTable(db)) {
        out.error('Table "tasks" is missing after applying the schema');
        process.exitCode = 1;
        return;
      }

      out.success(`Database ready at ${getDbPath(db) || ':memory:'}`);
      out.info(`Tasks: ${countTasks(db)}`);
    }));
}
