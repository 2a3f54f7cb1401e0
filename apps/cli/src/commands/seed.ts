import { Command } from 'commander';
import type { OrganizerDb } from '@organizer/core';
import { countTasks, seedSampleTasks, withRetry } from '@organizer/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createSeedCommand(db: OrganizerDb): Command {
  return new Command('seed')
    .description('Insert the sample tasks')
    .option('-f, --force', 'Insert even when tasks already exist')
    .action((opts: { force?: boolean }) => $try(async () => {
      const existing = countTasks(db);
      if (existing > 0 && !opts.force) {
        out.warning(`Database already holds ${existing} task(s); use --force to add the samples anyway`);
        return;
      }

      const created = await withRetry(() => seedSampleTasks(db));
      out.success(`Inserted ${created.length} sample tasks`);
    }));
}
