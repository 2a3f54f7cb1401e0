import { Command } from 'commander';
import chalk from 'chalk';
import type { OrganizerDb } from '@organizer/core';
import { getDbPath, getStats, PRIORITY_VALUES, TASK_TYPE_VALUES } from '@organizer/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createSystemCommand(db: OrganizerDb): Command {
  const systemCommand = new Command('system')
    .description('System information and diagnostics');

  systemCommand.addCommand(
    new Command('status')
      .description('Show the database location and task counts')
      .action(() => $try(() => {
        const stats = getStats(db);

        console.log(chalk.bold.underline('Database'));
        console.log(`  Path: ${getDbPath(db) || ':memory:'}`);
        console.log();

        console.log(chalk.bold.underline('Tasks'));
        console.log(`  Total: ${chalk.bold(String(stats.total))} (${stats.withDeadline} with deadline)`);
        console.log(`  By priority: ${PRIORITY_VALUES.map(p => `${out.formatPriority(p, false)} ${stats.byPriority[p]}`).join(', ')}`);
        console.log(`  By type: ${TASK_TYPE_VALUES.map(t => `${out.formatType(t)} ${stats.byType[t]}`).join(', ')}`);
      })),
  );

  return systemCommand;
}
