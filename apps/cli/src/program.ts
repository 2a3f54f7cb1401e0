import { Command } from 'commander';
import type { OrganizerDb, BackupManager } from '@organizer/core';

import { createAddCommand } from './commands/add.js';
import { createGetCommand } from './commands/get.js';
import { createUpdateCommand } from './commands/update.js';
import { createDeleteCommand } from './commands/delete.js';
import { createListCommand } from './commands/list.js';
import { createSearchCommand } from './commands/search.js';
import { createInitCommand } from './commands/init.js';
import { createSeedCommand } from './commands/seed.js';
import { createBackupCommand } from './commands/backup.js';
import { createSystemCommand } from './commands/system.js';

export function createProgram(db: OrganizerDb, backup: BackupManager): Command {
  const program = new Command()
    .name('organizer')
    .description('Personal task organizer')
    .version('1.0.0');

  program.addCommand(createAddCommand(db));
  program.addCommand(createGetCommand(db));
  program.addCommand(createUpdateCommand(db));
  program.addCommand(createDeleteCommand(db));
  program.addCommand(createListCommand(db));
  program.addCommand(createSearchCommand(db));
  program.addCommand(createInitCommand(db));
  program.addCommand(createSeedCommand(db));
  program.addCommand(createBackupCommand(backup));
  program.addCommand(createSystemCommand(db));

  // Default action (no command): show task list
  program.action(async (_opts: unknown, cmd: Command) => {
    await cmd.commands.find(c => c.name() === 'list')?.parseAsync([], { from: 'user' });
  });

  return program;
}
