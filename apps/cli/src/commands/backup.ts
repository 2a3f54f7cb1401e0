import { Command } from 'commander';
import chalk from 'chalk';
import type { BackupManager } from '@organizer/core';
import * as out from '../output.js';
import { parseId, $try } from '../helpers.js';

function formatSize(bytes: number): string {
  return bytes < 1024 ? `${bytes} B` : `${(bytes / 1024).toFixed(1)} KB`;
}

export function createBackupCommand(backup: BackupManager): Command {
  const backupCommand = new Command('backup')
    .description('Create, list and restore database backups');

  backupCommand.addCommand(
    new Command('create')
      .description('Back up the database now')
      .action(() => $try(() => {
        try {
          const info = backup.createBackup();
          out.success(`Backup written to ${info.filePath}`);
        } catch (err: unknown) {
          out.warning(`Backup failed: ${err instanceof Error ? err.message : String(err)}`);
          process.exitCode = 1;
        }
      })),
  );

  backupCommand.addCommand(
    new Command('list')
      .description('List backups, newest first')
      .action(() => $try(() => {
        const backups = backup.listBackups();
        if (backups.length === 0) {
          out.info(`No backups in ${backup.directory}`);
          return;
        }
        backups.forEach((b, i) => {
          const kind = b.isDaily ? chalk.cyan('daily') : b.isPreRestore ? chalk.yellow('pre-restore') : 'version';
          console.log(`${chalk.dim(`${i + 1}.`)} ${b.timestamp.toISOString()} ${kind} ${formatSize(b.fileSize)}`);
        });
      })),
  );

  backupCommand.addCommand(
    new Command('restore')
      .description('Replace all tasks with the contents of a backup')
      .argument('[index]', 'Position in `backup list` (default: newest)', '1')
      .option('-f, --force', 'Restore without asking')
      .action((index: string, opts: { force?: boolean }) => $try(() => {
        const backups = backup.listBackups();
        const chosen = backups[parseId(index) - 1];
        if (!chosen) {
          out.error(`No backup at position ${index}`);
          process.exitCode = 1;
          return;
        }

        if (!opts.force) {
          out.warning(`This replaces every task with the backup from ${chosen.timestamp.toISOString()}. Re-run with --force to continue`);
          return;
        }

        backup.restoreBackup(chosen);
        out.success(`Restored backup from ${chosen.timestamp.toISOString()}`);
      })),
  );

  return backupCommand;
}
