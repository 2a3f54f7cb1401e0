/**
 * Manages backup creation, rotation, and restoration.
 * Uses WAL checkpoint + file copy for backups.
 */

import { copyFileSync, existsSync, mkdirSync, readdirSync, rmSync, statSync } from 'node:fs';
import { join, basename } from 'node:path';
import { homedir } from 'node:os';
import type { OrganizerDb } from '../db.js';
import { getRawDb, getDbPath, INSERT_STAMP_TRIGGER, INSERT_STAMP_TRIGGER_SQL } from '../db.js';

const MAX_VERSION_BACKUPS = 10;
const MAX_DAILY_BACKUP_DAYS = 7;
const BACKUP_EXT = '.backup.db';
const DAILY_PREFIX = 'daily.';
const PRE_RESTORE_PREFIX = 'pre-restore.';
const TS_FORMAT_RE = /^organizer\.(pre-restore\.)?(\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}-\d{3})\.backup\.db$/;
const DAILY_FORMAT_RE = /^organizer\.daily\.(\d{4}-\d{2}-\d{2})\.backup\.db$/;

export interface BackupInfo {
  filePath: string;
  timestamp: Date;
  isDaily: boolean;
  /** Safety copy taken just before a restore */
  isPreRestore: boolean;
  fileSize: number;
}

/** ORGANIZER_BACKUP_DIR wins over ~/.organizer/backups */
export function resolveBackupDir(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env['ORGANIZER_BACKUP_DIR']?.trim();
  return fromEnv ? fromEnv : join(homedir(), '.organizer', 'backups');
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/** Format a date as yyyy-MM-ddTHH-mm-ss-SSS (filesystem-safe) */
function formatTimestamp(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`
    + `T${pad(d.getHours())}-${pad(d.getMinutes())}-${pad(d.getSeconds())}-${pad(d.getMilliseconds(), 3)}`;
}

/** Format a date as yyyy-MM-dd */
function formatDay(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

export class BackupManager {
  private backupDir: string;
  private db: OrganizerDb;

  constructor(backupDir: string, db: OrganizerDb) {
    this.backupDir = backupDir;
    this.db = db;
  }

  get directory(): string {
    return this.backupDir;
  }

  /**
   * Copy the database file into the backup directory, plus the day's daily
   * copy if it does not exist yet, then rotate old backups.
   */
  createBackup(now: Date = new Date()): BackupInfo {
    if (!getDbPath(this.db)) throw new Error('In-memory databases cannot be backed up');

    this.ensureDir();
    const dest = this.versionPath(now);
    this.backupTo(dest);
    this.createDailyIfNeeded(now);
    this.rotate(now);

    return { filePath: dest, timestamp: now, isDaily: false, isPreRestore: false, fileSize: statSync(dest).size };
  }

  /** List available backups, newest first */
  listBackups(): BackupInfo[] {
    if (!existsSync(this.backupDir)) return [];

    const backups: BackupInfo[] = [];
    for (const name of readdirSync(this.backupDir)) {
      if (!name.endsWith(BACKUP_EXT)) continue;
      const info = this.parseBackupFile(join(this.backupDir, name));
      if (info) backups.push(info);
    }

    return backups.sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
  }

  /** Restore from a specific backup. Creates a safety backup first. */
  restoreBackup(backup: BackupInfo, now: Date = new Date()): void {
    if (!existsSync(backup.filePath)) {
      throw new Error(`Backup from ${backup.timestamp.toISOString()} not found`);
    }

    this.ensureDir();
    this.backupTo(this.preRestorePath(now));
    this.restoreFrom(backup.filePath);
    this.rotatePreRestoreBackups();
  }

  private ensureDir(): void {
    if (!existsSync(this.backupDir)) {
      mkdirSync(this.backupDir, { recursive: true });
    }
  }

  private backupTo(dest: string): void {
    const raw = getRawDb(this.db);
    // Flush WAL to main database file, then copy synchronously
    raw.pragma('wal_checkpoint(TRUNCATE)');
    copyFileSync(getDbPath(this.db), dest);
  }

  /**
   * Replace the tasks table contents with the backup's in one transaction.
   * AUTOINCREMENT keeps the id high-water mark, so ids issued after the
   * backup was taken are not handed out again. The insert stamp trigger is
   * lifted for the copy so restored rows keep their original timestamps.
   */
  private restoreFrom(source: string): void {
    const raw = getRawDb(this.db);
    const safePath = source.replace(/'/g, "''");
    raw.exec(`ATTACH DATABASE '${safePath}' AS backup_src`);
    try {
      const doRestore = raw.transaction(() => {
        raw.exec(`DROP TRIGGER IF EXISTS main.${INSERT_STAMP_TRIGGER}`);
        raw.exec('DELETE FROM main.tasks');
        raw.exec('INSERT INTO main.tasks SELECT * FROM backup_src.tasks');
        raw.exec(INSERT_STAMP_TRIGGER_SQL);
      });
      doRestore.immediate();
    } finally {
      raw.exec('DETACH DATABASE backup_src');
    }
  }

  private createDailyIfNeeded(now: Date): void {
    const path = this.dailyPath(now);
    if (existsSync(path)) return;
    this.backupTo(path);
  }

  private rotate(now: Date): void {
    this.rotateVersionBackups();
    this.rotateDailyBackups(now);
  }

  private rotateVersionBackups(): void {
    const versions = this.listBackups().filter(b => !b.isDaily && !b.isPreRestore);
    for (const backup of versions.slice(MAX_VERSION_BACKUPS)) {
      rmSync(backup.filePath, { force: true });
    }
  }

  private rotatePreRestoreBackups(): void {
    const safetyCopies = this.listBackups().filter(b => b.isPreRestore);
    for (const backup of safetyCopies.slice(MAX_VERSION_BACKUPS)) {
      rmSync(backup.filePath, { force: true });
    }
  }

  private rotateDailyBackups(now: Date): void {
    const cutoff = new Date(now);
    cutoff.setDate(cutoff.getDate() - MAX_DAILY_BACKUP_DAYS);

    for (const backup of this.listBackups()) {
      if (backup.isDaily && backup.timestamp < cutoff) {
        rmSync(backup.filePath, { force: true });
      }
    }
  }

  private parseBackupFile(filePath: string): BackupInfo | null {
    const name = basename(filePath);

    const vMatch = TS_FORMAT_RE.exec(name);
    if (vMatch) {
      const ts = vMatch[2]!.replace(/T(\d{2})-(\d{2})-(\d{2})-(\d{3})$/, 'T$1:$2:$3.$4');
      const d = new Date(ts);
      if (!isNaN(d.getTime())) {
        const isPreRestore = vMatch[1] !== undefined;
        return { filePath, timestamp: d, isDaily: false, isPreRestore, fileSize: statSync(filePath).size };
      }
    }

    const dMatch = DAILY_FORMAT_RE.exec(name);
    if (dMatch) {
      const d = new Date(dMatch[1]! + 'T00:00:00');
      if (!isNaN(d.getTime())) {
        return { filePath, timestamp: d, isDaily: true, isPreRestore: false, fileSize: statSync(filePath).size };
      }
    }

    return null;
  }

  private versionPath(d: Date): string {
    return join(this.backupDir, `organizer.${formatTimestamp(d)}${BACKUP_EXT}`);
  }

  private dailyPath(d: Date): string {
    return join(this.backupDir, `organizer.${DAILY_PREFIX}${formatDay(d)}${BACKUP_EXT}`);
  }

  private preRestorePath(d: Date): string {
    return join(this.backupDir, `organizer.${PRE_RESTORE_PREFIX}${formatTimestamp(d)}${BACKUP_EXT}`);
  }
}
