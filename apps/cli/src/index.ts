#!/usr/bin/env tsx

import { createDb, BackupManager, resolveBackupDir } from '@organizer/core';
import { createProgram } from './program.js';

// Initialize database (ORGANIZER_DB_PATH or the platform default)
const db = createDb();

// Initialize services
const backup = new BackupManager(resolveBackupDir(), db);

await createProgram(db, backup).parseAsync();
