import Database from 'better-sqlite3';
import type { Database as BetterSqlite3Database } from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import logger from '../logger.js';
import { runMigrations } from './migrations.js';

export type { BetterSqlite3Database };

const IN_MEMORY = ':memory:';

export function openDatabase(databasePath: string): BetterSqlite3Database {
  let location = databasePath;
  if (databasePath !== IN_MEMORY) {
    location = path.resolve(databasePath);
    fs.mkdirSync(path.dirname(location), { recursive: true });
  }

  logger.info({ databasePath: location }, 'Initialising SQLite database');

  const db = new Database(location);
  db.pragma('foreign_keys = ON');
  if (location !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('busy_timeout = 5000');

  runMigrations(db);

  return db;
}

export function pingDatabase(db: BetterSqlite3Database): void {
  db.prepare('SELECT 1').get();
}
