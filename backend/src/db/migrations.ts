import type { Database as BetterSqlite3Database } from 'better-sqlite3';
import logger from '../logger.js';

type Migration = {
  version: number;
  name: string;
  up: (db: BetterSqlite3Database) => void;
};

const migrations: Migration[] = [
  {
    version: 1,
    name: 'oil-resources',
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS oil_resources (
          id TEXT PRIMARY KEY,
          date TEXT NOT NULL,
          price REAL NOT NULL CHECK (price >= 0),
          type TEXT NOT NULL DEFAULT 'PETROL' CHECK (type IN ('PETROL','DIESEL','GAS')),
          oil_document_url TEXT,
          user_id TEXT,
          email TEXT,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_oil_resources_date ON oil_resources(date);
        CREATE INDEX IF NOT EXISTS idx_oil_resources_user ON oil_resources(user_id);
        CREATE INDEX IF NOT EXISTS idx_oil_resources_email ON oil_resources(email);
      `);
    },
  },
];

export function runMigrations(db: BetterSqlite3Database): void {
  const currentVersion = Number(db.pragma('user_version', { simple: true }));
  const pending = migrations.filter((migration) => migration.version > currentVersion).sort((a, b) => a.version - b.version);

  for (const migration of pending) {
    logger.info({ version: migration.version, name: migration.name }, 'Applying database migration');
    const transaction = db.transaction(() => {
      migration.up(db);
      db.pragma(`user_version = ${migration.version}`);
    });
    transaction();
  }
}
