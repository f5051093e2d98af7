import type Database from 'better-sqlite3';
import { migration001 } from './001_initial_schema';
import { migration002 } from './002_add_meanings';
import { createLogger } from '../../main/utils/logger';

export interface Migration {
  version: number;
  name: string;
  up: (db: Database.Database) => void;
}

const log = createLogger('Migration');

export const migrations: Migration[] = [
  migration001,
  migration002,
];

export function getSchemaVersion(db: Database.Database): number {
  const row = db.prepare(
    'SELECT MAX(version) as version FROM migrations'
  ).get() as { version: number | null } | undefined;

  return row?.version ?? 0;
}

export function runMigrations(db: Database.Database, pending: Migration[] = migrations): void {
  // Create migrations table if it doesn't exist
  db.exec(`
    CREATE TABLE IF NOT EXISTS migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at DATETIME DEFAULT CURRENT_TIMESTAMP
    )
  `);

  const appliedVersion = getSchemaVersion(db);
  log.debug(`Current database version: ${appliedVersion}`);

  const ordered = [...pending].sort((a, b) => a.version - b.version);
  for (const migration of ordered) {
    if (migration.version > appliedVersion) {
      log.info(`Running migration ${migration.version}: ${migration.name}`);

      db.transaction(() => {
        migration.up(db);
        db.prepare(
          'INSERT INTO migrations (version, name) VALUES (?, ?)'
        ).run(migration.version, migration.name);
      })();

      log.info(`Migration ${migration.version} completed`);
    }
  }
}
