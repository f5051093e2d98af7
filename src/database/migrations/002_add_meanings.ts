import type Database from 'better-sqlite3';

export const migration002 = {
  version: 2,
  name: 'add_meanings',
  up: (db: Database.Database) => {
    const columns = db.prepare('PRAGMA table_info(verbs)').all() as { name: string }[];
    if (columns.some((column) => column.name === 'meanings')) {
      return;
    }

    // Nullable: rows written before this version are decoded from the
    // legacy columns on read
    db.exec(`
      ALTER TABLE verbs
      ADD COLUMN meanings TEXT
    `);
  },
};
