import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { runMigrations } from './migrations';
import { createLogger } from '../main/utils/logger';

const log = createLogger('Database');

export interface DatabaseOptions {
  /** File path, or ':memory:' */
  filePath: string;
  /** How long SQLite waits on a locked database before SQLITE_BUSY */
  busyTimeoutMs: number;
}

/**
 * Owns the single SQLite connection of the application.
 * Opened lazily on first use, closed once at teardown.
 */
export class DatabaseConnection {
  private db: Database.Database | null = null;

  constructor(private readonly options: DatabaseOptions) {}

  get(): Database.Database {
    if (!this.db) {
      this.db = this.open();
    }
    return this.db;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private open(): Database.Database {
    const { filePath, busyTimeoutMs } = this.options;

    if (filePath !== ':memory:') {
      // Ensure the data directory exists
      const dir = path.dirname(filePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }
    log.debug('Opening database:', filePath);

    const db = new Database(filePath, { timeout: busyTimeoutMs });

    // WAL mode for better read concurrency (no-op for in-memory databases)
    db.pragma('journal_mode = WAL');

    runMigrations(db);
    return db;
  }
}
