import type { DatabaseConnection } from '../index';

/**
 * Key/value store backed by the settings table. Values are stored as text;
 * callers own their serialization.
 */
export class SettingsRepository {
  constructor(private readonly connection: DatabaseConnection) {}

  private get db() {
    return this.connection.get();
  }

  async get(key: string): Promise<string | null> {
    const row = this.db.prepare(`
      SELECT value FROM settings WHERE key = ?
    `).get(key) as { value: string } | undefined;

    return row?.value ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.db.prepare(`
      INSERT INTO settings (key, value, updated_at)
      VALUES (?, ?, CURRENT_TIMESTAMP)
      ON CONFLICT(key) DO UPDATE SET value = ?, updated_at = CURRENT_TIMESTAMP
    `).run(key, value, value);
  }
}
