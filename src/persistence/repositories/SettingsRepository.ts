import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';

export interface StoredSetting {
  key: string;
  value: unknown;
  updatedAt: number;
}

/** Raw key/value access to the `settings` table; values are stored as JSON. */
export class SettingsRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  getAll(): StoredSetting[] {
    const rows = this.db
      .prepare('SELECT key, value, updated_at FROM settings ORDER BY key')
      .all() as Array<{ key: string; value: string; updated_at: number }>;

    return rows.map((row) => ({
      key: row.key,
      value: JSON.parse(row.value) as unknown,
      updatedAt: row.updated_at,
    }));
  }

  set(key: string, value: unknown): void {
    this.db
      .prepare(
        `INSERT INTO settings (key, value, updated_at)
         VALUES (?, ?, strftime('%s', 'now'))
         ON CONFLICT(key) DO UPDATE SET
           value = excluded.value,
           updated_at = strftime('%s', 'now')`
      )
      .run(key, JSON.stringify(value));
  }

  clear(): void {
    this.db.prepare('DELETE FROM settings').run();
  }
}
