import Database from 'better-sqlite3';
import { createLogger } from '../utils/logger.js';
import { join, dirname as pathDirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { mkdirSync } from 'node:fs';

const __filename = fileURLToPath(import.meta.url);
const __dirname = pathDirname(__filename);

const logger = createLogger({ component: 'database' });

let db: Database.Database | null = null;

export function getDatabase(path?: string): Database.Database {
  if (db) {
    return db;
  }

  const dbPath = path || process.env.DATABASE_PATH || join(__dirname, '../../data', 'quick-capture.db');
  logger.info({ dbPath }, 'Initializing database');

  mkdirSync(pathDirname(dbPath), { recursive: true });

  db = new Database(dbPath);
  db.pragma('journal_mode = WAL');

  runMigrations(db);

  return db;
}

export function runMigrations(database: Database.Database): void {
  logger.info('Running database migrations');

  // Preferences: one JSON-encoded value per key
  database.exec(`
    CREATE TABLE IF NOT EXISTS settings (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      updated_at INTEGER DEFAULT (strftime('%s', 'now'))
    );
  `);

  logger.info('Database migrations completed');
}

export function closeDatabase(): void {
  if (db) {
    logger.info('Closing database connection');
    db.close();
    db = null;
  }
}
