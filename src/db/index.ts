import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';
import { config } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';

const logger = createLogger('db');

export type AppDatabase = BetterSQLite3Database<typeof schema> & {
  $client: Database.Database;
};

// Export schema for convenience
export * from './schema.js';

function initializeSchema(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS brand_profiles (
      name TEXT PRIMARY KEY,
      target_audience TEXT,
      brand_tone TEXT,
      industry TEXT,
      key_values TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS generations (
      id TEXT PRIMARY KEY,
      prompt TEXT NOT NULL,
      content_types TEXT NOT NULL,
      platforms TEXT NOT NULL,
      brand_name TEXT,
      brand_context TEXT,
      num_variations INTEGER NOT NULL,
      content TEXT NOT NULL,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_generations_created ON generations(created_at);
  `);
}

/**
 * Opens (or creates) the SQLite file at `path` and makes sure the tables
 * exist. Pass ':memory:' for a throwaway database.
 */
export function createDatabase(path: string = config.database.url): AppDatabase {
  if (path !== ':memory:') {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const sqlite = new Database(path);
  if (path !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }

  initializeSchema(sqlite);
  logger.debug('Database ready', { path });

  return drizzle(sqlite, { schema });
}

export function closeDatabase(db: AppDatabase): void {
  db.$client.close();
}
