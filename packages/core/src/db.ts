import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { mkdirSync } from 'node:fs';

export type TrackerDb = BetterSQLite3Database<typeof schema>;

/** An open database: the Drizzle instance plus the raw connection that owns it */
export interface DbHandle {
  readonly db: TrackerDb;
  readonly sqlite: Database.Database;
  close(): void;
}

export const APP_DIR_NAME = 'taskbell';
export const DB_FILE_NAME = 'taskbell.db';

/** Returns the platform-appropriate default data directory */
export function getDefaultDataDir(): string {
  const platform = process.platform;

  if (platform === 'darwin') {
    return join(homedir(), 'Library', 'Application Support', APP_DIR_NAME);
  }
  if (platform === 'win32') {
    return join(process.env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), APP_DIR_NAME);
  }
  // Linux / other
  return join(process.env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), APP_DIR_NAME);
}

/** Returns the platform-appropriate default database path */
export function getDefaultDbPath(): string {
  return join(getDefaultDataDir(), DB_FILE_NAME);
}

/** The raw SQL to create the schema from scratch (for new databases and tests) */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS kv_store (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    updated_at TEXT NOT NULL
);
`;

/**
 * Open a database with pragmas set and the schema applied.
 * If no path is given, uses the platform default.
 * Pass ':memory:' for in-memory databases (tests).
 */
export function createDb(path?: string): DbHandle {
  const dbPath = path ?? getDefaultDbPath();

  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);

  // Set pragmas — must happen on every connection
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('busy_timeout = 5000');

  // Idempotent — all statements use IF NOT EXISTS
  sqlite.exec(CREATE_SCHEMA_SQL);

  const db = drizzle(sqlite, { schema });
  return {
    db,
    sqlite,
    close: () => {
      if (sqlite.open) sqlite.close();
    },
  };
}

/** Create an in-memory database with schema applied. For tests. */
export function createTestDb(): DbHandle {
  return createDb(':memory:');
}

/**
 * Get the file path of the database.
 * Returns '' for in-memory databases.
 */
export function getDbPath(handle: DbHandle): string {
  const list = handle.sqlite.pragma('database_list') as Array<{ file: string }>;
  return list[0]?.file ?? '';
}
