import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { homedir } from 'node:os';
import { initSchema } from './schema.js';

let db: Database.Database | null = null;

export const DEFAULT_STATE_DIR = resolve(homedir(), '.kb-ledger-sync');
export const DEFAULT_DB_PATH = resolve(DEFAULT_STATE_DIR, 'state.db');

/**
 * Get or create the local state database connection.
 * Creates the directory and schema on first call.
 */
export function getDb(dbPath?: string): Database.Database {
  if (db) return db;

  const path = dbPath ?? DEFAULT_DB_PATH;

  if (path !== ':memory:') {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  db = new Database(path);

  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  // Several server processes may share one state file
  db.pragma('busy_timeout = 5000');
  db.pragma('temp_store = MEMORY');

  initSchema(db);

  return db;
}

/**
 * Close the database connection (for clean shutdown).
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Close any open connection and open a fresh one.
 * Tests pass ':memory:' for an isolated database.
 */
export function resetDb(dbPath?: string): Database.Database {
  closeDb();
  return getDb(dbPath ?? ':memory:');
}
