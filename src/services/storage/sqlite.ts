/**
 * SQLite key-value backend
 *
 * One `kv` table holds every persisted blob. better-sqlite3 writes are
 * synchronous, so a successful `set` has reached the database file.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { logger } from '../../utils/logger.js';
import type { KeyValueStorage, StorageChange } from './kv-storage.js';

// Schema version for migrations
export const SCHEMA_VERSION = 1;

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS kv (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    updated TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY
);
`;

/**
 * Initialize database schema
 */
export function initializeSchema(db: Database.Database): void {
  const hasVersionTable = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'")
    .get();

  let currentVersion = 0;
  if (hasVersionTable) {
    const row = db
      .prepare<[], { version: number }>(
        'SELECT version FROM schema_version ORDER BY version DESC LIMIT 1'
      )
      .get();
    currentVersion = row?.version ?? 0;
  }

  if (currentVersion < SCHEMA_VERSION) {
    logger.debug(`Migrating database from version ${currentVersion} to ${SCHEMA_VERSION}`);
    runMigrations(db, currentVersion);
  }
}

function runMigrations(db: Database.Database, fromVersion: number): void {
  db.exec('BEGIN TRANSACTION');

  try {
    if (fromVersion < 1) {
      db.exec(SCHEMA_SQL);
      db.prepare('INSERT OR REPLACE INTO schema_version (version) VALUES (?)').run(1);
    }

    db.exec('COMMIT');
    logger.debug('Database migration completed');
  } catch (error) {
    db.exec('ROLLBACK');
    logger.error('Database migration failed', error);
    throw error;
  }
}

/**
 * Open (creating if needed) a database file and bring its schema up to date.
 * Pass ':memory:' for a throwaway database.
 */
export function createDatabase(dbPath: string): Database.Database {
  logger.info(`Opening database at: ${dbPath}`);

  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');

  initializeSchema(db);

  return db;
}

export class SqliteKeyValueStorage implements KeyValueStorage {
  private readonly getStmt: Database.Statement<[string], { value: string }>;
  private readonly setStmt: Database.Statement<[string, string, string]>;
  private readonly removeStmt: Database.Statement<[string]>;

  constructor(private readonly db: Database.Database) {
    this.getStmt = db.prepare<[string], { value: string }>('SELECT value FROM kv WHERE key = ?');
    this.setStmt = db.prepare<[string, string, string]>(
      `INSERT INTO kv (key, value, updated) VALUES (?, ?, ?)
       ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated = excluded.updated`
    );
    this.removeStmt = db.prepare<[string]>('DELETE FROM kv WHERE key = ?');
  }

  /**
   * Open a database file and wrap it
   */
  static open(dbPath: string): SqliteKeyValueStorage {
    return new SqliteKeyValueStorage(createDatabase(dbPath));
  }

  get(key: string): string | null {
    return this.getStmt.get(key)?.value ?? null;
  }

  set(key: string, value: string): void {
    this.setStmt.run(key, value, new Date().toISOString());
  }

  remove(key: string): void {
    this.removeStmt.run(key);
  }

  writeBatch(changes: readonly StorageChange[]): void {
    const apply = this.db.transaction((batch: readonly StorageChange[]) => {
      const updated = new Date().toISOString();
      for (const change of batch) {
        if (change.value === null) {
          this.removeStmt.run(change.key);
        } else {
          this.setStmt.run(change.key, change.value, updated);
        }
      }
    });
    apply(changes);
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
