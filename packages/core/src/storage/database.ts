// packages/core/src/storage/database.ts

import Database from 'better-sqlite3';
import { StorageError, errorMessage } from '../utils/errors.js';

const SCHEMA_VERSION = '1';

const MIGRATIONS = [
  // Pending and claimed jobs. A row exists only until the job's terminal event is written.
  `CREATE TABLE IF NOT EXISTS jobs (
    seq          INTEGER PRIMARY KEY AUTOINCREMENT,
    id           TEXT NOT NULL UNIQUE,
    type         TEXT NOT NULL,
    mode         TEXT NOT NULL DEFAULT 'changed',
    repo         TEXT,
    auto_pr      INTEGER NOT NULL DEFAULT 1,
    enqueued_at  TEXT NOT NULL,
    claimed_by   TEXT,
    claimed_at   TEXT
  )`,
  'CREATE INDEX IF NOT EXISTS idx_jobs_claimed ON jobs(claimed_by, seq)',

  // Append-only event log
  `CREATE TABLE IF NOT EXISTS events (
    seq          INTEGER PRIMARY KEY AUTOINCREMENT,
    ts           TEXT NOT NULL,
    kind         TEXT NOT NULL,
    job_id       TEXT,
    line         TEXT,
    payload_json TEXT
  )`,
  'CREATE INDEX IF NOT EXISTS idx_events_job ON events(job_id)',

  `CREATE TABLE IF NOT EXISTS schema_meta (
    key   TEXT PRIMARY KEY,
    value TEXT NOT NULL
  )`,
];

/**
 * Open a SQLite database and run migrations.
 * Pass ':memory:' for in-memory databases (testing).
 */
export function openDatabase(dbPath: string): Database.Database {
  try {
    const db = new Database(dbPath);
    configurePragmas(db);
    runMigrations(db);
    return db;
  } catch (err) {
    throw new StorageError(`Failed to open database at "${dbPath}": ${errorMessage(err)}`, 'open');
  }
}

function configurePragmas(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');
}

/**
 * Run all schema migrations. Idempotent (uses IF NOT EXISTS).
 */
export function runMigrations(db: Database.Database): void {
  db.transaction(() => {
    for (const sql of MIGRATIONS) {
      db.exec(sql);
    }
    db.prepare("INSERT OR REPLACE INTO schema_meta(key, value) VALUES ('version', ?)").run(
      SCHEMA_VERSION,
    );
    db.prepare(
      "INSERT OR IGNORE INTO schema_meta(key, value) VALUES ('created_at', datetime('now'))",
    ).run();
  })();
}

export function getSchemaVersion(db: Database.Database): string | null {
  const row = db
    .prepare<[], { value: string }>("SELECT value FROM schema_meta WHERE key = 'version'")
    .get();
  return row?.value ?? null;
}

/** Rethrowable form of a driver failure: SQLite errors become StorageError, others pass through. */
export function toStorageError(operation: string, err: unknown): unknown {
  if (err instanceof StorageError) return err;
  if (err instanceof Database.SqliteError || err instanceof TypeError) {
    return new StorageError(`${operation} failed: ${errorMessage(err)}`, operation);
  }
  return err;
}

/** Run a storage call, rethrowing driver failures as StorageError. */
export function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw toStorageError(operation, err);
  }
}
