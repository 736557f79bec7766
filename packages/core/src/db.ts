import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';
import { LOCAL_NOW_SQL } from './schema/tasks.js';
import { dirname } from 'node:path';
import { mkdirSync } from 'node:fs';

export type TaskDb = BetterSQLite3Database<typeof schema>;
export type RawDb = Database.Database;

export interface ConnectionOptions {
  /** Database file path */
  path: string;
  /** How long a connection waits on a locked database, in ms */
  busyTimeoutMs?: number;
}

export const DEFAULT_BUSY_TIMEOUT_MS = 5000;

/** The raw SQL to create the schema from scratch (idempotent, run on every startup) */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY,
    title TEXT NOT NULL CHECK (length(title) <= 50),
    description TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'Pending' CHECK (status IN ('Pending', 'Completed')),
    created_date TEXT NOT NULL DEFAULT (${LOCAL_NOW_SQL})
);

CREATE INDEX IF NOT EXISTS idx_tasks_created_date ON tasks(created_date);

CREATE VIRTUAL TABLE IF NOT EXISTS tasks_fts USING fts5(
    title,
    description,
    content = 'tasks',
    content_rowid = 'id',
    tokenize = 'porter unicode61'
);

CREATE TRIGGER IF NOT EXISTS tasks_fts_insert AFTER INSERT ON tasks BEGIN
    INSERT INTO tasks_fts (rowid, title, description) VALUES (new.id, new.title, new.description);
END;

CREATE TRIGGER IF NOT EXISTS tasks_fts_delete AFTER DELETE ON tasks BEGIN
    INSERT INTO tasks_fts (tasks_fts, rowid, title, description) VALUES ('delete', old.id, old.title, old.description);
END;

CREATE TRIGGER IF NOT EXISTS tasks_fts_update AFTER UPDATE ON tasks BEGIN
    INSERT INTO tasks_fts (tasks_fts, rowid, title, description) VALUES ('delete', old.id, old.title, old.description);
    INSERT INTO tasks_fts (rowid, title, description) VALUES (new.id, new.title, new.description);
END;
`;

/**
 * Create the table, the full-text index and its triggers. When the index is
 * created over a table that already holds rows, it is rebuilt from them.
 */
export function initSchema(raw: RawDb): void {
  const hadIndex = raw.prepare(
    "SELECT 1 FROM sqlite_master WHERE type = 'table' AND name = 'tasks_fts'",
  ).get() !== undefined;

  raw.exec(CREATE_SCHEMA_SQL);

  if (!hadIndex) {
    raw.exec(`INSERT INTO tasks_fts (tasks_fts) VALUES ('rebuild')`);
  }
}

/** Unicode lower-casing; SQLite's own lower() and LIKE fold ASCII only */
function casefold(value: unknown): string | null {
  return typeof value === 'string' ? value.toLowerCase() : null;
}

/**
 * Open a raw connection with pragmas applied and `casefold()` registered.
 * Creates the parent directory of the database file.
 */
export function openConnection(options: ConnectionOptions): RawDb {
  mkdirSync(dirname(options.path), { recursive: true });

  const sqlite = new Database(options.path, {
    timeout: options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS,
  });

  try {
    // Pragmas and functions are per connection
    sqlite.pragma('journal_mode = WAL');
    sqlite.function('casefold', { deterministic: true }, casefold);
  } catch (err) {
    sqlite.close();
    throw err;
  }

  return sqlite;
}

/**
 * Run `fn` against a fresh connection inside one transaction.
 * Commits when `fn` returns, rolls back when it throws, and closes the
 * connection on every path.
 */
export function withConnection<T>(options: ConnectionOptions, fn: (db: TaskDb, raw: RawDb) => T): T {
  const sqlite = openConnection(options);
  try {
    const db = drizzle(sqlite, { schema });
    return sqlite.transaction(() => fn(db, sqlite))();
  } finally {
    sqlite.close();
  }
}
