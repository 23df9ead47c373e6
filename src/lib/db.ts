/**
 * Database
 *
 * Opens the embedded SQLite progress database and applies the schema.
 * One table, uniquely keyed by (source_id, record_id).
 */

import Database from 'better-sqlite3'
import { mkdirSync } from 'fs'
import { dirname } from 'path'

export type SqliteDatabase = Database.Database

export const IN_MEMORY = ':memory:'

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS progress (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    source_id TEXT NOT NULL,
    record_id INTEGER NOT NULL,
    status TEXT NOT NULL CHECK (status IN ('completed', 'failed')),
    label TEXT,
    attempt_count INTEGER NOT NULL DEFAULT 0,
    error_message TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    UNIQUE (source_id, record_id)
  );
  CREATE INDEX IF NOT EXISTS idx_progress_status ON progress (status);
  CREATE INDEX IF NOT EXISTS idx_progress_source ON progress (source_id);
`

/**
 * Opens (creating if needed) the progress database at `path`.
 * File databases run in WAL mode with synchronous=FULL so an acknowledged
 * write survives a crash.
 */
export function openDatabase(path: string = IN_MEMORY): SqliteDatabase {
  if (path !== IN_MEMORY) {
    mkdirSync(dirname(path), { recursive: true })
  }

  const db = new Database(path)
  if (path !== IN_MEMORY) {
    db.pragma('journal_mode = WAL')
  }
  db.pragma('synchronous = FULL')
  db.exec(SCHEMA)
  return db
}
