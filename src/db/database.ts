import Database from "better-sqlite3";
import type { Database as DatabaseType } from "better-sqlite3";
import { ROOT_DIRECTORY_ID } from "../types.js";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS kb_notes (
  id      INTEGER PRIMARY KEY AUTOINCREMENT,
  content TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS kb_dirs (
  id INTEGER PRIMARY KEY AUTOINCREMENT
);

CREATE TABLE IF NOT EXISTS kb_note_children (
  parent_id  INTEGER NOT NULL REFERENCES kb_dirs (id) ON DELETE CASCADE,
  child_id   INTEGER PRIMARY KEY REFERENCES kb_notes (id) ON DELETE CASCADE,
  child_name TEXT NOT NULL,
  UNIQUE (parent_id, child_name)
);

CREATE TABLE IF NOT EXISTS kb_dir_children (
  parent_id  INTEGER NOT NULL REFERENCES kb_dirs (id) ON DELETE CASCADE,
  child_id   INTEGER PRIMARY KEY REFERENCES kb_dirs (id) ON DELETE CASCADE,
  child_name TEXT NOT NULL,
  UNIQUE (parent_id, child_name)
);

CREATE INDEX IF NOT EXISTS idx_note_children_parent ON kb_note_children (parent_id);
CREATE INDEX IF NOT EXISTS idx_dir_children_parent  ON kb_dir_children (parent_id);

CREATE TABLE IF NOT EXISTS kb_newsletters (
  id        INTEGER PRIMARY KEY AUTOINCREMENT,
  name      TEXT NOT NULL,
  content   TEXT NOT NULL,
  timestamp TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS permissions (
  principal            TEXT UNIQUE NOT NULL,
  can_edit             INTEGER NOT NULL CHECK (can_edit IN (0, 1)),
  can_receive_feedback INTEGER NOT NULL CHECK (can_receive_feedback IN (0, 1))
);

CREATE TABLE IF NOT EXISTS kb_id_sequences (
  kind    TEXT PRIMARY KEY CHECK (kind IN ('directory', 'note')),
  last_id INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS events (
  event_id   INTEGER PRIMARY KEY AUTOINCREMENT,
  event_type TEXT NOT NULL,
  timestamp  TEXT NOT NULL,
  payload    TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_events_type ON events (event_type);
CREATE INDEX IF NOT EXISTS idx_events_ts   ON events (timestamp);
`;

export interface OpenOptions {
  /** How long a write waits for another connection's lock before failing. */
  busyTimeoutMs?: number;
}

export const DEFAULT_BUSY_TIMEOUT_MS = 5000;

export class DatabaseManager {
  private db: DatabaseType | null = null;

  get connection(): DatabaseType {
    if (!this.db) {
      throw new Error("Database not opened. Call open() first.");
    }
    return this.db;
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  open(path: string, opts: OpenOptions = {}): void {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.pragma(`busy_timeout = ${opts.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS}`);
  }

  initialize(): void {
    const db = this.connection;
    db.exec(SCHEMA_SQL);

    const now = new Date().toISOString();
    db.transaction(() => {
      db.prepare(`INSERT OR IGNORE INTO kb_dirs (id) VALUES (?)`).run(ROOT_DIRECTORY_ID);
      db.prepare(
        `INSERT OR IGNORE INTO kb_id_sequences (kind, last_id) VALUES ('directory', ?), ('note', 0)`,
      ).run(ROOT_DIRECTORY_ID);
      db.prepare(
        `INSERT INTO events (event_type, timestamp, payload) VALUES (?, ?, ?)`,
      ).run("DB_INITIALIZED", now, JSON.stringify({ initialized_at: now }));
    })();
  }

  isInitialized(): boolean {
    if (!this.db) return false;
    try {
      const row = this.db
        .prepare<[], { name: string }>(`SELECT name FROM sqlite_master WHERE type='table' AND name='events'`)
        .get();
      return row !== undefined;
    } catch {
      return false;
    }
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}
