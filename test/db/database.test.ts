import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { DatabaseManager } from "../../src/db/database.js";

describe("DatabaseManager", () => {
  let dbm: DatabaseManager;

  beforeEach(() => {
    dbm = new DatabaseManager();
    dbm.open(":memory:");
  });

  afterEach(() => {
    dbm.close();
  });

  it("should report not initialized before migration", () => {
    assert.equal(dbm.isInitialized(), false);
  });

  it("should initialize and create tables", () => {
    dbm.initialize();
    assert.equal(dbm.isInitialized(), true);

    const tables = dbm.connection
      .prepare<[], { name: string }>(`SELECT name FROM sqlite_master WHERE type='table' ORDER BY name`)
      .all();

    const tableNames = tables.map((t) => t.name);
    for (const name of [
      "kb_notes",
      "kb_dirs",
      "kb_note_children",
      "kb_dir_children",
      "kb_newsletters",
      "permissions",
      "kb_id_sequences",
      "events",
    ]) {
      assert.ok(tableNames.includes(name), `missing table ${name}`);
    }
  });

  it("should create the root directory", () => {
    dbm.initialize();
    const dirs = dbm.connection.prepare<[], { id: number }>(`SELECT id FROM kb_dirs`).all();
    assert.deepEqual(dirs, [{ id: 0 }]);
  });

  it("should start both id sequences at zero", () => {
    dbm.initialize();
    const rows = dbm.connection
      .prepare<[], { kind: string; last_id: number }>(`SELECT kind, last_id FROM kb_id_sequences ORDER BY kind`)
      .all();
    assert.deepEqual(rows, [
      { kind: "directory", last_id: 0 },
      { kind: "note", last_id: 0 },
    ]);
  });

  it("should emit DB_INITIALIZED event on initialize", () => {
    dbm.initialize();

    const events = dbm.connection
      .prepare<[], { event_type: string }>(`SELECT * FROM events WHERE event_type = 'DB_INITIALIZED'`)
      .all();

    assert.equal(events.length, 1);
  });

  it("should have foreign keys enabled", () => {
    dbm.initialize();
    const row = dbm.connection.prepare<[], { foreign_keys: number }>(`PRAGMA foreign_keys`).get();
    assert.equal(row?.foreign_keys, 1);
  });

  it("should apply the busy timeout", () => {
    dbm.close();
    dbm.open(":memory:", { busyTimeoutMs: 1234 });
    assert.equal(dbm.connection.pragma("busy_timeout", { simple: true }), 1234);
  });

  it("should cascade edge rows when a parent directory row is removed directly", () => {
    dbm.initialize();
    const db = dbm.connection;
    db.prepare(`INSERT INTO kb_dirs (id) VALUES (1)`).run();
    db.prepare(`INSERT INTO kb_dir_children (parent_id, child_id, child_name) VALUES (0, 1, 'a')`).run();
    db.prepare(`INSERT INTO kb_notes (id, content) VALUES (1, 'x')`).run();
    db.prepare(`INSERT INTO kb_note_children (parent_id, child_id, child_name) VALUES (1, 1, 'n')`).run();

    db.prepare(`DELETE FROM kb_dirs WHERE id = 1`).run();

    const edges = db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM kb_note_children`).get();
    assert.equal(edges?.n, 0);
    // The note row itself is not cascaded; the engine removes it explicitly.
    const notes = db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM kb_notes`).get();
    assert.equal(notes?.n, 1);
  });

  it("should close and reopen", () => {
    assert.equal(dbm.isOpen, true);
    dbm.close();
    assert.equal(dbm.isOpen, false);
    assert.throws(() => dbm.connection, /Database not opened/);
    dbm.open(":memory:");
    assert.equal(dbm.isOpen, true);
  });
});
