import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { DatabaseManager } from "../../src/db/database.js";
import { TreeRepository } from "../../src/db/repositories/tree-repository.js";
import { PermissionRepository } from "../../src/db/repositories/permission-repository.js";
import { EventRepository } from "../../src/db/repositories/event-repository.js";
import {
  AlreadyParentedError,
  DuplicateNameError,
  SelfParentError,
  UnknownParentError,
} from "../../src/errors.js";

describe("TreeRepository", () => {
  let dbm: DatabaseManager;
  let repo: TreeRepository;

  beforeEach(() => {
    dbm = new DatabaseManager();
    dbm.open(":memory:");
    dbm.initialize();
    repo = new TreeRepository(dbm.connection);
  });

  afterEach(() => {
    dbm.close();
  });

  it("should insert a directory edge", () => {
    repo.insertDirectory(1);
    repo.insertDirEdge(0, 1, "guides");
    assert.deepEqual(repo.getDirectoryEdge(1), { parent_id: 0, child_id: 1, child_name: "guides" });
    assert.deepEqual(repo.lookupChild(0, "guides"), { kind: "directory", id: 1, name: "guides" });
  });

  it("should reject an edge under a missing parent", () => {
    repo.insertDirectory(1);
    assert.throws(() => repo.insertDirEdge(99, 1, "guides"), UnknownParentError);
    repo.insertNote(1, "text");
    assert.throws(() => repo.insertNoteEdge(99, 1, "readme"), UnknownParentError);
  });

  it("should reject a directory as its own parent", () => {
    repo.insertDirectory(1);
    assert.throws(() => repo.insertDirEdge(1, 1, "loop"), SelfParentError);
  });

  it("should reject a duplicate name in the same namespace", () => {
    repo.insertDirectory(1);
    repo.insertDirectory(2);
    repo.insertDirEdge(0, 1, "guides");
    assert.throws(() => repo.insertDirEdge(0, 2, "guides"), DuplicateNameError);

    repo.insertNote(1, "one");
    repo.insertNote(2, "two");
    repo.insertNoteEdge(0, 1, "readme");
    assert.throws(() => repo.insertNoteEdge(0, 2, "readme"), DuplicateNameError);
  });

  it("should reject a second parent for the same child", () => {
    repo.insertDirectory(1);
    repo.insertDirectory(2);
    repo.insertDirEdge(0, 1, "a");
    repo.insertDirEdge(0, 2, "b");
    assert.throws(() => repo.insertDirEdge(2, 1, "c"), AlreadyParentedError);

    repo.insertNote(1, "text");
    repo.insertNoteEdge(1, 1, "readme");
    assert.throws(() => repo.insertNoteEdge(2, 1, "readme"), AlreadyParentedError);
  });

  it("should keep directory and note names in separate namespaces", () => {
    repo.insertDirectory(1);
    repo.insertDirEdge(0, 1, "readme");
    repo.insertNote(1, "hello");
    repo.insertNoteEdge(0, 1, "readme");

    assert.deepEqual(repo.lookupChild(0, "readme"), { kind: "directory", id: 1, name: "readme" });
    assert.deepEqual(repo.lookupChild(0, "readme", "note"), { kind: "note", id: 1, name: "readme" });
    assert.deepEqual(repo.listChildren(0), {
      directories: [{ id: 1, name: "readme" }],
      notes: [{ id: 1, name: "readme" }],
    });
  });

  it("should return null for a missing child", () => {
    assert.equal(repo.lookupChild(0, "nothing"), null);
    assert.equal(repo.lookupChild(42, "nothing"), null);
  });

  it("should list children ordered by name", () => {
    repo.insertDirectory(1);
    repo.insertDirectory(2);
    repo.insertDirectory(3);
    repo.insertDirEdge(0, 1, "b");
    repo.insertDirEdge(0, 2, "a");
    repo.insertDirEdge(0, 3, "C");
    repo.insertNote(1, "z");
    repo.insertNote(2, "y");
    repo.insertNoteEdge(0, 1, "zeta");
    repo.insertNoteEdge(0, 2, "alpha");

    const { directories, notes } = repo.listChildren(0);
    assert.deepEqual(directories.map((d) => d.name), ["C", "a", "b"]);
    assert.deepEqual(notes, [
      { id: 2, name: "alpha" },
      { id: 1, name: "zeta" },
    ]);
  });

  it("should remove edges idempotently without touching grandchildren", () => {
    repo.insertDirectory(1);
    repo.insertDirectory(2);
    repo.insertDirEdge(0, 1, "outer");
    repo.insertDirEdge(1, 2, "inner");

    assert.equal(repo.removeDirEdge(1), true);
    assert.equal(repo.removeDirEdge(1), false);
    assert.equal(repo.getDirectoryEdge(1), null);
    assert.deepEqual(repo.getDirectoryEdge(2), { parent_id: 1, child_id: 2, child_name: "inner" });

    repo.insertNote(1, "text");
    repo.insertNoteEdge(2, 1, "readme");
    assert.equal(repo.removeNoteEdge(1), true);
    assert.equal(repo.removeNoteEdge(1), false);
    assert.equal(repo.noteExists(1), true);
  });

  it("should read and update note content", () => {
    repo.insertNote(1, "draft");
    assert.deepEqual(repo.getNote(1), { id: 1, content: "draft" });
    assert.equal(repo.updateNoteContent(1, "final"), true);
    assert.equal(repo.getNote(1)?.content, "final");
    assert.equal(repo.updateNoteContent(2, "missing"), false);
    assert.equal(repo.getNote(2), null);
  });

  it("should count rows", () => {
    repo.insertDirectory(1);
    repo.insertNote(1, "text");
    repo.insertNote(2, "text");
    assert.deepEqual(repo.counts(), { directories: 2, notes: 2 });
  });
});

describe("PermissionRepository", () => {
  let dbm: DatabaseManager;
  let repo: PermissionRepository;

  beforeEach(() => {
    dbm = new DatabaseManager();
    dbm.open(":memory:");
    dbm.initialize();
    repo = new PermissionRepository(dbm.connection);
  });

  afterEach(() => {
    dbm.close();
  });

  it("should return null for an unknown principal", () => {
    assert.equal(repo.get("nobody"), null);
  });

  it("should merge partial updates", () => {
    assert.deepEqual(repo.set("alice", { can_edit: true }), {
      principal: "alice",
      can_edit: true,
      can_receive_feedback: false,
    });
    assert.deepEqual(repo.set("alice", { can_receive_feedback: true }), {
      principal: "alice",
      can_edit: true,
      can_receive_feedback: true,
    });
    assert.deepEqual(repo.list(), [{ principal: "alice", can_edit: true, can_receive_feedback: true }]);
  });

  it("should remove a record", () => {
    repo.set("alice", { can_edit: true });
    assert.equal(repo.remove("alice"), true);
    assert.equal(repo.remove("alice"), false);
    assert.equal(repo.get("alice"), null);
  });

  it("should list feedback recipients", () => {
    repo.set("dave", { can_receive_feedback: true });
    repo.set("alice", { can_edit: true });
    repo.set("bob", { can_receive_feedback: true });
    assert.deepEqual(repo.listFeedbackRecipients(), ["bob", "dave"]);
  });

  it("should emit PERMISSIONS_CHANGED events", () => {
    repo.set("alice", { can_edit: true });
    repo.remove("alice");
    const events = new EventRepository(dbm.connection).query({ event_type: "PERMISSIONS_CHANGED" });
    assert.equal(events.length, 2);
    assert.deepEqual(JSON.parse(events[1].payload), { principal: "alice", removed: true });
  });
});

describe("EventRepository", () => {
  let dbm: DatabaseManager;
  let repo: EventRepository;

  beforeEach(() => {
    dbm = new DatabaseManager();
    dbm.open(":memory:");
    dbm.initialize();
    repo = new EventRepository(dbm.connection);
  });

  afterEach(() => {
    dbm.close();
  });

  it("should append and count events", () => {
    assert.equal(repo.count(), 1); // DB_INITIALIZED
    const event = repo.append("DIRECTORY_CREATED", { directory_id: 1, parent_id: 0, name: "guides" });
    assert.equal(event.event_type, "DIRECTORY_CREATED");
    assert.deepEqual(JSON.parse(event.payload), { directory_id: 1, parent_id: 0, name: "guides" });
    assert.equal(repo.count(), 2);
    assert.deepEqual(repo.query({ event_type: "DIRECTORY_CREATED" }), [event]);
  });

  it("should filter by the entity named in the payload", () => {
    repo.append("DIRECTORY_CREATED", { directory_id: 1, parent_id: 0, name: "guides" });
    repo.append("NOTE_CREATED", { note_id: 1, parent_id: 1, name: "readme" });
    repo.append("DIRECTORY_CREATED", { directory_id: 2, parent_id: 1, name: "recycling" });

    const forDir = repo.query({ directory_id: 1 });
    assert.equal(forDir.length, 1);
    assert.equal(forDir[0].event_type, "DIRECTORY_CREATED");

    const forNote = repo.query({ note_id: 1 });
    assert.equal(forNote.length, 1);
    assert.equal(forNote[0].event_type, "NOTE_CREATED");
  });

  it("should paginate", () => {
    repo.append("NOTE_UPDATED", { note_id: 1 });
    repo.append("NOTE_UPDATED", { note_id: 2 });
    repo.append("NOTE_UPDATED", { note_id: 3 });
    const page = repo.query({ event_type: "NOTE_UPDATED", limit: 2, offset: 1 });
    assert.deepEqual(
      page.map((e) => JSON.parse(e.payload).note_id),
      [2, 3],
    );
  });
});
