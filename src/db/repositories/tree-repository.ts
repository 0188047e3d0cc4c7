import type { Database as DatabaseType } from "better-sqlite3";
import type {
  ChildEdge,
  ChildEntry,
  DirectoryId,
  DirectoryListing,
  EntityKind,
  KbNote,
  NoteId,
} from "../../types.js";
import {
  AlreadyParentedError,
  DuplicateNameError,
  SelfParentError,
  UnknownParentError,
} from "../../errors.js";

const EDGE_TABLES = {
  directory: "kb_dir_children",
  note: "kb_note_children",
} as const satisfies Record<EntityKind, string>;

/**
 * Rows of the two entity tables and the parent→child edges between them.
 *
 * Each edge method checks one edge at a time; subtree-wide work (cascade,
 * cycle checks) belongs to the engine, which calls in here inside a transaction.
 */
export class TreeRepository {
  constructor(private db: DatabaseType) {}

  // ---- Entity rows ----

  directoryExists(id: DirectoryId): boolean {
    return this.db.prepare<[number], { id: number }>(`SELECT id FROM kb_dirs WHERE id = ?`).get(id) !== undefined;
  }

  noteExists(id: NoteId): boolean {
    return this.db.prepare<[number], { id: number }>(`SELECT id FROM kb_notes WHERE id = ?`).get(id) !== undefined;
  }

  insertDirectory(id: DirectoryId): void {
    this.db.prepare(`INSERT INTO kb_dirs (id) VALUES (?)`).run(id);
  }

  insertNote(id: NoteId, content: string): void {
    this.db.prepare(`INSERT INTO kb_notes (id, content) VALUES (?, ?)`).run(id, content);
  }

  getNote(id: NoteId): KbNote | null {
    const row = this.db.prepare<[number], KbNote>(`SELECT id, content FROM kb_notes WHERE id = ?`).get(id);
    return row ?? null;
  }

  updateNoteContent(id: NoteId, content: string): boolean {
    return this.db.prepare(`UPDATE kb_notes SET content = ? WHERE id = ?`).run(content, id).changes > 0;
  }

  deleteDirectoryRow(id: DirectoryId): boolean {
    return this.db.prepare(`DELETE FROM kb_dirs WHERE id = ?`).run(id).changes > 0;
  }

  deleteNoteRow(id: NoteId): boolean {
    return this.db.prepare(`DELETE FROM kb_notes WHERE id = ?`).run(id).changes > 0;
  }

  // ---- Edges ----

  insertNoteEdge(parent: DirectoryId, child: NoteId, name: string): void {
    this.checkInsert("note", parent, child, name);
    this.db
      .prepare(`INSERT INTO kb_note_children (parent_id, child_id, child_name) VALUES (?, ?, ?)`)
      .run(parent, child, name);
  }

  insertDirEdge(parent: DirectoryId, child: DirectoryId, name: string): void {
    if (parent === child) throw new SelfParentError(child);
    this.checkInsert("directory", parent, child, name);
    this.db
      .prepare(`INSERT INTO kb_dir_children (parent_id, child_id, child_name) VALUES (?, ?, ?)`)
      .run(parent, child, name);
  }

  removeNoteEdge(child: NoteId): boolean {
    return this.db.prepare(`DELETE FROM kb_note_children WHERE child_id = ?`).run(child).changes > 0;
  }

  removeDirEdge(child: DirectoryId): boolean {
    return this.db.prepare(`DELETE FROM kb_dir_children WHERE child_id = ?`).run(child).changes > 0;
  }

  getDirectoryEdge(child: DirectoryId): ChildEdge | null {
    return this.getEdge("directory", child);
  }

  getNoteEdge(child: NoteId): ChildEdge | null {
    return this.getEdge("note", child);
  }

  /**
   * Resolve `name` under `parent`. Directory and note names live in separate
   * namespaces; without `kind` the directory namespace wins a shared name.
   */
  lookupChild(parent: DirectoryId, name: string, kind?: EntityKind): ChildEntry | null {
    const kinds: EntityKind[] = kind ? [kind] : ["directory", "note"];
    for (const k of kinds) {
      const row = this.db
        .prepare<[number, string], { child_id: number }>(
          `SELECT child_id FROM ${EDGE_TABLES[k]} WHERE parent_id = ? AND child_name = ?`,
        )
        .get(parent, name);
      if (row) return { kind: k, id: row.child_id, name };
    }
    return null;
  }

  listChildren(parent: DirectoryId): DirectoryListing {
    const directories = this.db
      .prepare<[number], { id: number; name: string }>(
        `SELECT child_id AS id, child_name AS name FROM kb_dir_children
         WHERE parent_id = ? ORDER BY child_name ASC`,
      )
      .all(parent);
    const notes = this.db
      .prepare<[number], { id: number; name: string }>(
        `SELECT child_id AS id, child_name AS name FROM kb_note_children
         WHERE parent_id = ? ORDER BY child_name ASC`,
      )
      .all(parent);
    return { directories, notes };
  }

  listChildDirectoryIds(parent: DirectoryId): DirectoryId[] {
    return this.db
      .prepare<[number], { child_id: number }>(`SELECT child_id FROM kb_dir_children WHERE parent_id = ? ORDER BY child_id`)
      .all(parent)
      .map((r) => r.child_id);
  }

  listNoteIdsIn(parent: DirectoryId): NoteId[] {
    return this.db
      .prepare<[number], { child_id: number }>(`SELECT child_id FROM kb_note_children WHERE parent_id = ? ORDER BY child_id`)
      .all(parent)
      .map((r) => r.child_id);
  }

  counts(): { directories: number; notes: number } {
    const row = this.db
      .prepare<[], { directories: number; notes: number }>(
        `SELECT (SELECT COUNT(*) FROM kb_dirs) AS directories, (SELECT COUNT(*) FROM kb_notes) AS notes`,
      )
      .get();
    return row ?? { directories: 0, notes: 0 };
  }

  private getEdge(kind: EntityKind, child: number): ChildEdge | null {
    const row = this.db
      .prepare<[number], ChildEdge>(
        `SELECT parent_id, child_id, child_name FROM ${EDGE_TABLES[kind]} WHERE child_id = ?`,
      )
      .get(child);
    return row ?? null;
  }

  private checkInsert(kind: EntityKind, parent: DirectoryId, child: number, name: string): void {
    if (!this.directoryExists(parent)) throw new UnknownParentError(parent);
    if (this.lookupChild(parent, name, kind)) throw new DuplicateNameError(parent, name, kind);
    const existing = this.getEdge(kind, child);
    if (existing) throw new AlreadyParentedError(kind, child, existing.parent_id);
  }
}
