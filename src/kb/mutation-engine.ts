import type { Database as DatabaseType } from "better-sqlite3";
import { EventRepository } from "../db/repositories/event-repository.js";
import { PermissionRepository } from "../db/repositories/permission-repository.js";
import { TreeRepository } from "../db/repositories/tree-repository.js";
import {
  CycleRejectedError,
  DuplicateNameError,
  EntityNotFoundError,
  InvalidParameterError,
  KbError,
  RootImmutableError,
  RootUndeletableError,
  StorageFailureError,
  UnknownParentError,
} from "../errors.js";
import type {
  ChildEdge,
  ChildEntry,
  DeletedSubtree,
  DirectoryEntry,
  DirectoryId,
  DirectoryListing,
  EntityKind,
  NoteEntry,
  NoteId,
  Principal,
} from "../types.js";
import { PATH_SEPARATOR, ROOT_DIRECTORY_ID } from "../types.js";
import { AncestryOracle } from "./ancestry.js";
import { IdentityAllocator } from "./identity-allocator.js";
import { PermissionGate } from "./permission-gate.js";

export interface NoteWithContent extends NoteEntry {
  content: string;
}

export interface KnowledgeBaseComponents {
  tree: TreeRepository;
  ancestry: AncestryOracle;
  allocator: IdentityAllocator;
  gate: PermissionGate;
  events: EventRepository;
}

export function validateName(name: string): void {
  if (name.length === 0) {
    throw new InvalidParameterError("Name must not be empty.");
  }
  if (name.includes(PATH_SEPARATOR)) {
    throw new InvalidParameterError(`Name must not contain '${PATH_SEPARATOR}': ${name}`);
  }
  if (name.trim() !== name) {
    throw new InvalidParameterError(`Name must not start or end with whitespace: '${name}'`);
  }
}

/**
 * The namespace engine. Every write checks the principal's edit permission,
 * then validates and applies inside one `BEGIN IMMEDIATE` transaction: the
 * SQLite write lock is held from the first validation read until commit, and
 * any throw rolls the whole operation back.
 */
export class KnowledgeBase {
  readonly tree: TreeRepository;
  readonly ancestry: AncestryOracle;
  readonly allocator: IdentityAllocator;
  readonly gate: PermissionGate;
  readonly events: EventRepository;

  constructor(
    private db: DatabaseType,
    components: Partial<KnowledgeBaseComponents> = {},
  ) {
    this.tree = components.tree ?? new TreeRepository(db);
    this.ancestry = components.ancestry ?? new AncestryOracle(this.tree);
    this.allocator = components.allocator ?? new IdentityAllocator(db);
    this.gate = components.gate ?? new PermissionGate(new PermissionRepository(db));
    this.events = components.events ?? new EventRepository(db);
  }

  // ---- Directories ----

  createDirectory(principal: Principal, parent: DirectoryId, name: string): DirectoryEntry {
    return this.write<DirectoryEntry>(principal, () => {
      this.requireParent(parent);
      validateName(name);
      if (this.tree.lookupChild(parent, name, "directory")) {
        throw new DuplicateNameError(parent, name, "directory");
      }

      const id = this.allocator.allocate("directory");
      this.tree.insertDirectory(id);
      this.tree.insertDirEdge(parent, id, name);
      this.events.append("DIRECTORY_CREATED", { directory_id: id, parent_id: parent, name });

      return { kind: "directory", id, parent_id: parent, name };
    });
  }

  /** Reparent `dir`, keeping its name unless `newName` is given. */
  moveDirectory(principal: Principal, dir: DirectoryId, newParent: DirectoryId, newName?: string): DirectoryEntry {
    return this.write(principal, () => this.applyDirectoryMove(dir, newParent, newName));
  }

  renameDirectory(principal: Principal, dir: DirectoryId, newName: string): DirectoryEntry {
    return this.write(principal, () => {
      if (dir === ROOT_DIRECTORY_ID) throw new RootImmutableError("rename");
      const edge = this.tree.getDirectoryEdge(dir);
      if (!edge) throw new EntityNotFoundError("Directory", dir);
      return this.applyDirectoryMove(dir, edge.parent_id, newName);
    });
  }

  deleteDirectory(principal: Principal, dir: DirectoryId): DeletedSubtree {
    if (dir === ROOT_DIRECTORY_ID) throw new RootUndeletableError();

    return this.write<DeletedSubtree>(principal, () => {
      if (!this.tree.directoryExists(dir)) throw new EntityNotFoundError("Directory", dir);

      const directories = this.ancestry.descendants(dir);
      const notes = this.ancestry.ownedNotes(dir);

      for (const note of notes) {
        this.tree.removeNoteEdge(note);
        this.tree.deleteNoteRow(note);
      }
      // Deepest first, so no remaining edge ever points at a deleted parent.
      for (const d of [...directories].reverse()) {
        this.tree.removeDirEdge(d);
        this.tree.deleteDirectoryRow(d);
      }

      this.events.append("DIRECTORY_DELETED", { directory_id: dir, directories, notes });
      return { directories, notes };
    });
  }

  // ---- Notes ----

  createNote(principal: Principal, parent: DirectoryId, name: string, content: string): NoteEntry {
    return this.write<NoteEntry>(principal, () => {
      this.requireParent(parent);
      validateName(name);
      if (this.tree.lookupChild(parent, name, "note")) {
        throw new DuplicateNameError(parent, name, "note");
      }

      const id = this.allocator.allocate("note");
      this.tree.insertNote(id, content);
      this.tree.insertNoteEdge(parent, id, name);
      this.events.append("NOTE_CREATED", { note_id: id, parent_id: parent, name });

      return { kind: "note", id, parent_id: parent, name };
    });
  }

  /** Move a note, keeping its name unless `newName` is given. */
  moveNote(principal: Principal, note: NoteId, newParent: DirectoryId, newName?: string): NoteEntry {
    return this.write(principal, () => {
      const edge = this.requireNoteEdge(note);
      return this.applyNoteMove(note, edge.parent_id, edge.child_name, newParent, newName ?? edge.child_name);
    });
  }

  renameNote(principal: Principal, note: NoteId, newName: string): NoteEntry {
    return this.write(principal, () => {
      const edge = this.requireNoteEdge(note);
      return this.applyNoteMove(note, edge.parent_id, edge.child_name, edge.parent_id, newName);
    });
  }

  updateNote(principal: Principal, note: NoteId, content: string): NoteWithContent {
    return this.write<NoteWithContent>(principal, () => {
      const edge = this.requireNoteEdge(note);
      this.tree.updateNoteContent(note, content);
      this.events.append("NOTE_UPDATED", { note_id: note });
      return { kind: "note", id: note, parent_id: edge.parent_id, name: edge.child_name, content };
    });
  }

  deleteNote(principal: Principal, note: NoteId): NoteEntry {
    return this.write<NoteEntry>(principal, () => {
      const edge = this.requireNoteEdge(note);
      this.tree.removeNoteEdge(note);
      this.tree.deleteNoteRow(note);
      this.events.append("NOTE_DELETED", { note_id: note, parent_id: edge.parent_id, name: edge.child_name });
      return { kind: "note", id: note, parent_id: edge.parent_id, name: edge.child_name };
    });
  }

  // ---- Reads ----

  getDirectory(id: DirectoryId): DirectoryEntry {
    return this.read<DirectoryEntry>(() => {
      if (!this.tree.directoryExists(id)) throw new EntityNotFoundError("Directory", id);
      if (id === ROOT_DIRECTORY_ID) {
        return { kind: "directory", id, parent_id: null, name: null };
      }
      const edge = this.tree.getDirectoryEdge(id);
      if (!edge) throw new StorageFailureError(`directory ${id} has no parent`);
      return { kind: "directory", id, parent_id: edge.parent_id, name: edge.child_name };
    });
  }

  getNote(id: NoteId): NoteWithContent {
    return this.read<NoteWithContent>(() => {
      const note = this.tree.getNote(id);
      if (!note) throw new EntityNotFoundError("Note", id);
      const edge = this.tree.getNoteEdge(id);
      if (!edge) throw new StorageFailureError(`note ${id} has no parent`);
      return { kind: "note", id, parent_id: edge.parent_id, name: edge.child_name, content: note.content };
    });
  }

  lookupChild(parent: DirectoryId, name: string, kind?: EntityKind): ChildEntry | null {
    return this.read(() => this.tree.lookupChild(parent, name, kind));
  }

  listChildren(parent: DirectoryId): DirectoryListing {
    return this.read(() => {
      if (!this.tree.directoryExists(parent)) throw new EntityNotFoundError("Directory", parent);
      return this.tree.listChildren(parent);
    });
  }

  /**
   * Resolve a `/`-separated path from the root. Every segment but the last must
   * name a directory; the last may name either kind. The empty path and `/`
   * resolve to the root, reported with the name "".
   */
  resolvePath(path: string): ChildEntry | null {
    const segments = path.split(PATH_SEPARATOR).filter((s) => s.length > 0);
    return this.read<ChildEntry | null>(() => {
      let current: ChildEntry = { kind: "directory", id: ROOT_DIRECTORY_ID, name: "" };
      for (const [i, segment] of segments.entries()) {
        const last = i === segments.length - 1;
        const next = this.tree.lookupChild(current.id, segment, last ? undefined : "directory");
        if (!next) return null;
        current = next;
      }
      return current;
    });
  }

  /** Absolute path of a directory, `/` for the root. */
  pathOf(dir: DirectoryId): string {
    return this.read(() => {
      if (!this.tree.directoryExists(dir)) throw new EntityNotFoundError("Directory", dir);
      const names = this.ancestry.pathToRoot(dir).map((e) => e.child_name).reverse();
      return PATH_SEPARATOR + names.join(PATH_SEPARATOR);
    });
  }

  isAncestor(candidate: DirectoryId, target: DirectoryId): boolean {
    return this.read(() => this.ancestry.isAncestor(candidate, target));
  }

  descendants(root: DirectoryId): DirectoryId[] {
    return this.read(() => this.ancestry.descendants(root));
  }

  ownedNotes(root: DirectoryId): NoteId[] {
    return this.read(() => this.ancestry.ownedNotes(root));
  }

  // ---- Internals ----

  private applyDirectoryMove(dir: DirectoryId, newParent: DirectoryId, requestedName?: string): DirectoryEntry {
    if (!this.tree.directoryExists(dir)) throw new EntityNotFoundError("Directory", dir);
    this.requireParent(newParent);
    // Also rejects moving the root, which is an ancestor of everything.
    if (newParent === dir || this.ancestry.isAncestor(dir, newParent)) {
      throw new CycleRejectedError(dir, newParent);
    }

    const edge = this.tree.getDirectoryEdge(dir);
    if (!edge) throw new StorageFailureError(`directory ${dir} has no parent`);
    const newName = requestedName ?? edge.child_name;
    validateName(newName);
    const entry: DirectoryEntry = { kind: "directory", id: dir, parent_id: newParent, name: newName };
    if (edge.parent_id === newParent && edge.child_name === newName) return entry;

    if (this.tree.lookupChild(newParent, newName, "directory")) {
      throw new DuplicateNameError(newParent, newName, "directory");
    }

    this.tree.removeDirEdge(dir);
    this.tree.insertDirEdge(newParent, dir, newName);
    this.events.append("DIRECTORY_MOVED", {
      directory_id: dir,
      from_parent_id: edge.parent_id,
      from_name: edge.child_name,
      to_parent_id: newParent,
      to_name: newName,
    });
    return entry;
  }

  private applyNoteMove(
    note: NoteId,
    fromParent: DirectoryId,
    fromName: string,
    newParent: DirectoryId,
    newName: string,
  ): NoteEntry {
    this.requireParent(newParent);
    validateName(newName);

    const entry: NoteEntry = { kind: "note", id: note, parent_id: newParent, name: newName };
    if (fromParent === newParent && fromName === newName) return entry;

    if (this.tree.lookupChild(newParent, newName, "note")) {
      throw new DuplicateNameError(newParent, newName, "note");
    }

    this.tree.removeNoteEdge(note);
    this.tree.insertNoteEdge(newParent, note, newName);
    this.events.append("NOTE_MOVED", {
      note_id: note,
      from_parent_id: fromParent,
      from_name: fromName,
      to_parent_id: newParent,
      to_name: newName,
    });
    return entry;
  }

  private requireParent(parent: DirectoryId): void {
    if (!this.tree.directoryExists(parent)) throw new UnknownParentError(parent);
  }

  private requireNoteEdge(note: NoteId): ChildEdge {
    const edge = this.tree.getNoteEdge(note);
    if (!edge) throw new EntityNotFoundError("Note", note);
    return edge;
  }

  private write<T>(principal: Principal, apply: () => T): T {
    return this.guard(() =>
      this.db
        .transaction(() => {
          this.gate.requireEdit(principal);
          return apply();
        })
        .immediate(),
    );
  }

  private read<T>(query: () => T): T {
    return this.guard(() => this.db.transaction(query).deferred());
  }

  private guard<T>(run: () => T): T {
    try {
      return run();
    } catch (err) {
      if (err instanceof KbError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new StorageFailureError(message, { cause: err });
    }
  }
}
