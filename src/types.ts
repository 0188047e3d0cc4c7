// ---- Identifiers ----

export type DirectoryId = number;
export type NoteId = number;
export type Principal = string; // username of whoever issues the request

export type EntityKind = "directory" | "note";

export const ROOT_DIRECTORY_ID: DirectoryId = 0;

// ---- Rows ----

export interface KbNote {
  id: NoteId;
  content: string;
}

export interface ChildEdge {
  parent_id: DirectoryId;
  child_id: number;
  child_name: string;
}

// ---- Entries returned to callers ----

export interface DirectoryEntry {
  kind: "directory";
  id: DirectoryId;
  parent_id: DirectoryId | null; // null only for the root
  name: string | null;
}

export interface NoteEntry {
  kind: "note";
  id: NoteId;
  parent_id: DirectoryId;
  name: string;
}

export type ChildEntry =
  | { kind: "directory"; id: DirectoryId; name: string }
  | { kind: "note"; id: NoteId; name: string };

export interface DirectoryListing {
  directories: { id: DirectoryId; name: string }[];
  notes: { id: NoteId; name: string }[];
}

export interface DeletedSubtree {
  directories: DirectoryId[];
  notes: NoteId[];
}

// ---- Permissions ----

export interface Permissions {
  can_edit: boolean;
  can_receive_feedback: boolean;
}

export interface PermissionRecord extends Permissions {
  principal: Principal;
}

// ---- Events ----

export type EventType =
  | "DB_INITIALIZED"
  | "DIRECTORY_CREATED"
  | "DIRECTORY_MOVED"
  | "DIRECTORY_DELETED"
  | "NOTE_CREATED"
  | "NOTE_MOVED"
  | "NOTE_UPDATED"
  | "NOTE_DELETED"
  | "PERMISSIONS_CHANGED";

export const EVENT_TYPES = [
  "DB_INITIALIZED",
  "DIRECTORY_CREATED",
  "DIRECTORY_MOVED",
  "DIRECTORY_DELETED",
  "NOTE_CREATED",
  "NOTE_MOVED",
  "NOTE_UPDATED",
  "NOTE_DELETED",
  "PERMISSIONS_CHANGED",
] as const satisfies readonly EventType[];

interface MovedPayload {
  from_parent_id: DirectoryId;
  from_name: string;
  to_parent_id: DirectoryId;
  to_name: string;
}

/** Payload recorded for each event type. */
export interface EventPayloads {
  DB_INITIALIZED: { initialized_at: string };
  DIRECTORY_CREATED: { directory_id: DirectoryId; parent_id: DirectoryId; name: string };
  DIRECTORY_MOVED: MovedPayload & { directory_id: DirectoryId };
  DIRECTORY_DELETED: { directory_id: DirectoryId; directories: DirectoryId[]; notes: NoteId[] };
  NOTE_CREATED: { note_id: NoteId; parent_id: DirectoryId; name: string };
  NOTE_MOVED: MovedPayload & { note_id: NoteId };
  NOTE_UPDATED: { note_id: NoteId };
  NOTE_DELETED: { note_id: NoteId; parent_id: DirectoryId; name: string };
  PERMISSIONS_CHANGED: PermissionRecord | { principal: Principal; removed: true };
}

export interface KbEvent {
  event_id: number;
  event_type: EventType;
  timestamp: string;
  payload: string; // JSON
}

// ---- Constants ----

export const PATH_SEPARATOR = "/";
