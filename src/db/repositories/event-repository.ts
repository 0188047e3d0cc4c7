import type { Database as DatabaseType } from "better-sqlite3";
import type { DirectoryId, EventPayloads, EventType, KbEvent, NoteId } from "../../types.js";

export class EventRepository {
  constructor(private db: DatabaseType) {}

  /** Record a committed change. Runs inside the caller's transaction, if any. */
  append<T extends EventType>(eventType: T, payload: EventPayloads[T]): KbEvent {
    const event = {
      event_type: eventType,
      timestamp: new Date().toISOString(),
      payload: JSON.stringify(payload),
    };
    const { lastInsertRowid } = this.db
      .prepare(`INSERT INTO events (event_type, timestamp, payload) VALUES (@event_type, @timestamp, @payload)`)
      .run(event);

    return { event_id: Number(lastInsertRowid), ...event };
  }

  query(opts: {
    event_type?: EventType;
    since?: string;
    /** Only events whose payload names this directory. */
    directory_id?: DirectoryId;
    /** Only events whose payload names this note. */
    note_id?: NoteId;
    limit?: number;
    offset?: number;
  } = {}): KbEvent[] {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (opts.event_type) {
      conditions.push("event_type = ?");
      params.push(opts.event_type);
    }
    if (opts.since) {
      conditions.push("timestamp >= ?");
      params.push(opts.since);
    }
    if (opts.directory_id !== undefined) {
      conditions.push("json_extract(payload, '$.directory_id') = ?");
      params.push(opts.directory_id);
    }
    if (opts.note_id !== undefined) {
      conditions.push("json_extract(payload, '$.note_id') = ?");
      params.push(opts.note_id);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const limit = opts.limit ?? 100;
    const offset = opts.offset ?? 0;

    return this.db
      .prepare<unknown[], KbEvent>(`SELECT * FROM events ${where} ORDER BY event_id ASC LIMIT ? OFFSET ?`)
      .all(...params, limit, offset);
  }

  count(): number {
    const row = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM events`).get();
    return row?.count ?? 0;
  }
}
