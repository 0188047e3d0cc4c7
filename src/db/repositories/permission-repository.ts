import type { Database as DatabaseType } from "better-sqlite3";
import type { PermissionRecord, Permissions, Principal } from "../../types.js";
import { EventRepository } from "./event-repository.js";

interface PermissionRow {
  principal: string;
  can_edit: number;
  can_receive_feedback: number;
}

function fromRow(row: PermissionRow): PermissionRecord {
  return {
    principal: row.principal,
    can_edit: row.can_edit === 1,
    can_receive_feedback: row.can_receive_feedback === 1,
  };
}

export class PermissionRepository {
  private events: EventRepository;

  constructor(private db: DatabaseType) {
    this.events = new EventRepository(db);
  }

  get(principal: Principal): PermissionRecord | null {
    const row = this.db
      .prepare<[string], PermissionRow>(`SELECT * FROM permissions WHERE principal = ?`)
      .get(principal);
    return row ? fromRow(row) : null;
  }

  /** Upsert; fields left out keep their stored value (false for a new record). */
  set(principal: Principal, changes: Partial<Permissions>): PermissionRecord {
    const current = this.get(principal);
    const next: PermissionRecord = {
      principal,
      can_edit: changes.can_edit ?? current?.can_edit ?? false,
      can_receive_feedback: changes.can_receive_feedback ?? current?.can_receive_feedback ?? false,
    };

    this.db
      .prepare(
        `INSERT INTO permissions (principal, can_edit, can_receive_feedback) VALUES (?, ?, ?)
         ON CONFLICT (principal) DO UPDATE SET
           can_edit = excluded.can_edit,
           can_receive_feedback = excluded.can_receive_feedback`,
      )
      .run(principal, next.can_edit ? 1 : 0, next.can_receive_feedback ? 1 : 0);

    this.events.append("PERMISSIONS_CHANGED", { ...next });

    return next;
  }

  remove(principal: Principal): boolean {
    const result = this.db.prepare(`DELETE FROM permissions WHERE principal = ?`).run(principal);
    if (result.changes > 0) {
      this.events.append("PERMISSIONS_CHANGED", { principal, removed: true });
      return true;
    }
    return false;
  }

  list(): PermissionRecord[] {
    return this.db
      .prepare<[], PermissionRow>(`SELECT * FROM permissions ORDER BY principal ASC`)
      .all()
      .map(fromRow);
  }

  listFeedbackRecipients(): Principal[] {
    return this.db
      .prepare<[], { principal: string }>(
        `SELECT principal FROM permissions WHERE can_receive_feedback = 1 ORDER BY principal ASC`,
      )
      .all()
      .map((r) => r.principal);
  }
}
