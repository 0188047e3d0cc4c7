import type { Database as DatabaseType } from "better-sqlite3";
import type { EntityKind } from "../types.js";
import { StorageFailureError } from "../errors.js";

/**
 * Hands out ids for new directories and notes from the `kb_id_sequences`
 * counters. Values only ever grow, so an id freed by a delete is never issued
 * again. The increment is a single statement, which keeps two connections
 * from reading the same counter value.
 */
export class IdentityAllocator {
  constructor(private db: DatabaseType) {}

  allocate(kind: EntityKind): number {
    const row = this.db
      .prepare<[string, number], { last_id: number }>(
        `UPDATE kb_id_sequences SET last_id = last_id + 1
         WHERE kind = ? AND last_id < ? RETURNING last_id`,
      )
      .get(kind, Number.MAX_SAFE_INTEGER);
    if (row) return row.last_id;

    // Nothing updated: either the counter row is gone or it sits at the limit.
    this.peek(kind);
    throw new StorageFailureError(`id sequence '${kind}' is exhausted`);
  }

  peek(kind: EntityKind): number {
    const row = this.db
      .prepare<[string], { last_id: number }>(`SELECT last_id FROM kb_id_sequences WHERE kind = ?`)
      .get(kind);
    if (!row) {
      throw new StorageFailureError(`id sequence '${kind}' is missing`);
    }
    return row.last_id;
  }
}
