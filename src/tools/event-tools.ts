import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { DatabaseManager } from "../db/database.js";
import { EventRepository } from "../db/repositories/event-repository.js";
import { DatabaseNotInitializedError } from "../errors.js";
import { EVENT_TYPES } from "../types.js";
import { jsonResult, kbErrorResult } from "./results.js";

export function registerEventTools(server: McpServer, dbManager: DatabaseManager): void {
  server.registerTool(
    "get_event_log",
    {
      description:
        "Query the append-only log of committed changes. Filter by event type, time, directory or note.",
      inputSchema: {
        event_type: z.enum(EVENT_TYPES).optional().describe("Filter by event type."),
        since: z.string().optional().describe("ISO 8601 timestamp. Only return events after this time."),
        directory_id: z.number().int().min(0).optional().describe("Only events about this directory."),
        note_id: z.number().int().min(0).optional().describe("Only events about this note."),
        limit: z.number().int().min(1).max(500).optional().describe("Max results (default 100)."),
        offset: z.number().int().min(0).optional().describe("Offset for pagination."),
      },
    },
    async ({ event_type, since, directory_id, note_id, limit, offset }) => {
      try {
        if (!dbManager.isInitialized()) throw new DatabaseNotInitializedError();
        const events = new EventRepository(dbManager.connection).query({
          event_type,
          since,
          directory_id,
          note_id,
          limit,
          offset,
        });

        return jsonResult(
          events.map((e) => ({
            event_id: e.event_id,
            event_type: e.event_type,
            timestamp: e.timestamp,
            payload: JSON.parse(e.payload),
          })),
        );
      } catch (err) {
        return kbErrorResult(err);
      }
    },
  );
}
