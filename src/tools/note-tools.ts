import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { DatabaseManager } from "../db/database.js";
import { KnowledgeBase } from "../kb/mutation-engine.js";
import { DatabaseNotInitializedError } from "../errors.js";
import { idSchema, principalSchema } from "./directory-tools.js";
import { jsonResult, kbErrorResult } from "./results.js";

export function registerNoteTools(server: McpServer, dbManager: DatabaseManager): void {
  function getKb(): KnowledgeBase {
    if (!dbManager.isInitialized()) throw new DatabaseNotInitializedError();
    return new KnowledgeBase(dbManager.connection);
  }

  server.registerTool(
    "create_note",
    {
      description: "Create a note in a directory. Fails if the directory already has a note with that name.",
      inputSchema: {
        principal: principalSchema,
        parent_id: idSchema.describe("Directory ID (0 is the root)."),
        name: z.string().describe("Name of the note."),
        content: z.string().describe("Note text. Stored as-is."),
      },
    },
    async ({ principal, parent_id, name, content }) => {
      try {
        return jsonResult(getKb().createNote(principal, parent_id, name, content));
      } catch (err) {
        return kbErrorResult(err);
      }
    },
  );

  server.registerTool(
    "get_note",
    {
      description: "Retrieve a note with its content, parent directory and name.",
      inputSchema: {
        note_id: idSchema.describe("The note ID."),
      },
    },
    async ({ note_id }) => {
      try {
        return jsonResult(getKb().getNote(note_id));
      } catch (err) {
        return kbErrorResult(err);
      }
    },
  );

  server.registerTool(
    "update_note",
    {
      description: "Replace a note's content.",
      inputSchema: {
        principal: principalSchema,
        note_id: idSchema.describe("The note ID."),
        content: z.string().describe("The new content."),
      },
    },
    async ({ principal, note_id, content }) => {
      try {
        return jsonResult(getKb().updateNote(principal, note_id, content));
      } catch (err) {
        return kbErrorResult(err);
      }
    },
  );

  server.registerTool(
    "move_note",
    {
      description: "Move a note to another directory, optionally under a new name.",
      inputSchema: {
        principal: principalSchema,
        note_id: idSchema.describe("The note ID."),
        new_parent_id: idSchema.describe("Destination directory ID."),
        new_name: z.string().optional().describe("Name in the destination. Keeps the current name if omitted."),
      },
    },
    async ({ principal, note_id, new_parent_id, new_name }) => {
      try {
        return jsonResult(getKb().moveNote(principal, note_id, new_parent_id, new_name));
      } catch (err) {
        return kbErrorResult(err);
      }
    },
  );

  server.registerTool(
    "rename_note",
    {
      description: "Rename a note in place.",
      inputSchema: {
        principal: principalSchema,
        note_id: idSchema.describe("The note ID."),
        new_name: z.string().describe("The new name."),
      },
    },
    async ({ principal, note_id, new_name }) => {
      try {
        return jsonResult(getKb().renameNote(principal, note_id, new_name));
      } catch (err) {
        return kbErrorResult(err);
      }
    },
  );

  server.registerTool(
    "delete_note",
    {
      description: "Delete a note. Its ID is never handed out again.",
      inputSchema: {
        principal: principalSchema,
        note_id: idSchema.describe("The note ID."),
      },
    },
    async ({ principal, note_id }) => {
      try {
        const note = getKb().deleteNote(principal, note_id);
        return jsonResult({ ...note, deleted: true });
      } catch (err) {
        return kbErrorResult(err);
      }
    },
  );
}
