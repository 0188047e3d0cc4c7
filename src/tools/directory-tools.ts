import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { DatabaseManager } from "../db/database.js";
import { KnowledgeBase } from "../kb/mutation-engine.js";
import { DatabaseNotInitializedError } from "../errors.js";
import { jsonResult, kbErrorResult } from "./results.js";

export const principalSchema = z
  .string()
  .min(1)
  .describe("Username of whoever issues the change. Must hold the edit permission.");

export const idSchema = z.number().int().min(0);

export function registerDirectoryTools(server: McpServer, dbManager: DatabaseManager): void {
  function getKb(): KnowledgeBase {
    if (!dbManager.isInitialized()) throw new DatabaseNotInitializedError();
    return new KnowledgeBase(dbManager.connection);
  }

  server.registerTool(
    "create_directory",
    {
      description: "Create a sub-directory. Fails if the parent already has a directory with that name.",
      inputSchema: {
        principal: principalSchema,
        parent_id: idSchema.describe("Parent directory ID (0 is the root)."),
        name: z.string().describe("Name of the new directory."),
      },
    },
    async ({ principal, parent_id, name }) => {
      try {
        return jsonResult(getKb().createDirectory(principal, parent_id, name));
      } catch (err) {
        return kbErrorResult(err);
      }
    },
  );

  server.registerTool(
    "move_directory",
    {
      description:
        "Move a directory (with everything below it) under a new parent, optionally renaming it. " +
        "Rejected if the destination is the directory itself or lies inside it.",
      inputSchema: {
        principal: principalSchema,
        directory_id: idSchema.describe("The directory to move."),
        new_parent_id: idSchema.describe("Destination directory ID."),
        new_name: z.string().optional().describe("Name under the new parent. Keeps the current name if omitted."),
      },
    },
    async ({ principal, directory_id, new_parent_id, new_name }) => {
      try {
        return jsonResult(getKb().moveDirectory(principal, directory_id, new_parent_id, new_name));
      } catch (err) {
        return kbErrorResult(err);
      }
    },
  );

  server.registerTool(
    "rename_directory",
    {
      description: "Rename a directory in place. The root cannot be renamed.",
      inputSchema: {
        principal: principalSchema,
        directory_id: idSchema.describe("The directory to rename."),
        new_name: z.string().describe("The new name."),
      },
    },
    async ({ principal, directory_id, new_name }) => {
      try {
        return jsonResult(getKb().renameDirectory(principal, directory_id, new_name));
      } catch (err) {
        return kbErrorResult(err);
      }
    },
  );

  server.registerTool(
    "delete_directory",
    {
      description:
        "Delete a directory together with every sub-directory and note below it, all at once. " +
        "The root cannot be deleted.",
      inputSchema: {
        principal: principalSchema,
        directory_id: idSchema.describe("The directory to delete."),
      },
    },
    async ({ principal, directory_id }) => {
      try {
        const removed = getKb().deleteDirectory(principal, directory_id);
        return jsonResult({ deleted_directories: removed.directories, deleted_notes: removed.notes });
      } catch (err) {
        return kbErrorResult(err);
      }
    },
  );

  server.registerTool(
    "list_directory",
    {
      description: "List the sub-directories and notes of a directory, each sorted by name.",
      inputSchema: {
        directory_id: idSchema.optional().describe("Directory ID. Defaults to the root."),
      },
    },
    async ({ directory_id }) => {
      try {
        const kb = getKb();
        const id = directory_id ?? 0;
        return jsonResult({ directory_id: id, path: kb.pathOf(id), ...kb.listChildren(id) });
      } catch (err) {
        return kbErrorResult(err);
      }
    },
  );

  server.registerTool(
    "lookup_child",
    {
      description:
        "Find a child of a directory by name. Directories and notes are named separately, " +
        "so pass `kind` when both exist under the same name.",
      inputSchema: {
        parent_id: idSchema.describe("Directory to search in."),
        name: z.string().describe("Child name."),
        kind: z.enum(["directory", "note"]).optional().describe("Restrict the search to one kind."),
      },
    },
    async ({ parent_id, name, kind }) => {
      try {
        return jsonResult({ child: getKb().lookupChild(parent_id, name, kind) });
      } catch (err) {
        return kbErrorResult(err);
      }
    },
  );

  server.registerTool(
    "resolve_path",
    {
      description: "Resolve a slash-separated path such as 'guides/recycling/readme' from the root.",
      inputSchema: {
        path: z.string().describe("Path from the root."),
      },
    },
    async ({ path }) => {
      try {
        return jsonResult({ path, target: getKb().resolvePath(path) });
      } catch (err) {
        return kbErrorResult(err);
      }
    },
  );

  server.registerTool(
    "get_directory",
    {
      description: "Get a directory's parent, name and absolute path.",
      inputSchema: {
        directory_id: idSchema.describe("The directory ID."),
      },
    },
    async ({ directory_id }) => {
      try {
        const kb = getKb();
        return jsonResult({ ...kb.getDirectory(directory_id), path: kb.pathOf(directory_id) });
      } catch (err) {
        return kbErrorResult(err);
      }
    },
  );
}
