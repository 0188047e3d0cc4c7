import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { DatabaseManager } from "./db/database.js";
import type { KbConfig } from "./config.js";
import { registerDbTools } from "./tools/db-tools.js";
import { registerDirectoryTools } from "./tools/directory-tools.js";
import { registerEventTools } from "./tools/event-tools.js";
import { registerNoteTools } from "./tools/note-tools.js";
import { registerPermissionTools } from "./tools/permission-tools.js";

export const SERVER_NAME = "kb-namespace-mcp";
export const SERVER_VERSION = "0.1.0";

/**
 * Build the MCP server with every tool registered. `config` is read at call
 * time, so a database path resolved after the handshake is picked up.
 */
export function createServer(dbManager: DatabaseManager, config: KbConfig): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      instructions: [
        "This server stores a knowledge base as a tree of directories and notes rooted at directory 0.",
        "",
        "Typical workflow:",
        "1. Initialize the database with db_init (one-time setup).",
        "2. Browse with list_directory, lookup_child, resolve_path and get_note.",
        "3. Change the tree with create_directory, create_note, move_*, rename_*, update_note and delete_*.",
        "   Every change names a principal; it must hold the edit permission (see get_permissions).",
        "4. Review committed changes with get_event_log.",
        "",
        "Names are unique per directory, separately for sub-directories and for notes.",
        "Deleting a directory removes everything below it in one step.",
      ].join("\n"),
    },
  );

  registerDbTools(server, dbManager, config);
  registerDirectoryTools(server, dbManager);
  registerNoteTools(server, dbManager);
  registerPermissionTools(server, dbManager);
  registerEventTools(server, dbManager);

  return server;
}
