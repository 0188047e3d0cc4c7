import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { DatabaseManager } from "../db/database.js";
import { EventRepository } from "../db/repositories/event-repository.js";
import { PermissionRepository } from "../db/repositories/permission-repository.js";
import { TreeRepository } from "../db/repositories/tree-repository.js";
import { DatabaseAlreadyInitializedError } from "../errors.js";
import { grantConfiguredPermissions, type KbConfig } from "../config.js";
import { jsonResult, kbErrorResult } from "./results.js";

export function registerDbTools(server: McpServer, dbManager: DatabaseManager, config: KbConfig): void {
  server.registerTool(
    "db_status",
    {
      description:
        "Check the database status. Returns whether the DB is initialized and basic statistics.",
    },
    async () => {
      if (!dbManager.isInitialized()) {
        return jsonResult({ initialized: false, path: config.dbPath });
      }

      const db = dbManager.connection;
      const { directories, notes } = new TreeRepository(db).counts();

      return jsonResult({
        initialized: true,
        path: config.dbPath,
        stats: {
          directories,
          notes,
          permission_records: new PermissionRepository(db).list().length,
          events: new EventRepository(db).count(),
        },
      });
    },
  );

  server.registerTool(
    "db_init",
    {
      description:
        "Initialize the database. Creates the SQLite file, all tables and the root directory. Fails if already initialized.",
      inputSchema: {
        path: z.string().optional().describe("Database file path. Uses the configured default if omitted."),
      },
    },
    async ({ path: overridePath }) => {
      if (dbManager.isInitialized()) {
        return kbErrorResult(new DatabaseAlreadyInitializedError());
      }

      const targetPath = overridePath ?? config.dbPath;

      try {
        if (overridePath !== undefined || !dbManager.isOpen) {
          dbManager.close();
          dbManager.open(targetPath, { busyTimeoutMs: config.busyTimeoutMs });
          config.dbPath = targetPath;
        }
        dbManager.initialize();
        grantConfiguredPermissions(dbManager, config);
      } catch (err) {
        return {
          isError: true,
          content: [{ type: "text" as const, text: `Failed to initialize database: ${err}` }],
        };
      }

      return jsonResult({
        initialized: true,
        path: targetPath,
        message: "Database created with an empty root directory.",
      });
    },
  );
}
