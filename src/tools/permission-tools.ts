import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { DatabaseManager } from "../db/database.js";
import { PermissionRepository } from "../db/repositories/permission-repository.js";
import { PermissionGate } from "../kb/permission-gate.js";
import { DatabaseNotInitializedError } from "../errors.js";
import { jsonResult, kbErrorResult } from "./results.js";

// Read-only: permissions are granted through configuration, not through tools.
export function registerPermissionTools(server: McpServer, dbManager: DatabaseManager): void {
  function getRepo(): PermissionRepository {
    if (!dbManager.isInitialized()) throw new DatabaseNotInitializedError();
    return new PermissionRepository(dbManager.connection);
  }

  server.registerTool(
    "get_permissions",
    {
      description: "Show what a user may do. A user with no record has no permissions.",
      inputSchema: {
        principal: z.string().min(1).describe("Username to check."),
      },
    },
    async ({ principal }) => {
      try {
        const gate = new PermissionGate(getRepo());
        return jsonResult({
          principal,
          can_edit: gate.canEdit(principal),
          can_receive_feedback: gate.canReceiveFeedback(principal),
        });
      } catch (err) {
        return kbErrorResult(err);
      }
    },
  );

  server.registerTool(
    "list_feedback_recipients",
    {
      description: "List the users who receive feedback messages.",
    },
    async () => {
      try {
        return jsonResult(getRepo().listFeedbackRecipients());
      } catch (err) {
        return kbErrorResult(err);
      }
    },
  );
}
