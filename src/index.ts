#!/usr/bin/env node

import { existsSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { DatabaseManager } from "./db/database.js";
import { DB_FILE_NAME, grantConfiguredPermissions, resolveConfig, type KbConfig } from "./config.js";
import { createServer } from "./server.js";

/**
 * Auto-detect the knowledge base directory from the MCP client's roots and derive the DB path.
 */
async function resolveDbPathFromRoots(lowLevelServer: Server): Promise<string> {
  const capabilities = lowLevelServer.getClientCapabilities();
  if (!capabilities?.roots) {
    throw new Error(
      "No database path configured and the MCP client does not support roots.\n" +
      "Either set KB_DB_PATH or KB_PATH, or use an MCP client that provides roots.",
    );
  }

  const { roots } = await lowLevelServer.listRoots();

  const fileRoot = roots.find((r) => r.uri.startsWith("file://"));
  if (!fileRoot) {
    throw new Error(
      "No database path configured and no file:// roots found from the MCP client.\n" +
      "Set KB_DB_PATH or KB_PATH to configure the database location.",
    );
  }

  const rootPath = fileURLToPath(fileRoot.uri);
  console.error(`Auto-detected knowledge base path from MCP roots: ${rootPath}`);
  return `${rootPath}/${DB_FILE_NAME}`;
}

function openIfPresent(dbManager: DatabaseManager, config: KbConfig): void {
  if (!existsSync(config.dbPath)) return;

  dbManager.open(config.dbPath, { busyTimeoutMs: config.busyTimeoutMs });
  const granted = grantConfiguredPermissions(dbManager, config);
  if (granted > 0) {
    console.error(`Granted ${granted} configured permission(s)`);
  }
}

const config = resolveConfig(process.argv, process.env);
const dbManager = new DatabaseManager();
const server = createServer(dbManager, config);

// Auto-open existing DB on startup (only when path is already known)
if (config.explicitPath) {
  openIfPresent(dbManager, config);
}

async function main(): Promise<void> {
  const transport = new StdioServerTransport();

  if (!config.explicitPath) {
    // Resolve DB path from MCP roots after handshake completes
    const lowLevelServer = server.server;

    await new Promise<void>((resolve, reject) => {
      lowLevelServer.oninitialized = () => {
        resolveDbPathFromRoots(lowLevelServer)
          .then((dbPath) => {
            config.dbPath = dbPath;
            openIfPresent(dbManager, config);
            resolve();
          })
          .catch(reject);
      };

      server.connect(transport).catch(reject);
    });
  } else {
    await server.connect(transport);
  }

  console.error(`kb-namespace-mcp running (db: ${config.dbPath})`);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  dbManager.close();
  process.exit(1);
});
