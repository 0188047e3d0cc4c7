import { z } from "zod";
import { DEFAULT_BUSY_TIMEOUT_MS, type DatabaseManager } from "./db/database.js";
import { PermissionRepository } from "./db/repositories/permission-repository.js";
import type { Principal } from "./types.js";

export const DEFAULT_DB_PATH = "./data/kb.sqlite";
export const DB_FILE_NAME = ".kb.sqlite";

export interface KbConfig {
  dbPath: string;
  /** False when no CLI argument or env var named the database; the path may then come from MCP roots. */
  explicitPath: boolean;
  busyTimeoutMs: number;
  editors: Principal[];
  feedbackRecipients: Principal[];
}

const principalList = z
  .string()
  .optional()
  .transform((raw) =>
    (raw ?? "")
      .split(",")
      .map((p) => p.trim())
      .filter((p) => p.length > 0),
  );

const envSchema = z.object({
  KB_DB_PATH: z.string().min(1).optional(),
  KB_PATH: z.string().min(1).optional(),
  KB_BUSY_TIMEOUT_MS: z.coerce.number().int().min(0).optional(),
  KB_EDITORS: principalList,
  KB_FEEDBACK_RECIPIENTS: principalList,
});

/**
 * Resolve configuration from explicit sources (CLI arg, env vars).
 * When neither names a database, `dbPath` holds the fallback and
 * `explicitPath` is false.
 */
export function resolveConfig(argv: string[], env: NodeJS.ProcessEnv): KbConfig {
  const parsed = envSchema.parse(env);

  // 1. Explicit CLI argument, 2. explicit env var, 3. inside KB_PATH
  let dbPath: string | null = argv[2] ?? parsed.KB_DB_PATH ?? null;
  if (dbPath === null && parsed.KB_PATH) {
    dbPath = `${parsed.KB_PATH}/${DB_FILE_NAME}`;
  }

  return {
    dbPath: dbPath ?? DEFAULT_DB_PATH,
    explicitPath: dbPath !== null,
    busyTimeoutMs: parsed.KB_BUSY_TIMEOUT_MS ?? DEFAULT_BUSY_TIMEOUT_MS,
    editors: parsed.KB_EDITORS,
    feedbackRecipients: parsed.KB_FEEDBACK_RECIPIENTS,
  };
}

/** Grant the configured principals their permissions. No-op until the database is initialized. */
export function grantConfiguredPermissions(dbManager: DatabaseManager, config: KbConfig): number {
  if (!dbManager.isInitialized()) return 0;

  const repo = new PermissionRepository(dbManager.connection);
  let granted = 0;
  dbManager.connection.transaction(() => {
    for (const principal of config.editors) {
      if (repo.get(principal)?.can_edit !== true) {
        repo.set(principal, { can_edit: true });
        granted++;
      }
    }
    for (const principal of config.feedbackRecipients) {
      if (repo.get(principal)?.can_receive_feedback !== true) {
        repo.set(principal, { can_receive_feedback: true });
        granted++;
      }
    }
  })();
  return granted;
}
