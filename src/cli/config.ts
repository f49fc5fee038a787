/**
 * CLI configuration: paths and service settings from the environment.
 *
 * Defaults:
 *   DB:        ~/.chatvault/db.sqlite
 *   Key ring:  ~/.chatvault/keys.yaml (only if the file exists)
 *
 * Environment overrides:
 *   CHATVAULT_DB_PATH                 path to SQLite file
 *   CHATVAULT_KEYRING                 path to YAML key ring
 *   CHATVAULT_GENERATION_URL          generation backend endpoint
 *   CHATVAULT_GENERATION_TIMEOUT_MS   request timeout
 *   CHATVAULT_MAX_TOKENS              max_tokens sent to the backend
 */

import { existsSync, mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import { z } from "zod";
import { ValidationError } from "../errors.js";
import { DEFAULT_GENERATION_TIMEOUT_MS } from "../pipeline/generation.js";
import { DEFAULT_MAX_TOKENS } from "../pipeline/chat-pipeline.js";

export interface ChatVaultConfig {
  baseDir: string;
  dbPath: string;
  keyRingPath: string | null;
  generationUrl: string;
  generationTimeoutMs: number;
  maxTokens: number;
}

export const DEFAULT_GENERATION_URL = "http://localhost:8001/generate";

const EnvSchema = z.object({
  CHATVAULT_DB_PATH: z.string().min(1).optional(),
  CHATVAULT_KEYRING: z.string().min(1).optional(),
  CHATVAULT_GENERATION_URL: z.string().url().default(DEFAULT_GENERATION_URL),
  CHATVAULT_GENERATION_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_GENERATION_TIMEOUT_MS),
  CHATVAULT_MAX_TOKENS: z.coerce.number().int().positive().default(DEFAULT_MAX_TOKENS),
});

export function resolveConfig(
  env: NodeJS.ProcessEnv = process.env,
  baseDir: string = join(homedir(), ".chatvault"),
): ChatVaultConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid environment: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
      "SCHEMA_INVALID",
      { issues: parsed.error.issues },
    );
  }
  const e = parsed.data;

  const defaultKeyRing = join(baseDir, "keys.yaml");
  const keyRingPath = e.CHATVAULT_KEYRING
    ? resolve(e.CHATVAULT_KEYRING)
    : existsSync(defaultKeyRing)
      ? defaultKeyRing
      : null;

  return {
    baseDir,
    dbPath: resolve(e.CHATVAULT_DB_PATH ?? join(baseDir, "db.sqlite")),
    keyRingPath,
    generationUrl: e.CHATVAULT_GENERATION_URL,
    generationTimeoutMs: e.CHATVAULT_GENERATION_TIMEOUT_MS,
    maxTokens: e.CHATVAULT_MAX_TOKENS,
  };
}

/**
 * Ensure the base directory and the database's directory exist.
 */
export function ensureDataDirs(config: ChatVaultConfig): void {
  mkdirSync(config.baseDir, { recursive: true });
  mkdirSync(dirname(config.dbPath), { recursive: true });
}
