#!/usr/bin/env node
/**
 * chatvault CLI entry point.
 *
 * Usage:
 *   chatvault <command> [options]
 *
 * Commands:
 *   init                                  Create the data directory and DB
 *   config show [--json]                  Show resolved configuration
 *   new-session --user [--title]          Create an empty session
 *   list-sessions --user                  List sessions, newest first
 *   history --user --session [--decrypt]  Show a session's messages
 *   rename-session --user --session --title
 *   delete-session --user --session       Delete a session and its messages
 *   verify-session --user --session       Recompute stored content hashes
 *   chat --user --message [--session]     Send one encrypted turn
 */

import { createLogger } from "../logging.js";
import { resolveConfig } from "./config.js";
import {
  cmdInit,
  cmdConfigShow,
  cmdNewSession,
  cmdListSessions,
  cmdHistory,
  cmdRenameSession,
  cmdDeleteSession,
  cmdVerifySession,
  cmdChat,
} from "./commands.js";
import { parseArgs } from "./args.js";

// ---------------------------------------------------------------------------
// Usage
// ---------------------------------------------------------------------------

const USAGE = `chatvault: encrypted conversation store

Usage:
  chatvault init
  chatvault config show [--json]
  chatvault new-session --user <id> [--title <text>] [--json]
  chatvault list-sessions --user <id> [--limit <n>] [--offset <n>] [--json]
  chatvault history --user <id> --session <id> [--decrypt] [--json]
  chatvault rename-session --user <id> --session <id> --title <text>
  chatvault delete-session --user <id> --session <id>
  chatvault verify-session --user <id> --session <id> [--json]
  chatvault chat --user <id> --message <text> [--session <id>] [--key-id <id>] [--json]

Environment:
  CHATVAULT_DB_PATH                Override SQLite database path
  CHATVAULT_KEYRING                YAML key ring (keys: { <id>: <base64> })
  CHATVAULT_GENERATION_URL         Generation backend endpoint
  CHATVAULT_GENERATION_TIMEOUT_MS  Generation request timeout
  CHATVAULT_MAX_TOKENS             max_tokens sent to the backend
  LOG_LEVEL                        pino log level (default info)
`;

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<number> {
  const raw = process.argv.slice(2);
  if (raw.length === 0) {
    process.stderr.write(USAGE);
    return 1;
  }

  const { command, rest, flags } = parseArgs(raw);
  const json = flags.has("json");

  if (flags.has("help") || command === "help") {
    process.stdout.write(USAGE);
    return 0;
  }

  const config = resolveConfig();
  const logger = createLogger("chatvault");

  switch (command) {
    case "init":
      return cmdInit(config, logger);

    case "config":
      if (rest[0] === "show") {
        return cmdConfigShow(config, json);
      }
      process.stderr.write("Unknown config subcommand. Use: config show\n");
      return 1;

    case "new-session":
      return cmdNewSession(flags, config, logger, json);

    case "list-sessions":
      return cmdListSessions(flags, config, logger, json);

    case "history":
      return cmdHistory(flags, config, logger, json);

    case "rename-session":
      return cmdRenameSession(flags, config, logger);

    case "delete-session":
      return cmdDeleteSession(flags, config, logger);

    case "verify-session":
      return cmdVerifySession(flags, config, logger, json);

    case "chat":
      return cmdChat(flags, config, logger, json);

    default:
      process.stderr.write(`Unknown command: ${command}\n\n${USAGE}`);
      return 1;
  }
}

main().then(
  (code) => process.exit(code),
  (e: unknown) => {
    process.stderr.write(`Fatal: ${e instanceof Error ? e.message : String(e)}\n`);
    process.exit(2);
  },
);
