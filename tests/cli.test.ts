/**
 * CLI command tests.
 *
 * Each test calls the cmd* functions directly against a temp directory
 * (resolveConfig with an explicit env and base dir) and asserts exit codes
 * and output lines. The generation backend is a stubbed global fetch.
 */

import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { tmpdir } from "node:os";
import Database from "better-sqlite3";
import {
  cmdChat,
  cmdConfigShow,
  cmdDeleteSession,
  cmdHistory,
  cmdInit,
  cmdListSessions,
  cmdNewSession,
  cmdRenameSession,
  cmdVerifySession,
} from "../src/cli/commands.js";
import { parseArgs } from "../src/cli/args.js";
import {
  DEFAULT_GENERATION_URL,
  resolveConfig,
  type ChatVaultConfig,
} from "../src/cli/config.js";
import { ValidationError } from "../src/errors.js";
import { silentLogger } from "../src/logging.js";
import { USER_A, USER_B } from "./fixtures.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const logger = silentLogger();

let tempDir: string;
let config: ChatVaultConfig;
let stdout: string[];
let stderr: string[];

function flags(entries: Record<string, string>): Map<string, string> {
  return new Map(Object.entries(entries));
}

function stdoutLines(): string[] {
  return stdout.join("").split("\n").filter((l) => l.length > 0);
}

function resetOutput(): void {
  stdout.length = 0;
  stderr.length = 0;
}

function stubGeneration(answer: string, sources: string[] = []) {
  const fetchStub = vi.fn<typeof fetch>(
    async () =>
      new Response(
        JSON.stringify({ answer, sources: sources.map((source) => ({ metadata: { source } })) }),
        { status: 200, headers: { "Content-Type": "application/json" } },
      ),
  );
  vi.stubGlobal("fetch", fetchStub);
  return fetchStub;
}

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), "chatvault-cli-"));
  config = resolveConfig({ CHATVAULT_MAX_TOKENS: "99" }, tempDir);
  stdout = [];
  stderr = [];
  vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
    stdout.push(String(chunk));
    return true;
  });
  vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
    stderr.push(String(chunk));
    return true;
  });
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllGlobals();
  rmSync(tempDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

describe("resolveConfig", () => {
  test("uses defaults under the base dir", () => {
    expect(resolveConfig({}, tempDir)).toEqual({
      baseDir: tempDir,
      dbPath: resolve(join(tempDir, "db.sqlite")),
      keyRingPath: null,
      generationUrl: DEFAULT_GENERATION_URL,
      generationTimeoutMs: 30_000,
      maxTokens: 512,
    });
  });

  test("reads overrides from the environment", () => {
    const resolved = resolveConfig(
      {
        CHATVAULT_DB_PATH: join(tempDir, "elsewhere", "chat.db"),
        CHATVAULT_GENERATION_URL: "http://generation.test/generate",
        CHATVAULT_GENERATION_TIMEOUT_MS: "1500",
      },
      tempDir,
    );
    expect(resolved.dbPath).toBe(resolve(join(tempDir, "elsewhere", "chat.db")));
    expect(resolved.generationUrl).toBe("http://generation.test/generate");
    expect(resolved.generationTimeoutMs).toBe(1500);
  });

  test("picks up keys.yaml in the base dir", () => {
    writeFileSync(join(tempDir, "keys.yaml"), "keys: {}\n", "utf8");
    expect(resolveConfig({}, tempDir).keyRingPath).toBe(join(tempDir, "keys.yaml"));
  });

  test("rejects invalid values", () => {
    expect(() => resolveConfig({ CHATVAULT_MAX_TOKENS: "lots" }, tempDir)).toThrow(
      ValidationError,
    );
    expect(() => resolveConfig({ CHATVAULT_GENERATION_URL: "not a url" }, tempDir)).toThrow(
      ValidationError,
    );
  });
});

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

describe("parseArgs", () => {
  test("splits the command, operands and valued flags", () => {
    const parsed = parseArgs(["config", "show", "--user", USER_A, "--limit", "5"]);
    expect(parsed.command).toBe("config");
    expect(parsed.rest).toEqual(["show"]);
    expect([...parsed.flags]).toEqual([
      ["user", USER_A],
      ["limit", "5"],
    ]);
  });

  test("stores a flag without a value as true", () => {
    const parsed = parseArgs(["history", "--decrypt", "--json"]);
    expect(parsed.command).toBe("history");
    expect(parsed.flags.get("decrypt")).toBe("true");
    expect(parsed.flags.get("json")).toBe("true");
  });

  test("has no command for empty argv", () => {
    expect(parseArgs([])).toEqual({ command: undefined, rest: [], flags: new Map() });
  });
});

// ---------------------------------------------------------------------------
// init / config show
// ---------------------------------------------------------------------------

describe("init / config show", () => {
  test("init creates the database", async () => {
    expect(await cmdInit(config, logger)).toBe(0);
    expect(existsSync(config.dbPath)).toBe(true);
    expect(stdoutLines()[0]).toBe(`Initialized chatvault at ${tempDir}`);
  });

  test("config show --json prints the resolved config", () => {
    expect(cmdConfigShow(config, true)).toBe(0);
    expect(JSON.parse(stdout.join(""))).toEqual(config);
  });
});

// ---------------------------------------------------------------------------
// Sessions
// ---------------------------------------------------------------------------

describe("session commands", () => {
  test("new-session requires --user", async () => {
    expect(await cmdNewSession(flags({}), config, logger, false)).toBe(1);
    expect(stderr.join("")).toBe("error: missing required flag: --user\n");
  });

  test("reports the first missing flag once and stops", async () => {
    expect(await cmdRenameSession(flags({ user: USER_A }), config, logger)).toBe(1);
    expect(stderr.join("")).toBe("error: missing required flag: --session\n");
    expect(stdout).toEqual([]);
  });

  test("treats an empty flag value as missing", async () => {
    expect(await cmdListSessions(flags({ user: "" }), config, logger, false)).toBe(1);
    expect(stderr.join("")).toBe("error: missing required flag: --user\n");
  });

  test("new-session reports invalid ids as errors", async () => {
    expect(await cmdNewSession(flags({ user: "alice" }), config, logger, false)).toBe(1);
    expect(stderr.join("")).toBe("error: INVALID_ID: Invalid ownerId (must be UUID): alice\n");
  });

  test("new-session then list-sessions", async () => {
    expect(
      await cmdNewSession(flags({ user: USER_A, title: "Trip" }), config, logger, false),
    ).toBe(0);
    const [sessionId] = stdoutLines();
    expect(sessionId).toMatch(/^[0-9a-f-]{36}$/);
    resetOutput();

    expect(await cmdListSessions(flags({ user: USER_A }), config, logger, false)).toBe(0);
    const lines = stdoutLines();
    expect(lines).toHaveLength(1);
    expect(lines[0]?.startsWith(`${sessionId}  `)).toBe(true);
    expect(lines[0]?.endsWith("  0 msg  Trip")).toBe(true);
  });

  test("list-sessions with no sessions", async () => {
    expect(await cmdListSessions(flags({ user: USER_B }), config, logger, false)).toBe(0);
    expect(stdout.join("")).toBe("No sessions.\n");
  });

  test("list-sessions rejects a non-integer limit", async () => {
    expect(
      await cmdListSessions(flags({ user: USER_A, limit: "ten" }), config, logger, false),
    ).toBe(1);
    expect(stderr.join("")).toBe("error: INVALID_PAGINATION: --limit must be an integer\n");
  });

  test("rename-session and delete-session are owner-scoped", async () => {
    await cmdNewSession(flags({ user: USER_A }), config, logger, false);
    const [sessionId = ""] = stdoutLines();
    resetOutput();

    expect(
      await cmdRenameSession(
        flags({ user: USER_B, session: sessionId, title: "Hijacked" }),
        config,
        logger,
      ),
    ).toBe(1);
    expect(stderr.join("")).toBe("error: session not found or access denied\n");
    resetOutput();

    expect(
      await cmdRenameSession(
        flags({ user: USER_A, session: sessionId, title: "Renamed" }),
        config,
        logger,
      ),
    ).toBe(0);
    expect(stdout.join("")).toBe(`Renamed ${sessionId}\n`);
    resetOutput();

    expect(
      await cmdDeleteSession(flags({ user: USER_B, session: sessionId }), config, logger),
    ).toBe(1);
    expect(
      await cmdDeleteSession(flags({ user: USER_A, session: sessionId }), config, logger),
    ).toBe(0);
    expect(stdout.join("")).toBe(`Deleted ${sessionId}\n`);
  });
});

// ---------------------------------------------------------------------------
// chat / history / verify
// ---------------------------------------------------------------------------

describe("chat", () => {
  test("sends an encrypted turn and prints the reply", async () => {
    const fetchStub = stubGeneration("hello back", ["kb.md"]);

    expect(await cmdChat(flags({ user: USER_A, message: "hello" }), config, logger, false)).toBe(
      0,
    );

    const lines = stdoutLines();
    expect(lines[0]).toMatch(/^session: [0-9a-f-]{36}$/);
    expect(lines.slice(1)).toEqual(["hello back", "  source: kb.md"]);

    expect(fetchStub).toHaveBeenCalledTimes(1);
    const [input, init] = fetchStub.mock.calls[0] ?? [];
    expect(input).toBe(DEFAULT_GENERATION_URL);
    expect(JSON.parse(String(init?.body))).toEqual({
      query: "hello",
      history: [],
      max_tokens: 99,
    });
  });

  test("prints the fallback reply when the backend fails", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn<typeof fetch>(async () => new Response("unavailable", { status: 503 })),
    );

    expect(await cmdChat(flags({ user: USER_A, message: "hello" }), config, logger, true)).toBe(
      0,
    );
    const output: unknown = JSON.parse(stdout.join(""));
    expect(output).toMatchObject({
      reply:
        "I'm having trouble reaching my knowledge base right now. Please try again in a moment.",
      sources: [],
    });
  });

  test("history, decrypted history and verify after a turn", async () => {
    stubGeneration("hello back");
    await cmdChat(flags({ user: USER_A, message: "hello", "key-id": "client_app_key" }), config, logger, true);
    const chat: unknown = JSON.parse(stdout.join(""));
    const sessionId =
      typeof chat === "object" && chat !== null && "session_id" in chat
        ? String(chat.session_id)
        : "";
    resetOutput();

    expect(
      await cmdHistory(flags({ user: USER_A, session: sessionId, decrypt: "true" }), config, logger, false),
    ).toBe(0);
    expect(stdoutLines()).toEqual(["[user] hello", "[bot] hello back"]);
    resetOutput();

    expect(
      await cmdHistory(flags({ user: USER_A, session: sessionId }), config, logger, false),
    ).toBe(0);
    const rows = stdoutLines();
    expect(rows).toHaveLength(2);
    expect(rows[0]).toMatch(/ {2}user {2}[0-9a-f]{64}$/);
    expect(rows[1]).toMatch(/ {2}bot {3}[0-9a-f]{64}$/);
    resetOutput();

    expect(
      await cmdVerifySession(flags({ user: USER_A, session: sessionId }), config, logger, false),
    ).toBe(0);
    expect(stdout.join("")).toBe("OK: 2 messages verified\n");
    resetOutput();

    expect(
      await cmdHistory(flags({ user: USER_B, session: sessionId }), config, logger, false),
    ).toBe(1);
    expect(stderr.join("")).toBe("error: ACCESS_DENIED: Session not found or access denied\n");
  });

  test("history fails with an integrity error on corrupt message data", async () => {
    stubGeneration("hello back", ["kb.md"]);
    await cmdChat(flags({ user: USER_A, message: "hello" }), config, logger, false);
    const sessionId = (stdoutLines()[0] ?? "").replace("session: ", "");
    resetOutput();

    const raw = new Database(config.dbPath);
    raw.prepare("UPDATE messages SET message_data = '{bad' WHERE role = 'bot'").run();
    raw.close();

    expect(
      await cmdHistory(flags({ user: USER_A, session: sessionId }), config, logger, false),
    ).toBe(1);
    expect(stderr.join("")).toBe("error: MESSAGE_DATA_CORRUPT: Stored message data is corrupt\n");
  });

  test("verify-session reports tampered messages", async () => {
    stubGeneration("hello back");
    await cmdChat(flags({ user: USER_A, message: "hello" }), config, logger, false);
    const sessionId = (stdoutLines()[0] ?? "").replace("session: ", "");
    resetOutput();

    const raw = new Database(config.dbPath);
    const bot = raw
      .prepare<[], { seq: number; message_id: string }>(
        "SELECT seq, message_id FROM messages WHERE role = 'bot'",
      )
      .get();
    raw.prepare("UPDATE messages SET ciphertext = ? WHERE role = 'bot'").run(Buffer.from("forged"));
    raw.close();

    expect(
      await cmdVerifySession(flags({ user: USER_A, session: sessionId }), config, logger, false),
    ).toBe(1);
    expect(stdoutLines()).toEqual([
      "FAILED: 1 problem(s) in 2 messages",
      `  seq ${bot?.seq ?? -1} (${bot?.message_id ?? ""}): hash_mismatch`,
    ]);
  });
});
