/**
 * CLI command implementations.
 *
 * Every function:
 *   - accepts parsed flags and the resolved config
 *   - calls library code (no business logic here)
 *   - writes to stdout / stderr
 *   - resolves to an exit code (0 = success, 1 = error)
 */

import { EncryptionCodec } from "../codec/codec.js";
import { StaticKeyProvider, loadKeyRing, DEFAULT_APP_KEY_ID } from "../codec/key-provider.js";
import { AES_256_GCM, parseEncryptionMetadata, toWireMetadata } from "../codec/metadata.js";
import { decodeBase64, encodeBase64 } from "../codec/base64.js";
import type { ChatTurnRequestWire } from "../contracts/schemas.js";
import { ChatVaultError, ValidationError } from "../errors.js";
import { computeContentHash } from "../integrity/hashing.js";
import type { Logger } from "../logging.js";
import { ChatPipeline } from "../pipeline/chat-pipeline.js";
import { HttpGenerationBackend } from "../pipeline/generation.js";
import { SqliteSessionStore } from "../store/sqlite-store.js";
import { type ChatVaultConfig, ensureDataDirs } from "./config.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export type Flags = Map<string, string>;

/** Bad invocation: reported as a plain `error:` line, exit code 1. */
class UsageError extends Error {}

function err(msg: string): void {
  process.stderr.write(`error: ${msg}\n`);
}

function out(msg: string): void {
  process.stdout.write(`${msg}\n`);
}

function outJson(value: unknown): void {
  out(JSON.stringify(value, null, 2));
}

function requireFlag(flags: Flags, name: string): string {
  const value = flags.get(name);
  if (value === undefined || value === "") {
    throw new UsageError(`missing required flag: --${name}`);
  }
  return value;
}

function intFlag(flags: Flags, name: string): number | undefined {
  const v = flags.get(name);
  if (v === undefined) return undefined;
  const n = Number(v);
  if (!Number.isInteger(n)) {
    throw new ValidationError(`--${name} must be an integer`, "INVALID_PAGINATION", {
      [name]: v,
    });
  }
  return n;
}

/**
 * Run a command body, turning usage and library errors into an `error:`
 * line and exit code 1. Anything else propagates to the entry point.
 */
async function guarded(body: () => Promise<number>): Promise<number> {
  try {
    return await body();
  } catch (e: unknown) {
    if (e instanceof UsageError) {
      err(e.message);
      return 1;
    }
    if (e instanceof ChatVaultError) {
      err(`${e.code}: ${e.message}`);
      return 1;
    }
    throw e;
  }
}

async function withStore<T>(
  config: ChatVaultConfig,
  logger: Logger,
  fn: (store: SqliteSessionStore) => Promise<T>,
): Promise<T> {
  ensureDataDirs(config);
  const store = new SqliteSessionStore(config.dbPath, { logger });
  try {
    return await fn(store);
  } finally {
    store.close();
  }
}

function buildCodec(config: ChatVaultConfig, logger: Logger): EncryptionCodec {
  const keys = config.keyRingPath
    ? loadKeyRing(config.keyRingPath, logger)
    : new StaticKeyProvider(undefined, { logger });
  return new EncryptionCodec(keys);
}

// ---------------------------------------------------------------------------
// init / config show
// ---------------------------------------------------------------------------

export async function cmdInit(config: ChatVaultConfig, logger: Logger): Promise<number> {
  await withStore(config, logger, async () => undefined);
  out(`Initialized chatvault at ${config.baseDir}`);
  out(`  DB:       ${config.dbPath}`);
  out(`  Key ring: ${config.keyRingPath ?? "(built-in)"}`);
  return 0;
}

export function cmdConfigShow(config: ChatVaultConfig, json: boolean): number {
  if (json) {
    outJson(config);
  } else {
    out(`baseDir:             ${config.baseDir}`);
    out(`dbPath:              ${config.dbPath}`);
    out(`keyRingPath:         ${config.keyRingPath ?? "(built-in)"}`);
    out(`generationUrl:       ${config.generationUrl}`);
    out(`generationTimeoutMs: ${config.generationTimeoutMs}`);
    out(`maxTokens:           ${config.maxTokens}`);
  }
  return 0;
}

// ---------------------------------------------------------------------------
// Sessions
// ---------------------------------------------------------------------------

export function cmdNewSession(
  flags: Flags,
  config: ChatVaultConfig,
  logger: Logger,
  json: boolean,
): Promise<number> {
  return guarded(async () => {
    const user = requireFlag(flags, "user");
    const session = await withStore(config, logger, (store) =>
      store.createSession(user, flags.get("title")),
    );
    if (json) {
      outJson(session);
    } else {
      out(session.sessionId);
    }
    return 0;
  });
}

export function cmdListSessions(
  flags: Flags,
  config: ChatVaultConfig,
  logger: Logger,
  json: boolean,
): Promise<number> {
  return guarded(async () => {
    const user = requireFlag(flags, "user");
    const sessions = await withStore(config, logger, (store) =>
      store.listSessions(user, {
        limit: intFlag(flags, "limit"),
        offset: intFlag(flags, "offset"),
      }),
    );
    if (json) {
      outJson(sessions);
      return 0;
    }
    if (sessions.length === 0) {
      out("No sessions.");
      return 0;
    }
    for (const s of sessions) {
      out(`${s.sessionId}  ${s.updatedAt}  ${s.messageCount} msg  ${s.title}`);
    }
    return 0;
  });
}

export function cmdRenameSession(
  flags: Flags,
  config: ChatVaultConfig,
  logger: Logger,
): Promise<number> {
  return guarded(async () => {
    const user = requireFlag(flags, "user");
    const session = requireFlag(flags, "session");
    const title = requireFlag(flags, "title");
    const ok = await withStore(config, logger, (store) =>
      store.updateTitle(session, user, title),
    );
    if (!ok) {
      err("session not found or access denied");
      return 1;
    }
    out(`Renamed ${session}`);
    return 0;
  });
}

export function cmdDeleteSession(
  flags: Flags,
  config: ChatVaultConfig,
  logger: Logger,
): Promise<number> {
  return guarded(async () => {
    const user = requireFlag(flags, "user");
    const session = requireFlag(flags, "session");
    const ok = await withStore(config, logger, (store) =>
      store.deleteSession(session, user),
    );
    if (!ok) {
      err("session not found or access denied");
      return 1;
    }
    out(`Deleted ${session}`);
    return 0;
  });
}

export function cmdVerifySession(
  flags: Flags,
  config: ChatVaultConfig,
  logger: Logger,
  json: boolean,
): Promise<number> {
  return guarded(async () => {
    const user = requireFlag(flags, "user");
    const session = requireFlag(flags, "session");
    const result = await withStore(config, logger, (store) =>
      store.verifySession(session, user),
    );
    if (json) {
      outJson(result);
    } else if (result.valid) {
      out(`OK: ${result.messageCount} messages verified`);
    } else {
      out(`FAILED: ${result.failures.length} problem(s) in ${result.messageCount} messages`);
      for (const f of result.failures) {
        out(`  seq ${f.seq} (${f.messageId}): ${f.reason}`);
      }
    }
    return result.valid ? 0 : 1;
  });
}

// ---------------------------------------------------------------------------
// History / chat
// ---------------------------------------------------------------------------

export function cmdHistory(
  flags: Flags,
  config: ChatVaultConfig,
  logger: Logger,
  json: boolean,
): Promise<number> {
  return guarded(async () => {
    const user = requireFlag(flags, "user");
    const session = requireFlag(flags, "session");
    const decrypt = flags.has("decrypt");

    return withStore(config, logger, async (store) => {
      const pipeline = new ChatPipeline(
        store,
        buildCodec(config, logger),
        new HttpGenerationBackend({
          url: config.generationUrl,
          timeoutMs: config.generationTimeoutMs,
        }),
        { maxTokens: config.maxTokens, logger },
      );

      if (!decrypt) {
        const entries = await pipeline.getHistory(user, session);
        if (json) {
          outJson(entries);
        } else {
          for (const e of entries) {
            out(`${e.created_at}  ${e.sender_type.padEnd(4)}  ${e.content_hash}`);
          }
        }
        return 0;
      }

      const turns = await pipeline.readTranscript(user, session);
      if (json) {
        outJson(turns);
      } else {
        for (const t of turns) {
          out(`[${t.role}] ${t.content}`);
        }
      }
      return 0;
    });
  });
}

/**
 * Client-side round trip: encrypt `--message` with the configured key ring,
 * run a turn, decrypt and print the reply.
 */
export function cmdChat(
  flags: Flags,
  config: ChatVaultConfig,
  logger: Logger,
  json: boolean,
): Promise<number> {
  return guarded(async () => {
    const user = requireFlag(flags, "user");
    const message = requireFlag(flags, "message");
    const keyId = flags.get("key-id") ?? DEFAULT_APP_KEY_ID;
    const codec = buildCodec(config, logger);

    const sealed = codec.encrypt(message, {
      algorithm: AES_256_GCM,
      keyId,
      iv: "",
      createdAt: new Date().toISOString(),
    });
    const request: ChatTurnRequestWire = {
      encrypted_message: encodeBase64(sealed.ciphertext),
      encryption_metadata: { ...toWireMetadata(sealed.metadata) },
      content_hash: computeContentHash(sealed.ciphertext),
      session_id: flags.get("session"),
    };

    return withStore(config, logger, async (store) => {
      const pipeline = new ChatPipeline(
        store,
        codec,
        new HttpGenerationBackend({
          url: config.generationUrl,
          timeoutMs: config.generationTimeoutMs,
        }),
        { maxTokens: config.maxTokens, logger },
      );
      const response = await pipeline.handleTurn(user, request);

      const ciphertext = decodeBase64(response.encrypted_response);
      if (ciphertext === null) {
        err("response ciphertext is not valid base64");
        return 1;
      }
      const reply = codec.decrypt(
        ciphertext,
        parseEncryptionMetadata(response.encryption_metadata),
      );

      if (json) {
        outJson({ session_id: response.session_id, reply, sources: response.sources });
      } else {
        out(`session: ${response.session_id}`);
        out(reply);
        for (const source of response.sources) {
          out(`  source: ${source}`);
        }
      }
      return 0;
    });
  });
}
