/**
 * SQLite-backed session store.
 *
 * Schema:
 *   - `sessions` (session_id, owner_id, title, session_data, session_metadata,
 *                 created_at, updated_at)
 *   - `messages` (seq, message_id, session_id, role, ciphertext,
 *                 metadata_json, content_hash, message_data, created_at)
 *
 * Invariants enforced at write time:
 *   1. Every statement that touches a session filters on owner_id; the
 *      ownership check and the write share one transaction.
 *   2. content_hash matches SHA-256(ciphertext) for every inserted message.
 *      Rows that no longer parse (metadata_json, message_data) surface as
 *      IntegrityError on read.
 *   3. Messages are insert-only; `seq` (AUTOINCREMENT) fixes their order.
 *   4. Deleting a session cascades to its messages (foreign_keys = ON).
 *   5. A derived title replaces only the default title, and only on the
 *      session's first user message.
 */

import Database from "better-sqlite3";
import { v4 as uuidv4 } from "uuid";
import {
  parseEncryptionMetadata,
  toWireMetadata,
  type EncryptionMetadata,
} from "../codec/metadata.js";
import { AccessDeniedError, IntegrityError } from "../errors.js";
import { assertContentHash, computeContentHash } from "../integrity/hashing.js";
import { silentLogger, type Logger } from "../logging.js";
import {
  DEFAULT_SESSION_TITLE,
  type ListSessionsOptions,
  type MessageDraft,
  type MessageRole,
  type MessageVerificationFailure,
  type Session,
  type SessionData,
  type SessionStore,
  type SessionSummary,
  type SessionVerificationResult,
  type StoredMessage,
} from "./types.js";
import {
  assertId,
  normalizePagination,
  normalizeTitle,
} from "./validation.js";

// ---------------------------------------------------------------------------
// Internal row shapes (match SQLite column names)
// ---------------------------------------------------------------------------

interface SessionRow {
  session_id: string;
  owner_id: string;
  title: string;
  created_at: string;
  updated_at: string;
}

interface SessionSummaryRow extends SessionRow {
  message_count: number;
}

interface SessionDataRow {
  session_data: Buffer | null;
  session_metadata: string | null;
}

interface MessageRow {
  seq: number;
  message_id: string;
  session_id: string;
  role: MessageRole;
  ciphertext: Buffer;
  metadata_json: string;
  content_hash: string;
  message_data: string | null;
  created_at: string;
}

// ---------------------------------------------------------------------------
// Row ↔ domain conversion
// ---------------------------------------------------------------------------

function rowToSession(row: SessionRow): Session {
  return {
    sessionId: row.session_id,
    ownerId: row.owner_id,
    title: row.title,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseStoredMetadata(
  json: string,
  context: Record<string, unknown>,
): EncryptionMetadata {
  try {
    return parseEncryptionMetadata(JSON.parse(json));
  } catch (err: unknown) {
    throw new IntegrityError("Stored encryption metadata is corrupt", "METADATA_CORRUPT", {
      ...context,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

function parseMessageData(
  json: string | null,
  context: Record<string, unknown>,
): Record<string, unknown> | null {
  if (json === null) return null;
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (err: unknown) {
    throw new IntegrityError("Stored message data is corrupt", "MESSAGE_DATA_CORRUPT", {
      ...context,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  if (!isRecord(value)) {
    throw new IntegrityError("Stored message data is corrupt", "MESSAGE_DATA_CORRUPT", {
      ...context,
      cause: "message_data is not a JSON object",
    });
  }
  return value;
}

function rowToMessage(row: MessageRow): StoredMessage {
  return {
    messageId: row.message_id,
    sessionId: row.session_id,
    seq: row.seq,
    role: row.role,
    ciphertext: row.ciphertext,
    metadata: parseStoredMetadata(row.metadata_json, {
      messageId: row.message_id,
    }),
    contentHash: row.content_hash,
    messageData: parseMessageData(row.message_data, {
      messageId: row.message_id,
    }),
    createdAt: row.created_at,
  };
}

// ---------------------------------------------------------------------------
// DDL
// ---------------------------------------------------------------------------

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS sessions (
  session_id        TEXT PRIMARY KEY,
  owner_id          TEXT NOT NULL,
  title             TEXT NOT NULL,
  session_data      BLOB,
  session_metadata  TEXT,
  created_at        TEXT NOT NULL,
  updated_at        TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS messages (
  seq            INTEGER PRIMARY KEY AUTOINCREMENT,
  message_id     TEXT    NOT NULL UNIQUE,
  session_id     TEXT    NOT NULL REFERENCES sessions(session_id) ON DELETE CASCADE,
  role           TEXT    NOT NULL CHECK (role IN ('user', 'bot')),
  ciphertext     BLOB    NOT NULL,
  metadata_json  TEXT    NOT NULL,
  content_hash   TEXT    NOT NULL,
  message_data   TEXT,
  created_at     TEXT    NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_sessions_owner ON sessions(owner_id, updated_at);
CREATE INDEX IF NOT EXISTS idx_messages_session ON messages(session_id, seq);
`;

const SESSION_COLUMNS = "session_id, owner_id, title, created_at, updated_at";

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export interface SqliteSessionStoreOptions {
  /** Clock for created_at / updated_at. */
  now?: () => Date;
  logger?: Logger;
}

export class SqliteSessionStore implements SessionStore {
  private readonly db: Database.Database;
  private readonly now: () => Date;
  private readonly log: Logger;

  private readonly stmtInsertSession: Database.Statement<
    [string, string, string, string, string]
  >;
  private readonly stmtOwnedSession: Database.Statement<[string, string], SessionRow>;
  private readonly stmtListSessions: Database.Statement<
    [string, number, number],
    SessionSummaryRow
  >;
  private readonly stmtDeleteSession: Database.Statement<[string, string]>;
  private readonly stmtUpdateTitle: Database.Statement<[string, string, string, string]>;
  private readonly stmtTouchSession: Database.Statement<[string, string]>;
  private readonly stmtHasUserMessage: Database.Statement<[string], { found: number }>;
  private readonly stmtInsertMessage: Database.Statement<
    [string, string, MessageRole, Buffer, string, string, string | null, string]
  >;
  private readonly stmtMessageBySeq: Database.Statement<[number | bigint], MessageRow>;
  private readonly stmtMessagesBySession: Database.Statement<[string], MessageRow>;
  private readonly stmtSetSessionData: Database.Statement<
    [Buffer, string, string, string, string]
  >;
  private readonly stmtGetSessionData: Database.Statement<
    [string, string],
    SessionDataRow
  >;

  private readonly txnAppend: (
    sessionId: string,
    ownerId: string,
    draft: MessageDraft,
  ) => StoredMessage;
  private readonly txnListMessages: (
    sessionId: string,
    ownerId: string,
  ) => MessageRow[];

  constructor(dbPath: string, options: SqliteSessionStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? silentLogger();

    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA_SQL);

    // Prepared statements -------------------------------------------------
    this.stmtInsertSession = this.db.prepare<
      [string, string, string, string, string]
    >(
      `INSERT INTO sessions (session_id, owner_id, title, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?)`,
    );

    this.stmtOwnedSession = this.db.prepare<[string, string], SessionRow>(
      `SELECT ${SESSION_COLUMNS} FROM sessions WHERE session_id = ? AND owner_id = ?`,
    );

    this.stmtListSessions = this.db.prepare<
      [string, number, number],
      SessionSummaryRow
    >(
      `SELECT s.session_id, s.owner_id, s.title, s.created_at, s.updated_at,
              COUNT(m.seq) AS message_count
         FROM sessions s
         LEFT JOIN messages m ON m.session_id = s.session_id
        WHERE s.owner_id = ?
        GROUP BY s.session_id
        ORDER BY s.updated_at DESC, s.rowid DESC
        LIMIT ? OFFSET ?`,
    );

    this.stmtDeleteSession = this.db.prepare<[string, string]>(
      "DELETE FROM sessions WHERE session_id = ? AND owner_id = ?",
    );

    this.stmtUpdateTitle = this.db.prepare<[string, string, string, string]>(
      `UPDATE sessions SET title = ?, updated_at = ?
        WHERE session_id = ? AND owner_id = ?`,
    );

    this.stmtTouchSession = this.db.prepare<[string, string]>(
      "UPDATE sessions SET updated_at = ? WHERE session_id = ?",
    );

    this.stmtHasUserMessage = this.db.prepare<[string], { found: number }>(
      "SELECT 1 AS found FROM messages WHERE session_id = ? AND role = 'user' LIMIT 1",
    );

    this.stmtInsertMessage = this.db.prepare<
      [string, string, MessageRole, Buffer, string, string, string | null, string]
    >(
      `INSERT INTO messages
         (message_id, session_id, role, ciphertext, metadata_json,
          content_hash, message_data, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    );

    this.stmtMessageBySeq = this.db.prepare<[number | bigint], MessageRow>(
      "SELECT * FROM messages WHERE seq = ?",
    );

    this.stmtMessagesBySession = this.db.prepare<[string], MessageRow>(
      "SELECT * FROM messages WHERE session_id = ? ORDER BY seq ASC",
    );

    this.stmtSetSessionData = this.db.prepare<
      [Buffer, string, string, string, string]
    >(
      `UPDATE sessions SET session_data = ?, session_metadata = ?, updated_at = ?
        WHERE session_id = ? AND owner_id = ?`,
    );

    this.stmtGetSessionData = this.db.prepare<[string, string], SessionDataRow>(
      `SELECT session_data, session_metadata FROM sessions
        WHERE session_id = ? AND owner_id = ?`,
    );

    // Transactions --------------------------------------------------------
    this.txnAppend = this.db.transaction(
      (sessionId: string, ownerId: string, draft: MessageDraft): StoredMessage => {
        // 1. Ownership
        const session = this.stmtOwnedSession.get(sessionId, ownerId);
        if (!session) {
          throw new AccessDeniedError(sessionId);
        }

        // 2. Integrity of the ciphertext being written
        assertContentHash(draft.ciphertext, draft.contentHash, { sessionId });

        // 3. Title derivation decision, made before the insert
        const ts = this.now().toISOString();
        const applyTitle =
          draft.role === "user" &&
          draft.derivedTitle !== undefined &&
          draft.derivedTitle.trim().length > 0 &&
          session.title === DEFAULT_SESSION_TITLE &&
          this.stmtHasUserMessage.get(sessionId) === undefined;

        // 4. Insert
        const result = this.stmtInsertMessage.run(
          uuidv4(),
          sessionId,
          draft.role,
          draft.ciphertext,
          JSON.stringify(toWireMetadata(draft.metadata)),
          draft.contentHash.toLowerCase(),
          draft.messageData ? JSON.stringify(draft.messageData) : null,
          ts,
        );

        // 5. Session bookkeeping
        if (applyTitle && draft.derivedTitle !== undefined) {
          this.stmtUpdateTitle.run(
            normalizeTitle(draft.derivedTitle),
            ts,
            sessionId,
            ownerId,
          );
        } else {
          this.stmtTouchSession.run(ts, sessionId);
        }

        const row = this.stmtMessageBySeq.get(result.lastInsertRowid);
        if (!row) {
          throw new Error(`Inserted message not found: seq ${String(result.lastInsertRowid)}`);
        }
        return rowToMessage(row);
      },
    );

    this.txnListMessages = this.db.transaction(
      (sessionId: string, ownerId: string): MessageRow[] => {
        if (!this.stmtOwnedSession.get(sessionId, ownerId)) {
          throw new AccessDeniedError(sessionId);
        }
        return this.stmtMessagesBySession.all(sessionId);
      },
    );
  }

  // -----------------------------------------------------------------------
  // Sessions
  // -----------------------------------------------------------------------

  async createSession(ownerId: string, title?: string): Promise<Session> {
    assertId(ownerId, "ownerId");
    const finalTitle =
      title === undefined || title.trim() === ""
        ? DEFAULT_SESSION_TITLE
        : normalizeTitle(title);
    const ts = this.now().toISOString();
    const session: Session = {
      sessionId: uuidv4(),
      ownerId,
      title: finalTitle,
      createdAt: ts,
      updatedAt: ts,
    };
    this.stmtInsertSession.run(
      session.sessionId,
      ownerId,
      finalTitle,
      ts,
      ts,
    );
    this.log.debug({ sessionId: session.sessionId }, "session created");
    return session;
  }

  async getSession(sessionId: string, ownerId: string): Promise<Session | undefined> {
    assertId(sessionId, "sessionId");
    assertId(ownerId, "ownerId");
    const row = this.stmtOwnedSession.get(sessionId, ownerId);
    return row ? rowToSession(row) : undefined;
  }

  async listSessions(
    ownerId: string,
    options: ListSessionsOptions = {},
  ): Promise<SessionSummary[]> {
    assertId(ownerId, "ownerId");
    const { limit, offset } = normalizePagination(options);
    return this.stmtListSessions.all(ownerId, limit, offset).map((row) => ({
      ...rowToSession(row),
      messageCount: row.message_count,
    }));
  }

  async deleteSession(sessionId: string, ownerId: string): Promise<boolean> {
    assertId(sessionId, "sessionId");
    assertId(ownerId, "ownerId");
    const { changes } = this.stmtDeleteSession.run(sessionId, ownerId);
    if (changes > 0) {
      this.log.info({ sessionId }, "session deleted");
    }
    return changes > 0;
  }

  async updateTitle(
    sessionId: string,
    ownerId: string,
    title: string,
  ): Promise<boolean> {
    assertId(sessionId, "sessionId");
    assertId(ownerId, "ownerId");
    const { changes } = this.stmtUpdateTitle.run(
      normalizeTitle(title),
      this.now().toISOString(),
      sessionId,
      ownerId,
    );
    return changes > 0;
  }

  // -----------------------------------------------------------------------
  // Messages
  // -----------------------------------------------------------------------

  async appendMessage(
    sessionId: string,
    ownerId: string,
    draft: MessageDraft,
  ): Promise<StoredMessage> {
    assertId(sessionId, "sessionId");
    assertId(ownerId, "ownerId");
    const message = this.txnAppend(sessionId, ownerId, draft);
    this.log.debug(
      { sessionId, messageId: message.messageId, role: message.role },
      "message appended",
    );
    return message;
  }

  async listMessages(sessionId: string, ownerId: string): Promise<StoredMessage[]> {
    assertId(sessionId, "sessionId");
    assertId(ownerId, "ownerId");
    return this.txnListMessages(sessionId, ownerId).map(rowToMessage);
  }

  // -----------------------------------------------------------------------
  // Encrypted session context
  // -----------------------------------------------------------------------

  async setSessionData(
    sessionId: string,
    ownerId: string,
    data: SessionData,
  ): Promise<boolean> {
    assertId(sessionId, "sessionId");
    assertId(ownerId, "ownerId");
    const { changes } = this.stmtSetSessionData.run(
      data.ciphertext,
      JSON.stringify(toWireMetadata(data.metadata)),
      this.now().toISOString(),
      sessionId,
      ownerId,
    );
    return changes > 0;
  }

  async getSessionData(
    sessionId: string,
    ownerId: string,
  ): Promise<SessionData | null | undefined> {
    assertId(sessionId, "sessionId");
    assertId(ownerId, "ownerId");
    const row = this.stmtGetSessionData.get(sessionId, ownerId);
    if (!row) return undefined;
    if (row.session_data === null || row.session_metadata === null) return null;
    return {
      ciphertext: row.session_data,
      metadata: parseStoredMetadata(row.session_metadata, { sessionId }),
    };
  }

  // -----------------------------------------------------------------------
  // Verification
  // -----------------------------------------------------------------------

  async verifySession(
    sessionId: string,
    ownerId: string,
  ): Promise<SessionVerificationResult> {
    assertId(sessionId, "sessionId");
    assertId(ownerId, "ownerId");
    const rows = this.txnListMessages(sessionId, ownerId);
    const failures: MessageVerificationFailure[] = [];

    for (const row of rows) {
      const actual = computeContentHash(row.ciphertext);
      if (row.content_hash !== actual) {
        failures.push({
          messageId: row.message_id,
          seq: row.seq,
          reason: "hash_mismatch",
          expected: row.content_hash,
          actual,
        });
      }

      const problem = metadataProblem(row.metadata_json);
      if (problem !== null) {
        failures.push({
          messageId: row.message_id,
          seq: row.seq,
          reason: "metadata_corrupt",
          expected: "valid encryption metadata",
          actual: problem,
        });
      }

      const dataProblem = messageDataProblem(row.message_data);
      if (dataProblem !== null) {
        failures.push({
          messageId: row.message_id,
          seq: row.seq,
          reason: "message_data_corrupt",
          expected: "JSON object or null",
          actual: dataProblem,
        });
      }
    }

    return {
      valid: failures.length === 0,
      messageCount: rows.length,
      failures,
    };
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  close(): void {
    this.db.close();
  }
}

/** Returns the parse problem, or null when the metadata JSON is valid. */
function metadataProblem(json: string): string | null {
  try {
    parseEncryptionMetadata(JSON.parse(json));
    return null;
  } catch (err: unknown) {
    return err instanceof Error ? err.message : String(err);
  }
}

/** Returns the problem, or null when message_data is absent or a JSON object. */
function messageDataProblem(json: string | null): string | null {
  try {
    parseMessageData(json, {});
    return null;
  } catch (err: unknown) {
    return err instanceof IntegrityError ? String(err.details["cause"]) : String(err);
  }
}
