/**
 * Session store contract.
 *
 * The store only ever sees ciphertext. Every read and write is scoped to an
 * owner: a session owned by someone else behaves exactly like a session
 * that does not exist.
 */

import type { EncryptionMetadata } from "../codec/metadata.js";

export const DEFAULT_SESSION_TITLE = "New Chat Session";

export type MessageRole = "user" | "bot";

export interface SessionData {
  ciphertext: Buffer;
  metadata: EncryptionMetadata;
}

export interface Session {
  sessionId: string;
  ownerId: string;
  title: string;
  createdAt: string;
  updatedAt: string;
}

export interface SessionSummary extends Session {
  messageCount: number;
}

/** What the caller supplies when appending a message. */
export interface MessageDraft {
  role: MessageRole;
  ciphertext: Buffer;
  metadata: EncryptionMetadata;
  contentHash: string;
  messageData?: Record<string, unknown> | null;
  /**
   * Title computed by the caller from the decrypted text. Applied only to
   * the first user message of a session still carrying the default title.
   */
  derivedTitle?: string;
}

export interface StoredMessage {
  messageId: string;
  sessionId: string;
  /** Insertion counter; defines message order. */
  seq: number;
  role: MessageRole;
  ciphertext: Buffer;
  metadata: EncryptionMetadata;
  contentHash: string;
  messageData: Record<string, unknown> | null;
  createdAt: string;
}

export interface ListSessionsOptions {
  limit?: number;
  offset?: number;
}

export interface MessageVerificationFailure {
  messageId: string;
  seq: number;
  reason: "hash_mismatch" | "metadata_corrupt" | "message_data_corrupt";
  expected: string;
  actual: string;
}

export interface SessionVerificationResult {
  valid: boolean;
  messageCount: number;
  failures: MessageVerificationFailure[];
}

export interface SessionStore {
  createSession(ownerId: string, title?: string): Promise<Session>;

  /** `undefined` for both missing and foreign sessions. */
  getSession(sessionId: string, ownerId: string): Promise<Session | undefined>;

  /** Most recently updated first, each with its message count. */
  listSessions(
    ownerId: string,
    options?: ListSessionsOptions,
  ): Promise<SessionSummary[]>;

  /** Removes the session and all its messages. `false` if missing or foreign. */
  deleteSession(sessionId: string, ownerId: string): Promise<boolean>;

  updateTitle(sessionId: string, ownerId: string, title: string): Promise<boolean>;

  /** @throws AccessDeniedError, IntegrityError */
  appendMessage(
    sessionId: string,
    ownerId: string,
    draft: MessageDraft,
  ): Promise<StoredMessage>;

  /** Insertion order. @throws AccessDeniedError */
  listMessages(sessionId: string, ownerId: string): Promise<StoredMessage[]>;

  setSessionData(
    sessionId: string,
    ownerId: string,
    data: SessionData,
  ): Promise<boolean>;

  /** `undefined` when the session is missing or foreign, `null` when unset. */
  getSessionData(
    sessionId: string,
    ownerId: string,
  ): Promise<SessionData | null | undefined>;

  /** Recompute every stored content hash. @throws AccessDeniedError */
  verifySession(
    sessionId: string,
    ownerId: string,
  ): Promise<SessionVerificationResult>;

  close(): void;
}
