export {
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

export {
  SqliteSessionStore,
  type SqliteSessionStoreOptions,
} from "./sqlite-store.js";

export {
  MAX_TITLE_LENGTH,
  DEFAULT_PAGE_LIMIT,
  MAX_PAGE_LIMIT,
  assertId,
  normalizeTitle,
  normalizePagination,
} from "./validation.js";
