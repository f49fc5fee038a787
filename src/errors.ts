/**
 * Error types shared by the store, codec and pipeline.
 *
 * One class per failure kind, each with a fixed set of codes. Callers branch
 * on `instanceof` for the kind and on `code` for the reason.
 */

export abstract class ChatVaultError<C extends string = string> extends Error {
  public readonly code: C;
  public readonly details: Record<string, unknown>;

  constructor(message: string, code: C, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details ?? {};
  }
}

/**
 * Session missing or owned by someone else. The two cases share one code and
 * one message so the caller cannot tell them apart.
 */
export class AccessDeniedError extends ChatVaultError<"ACCESS_DENIED"> {
  constructor(sessionId: string) {
    super("Session not found or access denied", "ACCESS_DENIED", { sessionId });
  }
}

export type IntegrityErrorCode =
  | "HASH_MISMATCH"
  | "METADATA_CORRUPT"
  | "MESSAGE_DATA_CORRUPT";

export class IntegrityError extends ChatVaultError<IntegrityErrorCode> {}

export type DecryptionErrorCode =
  | "IV_MISSING"
  | "IV_INVALID"
  | "CIPHERTEXT_TOO_SHORT"
  | "AUTH_FAILED"
  | "PLAINTEXT_NOT_UTF8"
  | "UNSUPPORTED_ALGORITHM";

export class DecryptionError extends ChatVaultError<DecryptionErrorCode> {}

export type ValidationErrorCode =
  | "INVALID_BASE64"
  | "INVALID_ID"
  | "INVALID_TITLE"
  | "INVALID_PAGINATION"
  | "INVALID_KEY"
  | "SCHEMA_INVALID"
  | "UNSUPPORTED_ALGORITHM";

export class ValidationError extends ChatVaultError<ValidationErrorCode> {}

export type UpstreamErrorCode =
  | "HTTP_STATUS"
  | "TIMEOUT"
  | "TRANSPORT"
  | "BAD_RESPONSE";

/**
 * Generation backend failure. The pipeline recovers from it locally; it only
 * reaches callers that use a `GenerationBackend` directly.
 */
export class UpstreamUnavailableError extends ChatVaultError<UpstreamErrorCode> {}
