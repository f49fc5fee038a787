/**
 * Wire contracts for a chat turn.
 *
 * Request:  { encrypted_message, encryption_metadata, content_hash, session_id? }
 * Response: { session_id, encrypted_response, encryption_metadata,
 *             content_hash, sources }
 *
 * Binary fields are base64, hashes are lowercase hex. Parsing converts to
 * the domain form (Buffers, camelCase metadata) and reports every problem
 * as a ValidationError.
 */

import { z } from "zod";
import { decodeBase64, encodeBase64 } from "../codec/base64.js";
import {
  parseEncryptionMetadata,
  toWireMetadata,
  type EncryptionMetadata,
  type EncryptionMetadataWire,
} from "../codec/metadata.js";
import { ValidationError } from "../errors.js";
import { assertId } from "../store/validation.js";
import type { MessageRole, StoredMessage } from "../store/types.js";

const HEX_64_RE = /^[0-9a-fA-F]{64}$/;

/** Upper bound on one encrypted message, base64 characters. */
export const MAX_ENCRYPTED_MESSAGE_CHARS = 1_048_576;

export const ChatTurnRequestSchema = z.object({
  encrypted_message: z.string().min(1).max(MAX_ENCRYPTED_MESSAGE_CHARS),
  encryption_metadata: z.record(z.unknown()),
  content_hash: z.string().regex(HEX_64_RE, "Must be a SHA-256 hex digest"),
  session_id: z.string().nullish(),
});

export type ChatTurnRequestWire = z.input<typeof ChatTurnRequestSchema>;

export interface ChatTurnRequest {
  ciphertext: Buffer;
  metadata: EncryptionMetadata;
  contentHash: string;
  sessionId?: string;
}

export interface ChatTurnResponse {
  session_id: string;
  encrypted_response: string;
  encryption_metadata: EncryptionMetadataWire;
  content_hash: string;
  sources: string[];
}

export interface HistoryEntry {
  id: string;
  session_id: string;
  sender_type: MessageRole;
  encrypted_content: string;
  encryption_metadata: EncryptionMetadataWire;
  content_hash: string;
  message_data: Record<string, unknown> | null;
  created_at: string;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function issuesMessage(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
}

export function parseChatTurnRequest(input: unknown): ChatTurnRequest {
  const parsed = ChatTurnRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid chat request: ${issuesMessage(parsed.error)}`,
      "SCHEMA_INVALID",
      { issues: parsed.error.issues },
    );
  }
  const body = parsed.data;

  const ciphertext = decodeBase64(body.encrypted_message);
  if (ciphertext === null) {
    throw new ValidationError(
      "encrypted_message is not valid base64",
      "INVALID_BASE64",
      { field: "encrypted_message" },
    );
  }

  const metadata = parseEncryptionMetadata(body.encryption_metadata);

  const request: ChatTurnRequest = {
    ciphertext,
    metadata,
    contentHash: body.content_hash.toLowerCase(),
  };
  if (body.session_id !== undefined && body.session_id !== null) {
    assertId(body.session_id, "session_id");
    request.sessionId = body.session_id;
  }
  return request;
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

export function toChatTurnResponse(
  sessionId: string,
  message: StoredMessage,
  sources: string[],
): ChatTurnResponse {
  return {
    session_id: sessionId,
    encrypted_response: encodeBase64(message.ciphertext),
    encryption_metadata: toWireMetadata(message.metadata),
    content_hash: message.contentHash,
    sources,
  };
}

export function toHistoryEntry(message: StoredMessage): HistoryEntry {
  return {
    id: message.messageId,
    session_id: message.sessionId,
    sender_type: message.role,
    encrypted_content: encodeBase64(message.ciphertext),
    encryption_metadata: toWireMetadata(message.metadata),
    content_hash: message.contentHash,
    message_data: message.messageData,
    created_at: message.createdAt,
  };
}
