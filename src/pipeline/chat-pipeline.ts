/**
 * Chat-turn pipeline.
 *
 * The only component that holds plaintext, and only for the duration of one
 * call. Per turn:
 *
 *   Received → Stored(user) → ContextBuilt → GenerationAttempted
 *            → Stored(bot) → Returned
 *
 * Any step may end the turn with AccessDeniedError, IntegrityError,
 * DecryptionError or ValidationError. A generation failure never does: the
 * fallback reply takes its place and is encrypted and hashed like any other.
 * If the caller's signal aborts, the user turn stays stored and no bot turn
 * is written.
 */

import type { EncryptionCodec } from "../codec/codec.js";
import {
  parseChatTurnRequest,
  toChatTurnResponse,
  toHistoryEntry,
  type ChatTurnResponse,
  type HistoryEntry,
} from "../contracts/schemas.js";
import { ChatVaultError } from "../errors.js";
import { assertContentHash, computeContentHash } from "../integrity/hashing.js";
import { silentLogger, type Logger } from "../logging.js";
import type { MessageRole, SessionStore, StoredMessage } from "../store/types.js";
import { assertId } from "../store/validation.js";
import type {
  GenerationBackend,
  GenerationResult,
  GenerationTurn,
} from "./generation.js";
import {
  assertTitleMaxLength,
  DEFAULT_TITLE_MAX_LENGTH,
  deriveTitle,
} from "./title.js";

export const FALLBACK_REPLY =
  "I'm having trouble reaching my knowledge base right now. Please try again in a moment.";

export const DEFAULT_MAX_TOKENS = 512;

export interface ChatPipelineOptions {
  maxTokens?: number;
  fallbackReply?: string;
  titleMaxLength?: number;
  logger?: Logger;
}

export interface TranscriptTurn {
  messageId: string;
  role: MessageRole;
  content: string;
  createdAt: string;
}

export class ChatPipeline {
  private readonly store: SessionStore;
  private readonly codec: EncryptionCodec;
  private readonly backend: GenerationBackend;
  private readonly maxTokens: number;
  private readonly fallbackReply: string;
  private readonly titleMaxLength: number;
  private readonly log: Logger;

  constructor(
    store: SessionStore,
    codec: EncryptionCodec,
    backend: GenerationBackend,
    options: ChatPipelineOptions = {},
  ) {
    this.store = store;
    this.codec = codec;
    this.backend = backend;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.fallbackReply = options.fallbackReply ?? FALLBACK_REPLY;
    this.titleMaxLength = options.titleMaxLength ?? DEFAULT_TITLE_MAX_LENGTH;
    assertTitleMaxLength(this.titleMaxLength);
    this.log = options.logger ?? silentLogger();
  }

  // -----------------------------------------------------------------------
  // Chat turn
  // -----------------------------------------------------------------------

  /**
   * Run one chat turn for `ownerId`.
   *
   * @param input  Wire request body (validated here).
   * @param signal Aborts generation and the bot turn; the user turn, once
   *               stored, stays.
   */
  async handleTurn(
    ownerId: string,
    input: unknown,
    signal?: AbortSignal,
  ): Promise<ChatTurnResponse> {
    // 1. Received
    assertId(ownerId, "ownerId");
    const request = parseChatTurnRequest(input);
    assertContentHash(request.ciphertext, request.contentHash, {
      stage: "inbound",
    });
    const query = this.codec.decrypt(request.ciphertext, request.metadata);

    // 2. Stored(user)
    const sessionId =
      request.sessionId ?? (await this.store.createSession(ownerId)).sessionId;
    const userMessage = await this.store.appendMessage(sessionId, ownerId, {
      role: "user",
      ciphertext: request.ciphertext,
      metadata: request.metadata,
      contentHash: request.contentHash,
      derivedTitle: deriveTitle(query, this.titleMaxLength),
    });

    // 3. ContextBuilt (prior turns only; the new turn travels as `query`)
    const stored = await this.store.listMessages(sessionId, ownerId);
    const history: GenerationTurn[] = stored
      .filter((m) => m.messageId !== userMessage.messageId)
      .map((m) => ({ role: m.role, content: this.openMessage(m) }));

    // 4. GenerationAttempted
    signal?.throwIfAborted();
    const reply = await this.generateOrFallback(sessionId, query, history, signal);
    signal?.throwIfAborted();

    // 5. Stored(bot): same key id as the inbound turn, fresh nonce
    const sealed = this.codec.encrypt(reply.answer, request.metadata);
    const botMessage = await this.store.appendMessage(sessionId, ownerId, {
      role: "bot",
      ciphertext: sealed.ciphertext,
      metadata: sealed.metadata,
      contentHash: computeContentHash(sealed.ciphertext),
      messageData: { sources: reply.sources },
    });

    // 6. Returned
    return toChatTurnResponse(sessionId, botMessage, reply.sources);
  }

  // -----------------------------------------------------------------------
  // History
  // -----------------------------------------------------------------------

  /** Stored messages as they are on the wire, still encrypted. */
  async getHistory(ownerId: string, sessionId: string): Promise<HistoryEntry[]> {
    const messages = await this.store.listMessages(sessionId, ownerId);
    return messages.map(toHistoryEntry);
  }

  /** Hash-verified, decrypted turns in insertion order. */
  async readTranscript(
    ownerId: string,
    sessionId: string,
  ): Promise<TranscriptTurn[]> {
    const messages = await this.store.listMessages(sessionId, ownerId);
    return messages.map((m) => ({
      messageId: m.messageId,
      role: m.role,
      content: this.openMessage(m),
      createdAt: m.createdAt,
    }));
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  /** Verify the stored hash, then decrypt with the message's own metadata. */
  private openMessage(message: StoredMessage): string {
    assertContentHash(message.ciphertext, message.contentHash, {
      messageId: message.messageId,
      stage: "stored",
    });
    return this.codec.decrypt(message.ciphertext, message.metadata);
  }

  private async generateOrFallback(
    sessionId: string,
    query: string,
    history: GenerationTurn[],
    signal: AbortSignal | undefined,
  ): Promise<GenerationResult> {
    try {
      return await this.backend.generate(
        { query, history, maxTokens: this.maxTokens },
        signal,
      );
    } catch (err: unknown) {
      if (signal?.aborted) throw signal.reason;
      this.log.warn(
        {
          sessionId,
          code: err instanceof ChatVaultError ? err.code : "UNKNOWN",
          error: err instanceof Error ? err.message : String(err),
        },
        "generation failed, using fallback reply",
      );
      return { answer: this.fallbackReply, sources: [] };
    }
  }
}
