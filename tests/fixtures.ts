/**
 * Shared test helpers: placeholder keys, a scripted generation backend and
 * a client-side sealer that builds wire requests the way an app would.
 */

import { EncryptionCodec } from "../src/codec/codec.js";
import { StaticKeyProvider } from "../src/codec/key-provider.js";
import {
  AES_256_GCM,
  parseEncryptionMetadata,
  toWireMetadata,
  type EncryptionMetadata,
} from "../src/codec/metadata.js";
import { decodeBase64, encodeBase64 } from "../src/codec/base64.js";
import type { ChatTurnRequestWire, ChatTurnResponse } from "../src/contracts/schemas.js";
import { computeContentHash } from "../src/integrity/hashing.js";
import type {
  GenerationBackend,
  GenerationRequest,
  GenerationResult,
} from "../src/pipeline/generation.js";

export const USER_A = "0b7c4d1e-2f3a-4b5c-8d6e-7f8091a2b3c4";
export const USER_B = "9e8d7c6b-5a49-4382-b716-05f4e3d2c1b0";
export const TEST_KEY_ID = "test-key";
export const TEST_KEY = Buffer.alloc(32, 0x11);

export function testKeyProvider(): StaticKeyProvider {
  return new StaticKeyProvider({ [TEST_KEY_ID]: TEST_KEY }, { fallback: null });
}

export function testCodec(): EncryptionCodec {
  return new EncryptionCodec(testKeyProvider());
}

export function inboundMetadata(keyId: string = TEST_KEY_ID): EncryptionMetadata {
  return {
    algorithm: AES_256_GCM,
    keyId,
    iv: "",
    createdAt: "2026-01-01T00:00:00.000Z",
  };
}

/** Encrypt `plaintext` and wrap it as a chat-turn request body. */
export function sealTurn(
  codec: EncryptionCodec,
  plaintext: string,
  sessionId?: string,
): ChatTurnRequestWire {
  const sealed = codec.encrypt(plaintext, inboundMetadata());
  return {
    encrypted_message: encodeBase64(sealed.ciphertext),
    encryption_metadata: { ...toWireMetadata(sealed.metadata) },
    content_hash: computeContentHash(sealed.ciphertext),
    session_id: sessionId,
  };
}

/** Decrypt the bot reply carried by a chat-turn response. */
export function openResponse(
  codec: EncryptionCodec,
  response: ChatTurnResponse,
): string {
  const ciphertext = decodeBase64(response.encrypted_response);
  if (ciphertext === null) throw new Error("response is not base64");
  return codec.decrypt(
    ciphertext,
    parseEncryptionMetadata(response.encryption_metadata),
  );
}

/** Backend that records requests and answers from a script. */
export class ScriptedBackend implements GenerationBackend {
  public readonly requests: GenerationRequest[] = [];
  private readonly respond: (
    request: GenerationRequest,
    signal?: AbortSignal,
  ) => GenerationResult | Promise<GenerationResult>;

  constructor(
    respond: (
      request: GenerationRequest,
      signal?: AbortSignal,
    ) => GenerationResult | Promise<GenerationResult> = (req) => ({
      answer: `echo: ${req.query}`,
      sources: ["doc-a"],
    }),
  ) {
    this.respond = respond;
  }

  async generate(
    request: GenerationRequest,
    signal?: AbortSignal,
  ): Promise<GenerationResult> {
    this.requests.push(request);
    return this.respond(request, signal);
  }
}
