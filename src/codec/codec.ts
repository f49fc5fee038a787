/**
 * AES-256-GCM encryption codec.
 *
 * Ciphertext layout: encrypted bytes followed by the 16-byte GCM tag, no
 * associated data. Each `encrypt` draws a fresh random 12-byte nonce; the
 * nonce travels base64-encoded in the outbound metadata.
 */

import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";
import { decodeBase64, encodeBase64 } from "./base64.js";
import type { KeyProvider } from "./key-provider.js";
import {
  AES_256_GCM,
  isSupportedAlgorithm,
  type EncryptionMetadata,
} from "./metadata.js";
import { DecryptionError, ValidationError } from "../errors.js";

export const IV_BYTES = 12;
export const TAG_BYTES = 16;

const STRICT_UTF8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export interface EncryptedPayload {
  ciphertext: Buffer;
  metadata: EncryptionMetadata;
}

export interface EncryptionCodecOptions {
  /** Clock for the provenance timestamp in outbound metadata. */
  now?: () => Date;
}

export class EncryptionCodec {
  private readonly keys: KeyProvider;
  private readonly now: () => Date;

  constructor(keys: KeyProvider, options: EncryptionCodecOptions = {}) {
    this.keys = keys;
    this.now = options.now ?? (() => new Date());
  }

  deriveKey(metadata: Pick<EncryptionMetadata, "keyId">): Buffer {
    return this.keys.resolve(metadata.keyId);
  }

  /**
   * Encrypt `plaintext` under the key named by `inbound.keyId`.
   * The returned metadata keeps the key id and carries the new nonce.
   */
  encrypt(plaintext: string, inbound: EncryptionMetadata): EncryptedPayload {
    if (!isSupportedAlgorithm(inbound.algorithm)) {
      throw new ValidationError(
        `Unsupported encryption algorithm: ${String(inbound.algorithm)}`,
        "UNSUPPORTED_ALGORITHM",
        { algorithm: inbound.algorithm },
      );
    }

    const key = this.deriveKey(inbound);
    const iv = randomBytes(IV_BYTES);

    const cipher = createCipheriv("aes-256-gcm", key, iv, {
      authTagLength: TAG_BYTES,
    });
    const ciphertext = Buffer.concat([
      cipher.update(plaintext, "utf8"),
      cipher.final(),
      cipher.getAuthTag(),
    ]);

    return {
      ciphertext,
      metadata: {
        algorithm: AES_256_GCM,
        keyId: inbound.keyId,
        iv: encodeBase64(iv),
        createdAt: this.now().toISOString(),
      },
    };
  }

  /**
   * Decrypt with the metadata stored beside the ciphertext. Never mutates
   * `metadata`.
   *
   * @throws DecryptionError when the nonce is missing or malformed, the
   *         algorithm is unsupported, the tag does not verify, or the
   *         plaintext is not UTF-8.
   */
  decrypt(ciphertext: Uint8Array, metadata: EncryptionMetadata): string {
    if (!isSupportedAlgorithm(metadata.algorithm)) {
      throw new DecryptionError(
        `Unsupported encryption algorithm: ${String(metadata.algorithm)}`,
        "UNSUPPORTED_ALGORITHM",
        { algorithm: metadata.algorithm },
      );
    }
    if (!metadata.iv) {
      throw new DecryptionError("No IV found in metadata", "IV_MISSING");
    }
    const iv = decodeBase64(metadata.iv);
    if (iv === null || iv.length !== IV_BYTES) {
      throw new DecryptionError(
        `IV must be base64 of ${IV_BYTES} bytes`,
        "IV_INVALID",
        { ivLength: iv?.length ?? null },
      );
    }
    if (ciphertext.length < TAG_BYTES) {
      throw new DecryptionError(
        "Ciphertext is shorter than the authentication tag",
        "CIPHERTEXT_TOO_SHORT",
        { length: ciphertext.length },
      );
    }

    const key = this.deriveKey(metadata);
    const body = ciphertext.subarray(0, ciphertext.length - TAG_BYTES);
    const tag = ciphertext.subarray(ciphertext.length - TAG_BYTES);

    const decipher = createDecipheriv("aes-256-gcm", key, iv, {
      authTagLength: TAG_BYTES,
    });
    decipher.setAuthTag(tag);
    let plaintext: Buffer;
    try {
      plaintext = Buffer.concat([decipher.update(body), decipher.final()]);
    } catch (err: unknown) {
      throw new DecryptionError(
        "Authentication tag did not verify (tampered ciphertext or wrong key)",
        "AUTH_FAILED",
        { keyId: metadata.keyId, cause: err instanceof Error ? err.message : String(err) },
      );
    }

    try {
      return STRICT_UTF8.decode(plaintext);
    } catch (err: unknown) {
      throw new DecryptionError("Decrypted plaintext is not valid UTF-8", "PLAINTEXT_NOT_UTF8", {
        keyId: metadata.keyId,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
