/**
 * Encryption metadata: the closed record that travels with every ciphertext.
 *
 * Domain form is camelCase; wire and at-rest form is snake_case
 * ({ algorithm, key_id, iv, created_at }). The union is tagged by
 * `algorithm`, so a new scheme is a new member, never an optional field.
 */

import { z } from "zod";
import { ValidationError } from "../errors.js";

export const AES_256_GCM = "AES-256-GCM";

export const SUPPORTED_ALGORITHMS = [AES_256_GCM] as const;

export type EncryptionAlgorithm = (typeof SUPPORTED_ALGORITHMS)[number];

export interface AesGcmMetadata {
  algorithm: typeof AES_256_GCM;
  keyId: string;
  /** Base64 of the 12-byte nonce. Empty when the sender omitted it. */
  iv: string;
  /** Provenance timestamp, as supplied by whoever encrypted. */
  createdAt: string;
}

export type EncryptionMetadata = AesGcmMetadata;

export interface EncryptionMetadataWire {
  algorithm: string;
  key_id: string;
  iv: string;
  created_at: string;
}

export function isSupportedAlgorithm(tag: string): tag is EncryptionAlgorithm {
  return (SUPPORTED_ALGORITHMS as readonly string[]).includes(tag);
}

export const EncryptionMetadataWireSchema = z.object({
  algorithm: z.string().min(1),
  key_id: z.string().min(1).max(200),
  iv: z.string().max(64).default(""),
  created_at: z.string().max(64).default(""),
});

/**
 * Validate a wire/at-rest metadata object and convert it to domain form.
 *
 * @throws ValidationError SCHEMA_INVALID on shape errors,
 *         UNSUPPORTED_ALGORITHM for a tag this build cannot decrypt.
 */
export function parseEncryptionMetadata(input: unknown): EncryptionMetadata {
  const parsed = EncryptionMetadataWireSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid encryption metadata: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
      "SCHEMA_INVALID",
      { issues: parsed.error.issues },
    );
  }
  const { algorithm, key_id, iv, created_at } = parsed.data;
  if (algorithm !== AES_256_GCM) {
    throw new ValidationError(
      `Unsupported encryption algorithm: ${algorithm}`,
      "UNSUPPORTED_ALGORITHM",
      { algorithm, supported: [...SUPPORTED_ALGORITHMS] },
    );
  }
  return { algorithm, keyId: key_id, iv, createdAt: created_at };
}

export function toWireMetadata(metadata: EncryptionMetadata): EncryptionMetadataWire {
  return {
    algorithm: metadata.algorithm,
    key_id: metadata.keyId,
    iv: metadata.iv,
    created_at: metadata.createdAt,
  };
}
