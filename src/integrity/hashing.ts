/**
 * SHA-256 content hashing for stored ciphertext.
 *
 * The content hash covers the raw ciphertext bytes exactly as stored
 * (GCM tag included). It is checked before any decrypt so a corrupt row is
 * rejected without touching key material.
 *
 * Pure functions, no I/O.
 */

import { createHash, timingSafeEqual } from "node:crypto";
import { IntegrityError } from "../errors.js";

const HEX_64_RE = /^[0-9a-f]{64}$/i;

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

/** SHA-256 hex digest of a UTF-8 string. */
export function sha256(data: string): string {
  return createHash("sha256").update(data, "utf8").digest("hex");
}

/** SHA-256 hex digest of raw bytes. */
export function sha256Bytes(data: Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

// ---------------------------------------------------------------------------
// Content hash
// ---------------------------------------------------------------------------

export function computeContentHash(ciphertext: Uint8Array): string {
  return sha256Bytes(ciphertext);
}

/**
 * Recompute the hash of `ciphertext` and compare it with `claimedHash`.
 * Hex case is ignored; anything that is not 64 hex chars never matches.
 */
export function verifyContentHash(
  ciphertext: Uint8Array,
  claimedHash: string,
): boolean {
  if (!HEX_64_RE.test(claimedHash)) return false;
  const expected = Buffer.from(computeContentHash(ciphertext), "hex");
  const claimed = Buffer.from(claimedHash.toLowerCase(), "hex");
  return timingSafeEqual(expected, claimed);
}

/** Throws `IntegrityError` (HASH_MISMATCH) when the hash does not match. */
export function assertContentHash(
  ciphertext: Uint8Array,
  claimedHash: string,
  context: Record<string, unknown> = {},
): void {
  if (!verifyContentHash(ciphertext, claimedHash)) {
    throw new IntegrityError(
      "Content hash does not match ciphertext",
      "HASH_MISMATCH",
      { ...context, claimedHash, actualHash: computeContentHash(ciphertext) },
    );
  }
}
