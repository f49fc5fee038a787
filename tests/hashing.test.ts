import { describe, it, expect } from "vitest";
import {
  sha256,
  sha256Bytes,
  computeContentHash,
  verifyContentHash,
  assertContentHash,
} from "../src/integrity/hashing.js";
import { IntegrityError } from "../src/errors.js";

// ===================================================================
// sha256
// ===================================================================

describe("sha256", () => {
  it("produces correct digest for empty string", () => {
    expect(sha256("")).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
  });

  it("produces correct digest for 'hello'", () => {
    expect(sha256("hello")).toBe(
      "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824",
    );
  });

  it("agrees with sha256Bytes for the same UTF-8 content", () => {
    expect(sha256Bytes(Buffer.from("hello", "utf8"))).toBe(sha256("hello"));
  });
});

// ===================================================================
// Content hash
// ===================================================================

describe("computeContentHash", () => {
  it("hashes the raw bytes", () => {
    expect(computeContentHash(Buffer.alloc(0))).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
    expect(computeContentHash(Buffer.from("hello"))).toBe(
      "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824",
    );
  });

  it("returns a 64-char lowercase hex string", () => {
    expect(computeContentHash(Buffer.from([1, 2, 3]))).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe("verifyContentHash", () => {
  const c = Buffer.from([0xde, 0xad, 0xbe, 0xef]);
  const other = Buffer.from([0xde, 0xad, 0xbe, 0xee]);

  it("accepts the hash of the same bytes", () => {
    expect(verifyContentHash(c, computeContentHash(c))).toBe(true);
  });

  it("rejects the hash of different bytes", () => {
    expect(verifyContentHash(c, computeContentHash(other))).toBe(false);
  });

  it("ignores hex case", () => {
    expect(verifyContentHash(c, computeContentHash(c).toUpperCase())).toBe(true);
  });

  it("rejects malformed hashes instead of throwing", () => {
    expect(verifyContentHash(c, "")).toBe(false);
    expect(verifyContentHash(c, "abc")).toBe(false);
    expect(verifyContentHash(c, "z".repeat(64))).toBe(false);
  });
});

describe("assertContentHash", () => {
  it("passes silently on match", () => {
    const c = Buffer.from("ciphertext");
    expect(() => assertContentHash(c, computeContentHash(c))).not.toThrow();
  });

  it("throws IntegrityError with HASH_MISMATCH and both hashes", () => {
    const c = Buffer.from("ciphertext");
    const claimed = sha256("something else");
    try {
      assertContentHash(c, claimed, { messageId: "m-1" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(IntegrityError);
      const e = err as IntegrityError;
      expect(e.code).toBe("HASH_MISMATCH");
      expect(e.details).toEqual({
        messageId: "m-1",
        claimedHash: claimed,
        actualHash: computeContentHash(c),
      });
    }
  });
});
