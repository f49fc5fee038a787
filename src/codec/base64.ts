/**
 * Strict base64 decoding.
 *
 * `Buffer.from(s, "base64")` silently skips characters outside the alphabet,
 * so a mangled field would decode to different bytes instead of failing.
 */

const BASE64_RE = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/** Decode standard padded base64, or return null when `value` is not valid base64. */
export function decodeBase64(value: string): Buffer | null {
  if (!BASE64_RE.test(value)) return null;
  return Buffer.from(value, "base64");
}

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}
