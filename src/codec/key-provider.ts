/**
 * Key resolution for the encryption codec.
 *
 * `KeyProvider` is the seam a real key-management integration plugs into.
 * `StaticKeyProvider` is the stand-in: a fixed map of key ids, with every
 * unknown id falling back to a placeholder key (and a warning).
 *
 * Key ring file format (YAML):
 *
 *   keys:
 *     client_app_key: <base64, 32 bytes>
 *     flutter_app_key: cGxhY2Vob2xkZXJfa2V5XzMyX2J5dGVzX2xvbmdfZm8=
 *   fallback: <base64, 32 bytes> | null   # null disables the fallback
 *
 * Without a key ring the built-in map serves both `client_app_key` and the
 * id already provisioned in deployed mobile clients (`flutter_app_key`),
 * and unknown ids fall back to the same placeholder bytes those clients
 * were given. A key ring replaces the built-in map entirely, so keep the
 * `flutter_app_key` line above while such clients are still in use.
 */

import { readFileSync } from "node:fs";
import yaml from "yaml";
import { z } from "zod";
import { decodeBase64 } from "./base64.js";
import { ValidationError } from "../errors.js";
import type { Logger } from "../logging.js";

export const KEY_BYTES = 32;

export interface KeyProvider {
  /** Return the 32-byte key for `keyId`. */
  resolve(keyId: string): Buffer;
}

/** Key id the client app is provisioned with. */
export const DEFAULT_APP_KEY_ID = "client_app_key";

/** Key id of already-deployed mobile clients. */
export const LEGACY_APP_KEY_ID = "flutter_app_key";

const DEFAULT_APP_KEY = Buffer.from("chatvault-shared-client-key-0001", "utf8");
const PLACEHOLDER_KEY = Buffer.from("placeholder_key_32_bytes_long_fo", "utf8");

export function assertKeyLength(key: Uint8Array, keyId: string): void {
  if (key.length !== KEY_BYTES) {
    throw new ValidationError(
      `Key "${keyId}" must be ${KEY_BYTES} bytes, got ${key.length}`,
      "INVALID_KEY",
      { keyId, length: key.length },
    );
  }
}

export function keyFromBase64(value: string, keyId: string): Buffer {
  const key = decodeBase64(value);
  if (key === null) {
    throw new ValidationError(
      `Key "${keyId}" is not valid base64`,
      "INVALID_BASE64",
      { keyId },
    );
  }
  assertKeyLength(key, keyId);
  return key;
}

// ---------------------------------------------------------------------------
// Static provider
// ---------------------------------------------------------------------------

export interface StaticKeyProviderOptions {
  /** Key for unknown ids. `null` makes unknown ids an error. */
  fallback?: Buffer | null;
  logger?: Logger;
}

export class StaticKeyProvider implements KeyProvider {
  private readonly keys: ReadonlyMap<string, Buffer>;
  private readonly fallback: Buffer | null;
  private readonly logger: Logger | undefined;

  constructor(
    keys: Record<string, Buffer> = {
      [DEFAULT_APP_KEY_ID]: DEFAULT_APP_KEY,
      [LEGACY_APP_KEY_ID]: PLACEHOLDER_KEY,
    },
    options: StaticKeyProviderOptions = {},
  ) {
    for (const [keyId, key] of Object.entries(keys)) {
      assertKeyLength(key, keyId);
    }
    const fallback =
      options.fallback === undefined ? PLACEHOLDER_KEY : options.fallback;
    if (fallback !== null) assertKeyLength(fallback, "fallback");

    this.keys = new Map(Object.entries(keys));
    this.fallback = fallback;
    this.logger = options.logger;
  }

  resolve(keyId: string): Buffer {
    const key = this.keys.get(keyId);
    if (key) return key;
    if (this.fallback === null) {
      throw new ValidationError(`Unknown key id: ${keyId}`, "INVALID_KEY", {
        keyId,
      });
    }
    this.logger?.warn({ keyId }, "key provider: unknown key id, using fallback key");
    return this.fallback;
  }

  has(keyId: string): boolean {
    return this.keys.has(keyId);
  }
}

// ---------------------------------------------------------------------------
// Key ring file
// ---------------------------------------------------------------------------

const KeyRingSchema = z.object({
  keys: z.record(z.string().min(1).max(200), z.string()).default({}),
  fallback: z.string().nullable().optional(),
});

export function parseKeyRing(content: string, logger?: Logger): StaticKeyProvider {
  const parsed = KeyRingSchema.safeParse(yaml.parse(content) ?? {});
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid key ring: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
      "SCHEMA_INVALID",
      { issues: parsed.error.issues },
    );
  }

  const keys: Record<string, Buffer> = {};
  for (const [keyId, value] of Object.entries(parsed.data.keys)) {
    keys[keyId] = keyFromBase64(value, keyId);
  }

  const { fallback } = parsed.data;
  return new StaticKeyProvider(keys, {
    fallback:
      fallback === undefined
        ? undefined
        : fallback === null
          ? null
          : keyFromBase64(fallback, "fallback"),
    logger,
  });
}

/** Load a YAML key ring from disk. */
export function loadKeyRing(path: string, logger?: Logger): StaticKeyProvider {
  return parseKeyRing(readFileSync(path, "utf8"), logger);
}
