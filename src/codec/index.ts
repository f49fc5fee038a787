export { decodeBase64, encodeBase64 } from "./base64.js";

export {
  AES_256_GCM,
  SUPPORTED_ALGORITHMS,
  EncryptionMetadataWireSchema,
  isSupportedAlgorithm,
  parseEncryptionMetadata,
  toWireMetadata,
  type AesGcmMetadata,
  type EncryptionAlgorithm,
  type EncryptionMetadata,
  type EncryptionMetadataWire,
} from "./metadata.js";

export {
  KEY_BYTES,
  DEFAULT_APP_KEY_ID,
  LEGACY_APP_KEY_ID,
  StaticKeyProvider,
  assertKeyLength,
  keyFromBase64,
  parseKeyRing,
  loadKeyRing,
  type KeyProvider,
  type StaticKeyProviderOptions,
} from "./key-provider.js";

export {
  EncryptionCodec,
  IV_BYTES,
  TAG_BYTES,
  type EncryptedPayload,
  type EncryptionCodecOptions,
} from "./codec.js";
