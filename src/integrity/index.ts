export {
  sha256,
  sha256Bytes,
  computeContentHash,
  verifyContentHash,
  assertContentHash,
} from "./hashing.js";
