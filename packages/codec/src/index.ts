/**
 * @vagus/codec — Canonical CBOR encoding and dual-hash content digests.
 *
 * One canonical form, bit-identical across implementations, hashed with
 * SHA-256 and Keccak-256 for cross-chain data-root commitments.
 *
 * @packageDocumentation
 */

// Types
export type { CanonicalValue, CanonicalMap, CanonicalDigest } from "./types.js";

// Errors
export { EncodingError } from "./errors.js";
export type { EncodingErrorCode } from "./errors.js";

// Encoding
export { encodeCanonical, compareKeys } from "./encoder.js";
export { decodeCanonical } from "./decoder.js";

// Digesting
export { canonicalDigest, sha256Hex, normalizeParams } from "./digest.js";

// Conformance vectors
export {
  ConformanceVectorSchema,
  VectorFileSchema,
  parseVectorFile,
  readVectorFile,
  verifyVectors,
} from "./vectors.js";
export type {
  ConformanceVector,
  VectorFile,
  VectorField,
  VectorMismatch,
  VectorReport,
  JsonValue,
} from "./vectors.js";
