/**
 * Dual-hash digesting over canonical bytes.
 *
 * SHA-256 serves the WASM-side verifier, Keccak-256 the EVM-side one.
 * Both hash the encoded bytes, never the logical value, so the two
 * chains commit to exactly the same data root.
 */

import { createHash } from "node:crypto";
import { bytesToHex, keccak256 } from "viem";
import { encodeCanonical } from "./encoder.js";
import { EncodingError } from "./errors.js";
import type { CanonicalDigest, CanonicalMap, CanonicalValue } from "./types.js";

/**
 * Encode once, then hash the same bytes with both functions.
 */
export function canonicalDigest(value: CanonicalValue): CanonicalDigest {
  const bytes = encodeCanonical(value);
  return {
    bytes,
    sha256: sha256Hex(bytes),
    keccak256: keccak256(bytes),
  };
}

export function sha256Hex(bytes: Uint8Array): `0x${string}` {
  return bytesToHex(createHash("sha256").update(bytes).digest());
}

// =============================================================================
// Parameter normalization
// =============================================================================

const MIN_INT64 = -(1n << 63n);
const MAX_UINT64_EXCLUSIVE = 1n << 64n;

/**
 * Prepare a parameter record for encoding.
 *
 * The encoder never drops null; callers that treat absent fields as
 * omitted go through this first. Integers must fit in [-2^63, 2^64);
 * numbers beyond the safe integer range encode as floats and are not
 * range-checked.
 *
 * @throws {EncodingError} OUT_OF_RANGE for an integer outside that range
 */
export function normalizeParams(
  params: Readonly<Record<string, CanonicalValue | undefined>>,
): CanonicalMap {
  const normalized: Record<string, CanonicalValue> = {};

  for (const key of Object.keys(params).sort()) {
    const value = params[key];
    if (value === undefined || value === null) continue;

    if (typeof value === "bigint" && (value < MIN_INT64 || value >= MAX_UINT64_EXCLUSIVE)) {
      throw new EncodingError(
        "OUT_OF_RANGE",
        `Integer value ${value} out of range for parameter ${key}`,
        `$.${key}`,
      );
    }

    normalized[key] = value;
  }

  return normalized;
}
