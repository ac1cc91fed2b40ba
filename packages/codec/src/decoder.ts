/**
 * Canonical CBOR decoder.
 *
 * Parsing is delegated to cbor-x. Canonicality is then checked by
 * re-encoding the decoded value and comparing bytes, so any input
 * accepted here is exactly what {@link encodeCanonical} would emit.
 *
 * Maps whose keys are all text decode to plain objects, any other map
 * to a `Map`; byte strings to Uint8Array; integers beyond the safe
 * range to bigint.
 */

import { Decoder } from "cbor-x";
import { EncodingError } from "./errors.js";
import { encodeCanonical } from "./encoder.js";
import type { CanonicalMap, CanonicalValue } from "./types.js";

const decoder = new Decoder({
  mapsAsObjects: false,
  useRecords: false,
});

/**
 * Decode canonical bytes back to a value.
 *
 * @throws {EncodingError} INVALID_BYTES for malformed CBOR,
 *   NON_CANONICAL when the bytes are valid CBOR but not canonical
 */
export function decodeCanonical(bytes: Uint8Array): CanonicalValue {
  let raw: unknown;
  try {
    raw = decoder.decode(bytes);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new EncodingError("INVALID_BYTES", `Malformed CBOR: ${reason}`);
  }

  const value = normalize(raw, "$");

  if (!bytesEqual(encodeCanonical(value), bytes)) {
    throw new EncodingError("NON_CANONICAL", "Input is valid CBOR but not in canonical form");
  }

  return value;
}

// =============================================================================
// Internal helpers
// =============================================================================

function normalize(raw: unknown, path: string): CanonicalValue {
  if (raw === null || typeof raw === "boolean" || typeof raw === "number" || typeof raw === "string") {
    return raw;
  }

  if (typeof raw === "bigint") {
    const asNumber = Number(raw);
    return Number.isSafeInteger(asNumber) ? asNumber : raw;
  }

  if (raw instanceof Uint8Array) {
    return new Uint8Array(raw);
  }

  if (Array.isArray(raw)) {
    const items: unknown[] = raw;
    return items.map((item, i) => normalize(item, `${path}[${i}]`));
  }

  if (raw instanceof Map) {
    const entries: [unknown, unknown][] = [...raw.entries()];
    return normalizeMap(entries, path);
  }

  throw new EncodingError(
    "NON_CANONICAL",
    `Decoded value at ${path} has no canonical form: ${typeof raw}`,
    path,
  );
}

function normalizeMap(entries: readonly [unknown, unknown][], path: string): CanonicalValue {
  const normalized = entries.map(([key, item]): [CanonicalValue, CanonicalValue] => {
    const normalizedKey = normalize(key, `${path}.<key>`);
    return [normalizedKey, normalize(item, `${path}.${String(normalizedKey)}`)];
  });

  if (!normalized.every(([key]) => typeof key === "string")) {
    return new Map(normalized);
  }

  // defineProperty keeps keys such as "__proto__" as own data properties
  const out: Record<string, CanonicalValue> = {};
  for (const [key, item] of normalized) {
    Object.defineProperty(out, String(key), {
      value: item,
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  const map: CanonicalMap = out;
  return map;
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
