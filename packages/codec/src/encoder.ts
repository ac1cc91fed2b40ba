/**
 * Canonical CBOR encoder (RFC 8949 §4.2, length-first map ordering).
 *
 * Rules:
 *   1. Every head uses its shortest form
 *   2. Map keys ordered by encoded length, then bytewise by encoded key
 *   3. Definite lengths only
 *   4. Floats use the narrowest IEEE-754 width that round-trips exactly
 *   5. null is encoded, never dropped
 *
 * The output must be bit-identical to every other implementation of the
 * same rules. Both verifiers hash these bytes.
 */

import { EncodingError } from "./errors.js";
import type { CanonicalValue } from "./types.js";

const MAJOR_UNSIGNED = 0;
const MAJOR_NEGATIVE = 1;
const MAJOR_BYTES = 2;
const MAJOR_TEXT = 3;
const MAJOR_ARRAY = 4;
const MAJOR_MAP = 5;

const SIMPLE_FALSE = 0xf4;
const SIMPLE_TRUE = 0xf5;
const SIMPLE_NULL = 0xf6;
const FLOAT16 = 0xf9;
const FLOAT32 = 0xfa;
const FLOAT64 = 0xfb;

const MAX_UINT64 = (1n << 64n) - 1n;
const MAX_DEPTH = 128;

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const textEncoder = new TextEncoder();

/**
 * Encode a value to its canonical CBOR bytes.
 *
 * @throws {EncodingError} for values with no canonical form
 */
export function encodeCanonical(value: CanonicalValue): Uint8Array {
  return encodeItem(value, "$", 0);
}

// =============================================================================
// Items
// =============================================================================

function encodeItem(value: unknown, path: string, depth: number): Uint8Array {
  if (depth > MAX_DEPTH) {
    throw new EncodingError("OUT_OF_RANGE", `Nesting deeper than ${MAX_DEPTH} at ${path}`, path);
  }

  if (value === null) return Uint8Array.of(SIMPLE_NULL);
  if (value === true) return Uint8Array.of(SIMPLE_TRUE);
  if (value === false) return Uint8Array.of(SIMPLE_FALSE);

  switch (typeof value) {
    case "number":
      return encodeNumber(value);
    case "bigint":
      return encodeInteger(value, path);
    case "string":
      return encodeText(value, path);
    case "object":
      break;
    default:
      throw new EncodingError(
        "UNSUPPORTED_TYPE",
        `Unsupported value at ${path}: ${typeof value}`,
        path,
      );
  }

  if (value instanceof Uint8Array) {
    return concat([head(MAJOR_BYTES, value.length), value]);
  }

  if (Array.isArray(value)) {
    const items: unknown[] = value;
    return concat([
      head(MAJOR_ARRAY, items.length),
      ...items.map((item, i) => encodeItem(item, `${path}[${i}]`, depth + 1)),
    ]);
  }

  if (value instanceof Map) {
    const entries: [unknown, unknown][] = [...value.entries()];
    return encodeMap(entries, path, depth);
  }

  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === Object.prototype || proto === null) {
    return encodeMap(Object.entries(value), path, depth);
  }

  throw new EncodingError(
    "UNSUPPORTED_TYPE",
    `Unsupported object at ${path}: ${constructorName(value)}`,
    path,
  );
}

function constructorName(value: object): string {
  const ctor: unknown = Reflect.get(value, "constructor");
  return typeof ctor === "function" && ctor.name !== "" ? ctor.name : "object";
}

function encodeMap(
  entries: readonly (readonly [unknown, unknown])[],
  path: string,
  depth: number,
): Uint8Array {
  const encoded = entries.map(([key, item]) => {
    const keyPath = `${path}.${String(key)}`;
    return {
      key: encodeItem(key, keyPath, depth + 1),
      item: encodeItem(item, keyPath, depth + 1),
    };
  });

  encoded.sort((a, b) => compareKeys(a.key, b.key));

  for (let i = 1; i < encoded.length; i++) {
    const previous = encoded[i - 1];
    const current = encoded[i];
    if (previous !== undefined && current !== undefined && compareKeys(previous.key, current.key) === 0) {
      throw new EncodingError("DUPLICATE_KEY", `Duplicate map key at ${path}`, path);
    }
  }

  return concat([
    head(MAJOR_MAP, encoded.length),
    ...encoded.flatMap((entry) => [entry.key, entry.item]),
  ]);
}

/**
 * Length-first, then bytewise. Exported for decoders that validate order.
 */
export function compareKeys(a: Uint8Array, b: Uint8Array): number {
  if (a.length !== b.length) {
    return a.length - b.length;
  }
  for (let i = 0; i < a.length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

function encodeText(value: string, path: string): Uint8Array {
  if (LONE_SURROGATE.test(value)) {
    throw new EncodingError("INVALID_TEXT", `Lone surrogate in text at ${path}`, path);
  }
  const bytes = textEncoder.encode(value);
  return concat([head(MAJOR_TEXT, bytes.length), bytes]);
}

// =============================================================================
// Numbers
// =============================================================================

function encodeNumber(value: number): Uint8Array {
  if (Number.isSafeInteger(value) && !Object.is(value, -0)) {
    return encodeInteger(BigInt(value), "");
  }
  return encodeFloat(value);
}

function encodeInteger(value: bigint, path: string): Uint8Array {
  if (value >= 0n) {
    if (value > MAX_UINT64) {
      throw new EncodingError("OUT_OF_RANGE", `Integer above 2^64-1 at ${path}`, path);
    }
    return head(MAJOR_UNSIGNED, value);
  }
  const magnitude = -1n - value;
  if (magnitude > MAX_UINT64) {
    throw new EncodingError("OUT_OF_RANGE", `Integer below -2^64 at ${path}`, path);
  }
  return head(MAJOR_NEGATIVE, magnitude);
}

function encodeFloat(value: number): Uint8Array {
  if (Number.isNaN(value)) {
    return Uint8Array.of(FLOAT16, 0x7e, 0x00);
  }

  const half = toFloat16Bits(value);
  if (half !== undefined) {
    return Uint8Array.of(FLOAT16, half >> 8, half & 0xff);
  }

  if (Math.fround(value) === value) {
    const out = new Uint8Array(5);
    out[0] = FLOAT32;
    new DataView(out.buffer).setFloat32(1, value);
    return out;
  }

  const out = new Uint8Array(9);
  out[0] = FLOAT64;
  new DataView(out.buffer).setFloat64(1, value);
  return out;
}

/**
 * IEEE-754 binary16 bit pattern when `value` is exactly representable.
 */
function toFloat16Bits(value: number): number | undefined {
  if (Math.fround(value) !== value) {
    return undefined;
  }

  const view = new DataView(new ArrayBuffer(4));
  view.setFloat32(0, value);
  const bits = view.getUint32(0);

  const sign = (bits >>> 31) << 15;
  const exponent = (bits >>> 23) & 0xff;
  const mantissa = bits & 0x7fffff;

  if (exponent === 0xff) {
    // Infinity (NaN is handled by the caller)
    return sign | 0x7c00;
  }
  if (exponent === 0) {
    // float32 subnormals are far below the binary16 range
    return mantissa === 0 ? sign : undefined;
  }

  const unbiased = exponent - 127;

  if (unbiased >= -14 && unbiased <= 15) {
    if ((mantissa & 0x1fff) !== 0) return undefined;
    return sign | ((unbiased + 15) << 10) | (mantissa >>> 13);
  }

  if (unbiased >= -24 && unbiased < -14) {
    const significand = 0x800000 | mantissa;
    const shift = -(unbiased + 1);
    if ((significand & ((1 << shift) - 1)) !== 0) return undefined;
    return sign | (significand >>> shift);
  }

  return undefined;
}

// =============================================================================
// Heads and buffers
// =============================================================================

function head(major: number, length: number | bigint): Uint8Array {
  const n = BigInt(length);
  const initial = major << 5;

  if (n < 24n) {
    return Uint8Array.of(initial | Number(n));
  }
  if (n <= 0xffn) {
    return Uint8Array.of(initial | 24, Number(n));
  }
  if (n <= 0xffffn) {
    const out = new Uint8Array(3);
    out[0] = initial | 25;
    new DataView(out.buffer).setUint16(1, Number(n));
    return out;
  }
  if (n <= 0xffffffffn) {
    const out = new Uint8Array(5);
    out[0] = initial | 26;
    new DataView(out.buffer).setUint32(1, Number(n));
    return out;
  }
  const out = new Uint8Array(9);
  out[0] = initial | 27;
  new DataView(out.buffer).setBigUint64(1, n);
  return out;
}

function concat(parts: readonly Uint8Array[]): Uint8Array {
  let total = 0;
  for (const part of parts) total += part.length;
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}
