/**
 * Canonical Decoder Tests
 *
 * Verifies:
 * - Canonical bytes decode back to the original value
 * - Valid but non-canonical CBOR is rejected
 * - Malformed CBOR is rejected
 */

import { describe, it, expect } from "vitest";
import { hexToBytes } from "viem";
import { decodeCanonical } from "../src/decoder.js";
import { encodeCanonical } from "../src/encoder.js";
import { EncodingError } from "../src/errors.js";
import type { CanonicalValue } from "../src/types.js";

function roundTrip(value: CanonicalValue): CanonicalValue {
  return decodeCanonical(encodeCanonical(value));
}

function decodeError(hex: `0x${string}`): EncodingError {
  try {
    decodeCanonical(hexToBytes(hex));
  } catch (error) {
    if (error instanceof EncodingError) return error;
    throw error;
  }
  throw new Error("expected EncodingError");
}

describe("decodeCanonical", () => {
  it("decodes a nested map", () => {
    const value = { outer: { inner: "value" }, list: [1, -2, 1.5], flag: true, none: null };
    expect(decodeCanonical(encodeCanonical(value))).toEqual(value);
  });

  it("decodes byte strings as Uint8Array", () => {
    const decoded = decodeCanonical(encodeCanonical({ raw: Uint8Array.of(9, 8, 7) }));
    expect(decoded).toEqual({ raw: Uint8Array.of(9, 8, 7) });
  });

  it("decodes integer-keyed maps as Map", () => {
    const map = new Map<CanonicalValue, CanonicalValue>([
      [1, "a"],
      [2, "b"],
    ]);
    const decoded = roundTrip(map);
    expect(decoded).toBeInstanceOf(Map);
    expect(decoded).toEqual(map);
  });

  it("keeps mixed and wide keys in a Map", () => {
    const map = new Map<CanonicalValue, CanonicalValue>([
      ["a", 0],
      [10, "x"],
      [2n ** 63n, true],
    ]);
    expect(roundTrip(map)).toEqual(map);
  });

  it("decodes text-keyed maps as plain objects", () => {
    const decoded = roundTrip(new Map<CanonicalValue, CanonicalValue>([["k", 1]]));
    expect(decoded).not.toBeInstanceOf(Map);
    expect(decoded).toEqual({ k: 1 });
    expect(roundTrip(new Map())).toEqual({});
  });

  it("keeps a __proto__ key as an own property", () => {
    const decoded = roundTrip(JSON.parse('{"__proto__":1,"a":2}'));
    if (decoded === null || typeof decoded !== "object") throw new Error("expected a map");
    expect(Object.keys(decoded)).toEqual(["a", "__proto__"]);
    expect(Object.getPrototypeOf(decoded)).toBe(Object.prototype);
    expect(Reflect.get(decoded, "__proto__")).toBe(1);
  });

  it("decodes 64-bit heads to numbers when safe", () => {
    expect(decodeCanonical(encodeCanonical(2 ** 40))).toBe(2 ** 40);
  });

  it("rejects a float wider than needed", () => {
    expect(decodeError("0xfb3ff8000000000000").code).toBe("NON_CANONICAL");
  });

  it("rejects an integer with a long head", () => {
    expect(decodeError("0x1805").code).toBe("NON_CANONICAL");
  });

  it("rejects unsorted map keys", () => {
    // {"b": 1, "a": 2}
    expect(decodeError("0xa2616201616102").code).toBe("NON_CANONICAL");
  });

  it("rejects indefinite-length arrays", () => {
    expect(decodeError("0x9f01ff").code).toBe("NON_CANONICAL");
  });

  it("rejects undefined", () => {
    expect(decodeError("0xf7").code).toBe("NON_CANONICAL");
  });

  it("rejects truncated input", () => {
    expect(decodeError("0x6561").code).toBe("INVALID_BYTES");
  });
});
