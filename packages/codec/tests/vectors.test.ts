/**
 * Conformance Vector Tests
 *
 * The bundled vector file is shared with the on-chain verifiers; every
 * record must reproduce byte for byte.
 */

import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { ZodError } from "zod";
import {
  parseVectorFile,
  readVectorFile,
  verifyVectors,
  type VectorFile,
} from "../src/vectors.js";

const VECTOR_PATH = fileURLToPath(new URL("../vectors/cbor_cases.json", import.meta.url));

describe("bundled conformance vectors", () => {
  const file = readVectorFile(VECTOR_PATH);

  it("loads every record", () => {
    expect(file.version).toBe("1.0");
    expect(file.test_vectors).toHaveLength(16);
  });

  it("reproduces every record", () => {
    const report = verifyVectors(file);
    expect(report.mismatches).toEqual([]);
    expect(report.passed).toBe(report.total);
  });

  it.each(readVectorFile(VECTOR_PATH).test_vectors)("$name", (vector) => {
    const report = verifyVectors({ version: "1.0", test_vectors: [vector] });
    expect(report.passed).toBe(1);
  });
});

describe("verifyVectors", () => {
  const tampered: VectorFile = {
    version: "1.0",
    test_vectors: [
      {
        name: "wrong_everything",
        input: { key: "value" },
        cbor_hex: "a0",
        sha256_hex: "00".repeat(32),
        keccak_hex: "00".repeat(32),
      },
    ],
  };

  it("reports each mismatching field", () => {
    const report = verifyVectors(tampered);
    expect(report.passed).toBe(0);
    expect(report.mismatches.map((m) => m.field)).toEqual([
      "cbor_hex",
      "sha256_hex",
      "keccak_hex",
    ]);
    expect(report.mismatches[0]).toEqual({
      name: "wrong_everything",
      field: "cbor_hex",
      expected: "a0",
      actual: "a1636b65796576616c7565",
    });
  });
});

describe("parseVectorFile", () => {
  it("rejects 0x-prefixed hashes", () => {
    const raw = {
      version: "1.0",
      test_vectors: [
        {
          name: "prefixed",
          input: {},
          cbor_hex: "a0",
          sha256_hex: `0x${"00".repeat(31)}`,
          keccak_hex: "00".repeat(32),
        },
      ],
    };
    expect(() => parseVectorFile(raw)).toThrow(ZodError);
  });

  it("rejects a record without input", () => {
    const raw = {
      version: "1.0",
      test_vectors: [{ name: "x", cbor_hex: "a0", sha256_hex: "00".repeat(32), keccak_hex: "00".repeat(32) }],
    };
    expect(() => parseVectorFile(raw)).toThrow(ZodError);
  });
});
