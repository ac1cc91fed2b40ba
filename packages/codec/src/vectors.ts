/**
 * Conformance vectors.
 *
 * The vector file is the compatibility gate between independently
 * written verifiers: every implementation must reproduce each record's
 * `cbor_hex`, `sha256_hex` and `keccak_hex` exactly.
 *
 * Format:
 *   { version, test_vectors: [{ name, input, cbor_hex, sha256_hex, keccak_hex }] }
 */

import { readFileSync } from "node:fs";
import { bytesToHex } from "viem";
import { z } from "zod";
import { canonicalDigest } from "./digest.js";

// =============================================================================
// Schema
// =============================================================================

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ]),
);

const HexDigits = z.string().regex(/^(?:[0-9a-f]{2})*$/, "expected lowercase hex without 0x");

export const ConformanceVectorSchema = z.object({
  name: z.string().min(1),
  input: JsonValueSchema,
  cbor_hex: HexDigits,
  sha256_hex: HexDigits.length(64),
  keccak_hex: HexDigits.length(64),
});

export const VectorFileSchema = z.object({
  version: z.string(),
  test_vectors: z.array(ConformanceVectorSchema),
});

export type ConformanceVector = z.infer<typeof ConformanceVectorSchema>;
export type VectorFile = z.infer<typeof VectorFileSchema>;

// =============================================================================
// Loading
// =============================================================================

/**
 * @throws {z.ZodError} if the document does not match the vector format
 */
export function parseVectorFile(raw: unknown): VectorFile {
  return VectorFileSchema.parse(raw);
}

export function readVectorFile(path: string): VectorFile {
  return parseVectorFile(JSON.parse(readFileSync(path, "utf-8")));
}

// =============================================================================
// Verification
// =============================================================================

export type VectorField = "cbor_hex" | "sha256_hex" | "keccak_hex";

export interface VectorMismatch {
  readonly name: string;
  readonly field: VectorField;
  readonly expected: string;
  readonly actual: string;
}

export interface VectorReport {
  readonly total: number;
  readonly passed: number;
  readonly mismatches: readonly VectorMismatch[];
}

/**
 * Re-encode every vector input and compare all three hex strings.
 * A vector with several mismatching fields reports each one.
 */
export function verifyVectors(file: VectorFile): VectorReport {
  const mismatches: VectorMismatch[] = [];
  let passed = 0;

  for (const vector of file.test_vectors) {
    const digest = canonicalDigest(vector.input);
    const actual: Record<VectorField, string> = {
      cbor_hex: stripPrefix(bytesToHex(digest.bytes)),
      sha256_hex: stripPrefix(digest.sha256),
      keccak_hex: stripPrefix(digest.keccak256),
    };

    const before = mismatches.length;
    for (const field of ["cbor_hex", "sha256_hex", "keccak_hex"] as const) {
      if (actual[field] !== vector[field]) {
        mismatches.push({ name: vector.name, field, expected: vector[field], actual: actual[field] });
      }
    }
    if (mismatches.length === before) passed++;
  }

  return { total: file.test_vectors.length, passed, mismatches };
}

function stripPrefix(hex: string): string {
  return hex.startsWith("0x") ? hex.slice(2) : hex;
}
