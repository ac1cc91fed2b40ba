/**
 * Wire form of an intent.
 *
 * JSON has no bigint and no bytes, so integers travel as decimal strings
 * and byte fields as 0x-prefixed lowercase hex. `serializeIntent` emits
 * RFC 8785 canonical JSON, so equal intents serialize to equal text.
 */

import type { Intent, IntentWire } from "@vagus/types";
import { canonicalize } from "json-canonicalize";
import { z } from "zod";

const U32_MAX = 0xffffffff;
const U64_MAX = (1n << 64n) - 1n;
const U256_MAX = (1n << 256n) - 1n;

const bytes32 = z
  .string()
  .regex(/^0x[0-9a-f]{64}$/, "must be 32 bytes of lowercase hex")
  .transform((v): `0x${string}` => `0x${v.slice(2)}`);

const address = z
  .string()
  .regex(/^0x[0-9a-f]{40}$/, "must be a 20-byte lowercase hex address")
  .transform((v): `0x${string}` => `0x${v.slice(2)}`);

const hexBytes = z
  .string()
  .regex(/^0x(?:[0-9a-f]{2})*$/, "must be even-length lowercase hex")
  .transform((v): `0x${string}` => `0x${v.slice(2)}`);

function decimal(max: bigint) {
  return z
    .string()
    .regex(/^(?:0|[1-9][0-9]*)$/, "must be a decimal integer")
    .transform((v) => BigInt(v))
    .refine((v) => v <= max, "out of range");
}

const u32 = z.number().int().min(0).max(U32_MAX);

export const IntentWireSchema = z
  .object({
    executorId: decimal(U64_MAX),
    actionId: bytes32,
    params: hexBytes,
    envelopeHash: bytes32,
    preStateRoot: bytes32,
    notBefore: decimal(U256_MAX),
    notAfter: decimal(U256_MAX),
    maxDurationMs: u32,
    maxEnergyJ: u32,
    planner: address,
    nonce: decimal(U256_MAX),
  })
  .strict();

export function toWire(intent: Intent): IntentWire {
  return {
    executorId: intent.executorId.toString(),
    actionId: lower(intent.actionId),
    params: lower(intent.params),
    envelopeHash: lower(intent.envelopeHash),
    preStateRoot: lower(intent.preStateRoot),
    notBefore: intent.notBefore.toString(),
    notAfter: intent.notAfter.toString(),
    maxDurationMs: intent.maxDurationMs,
    maxEnergyJ: intent.maxEnergyJ,
    planner: lower(intent.planner),
    nonce: intent.nonce.toString(),
  };
}

/**
 * Parse and validate a wire intent.
 *
 * @throws {ZodError} when a field is missing, mistyped or out of range
 */
export function fromWire(wire: unknown): Intent {
  return Object.freeze(IntentWireSchema.parse(wire));
}

export function serializeIntent(intent: Intent): string {
  return canonicalize(toWire(intent));
}

function lower(value: `0x${string}`): `0x${string}` {
  return `0x${value.slice(2).toLowerCase()}`;
}
