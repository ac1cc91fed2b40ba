/**
 * Content commitment for a built intent.
 *
 * The intent is encoded as a canonical CBOR map (integers as CBOR ints,
 * hashes and addresses as byte strings) and hashed with both SHA-256 and
 * Keccak-256, giving the data root both verifier chains store.
 */

import type { Intent } from "@vagus/types";
import { canonicalDigest, type CanonicalDigest, type CanonicalMap } from "@vagus/codec";
import { hexToBytes } from "viem";

export function intentToCanonical(intent: Intent): CanonicalMap {
  return {
    executorId: intent.executorId,
    actionId: hexToBytes(intent.actionId),
    params: hexToBytes(intent.params),
    envelopeHash: hexToBytes(intent.envelopeHash),
    preStateRoot: hexToBytes(intent.preStateRoot),
    notBefore: intent.notBefore,
    notAfter: intent.notAfter,
    maxDurationMs: intent.maxDurationMs,
    maxEnergyJ: intent.maxEnergyJ,
    planner: hexToBytes(intent.planner),
    nonce: intent.nonce,
  };
}

export function intentContentDigest(intent: Intent): CanonicalDigest {
  return canonicalDigest(intentToCanonical(intent));
}
