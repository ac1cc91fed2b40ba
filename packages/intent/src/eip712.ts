/**
 * EIP-712 signing digest for intents.
 *
 * Digest = keccak256(0x19 || 0x01 || domainSeparator || structHash).
 * Every hash in the construction is Keccak-256 so the result verifies
 * with `ecrecover` on the EVM side.
 *
 * Encoding rules for struct fields:
 * - integers are 32-byte big-endian words
 * - bytes32 values are used as-is
 * - dynamic `string`/`bytes` fields are replaced by their keccak
 * - addresses stay at their native 20 bytes (not left-padded)
 *
 * The last rule departs from the EIP-712 reference encoding. On-chain
 * verifiers for intents use the same packed layout, so it is kept.
 */

import type { Address, Hex, Intent, SigningDomain } from "@vagus/types";
import { isAddress, isBytes32, isHex } from "@vagus/types";
import { EncodingError } from "@vagus/codec";
import { concat, keccak256, numberToHex, stringToHex } from "viem";

// =============================================================================
// Type strings
// =============================================================================

export const DOMAIN_TYPE =
  "EIP712Domain(string name,string version,uint256 chainId,address verifyingContract)";

export const INTENT_TYPE =
  "Intent(uint256 executorId,bytes32 actionId,bytes params,bytes32 envelopeHash," +
  "bytes32 preStateRoot,uint256 notBefore,uint256 notAfter,uint32 maxDurationMs," +
  "uint32 maxEnergyJ,address planner,uint256 nonce)";

export const DOMAIN_TYPEHASH: Hex = keccak256(stringToHex(DOMAIN_TYPE));
export const INTENT_TYPEHASH: Hex = keccak256(stringToHex(INTENT_TYPE));

export const ZERO_ADDRESS: Address = `0x${"00".repeat(20)}`;

export const DEFAULT_DOMAIN: SigningDomain = Object.freeze({
  name: "Vagus",
  version: "1",
  chainId: 31337n,
  verifyingContract: ZERO_ADDRESS,
});

const MAX_UINT256 = (1n << 256n) - 1n;

// =============================================================================
// Hashes
// =============================================================================

export function domainSeparator(domain: SigningDomain): Hex {
  return keccak256(
    concat([
      DOMAIN_TYPEHASH,
      keccak256(stringToHex(domain.name)),
      keccak256(stringToHex(domain.version)),
      word(domain.chainId, "chainId"),
      address(domain.verifyingContract, "verifyingContract"),
    ]),
  );
}

export function intentStructHash(intent: Intent): Hex {
  return keccak256(
    concat([
      INTENT_TYPEHASH,
      word(intent.executorId, "executorId"),
      bytes32(intent.actionId, "actionId"),
      keccak256(hexBytes(intent.params, "params")),
      bytes32(intent.envelopeHash, "envelopeHash"),
      bytes32(intent.preStateRoot, "preStateRoot"),
      word(intent.notBefore, "notBefore"),
      word(intent.notAfter, "notAfter"),
      word(intent.maxDurationMs, "maxDurationMs"),
      word(intent.maxEnergyJ, "maxEnergyJ"),
      address(intent.planner, "planner"),
      word(intent.nonce, "nonce"),
    ]),
  );
}

/**
 * The 32-byte digest a planner signs for `intent` under `domain`.
 *
 * @throws {EncodingError} for an integer outside uint256, a non-integral
 *   number, or an address or hash of the wrong width
 */
export function intentSigningDigest(
  intent: Intent,
  domain: SigningDomain = DEFAULT_DOMAIN,
): Hex {
  return keccak256(concat(["0x1901", domainSeparator(domain), intentStructHash(intent)]));
}

// =============================================================================
// Typed data document
// =============================================================================

export interface TypedDataField {
  readonly name: string;
  readonly type: string;
}

export interface IntentTypedData {
  readonly types: {
    readonly EIP712Domain: readonly TypedDataField[];
    readonly Intent: readonly TypedDataField[];
  };
  readonly primaryType: "Intent";
  readonly domain: {
    readonly name: string;
    readonly version: string;
    readonly chainId: number | string;
    readonly verifyingContract: Address;
  };
  readonly message: {
    readonly executorId: string;
    readonly actionId: Hex;
    readonly params: Hex;
    readonly envelopeHash: Hex;
    readonly preStateRoot: Hex;
    readonly notBefore: string;
    readonly notAfter: string;
    readonly maxDurationMs: number;
    readonly maxEnergyJ: number;
    readonly planner: Address;
    readonly nonce: string;
  };
}

export const DOMAIN_FIELDS: readonly TypedDataField[] = parseFields(DOMAIN_TYPE);
export const INTENT_FIELDS: readonly TypedDataField[] = parseFields(INTENT_TYPE);

/**
 * Wallet-consumable document for `eth_signTypedData_v4` style signers.
 * uint256 values are decimal strings; chainId is a number when it fits.
 */
export function createTypedData(
  intent: Intent,
  domain: SigningDomain = DEFAULT_DOMAIN,
): IntentTypedData {
  const chainId =
    domain.chainId <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(domain.chainId)
      : domain.chainId.toString();

  return {
    types: { EIP712Domain: DOMAIN_FIELDS, Intent: INTENT_FIELDS },
    primaryType: "Intent",
    domain: {
      name: domain.name,
      version: domain.version,
      chainId,
      verifyingContract: domain.verifyingContract,
    },
    message: {
      executorId: intent.executorId.toString(),
      actionId: intent.actionId,
      params: intent.params,
      envelopeHash: intent.envelopeHash,
      preStateRoot: intent.preStateRoot,
      notBefore: intent.notBefore.toString(),
      notAfter: intent.notAfter.toString(),
      maxDurationMs: intent.maxDurationMs,
      maxEnergyJ: intent.maxEnergyJ,
      planner: intent.planner,
      nonce: intent.nonce.toString(),
    },
  };
}

// =============================================================================
// Field encoders
// =============================================================================

function word(value: bigint | number, field: string): Hex {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw new EncodingError("OUT_OF_RANGE", `${field} must be an integer, got ${value}`);
  }
  const n = BigInt(value);
  if (n < 0n || n > MAX_UINT256) {
    throw new EncodingError("OUT_OF_RANGE", `${field} out of uint256 range: ${n}`);
  }
  return numberToHex(n, { size: 32 });
}

function bytes32(value: Hex, field: string): Hex {
  if (!isBytes32(value)) {
    throw new EncodingError("INVALID_BYTES", `${field} must be 32 bytes: ${value}`);
  }
  return value;
}

function hexBytes(value: Hex, field: string): Hex {
  if (!isHex(value)) {
    throw new EncodingError("INVALID_BYTES", `${field} must be even-length hex: ${value}`);
  }
  return value;
}

function address(value: Address, field: string): Hex {
  if (!isAddress(value)) {
    throw new EncodingError("INVALID_BYTES", `${field} must be a 20-byte address: ${value}`);
  }
  return value;
}

function parseFields(typeString: string): TypedDataField[] {
  const body = typeString.slice(typeString.indexOf("(") + 1, -1);
  return body.split(",").map((member) => {
    const [type = "", name = ""] = member.split(" ");
    return { name, type };
  });
}
