/**
 * Runtime Type Guards
 *
 * Narrowing functions for Vagus domain types. These enable safe runtime
 * validation at system boundaries (wire input, loaded sources, caller
 * supplied addresses).
 */

import type { Address, Hex, Intent } from "./intent.js";
import type { KnownAnsState, StateScaling } from "./schema.js";

// =============================================================================
// Hex guards
// =============================================================================

const HEX_PATTERN = /^0x(?:[0-9a-fA-F]{2})*$/;

/**
 * True for a 0x-prefixed, even-length hex string.
 * When `byteLength` is given the decoded length must match exactly.
 */
export function isHex(value: unknown, byteLength?: number): value is Hex {
  if (typeof value !== "string" || !HEX_PATTERN.test(value)) return false;
  return byteLength === undefined || value.length === 2 + byteLength * 2;
}

export function isAddress(value: unknown): value is Address {
  return isHex(value, 20);
}

export function isBytes32(value: unknown): value is Hex {
  return isHex(value, 32);
}

// =============================================================================
// Schema guards
// =============================================================================

const KNOWN_ANS_STATES = new Set<string>(["SAFE", "DANGER", "SHUTDOWN"]);

export function isKnownAnsState(value: unknown): value is KnownAnsState {
  return typeof value === "string" && KNOWN_ANS_STATES.has(value);
}

export function isStateScaling(value: unknown): value is StateScaling {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isUnitFactor(v.speed) && isUnitFactor(v.force);
}

function isUnitFactor(value: unknown): boolean {
  return typeof value === "number" && value >= 0 && value <= 1;
}

// =============================================================================
// Intent guards
// =============================================================================

const U32_MAX = 0xffffffff;

function isU32(value: unknown): boolean {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= U32_MAX
  );
}

export function isIntent(value: unknown): value is Intent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.executorId === "bigint" &&
    isBytes32(v.actionId) &&
    isHex(v.params) &&
    isBytes32(v.envelopeHash) &&
    isBytes32(v.preStateRoot) &&
    typeof v.notBefore === "bigint" &&
    typeof v.notAfter === "bigint" &&
    isU32(v.maxDurationMs) &&
    isU32(v.maxEnergyJ) &&
    isAddress(v.planner) &&
    typeof v.nonce === "bigint"
  );
}
