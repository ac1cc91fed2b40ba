/**
 * Intent Validator
 *
 * Holistic checks on a built intent at verification time: validity
 * window, resource envelope and the current ANS state. Parameter bounds
 * scaled by the ANS state are checked separately by
 * {@link validateIntentParameters}, which needs the action name.
 *
 * Both functions return every violation found; an empty list means the
 * intent may run.
 */

import type { AnsState, Hex, Intent } from "@vagus/types";
import { isHex } from "@vagus/types";
import { hexToBytes } from "viem";
import { checkScaled, type SchemaStore } from "@vagus/schema";
import { EncodingError } from "@vagus/codec";
import { decodeParams } from "./params.js";
import { systemClock } from "./nonce.js";

/** How far ahead of `now` an intent's window may open. */
export const MAX_FUTURE_START_S = 3600n;

export interface ValidateIntentOptions {
  /** Unix seconds; defaults to the system clock. */
  readonly now?: number | bigint;
}

export function validateIntent(
  store: SchemaStore,
  intent: Intent,
  ansState: AnsState,
  options: ValidateIntentOptions = {},
): string[] {
  assertFiniteField("maxDurationMs", intent.maxDurationMs);
  assertFiniteField("maxEnergyJ", intent.maxEnergyJ);

  const now = toSeconds(options.now ?? systemClock());
  const errors: string[] = [];

  // Temporal
  if (intent.notBefore > intent.notAfter) {
    errors.push("not_before cannot be after not_after");
  }
  if (intent.notAfter < now) {
    errors.push("Intent has already expired");
  }
  if (intent.notBefore > now + MAX_FUTURE_START_S) {
    errors.push("Intent validity starts too far in the future");
  }

  // Resource
  if (intent.maxDurationMs <= 0) {
    errors.push("max_duration_ms must be positive");
  }
  if (intent.maxEnergyJ <= 0) {
    errors.push("max_energy_j must be positive");
  }
  if (intent.executorId <= 0n) {
    errors.push("executor_id must be positive");
  }

  // Policy
  if (store.getScaling(ansState) === undefined) {
    errors.push(`Unknown ANS state: ${ansState}`);
  }

  return errors;
}

/**
 * Check the encoded parameter payload against bounds scaled by `ansState`.
 *
 * An unknown ANS state is reported once, however many brakeable
 * parameters the action has.
 */
export function validateIntentParameters(
  store: SchemaStore,
  actionName: string,
  params: Hex | Uint8Array,
  ansState: AnsState,
): string[] {
  if (store.getAction(actionName) === undefined) {
    return [`Unknown action: ${actionName}`];
  }

  let decoded: Map<string, number>;
  try {
    decoded = decodeParams(toBytes(params));
  } catch (error) {
    if (error instanceof EncodingError) {
      return [`Malformed params: ${error.message}`];
    }
    throw error;
  }

  const errors: string[] = [];
  for (const [name, value] of decoded) {
    const check = checkScaled(store, actionName, name, value, ansState);
    if (check.valid) continue;

    switch (check.code) {
      case "UNKNOWN_PARAMETER":
        errors.push(`Unknown parameter: ${name} for action ${actionName}`);
        break;
      case "UNKNOWN_ANS_STATE":
        if (!errors.includes(check.message)) errors.push(check.message);
        break;
      default:
        errors.push(`Parameter ${name}: ${check.message}`);
    }
  }
  return errors;
}

function toBytes(params: Hex | Uint8Array): Uint8Array {
  if (typeof params !== "string") return params;
  if (!isHex(params)) {
    throw new EncodingError("INVALID_BYTES", `Parameter payload is not hex: ${params}`);
  }
  return hexToBytes(params);
}

function toSeconds(now: number | bigint): bigint {
  if (typeof now === "bigint") return now;
  assertFiniteField("now", now);
  return BigInt(Math.floor(now));
}

function assertFiniteField(field: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new TypeError(`${field} must be a finite number, got ${value}`);
  }
}
