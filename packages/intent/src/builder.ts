/**
 * Intent Builder
 *
 * Collects an action, its parameters and the resource envelope, checks
 * them against the static schema bounds and produces a frozen Intent.
 *
 * Build-time checks never consult the ANS state: an intent planned while
 * SAFE stays well-formed after the robot enters DANGER. Scaled bounds are
 * applied at verification time by {@link validateIntentParameters}.
 *
 * Errors are collected, not thrown. The only exceptions are the two
 * short-circuits (missing action, unknown action), which still come back
 * as a single-entry list.
 */

import type { Address, Hex, Intent } from "@vagus/types";
import { isAddress } from "@vagus/types";
import { checkStatic, ZERO_HASH, type SchemaStore } from "@vagus/schema";
import { sha256Hex } from "@vagus/codec";
import { bytesToHex } from "viem";
import { IntentValidationError } from "./errors.js";
import { encodeParams } from "./params.js";
import { defaultNonceSource, systemClock, type Clock, type NonceSource } from "./nonce.js";

// =============================================================================
// Types
// =============================================================================

export interface IntentBuilderOptions {
  /** Executor that will run the action (u64, > 0) */
  readonly executorId: bigint | number;

  /** Planner address, 20 bytes */
  readonly planner: Address;

  readonly clock?: Clock;
  readonly nonces?: NonceSource;
}

export type BuildResult =
  | { readonly ok: true; readonly intent: Intent }
  | { readonly ok: false; readonly error: IntentValidationError };

// =============================================================================
// Constants
// =============================================================================

const DEFAULT_MAX_DURATION_MS = 30_000;
const DEFAULT_MAX_ENERGY_J = 1000;
const DEFAULT_VALIDITY_DURATION_S = 3600;

const U32_MAX = 0xffffffff;
const U64_MAX = (1n << 64n) - 1n;

const utf8 = new TextEncoder();

/**
 * `0x` + SHA-256 of the UTF-8 action name.
 */
export function actionIdFor(action: string): Hex {
  return sha256Hex(utf8.encode(action));
}

// =============================================================================
// Builder
// =============================================================================

export class IntentBuilder {
  private action = "";
  private readonly params = new Map<string, number>();
  private maxDurationMs = DEFAULT_MAX_DURATION_MS;
  private maxEnergyJ = DEFAULT_MAX_ENERGY_J;
  private validityDurationS = DEFAULT_VALIDITY_DURATION_S;

  private readonly clock: Clock;
  private readonly nonces: NonceSource;

  constructor(
    private readonly store: SchemaStore,
    private readonly options: IntentBuilderOptions,
  ) {
    this.clock = options.clock ?? systemClock;
    this.nonces = options.nonces ?? defaultNonceSource;
  }

  setAction(action: string): this {
    this.action = action;
    return this;
  }

  /** Overwrites any earlier value for the same name. */
  setParameter(name: string, value: number): this {
    this.params.set(name, value);
    return this;
  }

  setMaxDuration(ms: number): this {
    this.maxDurationMs = ms;
    return this;
  }

  setMaxEnergy(joules: number): this {
    this.maxEnergyJ = joules;
    return this;
  }

  setValidityDuration(seconds: number): this {
    this.validityDurationS = seconds;
    return this;
  }

  /**
   * Every problem that would stop {@link build}, or an empty list.
   */
  validate(): string[] {
    if (this.action === "") {
      return ["Action name is required"];
    }

    if (this.store.getAction(this.action) === undefined) {
      return [`Unknown action: ${this.action}`];
    }

    const errors: string[] = [];

    for (const [name, value] of this.params) {
      if (this.store.getParameter(this.action, name) === undefined) {
        errors.push(`Unknown parameter: ${name} for action ${this.action}`);
        continue;
      }
      if (!Number.isFinite(value)) {
        errors.push(`Parameter ${name}: value must be a finite number`);
        continue;
      }
      const check = checkStatic(this.store, this.action, name, value);
      if (!check.valid) {
        errors.push(`Parameter ${name}: ${check.message}`);
      }
    }

    errors.push(...this.envelopeErrors());
    return errors;
  }

  build(): BuildResult {
    const errors = this.validate();
    if (errors.length > 0) {
      return { ok: false, error: new IntentValidationError(errors) };
    }
    return { ok: true, intent: this.assemble() };
  }

  /**
   * @throws {IntentValidationError} with every collected message
   */
  buildOrThrow(): Intent {
    const result = this.build();
    if (!result.ok) {
      throw result.error;
    }
    return result.intent;
  }

  // ===========================================================================
  // Internal
  // ===========================================================================

  private envelopeErrors(): string[] {
    const errors: string[] = [];
    const { executorId, planner } = this.options;

    if (!isU64(executorId) || BigInt(executorId) === 0n) {
      errors.push(`executor_id must be a positive u64: ${executorId}`);
    }
    if (!isAddress(planner)) {
      errors.push(`planner must be a 20-byte hex address: ${planner}`);
    }
    if (!isPositiveU32(this.maxDurationMs)) {
      errors.push(`max_duration_ms must be a positive u32: ${this.maxDurationMs}`);
    }
    if (!isPositiveU32(this.maxEnergyJ)) {
      errors.push(`max_energy_j must be a positive u32: ${this.maxEnergyJ}`);
    }
    if (!Number.isSafeInteger(this.validityDurationS) || this.validityDurationS < 0) {
      errors.push(
        `validity_duration_s must be a non-negative integer: ${this.validityDurationS}`,
      );
    }
    return errors;
  }

  private assemble(): Intent {
    const executorId = BigInt(this.options.executorId);
    const actionId = actionIdFor(this.action);
    const params = bytesToHex(encodeParams(this.params));
    const envelope = `${executorId}:${actionId}:${params.slice(2)}`;
    const now = BigInt(Math.floor(this.clock()));

    return Object.freeze({
      executorId,
      actionId,
      params,
      envelopeHash: sha256Hex(utf8.encode(envelope)),
      preStateRoot: ZERO_HASH,
      notBefore: now,
      notAfter: now + BigInt(this.validityDurationS),
      maxDurationMs: this.maxDurationMs,
      maxEnergyJ: this.maxEnergyJ,
      planner: `0x${this.options.planner.slice(2).toLowerCase()}`,
      nonce: this.nonces.next(now),
    });
  }
}

function isU64(value: bigint | number): boolean {
  if (typeof value === "number" && !Number.isSafeInteger(value)) return false;
  const n = BigInt(value);
  return n >= 0n && n <= U64_MAX;
}

function isPositiveU32(value: number): boolean {
  return Number.isInteger(value) && value > 0 && value <= U32_MAX;
}
