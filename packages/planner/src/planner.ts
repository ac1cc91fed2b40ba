/**
 * Planner
 *
 * Composes a loaded schema store, a signing domain and a logger into the
 * planning workflow:
 *
 *   1. Build the intent against static bounds
 *   2. Re-check its parameters against bounds scaled by the current ANS state
 *   3. Produce the EIP-712 digest, typed-data document, content hash and
 *      canonical JSON wire form
 *
 * The current ANS state is the only mutable field. The planner is meant to
 * have a single owner; nothing here is safe to share across workers.
 */

import type { Address, AnsState, Hex, Intent, SigningDomain } from "@vagus/types";
import type { SchemaStore } from "@vagus/schema";
import type { CanonicalDigest } from "@vagus/codec";
import {
  DEFAULT_DOMAIN,
  IntentBuilder,
  MonotonicNonceSource,
  createTypedData,
  intentContentDigest,
  intentSigningDigest,
  serializeIntent,
  systemClock,
  validateIntent,
  validateIntentParameters,
  type Clock,
  type IntentTypedData,
  type NonceSource,
} from "@vagus/intent";
import type { Logger } from "pino";
import { PlannerError } from "./errors.js";

// =============================================================================
// Types
// =============================================================================

export interface PlannerOptions {
  readonly store: SchemaStore;
  readonly executorId: bigint;
  readonly planner: Address;
  readonly logger: Logger;
  readonly domain?: SigningDomain;
  readonly ansState?: AnsState;
  readonly clock?: Clock;
  readonly nonces?: NonceSource;
}

export interface PlanRequest {
  readonly action: string;
  readonly parameters: Readonly<Record<string, number>>;
  readonly maxDurationMs?: number;
  readonly maxEnergyJ?: number;
  readonly validityDurationS?: number;
  /** Overrides the planner's default executor. */
  readonly executorId?: bigint;
}

export interface PlannedIntent {
  readonly intent: Intent;
  /** EIP-712 signing digest under the planner's domain */
  readonly digest: Hex;
  readonly typedData: IntentTypedData;
  /** Dual-hash commitment over the canonical CBOR form */
  readonly contentHash: CanonicalDigest;
  /** RFC 8785 canonical JSON of the wire form */
  readonly wire: string;
}

export type PlanResult =
  | { readonly ok: true; readonly plan: PlannedIntent }
  | { readonly ok: false; readonly errors: readonly string[] };

// =============================================================================
// Planner
// =============================================================================

export class Planner {
  private ansState: AnsState;
  private readonly domain: SigningDomain;
  private readonly clock: Clock;
  private readonly nonces: NonceSource;
  private readonly logger: Logger;

  constructor(private readonly options: PlannerOptions) {
    this.domain = options.domain ?? DEFAULT_DOMAIN;
    this.clock = options.clock ?? systemClock;
    this.nonces = options.nonces ?? new MonotonicNonceSource();
    this.logger = options.logger;
    this.ansState = options.ansState ?? "SAFE";
    this.requireKnownState(this.ansState);
  }

  get currentAnsState(): AnsState {
    return this.ansState;
  }

  get signingDomain(): SigningDomain {
    return this.domain;
  }

  /**
   * @throws {PlannerError} UNKNOWN_ANS_STATE when the policy has no such state
   */
  setAnsState(state: AnsState): void {
    this.requireKnownState(state);
    if (state === this.ansState) return;

    const previous = this.ansState;
    this.ansState = state;
    this.logger.info({ from: previous, to: state }, "ANS state changed");
  }

  plan(request: PlanRequest): PlanResult {
    const builder = new IntentBuilder(this.options.store, {
      executorId: request.executorId ?? this.options.executorId,
      planner: this.options.planner,
      clock: this.clock,
      nonces: this.nonces,
    }).setAction(request.action);

    for (const [name, value] of Object.entries(request.parameters)) {
      builder.setParameter(name, value);
    }
    if (request.maxDurationMs !== undefined) builder.setMaxDuration(request.maxDurationMs);
    if (request.maxEnergyJ !== undefined) builder.setMaxEnergy(request.maxEnergyJ);
    if (request.validityDurationS !== undefined) {
      builder.setValidityDuration(request.validityDurationS);
    }

    const built = builder.build();
    if (!built.ok) {
      return this.reject(request.action, built.error.errors);
    }

    const { intent } = built;
    const scaledErrors = validateIntentParameters(
      this.options.store,
      request.action,
      intent.params,
      this.ansState,
    );
    if (scaledErrors.length > 0) {
      return this.reject(request.action, scaledErrors);
    }

    const plan: PlannedIntent = {
      intent,
      digest: intentSigningDigest(intent, this.domain),
      typedData: createTypedData(intent, this.domain),
      contentHash: intentContentDigest(intent),
      wire: serializeIntent(intent),
    };

    this.logger.info(
      {
        action: request.action,
        ansState: this.ansState,
        nonce: intent.nonce.toString(),
        digest: plan.digest,
      },
      "Intent planned",
    );
    return { ok: true, plan };
  }

  /**
   * Holistic check of an intent under the current ANS state.
   */
  verify(intent: Intent): string[] {
    return validateIntent(this.options.store, intent, this.ansState, { now: this.clock() });
  }

  private reject(action: string, errors: readonly string[]): PlanResult {
    this.logger.warn({ action, ansState: this.ansState, errors }, "Intent rejected");
    return { ok: false, errors };
  }

  private requireKnownState(state: AnsState): void {
    if (this.options.store.getScaling(state) === undefined) {
      throw new PlannerError("UNKNOWN_ANS_STATE", `Unknown ANS state: ${state}`);
    }
  }
}
