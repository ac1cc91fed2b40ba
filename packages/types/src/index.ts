/**
 * @vagus/types — Shared domain types for the Vagus planner.
 *
 * These types are used across all Vagus packages:
 * - Action parameter schemas and ANS state policy
 * - Intents, their wire form and the signing domain
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Schema types
export type {
  ParameterSchema,
  ActionSchema,
  ActionSource,
  StateScaling,
  StatePolicy,
  PolicySchema,
  AnsState,
  KnownAnsState,
} from "./schema.js";

// Intent types
export type {
  Hex,
  Address,
  Intent,
  IntentWire,
  SigningDomain,
} from "./intent.js";

// Runtime type guards
export {
  isHex,
  isAddress,
  isBytes32,
  isKnownAnsState,
  isStateScaling,
  isIntent,
} from "./guards.js";
