/**
 * @vagus/intent — Intent building, signing digest and validation.
 *
 * @packageDocumentation
 */

// Errors
export { IntentValidationError } from "./errors.js";

// Building
export { IntentBuilder, actionIdFor } from "./builder.js";
export type { BuildResult, IntentBuilderOptions } from "./builder.js";
export { createMoveToIntent, createGraspIntent } from "./convenience.js";
export type { MoveToTarget, GraspTarget } from "./convenience.js";
export { MonotonicNonceSource, defaultNonceSource, systemClock } from "./nonce.js";
export type { Clock, NonceSource } from "./nonce.js";
export { encodeParams, decodeParams } from "./params.js";

// Signing digest
export {
  DEFAULT_DOMAIN,
  DOMAIN_FIELDS,
  DOMAIN_TYPE,
  DOMAIN_TYPEHASH,
  INTENT_FIELDS,
  INTENT_TYPE,
  INTENT_TYPEHASH,
  ZERO_ADDRESS,
  createTypedData,
  domainSeparator,
  intentSigningDigest,
  intentStructHash,
} from "./eip712.js";
export type { IntentTypedData, TypedDataField } from "./eip712.js";

// Validation
export { validateIntent, validateIntentParameters, MAX_FUTURE_START_S } from "./validator.js";
export type { ValidateIntentOptions } from "./validator.js";

// Wire form and content commitment
export { IntentWireSchema, toWire, fromWire, serializeIntent } from "./wire.js";
export { intentToCanonical, intentContentDigest } from "./content.js";
