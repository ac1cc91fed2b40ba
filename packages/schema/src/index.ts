/**
 * @vagus/schema — Action schemas, ANS policy and parameter bounds.
 *
 * @packageDocumentation
 */

// Store
export { SchemaStore } from "./store.js";
export { SchemaLoadError } from "./errors.js";
export type { SchemaLoadErrorCode } from "./errors.js";

// Source validation
export {
  ActionSourceSchema,
  PolicySourceSchema,
  ParameterSchemaSchema,
  StateScalingSchema,
} from "./sources.js";
export type { ParsedActionSource, ParsedPolicySource } from "./sources.js";

// Parameter validation
export {
  checkStatic,
  checkScaled,
  scalingDimension,
  scalingFactor,
  scaledMaximum,
} from "./parameter-validator.js";
export type {
  ParameterCheck,
  ParameterCheckCode,
  ScalingDimension,
} from "./parameter-validator.js";

// Limits commitment
export { computeScaledLimitsHash, ZERO_HASH } from "./limits-hash.js";

// Formatting
export { formatFixed, formatNumber } from "./format.js";
