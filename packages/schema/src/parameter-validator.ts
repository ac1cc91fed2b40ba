/**
 * Parameter Validator
 *
 * Checks a single parameter value against its schema, either with the
 * static bounds or with the upper bound scaled by the current ANS state.
 *
 * Results are structured pairs, never exceptions, so callers can
 * aggregate several violations. Only a non-finite value is fatal.
 *
 * The scaling dimension is picked by an ordered rule table on the
 * lower-cased parameter name. Order is part of the safety contract:
 *   1. contains "speed" or starts with "v" → speed factor
 *   2. contains "force"                    → force factor
 *   3. anything else                       → min(speed, force)
 */

import type { AnsState, ParameterSchema, StateScaling } from "@vagus/types";
import type { SchemaStore } from "./store.js";
import { formatFixed, formatNumber } from "./format.js";

// =============================================================================
// Types
// =============================================================================

export type ParameterCheckCode =
  | "UNKNOWN_PARAMETER"
  | "BELOW_MINIMUM"
  | "ABOVE_MAXIMUM"
  | "UNKNOWN_ANS_STATE";

export type ParameterCheck =
  | { readonly valid: true }
  | {
      readonly valid: false;
      readonly code: ParameterCheckCode;
      readonly message: string;
    };

export type ScalingDimension = "speed" | "force" | "combined";

interface DimensionRule {
  readonly dimension: ScalingDimension;
  readonly matches: (lowerName: string) => boolean;
}

// =============================================================================
// Scaling rules
// =============================================================================

const DIMENSION_RULES: readonly DimensionRule[] = [
  {
    dimension: "speed",
    matches: (name) => name.includes("speed") || name.startsWith("v"),
  },
  {
    dimension: "force",
    matches: (name) => name.includes("force"),
  },
];

const VALID: ParameterCheck = Object.freeze({ valid: true });

/**
 * Which scaling factor applies to a brakeable parameter.
 */
export function scalingDimension(param: string): ScalingDimension {
  const name = param.toLowerCase();
  for (const rule of DIMENSION_RULES) {
    if (rule.matches(name)) {
      return rule.dimension;
    }
  }
  return "combined";
}

export function scalingFactor(
  scaling: StateScaling,
  dimension: ScalingDimension,
): number {
  switch (dimension) {
    case "speed":
      return scaling.speed;
    case "force":
      return scaling.force;
    case "combined":
      return Math.min(scaling.speed, scaling.force);
  }
}

/**
 * Upper bound of a brakeable parameter under the given scaling.
 */
export function scaledMaximum(
  schema: ParameterSchema,
  scaling: StateScaling,
  param: string,
): number {
  return schema.max * scalingFactor(scaling, scalingDimension(param));
}

// =============================================================================
// Checks
// =============================================================================

/**
 * Check a value against the unscaled schema bounds.
 *
 * An unknown action and an unknown parameter produce the same
 * UNKNOWN_PARAMETER result.
 */
export function checkStatic(
  store: SchemaStore,
  action: string,
  param: string,
  value: number,
): ParameterCheck {
  assertFinite(param, value);

  const schema = store.getParameter(action, param);
  if (schema === undefined) {
    return unknownParameter(action, param);
  }

  if (value < schema.min) {
    return belowMinimum(value, schema);
  }

  if (value > schema.max) {
    return {
      valid: false,
      code: "ABOVE_MAXIMUM",
      message: `Value ${formatNumber(value)} above maximum ${formatNumber(schema.max)}`,
    };
  }

  return VALID;
}

/**
 * Check a value against bounds scaled by the ANS state.
 *
 * Non-brakeable parameters behave exactly as {@link checkStatic}.
 */
export function checkScaled(
  store: SchemaStore,
  action: string,
  param: string,
  value: number,
  ansState: AnsState,
): ParameterCheck {
  assertFinite(param, value);

  const schema = store.getParameter(action, param);
  if (schema === undefined) {
    return unknownParameter(action, param);
  }

  if (!schema.brakeable) {
    return checkStatic(store, action, param, value);
  }

  const scaling = store.getScaling(ansState);
  if (scaling === undefined) {
    return {
      valid: false,
      code: "UNKNOWN_ANS_STATE",
      message: `Unknown ANS state: ${ansState}`,
    };
  }

  if (value < schema.min) {
    return belowMinimum(value, schema);
  }

  const scaledMax = scaledMaximum(schema, scaling, param);
  if (value > scaledMax) {
    return {
      valid: false,
      code: "ABOVE_MAXIMUM",
      message:
        `Value ${formatNumber(value)} above scaled maximum ${formatFixed(scaledMax, 3)} ` +
        `(original: ${formatNumber(schema.max)})`,
    };
  }

  return VALID;
}

// =============================================================================
// Internal helpers
// =============================================================================

function assertFinite(param: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new TypeError(`Parameter ${param} must be a finite number, got ${value}`);
  }
}

function unknownParameter(action: string, param: string): ParameterCheck {
  return {
    valid: false,
    code: "UNKNOWN_PARAMETER",
    message: `Parameter ${param} not found in action ${action}`,
  };
}

function belowMinimum(value: number, schema: ParameterSchema): ParameterCheck {
  return {
    valid: false,
    code: "BELOW_MINIMUM",
    message: `Value ${formatNumber(value)} below minimum ${formatNumber(schema.min)}`,
  };
}
