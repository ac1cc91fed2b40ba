/**
 * Schema Types
 *
 * Action parameter schemas and the ANS state policy. Both are loaded
 * once per process and never mutated afterwards.
 */

/**
 * Bounds for one action parameter.
 *
 * A brakeable parameter has its upper bound throttled by the ANS state;
 * the lower bound is never scaled.
 */
export interface ParameterSchema {
  readonly type: string;
  readonly unit: string;
  readonly min: number;
  readonly max: number;
  readonly brakeable: boolean;
}

export interface ActionSchema {
  readonly description: string;
  readonly parameters: Readonly<Record<string, ParameterSchema>>;
}

/**
 * Multipliers applied to brakeable upper bounds, each in [0, 1].
 */
export interface StateScaling {
  readonly speed: number;
  readonly force: number;
}

export interface StatePolicy {
  readonly description: string;
  readonly scaling: StateScaling;
  readonly restrictions: readonly string[];
}

export interface PolicySchema {
  readonly states: Readonly<Record<string, StatePolicy>>;
}

/**
 * Action source as delivered by the external loader.
 */
export interface ActionSource {
  readonly actions: Readonly<Record<string, ActionSchema>>;
}

/**
 * The ANS states every bundled policy defines. Policies may add more.
 */
export type KnownAnsState = "SAFE" | "DANGER" | "SHUTDOWN";

/**
 * An ANS state name. Resolution against the loaded policy happens at
 * validation time, so any string is accepted here.
 */
export type AnsState = KnownAnsState | (string & {});
