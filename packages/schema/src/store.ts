/**
 * SchemaStore — immutable registry of action schemas and ANS policy.
 *
 * Built once at process start from the two sources and passed by
 * reference into every validator and builder call. There is no global
 * instance: tests construct their own store from fixtures.
 *
 * Rules:
 * - Everything handed out is deep-frozen
 * - Lookups are plain map reads; safe for any number of readers
 * - A reload is a new SchemaStore, never an in-place update
 */

import type {
  ActionSchema,
  ParameterSchema,
  StatePolicy,
  StateScaling,
} from "@vagus/types";
import { SchemaLoadError } from "./errors.js";
import {
  ActionSourceSchema,
  PolicySourceSchema,
  describeIssues,
} from "./sources.js";

interface ActionEntry {
  readonly schema: ActionSchema;
  readonly parameters: ReadonlyMap<string, ParameterSchema>;
}

export class SchemaStore {
  private readonly actions: ReadonlyMap<string, ActionEntry>;
  private readonly states: ReadonlyMap<string, StatePolicy>;

  private constructor(
    actions: ReadonlyMap<string, ActionEntry>,
    states: ReadonlyMap<string, StatePolicy>,
  ) {
    this.actions = actions;
    this.states = states;
    Object.freeze(this);
  }

  /**
   * Validate both sources and build a store.
   *
   * @throws {SchemaLoadError} MISSING_SOURCE when a source is null/undefined,
   *   MALFORMED_SOURCE when required fields are missing or out of range
   */
  static load(actionSource: unknown, policySource: unknown): SchemaStore {
    if (actionSource === undefined || actionSource === null) {
      throw new SchemaLoadError("MISSING_SOURCE", "Action source is missing", "actions");
    }
    if (policySource === undefined || policySource === null) {
      throw new SchemaLoadError("MISSING_SOURCE", "Policy source is missing", "policy");
    }

    const parsedActions = ActionSourceSchema.safeParse(actionSource);
    if (!parsedActions.success) {
      throw new SchemaLoadError(
        "MALFORMED_SOURCE",
        `Malformed action source: ${describeIssues(parsedActions.error)}`,
        "actions",
      );
    }

    const parsedPolicy = PolicySourceSchema.safeParse(policySource);
    if (!parsedPolicy.success) {
      throw new SchemaLoadError(
        "MALFORMED_SOURCE",
        `Malformed policy source: ${describeIssues(parsedPolicy.error)}`,
        "policy",
      );
    }

    const actions = new Map<string, ActionEntry>();
    for (const [name, action] of Object.entries(parsedActions.data.actions)) {
      const schema = deepFreeze(action);
      actions.set(name, {
        schema,
        parameters: new Map(Object.entries(schema.parameters)),
      });
    }

    const states = new Map<string, StatePolicy>();
    for (const [name, policy] of Object.entries(parsedPolicy.data.states)) {
      states.set(name, deepFreeze(policy));
    }

    return new SchemaStore(actions, states);
  }

  getAction(name: string): ActionSchema | undefined {
    return this.actions.get(name)?.schema;
  }

  getParameter(action: string, name: string): ParameterSchema | undefined {
    return this.actions.get(action)?.parameters.get(name);
  }

  getStatePolicy(state: string): StatePolicy | undefined {
    return this.states.get(state);
  }

  getScaling(state: string): StateScaling | undefined {
    return this.states.get(state)?.scaling;
  }

  actionNames(): readonly string[] {
    return [...this.actions.keys()];
  }

  stateNames(): readonly string[] {
    return [...this.states.keys()];
  }
}

// =============================================================================
// Internal helpers
// =============================================================================

function deepFreeze<T extends object>(value: T): T {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (child !== null && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
