/**
 * Shared fixtures for the intent tests: the mechanical arm schema, a
 * pinned clock and builder options.
 */

import { SchemaStore } from "@vagus/schema";
import type { Address } from "@vagus/types";
import { MonotonicNonceSource } from "../src/nonce.js";
import type { IntentBuilderOptions } from "../src/builder.js";

export const NOW = 1_700_000_000;

export const PLANNER: Address = "0xAbCdEf0123456789aBcDeF0123456789AbCdEf01";

export function armStore(): SchemaStore {
  return SchemaStore.load(
    {
      actions: {
        MOVE_TO: {
          description: "Move end effector to a target position",
          parameters: {
            x: { type: "float", unit: "m", min: -2.0, max: 2.0, brakeable: true },
            y: { type: "float", unit: "m", min: -2.0, max: 2.0, brakeable: true },
            z: { type: "float", unit: "m", min: 0.0, max: 3.0, brakeable: true },
            vMax: { type: "float", unit: "m/s", min: 0.0, max: 2.0, brakeable: true },
          },
        },
        GRASP: {
          description: "Close the gripper with a bounded force",
          parameters: {
            force: { type: "float", unit: "N", min: 1.0, max: 100.0, brakeable: true },
            duration: { type: "int", unit: "ms", min: 100, max: 10000, brakeable: false },
          },
        },
      },
    },
    {
      states: {
        SAFE: {
          description: "Normal operation",
          scaling: { speed: 1.0, force: 1.0 },
          restrictions: [],
        },
        DANGER: {
          description: "Reduced envelope",
          scaling: { speed: 0.6, force: 0.7 },
          restrictions: ["no_new_grasps_near_humans"],
        },
        SHUTDOWN: {
          description: "No actuation",
          scaling: { speed: 0.0, force: 0.0 },
          restrictions: ["all_motion_blocked"],
        },
      },
    },
  );
}

export function builderOptions(overrides: Partial<IntentBuilderOptions> = {}): IntentBuilderOptions {
  return {
    executorId: 7n,
    planner: PLANNER,
    clock: () => NOW,
    nonces: new MonotonicNonceSource(),
    ...overrides,
  };
}
