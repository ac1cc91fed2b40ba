/**
 * Mechanical arm fixture shared by the schema tests.
 */

import { SchemaStore } from "../src/store.js";

export const ARM_ACTIONS = {
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
};

export const ARM_POLICY = {
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
};

export function armStore(): SchemaStore {
  return SchemaStore.load(ARM_ACTIONS, ARM_POLICY);
}
