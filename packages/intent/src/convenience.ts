/**
 * Shortcuts for the two bundled mechanical-arm actions.
 */

import type { SchemaStore } from "@vagus/schema";
import { IntentBuilder, type BuildResult, type IntentBuilderOptions } from "./builder.js";

export interface MoveToTarget {
  readonly x: number;
  readonly y: number;
  readonly z: number;
  /** Peak velocity, m/s. Defaults to 1.0. */
  readonly vMax?: number;
}

export interface GraspTarget {
  readonly force: number;
  readonly durationMs: number;
}

export function createMoveToIntent(
  store: SchemaStore,
  options: IntentBuilderOptions,
  target: MoveToTarget,
): BuildResult {
  return new IntentBuilder(store, options)
    .setAction("MOVE_TO")
    .setParameter("x", target.x)
    .setParameter("y", target.y)
    .setParameter("z", target.z)
    .setParameter("vMax", target.vMax ?? 1.0)
    .build();
}

export function createGraspIntent(
  store: SchemaStore,
  options: IntentBuilderOptions,
  target: GraspTarget,
): BuildResult {
  return new IntentBuilder(store, options)
    .setAction("GRASP")
    .setParameter("force", target.force)
    .setParameter("duration", target.durationMs)
    .build();
}
