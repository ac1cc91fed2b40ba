/**
 * @vagus/planner — Planner facade.
 *
 * @packageDocumentation
 */

export { loadConfig, signingDomainFrom, ConfigSchema } from "./config.js";
export type { PlannerConfig } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export {
  loadSchemaDirectory,
  BUNDLED_SCHEMA_DIR,
  ACTIONS_FILE,
  POLICY_FILE,
} from "./schema-loader.js";
export { Planner } from "./planner.js";
export type { PlannerOptions, PlanRequest, PlannedIntent, PlanResult } from "./planner.js";
export { PlannerError } from "./errors.js";
export type { PlannerErrorCode } from "./errors.js";
export { createPlanner } from "./create.js";
