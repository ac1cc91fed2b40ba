import type { Logger } from "pino";
import { signingDomainFrom, type PlannerConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { Planner } from "./planner.js";
import { loadSchemaDirectory } from "./schema-loader.js";

/**
 * Wire a {@link Planner} from validated configuration.
 *
 * @throws {SchemaLoadError} when the schema directory is incomplete
 * @throws {PlannerError} when VAGUS_ANS_STATE is not in the policy
 */
export function createPlanner(config: PlannerConfig, logger?: Logger): Planner {
  const log = logger ?? createLogger(config);
  const store = loadSchemaDirectory(config.VAGUS_SCHEMA_DIR);

  log.info(
    {
      actions: store.actionNames(),
      states: store.stateNames(),
      chainId: config.VAGUS_CHAIN_ID.toString(),
    },
    "Schema loaded",
  );

  return new Planner({
    store,
    executorId: config.VAGUS_EXECUTOR_ID,
    planner: config.VAGUS_PLANNER_ADDRESS,
    logger: log,
    domain: signingDomainFrom(config),
    ansState: config.VAGUS_ANS_STATE,
  });
}
