/**
 * Structured logging.
 *
 * JSON lines via pino; pretty-printed through pino-pretty in development.
 */

import pino, { type DestinationStream, type Logger } from "pino";
import type { PlannerConfig } from "./config.js";

export type { Logger } from "pino";

export function createLogger(
  config: Pick<PlannerConfig, "LOG_LEVEL" | "NODE_ENV">,
  destination?: DestinationStream,
): Logger {
  const options: pino.LoggerOptions = {
    name: "vagus-planner",
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development" && destination === undefined
      ? { transport: { target: "pino-pretty" } }
      : {}),
  };
  return destination === undefined ? pino(options) : pino(options, destination);
}
