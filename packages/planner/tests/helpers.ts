import type { Logger } from "pino";
import { createLogger } from "../src/logger.js";

export const NOW = 1_700_000_000;

export const PLANNER_ADDRESS = "0x00000000000000000000000000000000000000aa";

/**
 * Logger that records every emitted line as parsed JSON.
 */
export function captureLogger(): { logger: Logger; lines: unknown[] } {
  const lines: unknown[] = [];
  const logger = createLogger(
    { LOG_LEVEL: "info", NODE_ENV: "test" },
    {
      write(msg: string) {
        const parsed: unknown = JSON.parse(msg);
        lines.push(parsed);
      },
    },
  );
  return { logger, lines };
}
