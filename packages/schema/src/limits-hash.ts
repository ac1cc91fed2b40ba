/**
 * Scaled limits commitment.
 *
 * Capability issuers record which ANS scaling an action was planned
 * under. The commitment is SHA-256 over `{action}:{speed}:{force}`,
 * with the factors rendered as in validation messages.
 */

import { createHash } from "node:crypto";
import type { AnsState, Hex } from "@vagus/types";
import type { SchemaStore } from "./store.js";
import { formatNumber } from "./format.js";

export const ZERO_HASH: Hex = `0x${"0".repeat(64)}`;

/**
 * @returns 0x-prefixed SHA-256 hex, or {@link ZERO_HASH} for an unknown state
 */
export function computeScaledLimitsHash(
  store: SchemaStore,
  action: string,
  ansState: AnsState,
): Hex {
  const scaling = store.getScaling(ansState);
  if (scaling === undefined) {
    return ZERO_HASH;
  }

  const data = `${action}:${formatNumber(scaling.speed)}:${formatNumber(scaling.force)}`;
  return `0x${createHash("sha256").update(data).digest("hex")}`;
}
