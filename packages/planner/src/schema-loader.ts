/**
 * Schema directory loading.
 *
 * A schema directory holds `actions.json` and `policy.json`. Both are read
 * and parsed here; structural validation is left to {@link SchemaStore.load}.
 */

import { readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { SchemaLoadError, SchemaStore } from "@vagus/schema";

export const ACTIONS_FILE = "actions.json";
export const POLICY_FILE = "policy.json";

/** Mechanical-arm schema shipped with this package. */
export const BUNDLED_SCHEMA_DIR = fileURLToPath(
  new URL("../schemas/mechanical-arm", import.meta.url),
);

/**
 * @throws {SchemaLoadError} MISSING_SOURCE when a file does not exist,
 *   MALFORMED_SOURCE when it is not JSON or fails validation
 */
export function loadSchemaDirectory(dir: string = BUNDLED_SCHEMA_DIR): SchemaStore {
  const actions = readSource(join(dir, ACTIONS_FILE), "actions");
  const policy = readSource(join(dir, POLICY_FILE), "policy");
  return SchemaStore.load(actions, policy);
}

function readSource(path: string, source: "actions" | "policy"): unknown {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (error) {
    if (isNotFound(error)) {
      throw new SchemaLoadError("MISSING_SOURCE", `Schema file not found: ${path}`, source);
    }
    throw error;
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SchemaLoadError("MALFORMED_SOURCE", `Invalid JSON in ${path}: ${reason}`, source);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
