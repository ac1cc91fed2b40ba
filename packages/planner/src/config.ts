/**
 * @vagus/planner — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { SigningDomain } from "@vagus/types";

// =============================================================================
// Schema
// =============================================================================

const hexAddress = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, "must be a 20-byte hex address")
  .transform((v): `0x${string}` => `0x${v.slice(2).toLowerCase()}`);

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Signing domain
  VAGUS_DOMAIN_NAME: z.string().min(1).default("Vagus"),
  VAGUS_DOMAIN_VERSION: z.string().min(1).default("1"),
  VAGUS_CHAIN_ID: z
    .string()
    .regex(/^[0-9]+$/, "must be a decimal chain id")
    .transform((v) => BigInt(v))
    .default("31337"),
  VAGUS_VERIFYING_CONTRACT: hexAddress.default(`0x${"00".repeat(20)}`),

  // Planner identity
  VAGUS_EXECUTOR_ID: z
    .string()
    .regex(/^[1-9][0-9]*$/, "must be a positive integer")
    .transform((v) => BigInt(v))
    .default("1"),
  VAGUS_PLANNER_ADDRESS: hexAddress.default(`0x${"00".repeat(20)}`),

  // Schema and policy
  VAGUS_SCHEMA_DIR: z.string().min(1).optional(),
  VAGUS_ANS_STATE: z.string().min(1).default("SAFE"),
});

export type PlannerConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): PlannerConfig {
  return ConfigSchema.parse(env);
}

export function signingDomainFrom(config: PlannerConfig): SigningDomain {
  return {
    name: config.VAGUS_DOMAIN_NAME,
    version: config.VAGUS_DOMAIN_VERSION,
    chainId: config.VAGUS_CHAIN_ID,
    verifyingContract: config.VAGUS_VERIFYING_CONTRACT,
  };
}
