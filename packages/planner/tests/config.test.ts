/**
 * Tests for config.ts — loadConfig + signingDomainFrom.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig, signingDomainFrom } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.VAGUS_DOMAIN_NAME).toBe("Vagus");
    expect(config.VAGUS_CHAIN_ID).toBe(31337n);
    expect(config.VAGUS_EXECUTOR_ID).toBe(1n);
    expect(config.VAGUS_SCHEMA_DIR).toBeUndefined();
    expect(config.VAGUS_ANS_STATE).toBe("SAFE");
  });

  it("parses chain id and executor id as bigint", () => {
    const config = loadConfig({ VAGUS_CHAIN_ID: "11155111", VAGUS_EXECUTOR_ID: "42" });
    expect(config.VAGUS_CHAIN_ID).toBe(11155111n);
    expect(config.VAGUS_EXECUTOR_ID).toBe(42n);
  });

  it("lowercases addresses", () => {
    const config = loadConfig({
      VAGUS_PLANNER_ADDRESS: "0x00000000000000000000000000000000000000AA",
    });
    expect(config.VAGUS_PLANNER_ADDRESS).toBe("0x00000000000000000000000000000000000000aa");
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(ZodError);
    expect(() => loadConfig({ VAGUS_CHAIN_ID: "-1" })).toThrow(ZodError);
    expect(() => loadConfig({ VAGUS_EXECUTOR_ID: "0" })).toThrow(ZodError);
    expect(() => loadConfig({ VAGUS_VERIFYING_CONTRACT: "0x1234" })).toThrow(ZodError);
  });
});

describe("signingDomainFrom", () => {
  it("maps the domain variables", () => {
    const config = loadConfig({
      VAGUS_DOMAIN_NAME: "VagusTest",
      VAGUS_DOMAIN_VERSION: "2",
      VAGUS_CHAIN_ID: "1",
    });
    expect(signingDomainFrom(config)).toEqual({
      name: "VagusTest",
      version: "2",
      chainId: 1n,
      verifyingContract: "0x0000000000000000000000000000000000000000",
    });
  });
});
