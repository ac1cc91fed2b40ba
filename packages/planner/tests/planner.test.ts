/**
 * Planner Tests
 *
 * Verifies:
 * - A successful plan carries a digest, typed data, content hash and wire form
 * - Static and ANS-scaled violations are rejected and logged
 * - ANS state transitions and holistic verification
 */

import { describe, it, expect } from "vitest";
import {
  DEFAULT_DOMAIN,
  MonotonicNonceSource,
  intentSigningDigest,
  serializeIntent,
} from "@vagus/intent";
import { loadConfig } from "../src/config.js";
import { createPlanner } from "../src/create.js";
import { PlannerError } from "../src/errors.js";
import { Planner, type PlanResult, type PlannedIntent } from "../src/planner.js";
import { loadSchemaDirectory } from "../src/schema-loader.js";
import { captureLogger, NOW, PLANNER_ADDRESS } from "./helpers.js";

const store = loadSchemaDirectory();

function setup(clock: () => number = () => NOW) {
  const { logger, lines } = captureLogger();
  const planner = new Planner({
    store,
    executorId: 3n,
    planner: PLANNER_ADDRESS,
    logger,
    clock,
    nonces: new MonotonicNonceSource(),
  });
  return { planner, lines };
}

function planned(result: PlanResult): PlannedIntent {
  if (!result.ok) throw new Error(result.errors.join("; "));
  return result.plan;
}

function rejected(result: PlanResult): readonly string[] {
  if (result.ok) throw new Error("expected rejection");
  return result.errors;
}

const MOVE = { action: "MOVE_TO", parameters: { x: 0.5, y: -1, z: 1.2, vMax: 1.5 } };

// =============================================================================
// plan
// =============================================================================

describe("Planner.plan", () => {
  it("produces every artifact for a valid request", () => {
    const { planner } = setup();
    const plan = planned(planner.plan(MOVE));

    expect(plan.intent.executorId).toBe(3n);
    expect(plan.intent.notBefore).toBe(BigInt(NOW));
    expect(plan.digest).toBe(intentSigningDigest(plan.intent, DEFAULT_DOMAIN));
    expect(plan.typedData.primaryType).toBe("Intent");
    expect(plan.typedData.message.planner).toBe(PLANNER_ADDRESS);
    expect(plan.wire).toBe(serializeIntent(plan.intent));
    expect(plan.contentHash.sha256).toMatch(/^0x[0-9a-f]{64}$/);
  });

  it("applies request overrides", () => {
    const { planner } = setup();
    const plan = planned(
      planner.plan({
        ...MOVE,
        maxDurationMs: 1500,
        maxEnergyJ: 12,
        validityDurationS: 30,
        executorId: 9n,
      }),
    );
    expect(plan.intent.maxDurationMs).toBe(1500);
    expect(plan.intent.maxEnergyJ).toBe(12);
    expect(plan.intent.notAfter).toBe(BigInt(NOW + 30));
    expect(plan.intent.executorId).toBe(9n);
  });

  it("never reuses a nonce", () => {
    const { planner } = setup();
    const first = planned(planner.plan(MOVE));
    const second = planned(planner.plan(MOVE));
    expect(second.intent.nonce).toBe(first.intent.nonce + 1n);
    expect(second.digest).not.toBe(first.digest);
  });

  it("logs a successful plan at info", () => {
    const { planner, lines } = setup();
    const plan = planned(planner.plan(MOVE));
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: "Intent planned",
      action: "MOVE_TO",
      ansState: "SAFE",
      nonce: String(NOW),
      digest: plan.digest,
    });
  });

  it("rejects static violations and logs them at warn", () => {
    const { planner, lines } = setup();
    const errors = rejected(planner.plan({ action: "MOVE_TO", parameters: { x: 5 } }));
    expect(errors).toEqual(["Parameter x: Value 5.0 above maximum 2.0"]);
    expect(lines[0]).toMatchObject({
      level: 40,
      msg: "Intent rejected",
      action: "MOVE_TO",
      errors: ["Parameter x: Value 5.0 above maximum 2.0"],
    });
  });

  it("rejects unknown actions", () => {
    const { planner } = setup();
    expect(rejected(planner.plan({ action: "FLY", parameters: {} }))).toEqual([
      "Unknown action: FLY",
    ]);
  });

  it("applies the ANS scaling after the static checks pass", () => {
    const { planner } = setup();
    planner.setAnsState("DANGER");
    expect(rejected(planner.plan(MOVE))).toEqual([
      "Parameter vMax: Value 1.5 above scaled maximum 1.200 (original: 2.0)",
    ]);
  });

  it("blocks grasps in SHUTDOWN but keeps non-brakeable bounds static", () => {
    const { planner } = setup();
    planner.setAnsState("SHUTDOWN");
    const errors = rejected(
      planner.plan({ action: "GRASP", parameters: { force: 10, duration: 500 } }),
    );
    expect(errors).toEqual([
      "Parameter force: Value 10.0 above scaled maximum 0.000 (original: 100.0)",
    ]);
  });
});

// =============================================================================
// ANS state
// =============================================================================

describe("Planner ANS state", () => {
  it("starts in SAFE", () => {
    expect(setup().planner.currentAnsState).toBe("SAFE");
  });

  it("logs transitions", () => {
    const { planner, lines } = setup();
    planner.setAnsState("DANGER");
    planner.setAnsState("DANGER");
    expect(planner.currentAnsState).toBe("DANGER");
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 30, msg: "ANS state changed", from: "SAFE", to: "DANGER" });
  });

  it("rejects states missing from the policy", () => {
    const { planner } = setup();
    expect(() => planner.setAnsState("PANIC")).toThrow(PlannerError);
    expect(() => planner.setAnsState("PANIC")).toThrow("Unknown ANS state: PANIC");
    expect(planner.currentAnsState).toBe("SAFE");
  });

  it("rejects an unknown initial state", () => {
    const { logger } = captureLogger();
    expect(
      () =>
        new Planner({
          store,
          executorId: 1n,
          planner: PLANNER_ADDRESS,
          logger,
          ansState: "PANIC",
        }),
    ).toThrow(PlannerError);
  });
});

// =============================================================================
// verify
// =============================================================================

describe("Planner.verify", () => {
  it("accepts a fresh intent and reports expiry", () => {
    let now = NOW;
    const { planner } = setup(() => now);
    const { intent } = planned(planner.plan(MOVE));

    expect(planner.verify(intent)).toEqual([]);

    now = NOW + 3601;
    expect(planner.verify(intent)).toEqual(["Intent has already expired"]);
  });
});

// =============================================================================
// createPlanner
// =============================================================================

describe("createPlanner", () => {
  it("wires a planner from configuration", () => {
    const { logger, lines } = captureLogger();
    const config = loadConfig({
      NODE_ENV: "test",
      VAGUS_CHAIN_ID: "5",
      VAGUS_ANS_STATE: "DANGER",
      VAGUS_PLANNER_ADDRESS: PLANNER_ADDRESS,
    });
    const planner = createPlanner(config, logger);

    expect(planner.currentAnsState).toBe("DANGER");
    expect(planner.signingDomain.chainId).toBe(5n);
    expect(lines[0]).toMatchObject({
      msg: "Schema loaded",
      actions: ["MOVE_TO", "GRASP"],
      states: ["SAFE", "DANGER", "SHUTDOWN"],
      chainId: "5",
    });
  });

  it("fails on a state the bundled policy lacks", () => {
    const { logger } = captureLogger();
    const config = loadConfig({ NODE_ENV: "test", VAGUS_ANS_STATE: "PANIC" });
    expect(() => createPlanner(config, logger)).toThrow(PlannerError);
  });
});
