import { describe, it, expect } from "vitest";
import { computeScaledLimitsHash, ZERO_HASH } from "../src/limits-hash.js";
import { armStore } from "./fixtures.js";

describe("computeScaledLimitsHash", () => {
  const store = armStore();

  it("hashes action and SAFE factors", () => {
    expect(computeScaledLimitsHash(store, "MOVE_TO", "SAFE")).toBe(
      "0x3b7f7df40fefef26bac191fb3ff9376a5cb549cf41711521180e4b035c0040fd",
    );
  });

  it("hashes action and DANGER factors", () => {
    expect(computeScaledLimitsHash(store, "MOVE_TO", "DANGER")).toBe(
      "0xa2257c2c5ac7fec1dae63ce641d1a11e02f19d9e4854ec3074a4dc691d29a875",
    );
  });

  it("renders zero factors with a trailing .0", () => {
    expect(computeScaledLimitsHash(store, "GRASP", "SHUTDOWN")).toBe(
      "0x413983c244b72791ebff2a9c064d93fa84efa1af7173661f4bc8246e900854de",
    );
  });

  it("returns the zero hash for an unknown state", () => {
    expect(computeScaledLimitsHash(store, "MOVE_TO", "PANIC")).toBe(ZERO_HASH);
    expect(ZERO_HASH).toHaveLength(66);
  });
});
