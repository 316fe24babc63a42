import { describe, expect, it } from "vitest";
import { createPolicy, DEFAULT_POLICY } from "./policy.js";

describe("createPolicy", () => {
  it("returns the defaults without overrides", () => {
    expect(createPolicy()).toEqual(DEFAULT_POLICY);
  });

  it("merges message overrides per tier", () => {
    const policy = createPolicy({
      messages: { ...DEFAULT_POLICY.messages, good: "Nice." },
    });
    expect(policy.messages.good).toBe("Nice.");
    expect(policy.messages.excellent).toBe(DEFAULT_POLICY.messages.excellent);
  });

  it("is frozen", () => {
    const policy = createPolicy({ specificRatio: 0.5 });
    expect(Object.isFrozen(policy)).toBe(true);
    expect(Object.isFrozen(policy.countChoices)).toBe(true);
    expect(Object.isFrozen(policy.messages)).toBe(true);
  });

  it("rejects a ratio outside 0..1", () => {
    expect(() => createPolicy({ specificRatio: 1.5 })).toThrow(RangeError);
    expect(() => createPolicy({ specificRatio: -0.1 })).toThrow(RangeError);
  });

  it("rejects inverted thresholds", () => {
    expect(() =>
      createPolicy({ excellentThreshold: 40, goodThreshold: 60 })
    ).toThrow(RangeError);
  });

  it("rejects non-positive count choices", () => {
    expect(() => createPolicy({ countChoices: [10, 0] })).toThrow(RangeError);
  });
});
