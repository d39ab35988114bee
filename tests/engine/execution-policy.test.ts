import { describe, expect, it } from "vitest";
import {
  createExecutionPolicy,
  decide,
  unmatchedPolicyIds,
} from "../../src/engine/index.js";

describe("execution policy", () => {
  it("runs everything by default", () => {
    expect(decide(createExecutionPolicy(), { id: "FS-001" })).toEqual({
      action: "run",
    });
  });

  it("skips excluded ids", () => {
    const policy = createExecutionPolicy(["FS-001"]);
    expect(decide(policy, { id: "FS-001" })).toEqual({
      action: "skip",
      reason: "excluded",
    });
    expect(decide(policy, { id: "FS-002" })).toEqual({ action: "run" });
  });

  it("skips ids outside a non-empty include list", () => {
    const policy = createExecutionPolicy([], ["FS-002"]);
    expect(decide(policy, { id: "FS-001" })).toEqual({
      action: "skip",
      reason: "not included",
    });
    expect(decide(policy, { id: "FS-002" })).toEqual({ action: "run" });
  });

  it("lets exclude win over include", () => {
    const policy = createExecutionPolicy(["FS-001"], ["FS-001"]);
    expect(decide(policy, { id: "FS-001" })).toEqual({
      action: "skip",
      reason: "excluded",
    });
  });

  it("reports ids the profile does not contain", () => {
    const policy = createExecutionPolicy(["ZZ-1", "FS-001"], ["AA-1", "ZZ-1"]);
    expect(unmatchedPolicyIds(policy, [{ id: "FS-001" }])).toEqual([
      "AA-1",
      "ZZ-1",
    ]);
  });
});
