import { describe, expect, it } from "vitest";
import { fail, pass, probeError, warn } from "../../src/checks/probe-result.js";
import { Category, Severity } from "../../src/checks/types.js";
import {
  CheckStatus,
  ScanRunBuilder,
  statusForResult,
  type CheckOutcome,
} from "../../src/engine/index.js";

function outcome(index: number, status: CheckOutcome["status"]): CheckOutcome {
  return {
    checkId: `T-${index}`,
    name: `Check ${index}`,
    category: Category.Custom,
    severity: Severity.Low,
    status,
    message: status,
    remediationApplied: false,
    timestamp: "2024-01-01T00:00:00.000Z",
    index,
  };
}

const header = {
  scanId: "20240101_000000_000",
  profile: "test",
  target: "/",
  fixMode: false,
  startTime: "2024-01-01T00:00:00.000Z",
};

describe("probe result interpretation", () => {
  it("maps each result kind to a status", () => {
    expect(statusForResult(pass("a"))).toBe(CheckStatus.Pass);
    expect(statusForResult(fail("a"))).toBe(CheckStatus.Fail);
    expect(statusForResult(warn("a"))).toBe(CheckStatus.Warn);
    expect(statusForResult(probeError("a"))).toBe(CheckStatus.Error);
  });
});

describe("scan run builder", () => {
  it("sorts by registry index and derives the summary", () => {
    const run = new ScanRunBuilder(header)
      .addOutcome(outcome(2, CheckStatus.Error))
      .addOutcome(outcome(0, CheckStatus.Pass))
      .addSkipped({
        checkId: "T-1",
        name: "Check 1",
        category: Category.Custom,
        severity: Severity.Low,
        reason: "excluded",
        index: 1,
      })
      .addOutcome(outcome(3, CheckStatus.Warn))
      .build(1.5);

    expect(run.outcomes.map((item) => item.index)).toEqual([0, 2, 3]);
    expect(run.summary).toEqual({
      total: 3,
      pass: 1,
      warn: 1,
      fail: 0,
      error: 1,
      skip: 1,
    });
    expect(run.complianceScore).toBe(33);
    expect(run.durationSeconds).toBe(1.5);
  });

  it("builds only once", () => {
    const builder = new ScanRunBuilder(header);
    builder.build(0);
    expect(() => builder.build(0)).toThrow("Scan run already built");
    expect(() => builder.addOutcome(outcome(0, CheckStatus.Pass))).toThrow(
      "Scan run already built",
    );
  });

  it("does not share state with the caller's outcome objects", () => {
    const source = outcome(0, CheckStatus.Fail);
    const run = new ScanRunBuilder(header).addOutcome(source).build(0);
    expect(run.outcomes[0]).not.toBe(source);
    expect(run.outcomes[0]).toEqual(source);
  });
});
