import { describe, expect, it } from "vitest";
import { RiskLevel } from "../../src/engine/index.js";
import {
  calculateComplianceScore,
  riskLevelForScore,
} from "../../src/scoring/index.js";

describe("compliance score", () => {
  it("is zero when nothing executed", () => {
    expect(calculateComplianceScore({ total: 0, pass: 0 })).toBe(0);
  });

  it("floors the pass percentage", () => {
    expect(calculateComplianceScore({ total: 20, pass: 17 })).toBe(85);
    expect(calculateComplianceScore({ total: 3, pass: 2 })).toBe(66);
    expect(calculateComplianceScore({ total: 8, pass: 6 })).toBe(75);
    expect(calculateComplianceScore({ total: 7, pass: 7 })).toBe(100);
    expect(calculateComplianceScore({ total: 7, pass: 0 })).toBe(0);
  });
});

describe("risk level", () => {
  it.each([
    [100, RiskLevel.Low],
    [90, RiskLevel.Low],
    [89, RiskLevel.Medium],
    [70, RiskLevel.Medium],
    [69, RiskLevel.High],
    [50, RiskLevel.High],
    [49, RiskLevel.Critical],
    [0, RiskLevel.Critical],
  ])("maps score %i to %s", (score, level) => {
    expect(riskLevelForScore(score)).toBe(level);
  });
});
