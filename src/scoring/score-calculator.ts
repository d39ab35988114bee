import type { RiskLevel, ScanSummary } from "../engine/types.js";
import { RISK_FLOOR, RISK_THRESHOLDS } from "./thresholds.js";

/**
 * Percentage of executed checks that passed, floored. WARN, FAIL and ERROR
 * all count against the score; severity plays no part. An empty run scores 0.
 */
export function calculateComplianceScore(
  summary: Pick<ScanSummary, "total" | "pass">,
): number {
  if (summary.total <= 0) {
    return 0;
  }
  return Math.floor((100 * summary.pass) / summary.total);
}

export function riskLevelForScore(score: number): RiskLevel {
  for (const threshold of RISK_THRESHOLDS) {
    if (score >= threshold.minScore) {
      return threshold.level;
    }
  }
  return RISK_FLOOR;
}
