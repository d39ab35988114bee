import { RiskLevel } from "../engine/types.js";

/**
 * Inclusive lower bounds, highest first. The first matching tier wins.
 */
export const RISK_THRESHOLDS: readonly {
  readonly minScore: number;
  readonly level: RiskLevel;
}[] = [
  { minScore: 90, level: RiskLevel.Low },
  { minScore: 70, level: RiskLevel.Medium },
  { minScore: 50, level: RiskLevel.High },
];

export const RISK_FLOOR: RiskLevel = RiskLevel.Critical;
