export {
  calculateComplianceScore,
  riskLevelForScore,
} from "./score-calculator.js";
export { RISK_FLOOR, RISK_THRESHOLDS } from "./thresholds.js";
