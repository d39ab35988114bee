export {
  runCheck,
  statusForResult,
  type CheckRunOptions,
} from "./check-runner.js";
export {
  createExecutionPolicy,
  decide,
  unmatchedPolicyIds,
  type CheckDecision,
} from "./execution-policy.js";
export { ScanRunBuilder, summarize } from "./result-aggregator.js";
export {
  createScanId,
  DEFAULT_CHECK_TIMEOUT_SECONDS,
  DEFAULT_SCAN_TIMEOUT_SECONDS,
  MAX_TIMEOUT_SECONDS,
  runScan,
  type ScanOptions,
} from "./scan-engine.js";
export {
  CHECK_STATUSES,
  CheckStatus,
  RISK_LEVELS,
  RiskLevel,
} from "./types.js";
export type {
  CheckOutcome,
  ExecutedStatus,
  ExecutionPolicy,
  ScanRun,
  ScanSummary,
  SkippedCheck,
  SkipReason,
} from "./types.js";
