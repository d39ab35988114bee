export { BUILTIN_CHECKS, createCheckCatalog } from "./catalog.js";
export type { CheckCatalog } from "./catalog.js";
export { fail, pass, probeError, warn } from "./probe-result.js";
export { Category, CATEGORY_ORDER, Severity, SEVERITIES } from "./types.js";
export type {
  CheckDefinition,
  FailureDegree,
  Probe,
  ProbeResult,
  Remediation,
  RemediationAction,
  ScanContext,
} from "./types.js";
