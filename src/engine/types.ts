import type { Category, Severity } from "../checks/types.js";

export const enum CheckStatus {
  Pass = "PASS",
  Warn = "WARN",
  Fail = "FAIL",
  Skip = "SKIP",
  Error = "ERROR",
}

export const CHECK_STATUSES: readonly CheckStatus[] = [
  CheckStatus.Pass,
  CheckStatus.Warn,
  CheckStatus.Fail,
  CheckStatus.Skip,
  CheckStatus.Error,
];

export type ExecutedStatus = Exclude<CheckStatus, CheckStatus.Skip>;

export type SkipReason = "excluded" | "not included";

export const enum RiskLevel {
  Low = "LOW",
  Medium = "MEDIUM",
  High = "HIGH",
  Critical = "CRITICAL",
}

export const RISK_LEVELS: readonly RiskLevel[] = [
  RiskLevel.Low,
  RiskLevel.Medium,
  RiskLevel.High,
  RiskLevel.Critical,
];

export interface CheckOutcome {
  readonly checkId: string;
  readonly name: string;
  readonly category: Category;
  readonly severity: Severity;
  readonly reference?: string;
  readonly status: ExecutedStatus;
  readonly message: string;
  readonly remediation?: string;
  readonly remediationApplied: boolean;
  readonly timestamp: string;
  /** Position of the check in registry order. */
  readonly index: number;
}

export interface SkippedCheck {
  readonly checkId: string;
  readonly name: string;
  readonly category: Category;
  readonly severity: Severity;
  readonly reason: SkipReason;
  readonly index: number;
}

export interface ScanSummary {
  readonly total: number;
  readonly pass: number;
  readonly warn: number;
  readonly fail: number;
  readonly error: number;
  readonly skip: number;
}

export interface ScanRun {
  readonly scanId: string;
  readonly profile: string;
  readonly target: string;
  readonly fixMode: boolean;
  readonly startTime: string;
  readonly durationSeconds: number;
  readonly outcomes: readonly CheckOutcome[];
  readonly skipped: readonly SkippedCheck[];
  readonly summary: ScanSummary;
  readonly complianceScore: number;
  readonly riskLevel: RiskLevel;
}

export interface ExecutionPolicy {
  readonly exclude: ReadonlySet<string>;
  readonly includeOnly: ReadonlySet<string>;
}
