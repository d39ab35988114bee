import type { CheckStatus, RiskLevel } from "../engine/types.js";

export const REPORT_FORMATS = ["text", "json", "csv", "html", "xml"] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

export interface JsonSummary {
  readonly total_checks: number;
  readonly passed: number;
  readonly warnings: number;
  readonly failed: number;
  readonly errors: number;
  readonly skipped: number;
}

export interface JsonCheckEntry {
  readonly name: string;
  readonly category: string;
  readonly status: CheckStatus;
  readonly severity: string;
  readonly message: string;
  readonly remediation?: string;
  readonly reference?: string;
  readonly remediation_applied?: boolean;
  readonly timestamp?: string;
}

/**
 * Canonical machine-readable report. Field names are a compatibility
 * contract with downstream consumers.
 */
export interface JsonReport {
  readonly scan_id: string;
  readonly timestamp: string;
  readonly profile: string;
  readonly target: string;
  readonly fix_mode: boolean;
  readonly duration_seconds: number;
  readonly compliance_score: number;
  readonly risk_level: RiskLevel;
  readonly summary: JsonSummary;
  readonly checks: Readonly<Record<string, JsonCheckEntry>>;
}
