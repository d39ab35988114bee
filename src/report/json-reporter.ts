import {
  CHECK_STATUSES,
  RISK_LEVELS,
  type CheckStatus,
  type ScanRun,
} from "../engine/types.js";
import { reportEntries } from "./report-utils.js";
import type { JsonCheckEntry, JsonReport, JsonSummary } from "./types.js";

export function buildJsonReport(run: ScanRun): JsonReport {
  const checks: Record<string, JsonCheckEntry> = {};
  for (const entry of reportEntries(run)) {
    checks[entry.checkId] = {
      name: entry.name,
      category: entry.category,
      status: entry.status,
      severity: entry.severity,
      message: entry.message,
      remediation: entry.remediation,
      reference: entry.reference,
      remediation_applied: entry.remediationApplied,
      timestamp: entry.timestamp,
    };
  }

  return {
    scan_id: run.scanId,
    timestamp: run.startTime,
    profile: run.profile,
    target: run.target,
    fix_mode: run.fixMode,
    duration_seconds: run.durationSeconds,
    compliance_score: run.complianceScore,
    risk_level: run.riskLevel,
    summary: {
      total_checks: run.summary.total,
      passed: run.summary.pass,
      warnings: run.summary.warn,
      failed: run.summary.fail,
      errors: run.summary.error,
      skipped: run.summary.skip,
    },
    checks,
  };
}

export function renderJsonReport(run: ScanRun): string {
  return `${JSON.stringify(buildJsonReport(run), null, 2)}\n`;
}

/**
 * Parse and validate a report produced by `renderJsonReport`. All problems
 * are collected and thrown together.
 */
export function parseJsonReport(text: string): JsonReport {
  let input: unknown;
  try {
    input = JSON.parse(text);
  } catch (error) {
    throw new Error(
      `Invalid JSON report: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const errors: string[] = [];
  const report = parseReport(input, errors);
  if (errors.length > 0 || !report) {
    throw new Error(`Invalid JSON report: ${errors.join("; ")}`);
  }
  return report;
}

function parseReport(input: unknown, errors: string[]): JsonReport | null {
  if (!isRecord(input)) {
    errors.push("report must be an object");
    return null;
  }

  const scanId = requireString(input.scan_id, "scan_id", errors);
  const timestamp = requireString(input.timestamp, "timestamp", errors);
  const profile = requireString(input.profile, "profile", errors);
  const target = requireString(input.target, "target", errors);
  if (typeof input.fix_mode !== "boolean") {
    errors.push("fix_mode must be a boolean");
  }
  const duration = input.duration_seconds;
  if (typeof duration !== "number" || duration < 0) {
    errors.push("duration_seconds must be a non-negative number");
  }
  const score = input.compliance_score;
  if (!isCount(score) || score > 100) {
    errors.push("compliance_score must be an integer between 0 and 100");
  }
  const riskLevel = RISK_LEVELS.find((level) => level === input.risk_level);
  if (!riskLevel) {
    errors.push(`risk_level must be one of ${RISK_LEVELS.join(", ")}`);
  }
  const summary = parseSummary(input.summary, errors);
  const checks = parseChecks(input.checks, errors);

  if (errors.length > 0 || !summary || !checks || !riskLevel) {
    return null;
  }
  return {
    scan_id: scanId,
    timestamp,
    profile,
    target,
    fix_mode: input.fix_mode === true,
    duration_seconds: typeof duration === "number" ? duration : 0,
    compliance_score: isCount(score) ? score : 0,
    risk_level: riskLevel,
    summary,
    checks,
  };
}

const SUMMARY_FIELDS = [
  "total_checks",
  "passed",
  "warnings",
  "failed",
  "errors",
  "skipped",
] as const;

function parseSummary(input: unknown, errors: string[]): JsonSummary | null {
  if (!isRecord(input)) {
    errors.push("summary must be an object");
    return null;
  }
  const counts: Record<(typeof SUMMARY_FIELDS)[number], number> = {
    total_checks: 0,
    passed: 0,
    warnings: 0,
    failed: 0,
    errors: 0,
    skipped: 0,
  };
  for (const field of SUMMARY_FIELDS) {
    const value = input[field];
    if (!isCount(value)) {
      errors.push(`summary.${field} must be a non-negative integer`);
      continue;
    }
    counts[field] = value;
  }
  const executed = counts.passed + counts.warnings + counts.failed + counts.errors;
  if (counts.total_checks !== executed) {
    errors.push(
      `summary.total_checks is ${counts.total_checks} but executed counts add up to ${executed}`,
    );
  }
  return counts;
}

function parseChecks(
  input: unknown,
  errors: string[],
): Record<string, JsonCheckEntry> | null {
  if (!isRecord(input)) {
    errors.push("checks must be an object");
    return null;
  }
  const checks: Record<string, JsonCheckEntry> = {};
  for (const [id, value] of Object.entries(input)) {
    const label = `checks.${id}`;
    if (!isRecord(value)) {
      errors.push(`${label} must be an object`);
      continue;
    }
    const status = parseStatus(value.status);
    if (!status) {
      errors.push(`${label}.status must be one of ${CHECK_STATUSES.join(", ")}`);
      continue;
    }
    const appliedRaw = value.remediation_applied;
    if (appliedRaw !== undefined && typeof appliedRaw !== "boolean") {
      errors.push(`${label}.remediation_applied must be a boolean`);
    }
    checks[id] = {
      name: requireString(value.name, `${label}.name`, errors),
      category: requireString(value.category, `${label}.category`, errors),
      status,
      severity: requireString(value.severity, `${label}.severity`, errors),
      message: optionalString(value.message, `${label}.message`, errors) ?? "",
      remediation: optionalString(
        value.remediation,
        `${label}.remediation`,
        errors,
      ),
      reference: optionalString(value.reference, `${label}.reference`, errors),
      remediation_applied:
        typeof appliedRaw === "boolean" ? appliedRaw : undefined,
      timestamp: optionalString(value.timestamp, `${label}.timestamp`, errors),
    };
  }
  return checks;
}

function parseStatus(value: unknown): CheckStatus | undefined {
  return CHECK_STATUSES.find((status) => status === value);
}

function requireString(input: unknown, label: string, errors: string[]): string {
  if (typeof input !== "string") {
    errors.push(`${label} must be a string`);
    return "";
  }
  return input;
}

function optionalString(
  input: unknown,
  label: string,
  errors: string[],
): string | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (typeof input !== "string") {
    errors.push(`${label} must be a string`);
    return undefined;
  }
  return input;
}

function isCount(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
