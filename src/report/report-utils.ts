import { CheckStatus, type ScanRun } from "../engine/types.js";

/**
 * One report row: an executed outcome or a skipped check.
 */
export interface ReportEntry {
  readonly checkId: string;
  readonly name: string;
  readonly category: string;
  readonly severity: string;
  readonly status: CheckStatus;
  readonly message: string;
  readonly remediation?: string;
  readonly reference?: string;
  readonly remediationApplied?: boolean;
  readonly timestamp?: string;
  readonly index: number;
}

/**
 * Executed and skipped checks merged back into registry order.
 */
export function reportEntries(run: ScanRun): ReportEntry[] {
  const executed: ReportEntry[] = run.outcomes.map((outcome) => ({
    checkId: outcome.checkId,
    name: outcome.name,
    category: outcome.category,
    severity: outcome.severity,
    status: outcome.status,
    message: outcome.message,
    remediation: outcome.remediation,
    reference: outcome.reference,
    remediationApplied: outcome.remediationApplied,
    timestamp: outcome.timestamp,
    index: outcome.index,
  }));
  const skipped: ReportEntry[] = run.skipped.map((skip) => ({
    checkId: skip.checkId,
    name: skip.name,
    category: skip.category,
    severity: skip.severity,
    status: CheckStatus.Skip,
    message: skip.reason,
    index: skip.index,
  }));
  return [...executed, ...skipped].sort((a, b) => a.index - b.index);
}

export function formatDuration(seconds: number): string {
  return `${seconds.toFixed(3)}s`;
}

const HTML_ESCAPES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

const XML_ESCAPES: Readonly<Record<string, string>> = {
  ...HTML_ESCAPES,
  "'": "&apos;",
};

export function escapeXml(value: string): string {
  // Control characters other than tab, LF and CR are not legal in XML 1.0.
  return value
    .replace(/[\u0000-\u0008\u000b\u000c\u000e-\u001f]/g, "")
    .replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char);
}

export function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}
