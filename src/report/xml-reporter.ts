import type { ScanRun } from "../engine/types.js";
import { escapeXml, reportEntries } from "./report-utils.js";

function attributes(
  values: Readonly<Record<string, string | number | boolean>>,
): string {
  return Object.entries(values)
    .map(([key, value]) => `${key}="${escapeXml(String(value))}"`)
    .join(" ");
}

function element(name: string, text: string | undefined): string[] {
  return text === undefined ? [] : [`      <${name}>${escapeXml(text)}</${name}>`];
}

export function renderXmlReport(run: ScanRun): string {
  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<scan-report ${attributes({
      "scan-id": run.scanId,
      profile: run.profile,
      target: run.target,
      timestamp: run.startTime,
      "fix-mode": run.fixMode,
      "duration-seconds": run.durationSeconds,
    })}>`,
    `  <summary ${attributes({
      total: run.summary.total,
      passed: run.summary.pass,
      warnings: run.summary.warn,
      failed: run.summary.fail,
      errors: run.summary.error,
      skipped: run.summary.skip,
      "compliance-score": run.complianceScore,
      "risk-level": run.riskLevel,
    })}/>`,
    "  <checks>",
  ];

  for (const entry of reportEntries(run)) {
    lines.push(
      `    <check ${attributes({
        id: entry.checkId,
        status: entry.status,
        severity: entry.severity,
        category: entry.category,
      })}>`,
      ...element("name", entry.name),
      ...element("message", entry.message),
      ...element("remediation", entry.remediation),
      ...element("reference", entry.reference),
      "    </check>",
    );
  }

  lines.push("  </checks>", "</scan-report>", "");
  return lines.join("\n");
}
