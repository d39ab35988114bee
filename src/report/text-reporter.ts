import { CheckStatus, type ScanRun } from "../engine/types.js";
import { formatDuration, reportEntries } from "./report-utils.js";

export interface TextRenderOptions {
  readonly messageWidth?: number;
  readonly showRemediation?: boolean;
}

export function renderTextReport(
  run: ScanRun,
  options: TextRenderOptions = {},
): string {
  const messageWidth = options.messageWidth ?? 60;
  const showRemediation = options.showRemediation ?? true;
  const entries = reportEntries(run);
  const lines: string[] = [];

  lines.push(renderHeaderBlock(run));
  lines.push("");
  lines.push(
    renderAsciiTable(
      [
        ["Total", String(run.summary.total)],
        ["Passed", String(run.summary.pass)],
        ["Warnings", String(run.summary.warn)],
        ["Failed", String(run.summary.fail)],
        ["Errors", String(run.summary.error)],
        ["Skipped", String(run.summary.skip)],
      ],
      ["Status", "Count"],
    ),
  );

  lines.push("");
  lines.push("Checks");
  lines.push("");
  if (entries.length === 0) {
    lines.push("No checks in profile.");
    return `${lines.join("\n")}\n`;
  }
  lines.push(
    renderAsciiTable(
      entries.map((entry) => [
        entry.checkId,
        entry.status,
        entry.severity,
        truncateText(entry.name, 40),
        truncateText(entry.message, messageWidth),
      ]),
      ["ID", "Status", "Severity", "Check", "Message"],
    ),
  );

  const actionable = entries.filter(
    (entry) =>
      entry.remediation !== undefined &&
      entry.status !== CheckStatus.Pass &&
      entry.status !== CheckStatus.Skip,
  );
  if (showRemediation && actionable.length > 0) {
    lines.push("");
    lines.push("Remediation");
    lines.push("");
    for (const entry of actionable) {
      lines.push(`- ${entry.checkId}: ${entry.remediation ?? ""}`);
    }
  }

  return `${lines.join("\n")}\n`;
}

function renderHeaderBlock(run: ScanRun): string {
  const lines = [
    "Hardencheck Compliance Report",
    `Scan ID: ${run.scanId}`,
    `Profile: ${run.profile}`,
    `Target: ${run.target}`,
    `Fix Mode: ${run.fixMode ? "enabled" : "disabled"}`,
    `Duration: ${formatDuration(run.durationSeconds)}`,
    `Compliance Score: ${run.complianceScore}/100`,
    `Risk Level: ${run.riskLevel}`,
  ];
  return renderAsciiBox(lines);
}

export function renderAsciiBox(content: readonly string[]): string {
  const width = Math.max(...content.map((line) => line.length));
  const top = `+${"-".repeat(width + 2)}+`;
  const body = content.map((line) => {
    const padding = " ".repeat(width - line.length);
    return `| ${line}${padding} |`;
  });
  return [top, ...body, top].join("\n");
}

export function renderAsciiTable(
  rows: readonly string[][],
  headers: readonly string[],
): string {
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => row[index]?.length ?? 0)),
  );
  const border = `+${widths.map((w) => "-".repeat(w + 2)).join("+")}+`;
  const headerLine = `| ${headers
    .map((header, index) => header.padEnd(widths[index] ?? 0))
    .join(" | ")} |`;
  const body = rows.map(
    (row) =>
      `| ${row
        .map((cell, index) => cell.padEnd(widths[index] ?? 0))
        .join(" | ")} |`,
  );
  return [border, headerLine, border, ...body, border].join("\n");
}

function truncateText(input: string, max: number): string {
  const flat = input.replace(/\s+/g, " ");
  if (flat.length <= max) {
    return flat;
  }
  return `${flat.slice(0, Math.max(0, max - 3))}...`;
}
