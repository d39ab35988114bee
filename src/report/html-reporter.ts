import type { ScanRun } from "../engine/types.js";
import { escapeHtml, formatDuration, reportEntries } from "./report-utils.js";

const STYLE = `
body { font-family: sans-serif; margin: 2rem; color: #222; }
table { border-collapse: collapse; width: 100%; }
th, td { border: 1px solid #ccc; padding: 0.4rem 0.6rem; text-align: left; vertical-align: top; }
th { background: #f0f0f0; }
.status-pass { background: #e6f4ea; }
.status-warn { background: #fff4e5; }
.status-fail { background: #fdecea; }
.status-error { background: #f3e5f5; }
.status-skip { color: #777; }
.risk-low { color: #1e7b34; }
.risk-medium { color: #b26a00; }
.risk-high { color: #c62828; }
.risk-critical { color: #8e0000; font-weight: bold; }
`;

export function renderHtmlReport(run: ScanRun): string {
  const title = `Compliance Report ${escapeHtml(run.scanId)}`;
  const summaryRows: [string, string][] = [
    ["Profile", run.profile],
    ["Target", run.target],
    ["Fix Mode", run.fixMode ? "enabled" : "disabled"],
    ["Started", run.startTime],
    ["Duration", formatDuration(run.durationSeconds)],
    ["Total", String(run.summary.total)],
    ["Passed", String(run.summary.pass)],
    ["Warnings", String(run.summary.warn)],
    ["Failed", String(run.summary.fail)],
    ["Errors", String(run.summary.error)],
    ["Skipped", String(run.summary.skip)],
  ];

  const checkRows = reportEntries(run).map((entry) => {
    const cells = [
      entry.checkId,
      entry.name,
      entry.status,
      entry.severity,
      entry.message,
      entry.remediation ?? "",
    ]
      .map((cell) => `<td>${escapeHtml(cell)}</td>`)
      .join("");
    return `      <tr class="status-${entry.status.toLowerCase()}">${cells}</tr>`;
  });

  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '  <meta charset="utf-8">',
    `  <title>${title}</title>`,
    `  <style>${STYLE}</style>`,
    "</head>",
    "<body>",
    `  <h1>${title}</h1>`,
    `  <p class="risk-${run.riskLevel.toLowerCase()}">Compliance Score: ${run.complianceScore}/100 (Risk Level: ${run.riskLevel})</p>`,
    '  <table class="summary">',
    ...summaryRows.map(
      ([label, value]) =>
        `    <tr><th>${label}</th><td>${escapeHtml(value)}</td></tr>`,
    ),
    "  </table>",
    "  <h2>Checks</h2>",
    '  <table class="checks">',
    "    <thead>",
    "      <tr><th>ID</th><th>Check</th><th>Status</th><th>Severity</th><th>Message</th><th>Remediation</th></tr>",
    "    </thead>",
    "    <tbody>",
    ...checkRows,
    "    </tbody>",
    "  </table>",
    "</body>",
    "</html>",
    "",
  ].join("\n");
}
