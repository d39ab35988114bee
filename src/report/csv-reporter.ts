import type { ScanRun } from "../engine/types.js";
import { csvField, reportEntries } from "./report-utils.js";

export const CSV_HEADER = [
  "Scan ID",
  "Check ID",
  "Check Name",
  "Status",
  "Severity",
  "Remediation",
] as const;

/**
 * The summary row carries the score in the Status column and the risk level
 * in the Severity column.
 */
export function renderCsvReport(run: ScanRun): string {
  const rows: string[][] = [
    [...CSV_HEADER],
    [
      run.scanId,
      "SUMMARY",
      "Summary",
      String(run.complianceScore),
      run.riskLevel,
      "",
    ],
  ];
  for (const entry of reportEntries(run)) {
    rows.push([
      run.scanId,
      entry.checkId,
      entry.name,
      entry.status,
      entry.severity,
      entry.remediation ?? "",
    ]);
  }
  return rows.map((row) => row.map(csvField).join(",")).join("\r\n") + "\r\n";
}
