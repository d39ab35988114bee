import type { ScanRun } from "../engine/types.js";
import { renderCsvReport } from "./csv-reporter.js";
import { renderHtmlReport } from "./html-reporter.js";
import { renderJsonReport } from "./json-reporter.js";
import { renderTextReport } from "./text-reporter.js";
import { REPORT_FORMATS, type ReportFormat } from "./types.js";
import { renderXmlReport } from "./xml-reporter.js";

export function renderReport(run: ScanRun, format: ReportFormat): string {
  switch (format) {
    case "text":
      return renderTextReport(run);
    case "json":
      return renderJsonReport(run);
    case "csv":
      return renderCsvReport(run);
    case "html":
      return renderHtmlReport(run);
    case "xml":
      return renderXmlReport(run);
  }
}

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

export { CSV_HEADER, renderCsvReport } from "./csv-reporter.js";
export { renderHtmlReport } from "./html-reporter.js";
export {
  buildJsonReport,
  parseJsonReport,
  renderJsonReport,
} from "./json-reporter.js";
export { reportEntries, type ReportEntry } from "./report-utils.js";
export { renderTextReport } from "./text-reporter.js";
export { renderXmlReport } from "./xml-reporter.js";
export { REPORT_FORMATS } from "./types.js";
export type {
  JsonCheckEntry,
  JsonReport,
  JsonSummary,
  ReportFormat,
} from "./types.js";
