export { buildJsonReport, renderJsonReport } from "./json-reporter.js";
export { renderAsciiTable, renderTextReport } from "./text-reporter.js";
export type { TextRenderOptions } from "./text-reporter.js";
export {
  formatCount,
  formatFiles,
  formatNumber,
  formatPercentage,
  rankEntries,
} from "./report-utils.js";
export type {
  JsonReport,
  RankedEntry,
  ReportInput,
  SummaryInfo,
  TargetInfo,
  ToolInfo,
} from "./types.js";
