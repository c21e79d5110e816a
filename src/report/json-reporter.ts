import type { JsonReport, ReportInput } from "./types.js";
import { rankEntries } from "./report-utils.js";

export function buildJsonReport(input: ReportInput): JsonReport {
  const { report } = input;
  return {
    tool: { name: "tree-tokens", version: input.toolVersion },
    target: input.target,
    summary: {
      total_tokens: report.totalTokens,
      files_counted: report.filesCounted,
      files_failed: report.errors.length,
      encoding: report.tokenizer,
    },
    by_extension: rankEntries(report.byExtension, report.fileCountByExtension),
    by_technology: rankEntries(
      report.byTechnology,
      report.fileCountByTechnology,
    ),
    context_windows: input.contextWindows,
    errors: report.errors,
  };
}

export function renderJsonReport(input: ReportInput): string {
  return JSON.stringify(buildJsonReport(input), null, 2);
}
