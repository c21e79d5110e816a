import type { FileError, TokenReport } from "../aggregate/types.js";
import type { ContextWindowUsage } from "../context-window/types.js";

export interface ToolInfo {
  readonly name: "tree-tokens";
  readonly version: string;
}

export interface TargetInfo {
  readonly input: string;
  readonly resolved_path: string;
  readonly source: "local" | "git";
}

export interface RankedEntry {
  readonly name: string;
  readonly tokens: number;
  readonly files: number;
}

export interface SummaryInfo {
  readonly total_tokens: number;
  readonly files_counted: number;
  readonly files_failed: number;
  readonly encoding: string;
}

export interface JsonReport {
  readonly tool: ToolInfo;
  readonly target: TargetInfo;
  readonly summary: SummaryInfo;
  readonly by_extension: readonly RankedEntry[];
  readonly by_technology: readonly RankedEntry[];
  readonly context_windows: readonly ContextWindowUsage[];
  readonly errors: readonly FileError[];
}

export interface ReportInput {
  readonly toolVersion: string;
  readonly target: TargetInfo;
  readonly report: TokenReport;
  readonly contextWindows: readonly ContextWindowUsage[];
}
