import type { ReportInput } from "./types.js";
import {
  formatCount,
  formatFiles,
  formatNumber,
  formatPercentage,
  rankEntries,
} from "./report-utils.js";

export interface TextRenderOptions {
  readonly showContextWindows?: boolean;
  readonly maxErrors?: number;
}

type Align = "left" | "right";

export function renderTextReport(
  input: ReportInput,
  options: TextRenderOptions = {},
): string {
  const { report } = input;
  const showContextWindows = options.showContextWindows ?? true;
  const maxErrors = options.maxErrors ?? 20;
  const lines: string[] = [];

  lines.push(
    renderAsciiBox([
      "Token Count Report",
      `Target: ${input.target.input}`,
      `Encoding: ${report.tokenizer}`,
      `Total tokens: ${formatNumber(report.totalTokens)} (${formatCount(report.totalTokens)})`,
      `Files counted: ${report.filesCounted}`,
    ]),
  );

  if (report.filesCounted === 0) {
    lines.push("");
    lines.push("No analyzable files found.");
  } else {
    lines.push("");
    lines.push("### Tokens by file extension");
    lines.push("");
    lines.push(
      renderAsciiTable(
        rankEntries(report.byExtension, report.fileCountByExtension).map(
          (entry) => tokenRow(entry.name, entry.tokens, entry.files),
        ),
        ["Extension", "Tokens", "Files"],
        ["left", "right", "right"],
      ),
    );

    lines.push("");
    lines.push("### Tokens by technology");
    lines.push("");
    lines.push(
      renderAsciiTable(
        rankEntries(report.byTechnology, report.fileCountByTechnology).map(
          (entry) => tokenRow(entry.name, entry.tokens, entry.files),
        ),
        ["Technology", "Tokens", "Files"],
        ["left", "right", "right"],
      ),
    );
  }

  if (showContextWindows && input.contextWindows.length > 0) {
    lines.push("");
    lines.push("### Context window comparison");
    lines.push("");
    lines.push(
      renderAsciiTable(
        input.contextWindows.map((usage) => [
          usage.model,
          formatCount(usage.window),
          formatPercentage(usage.percentage),
        ]),
        ["Model", "Window", "Usage"],
        ["left", "right", "right"],
      ),
    );
  }

  if (report.errors.length > 0) {
    const shown = report.errors.slice(0, Math.max(0, maxErrors));
    lines.push("");
    lines.push(`### Errors (${report.errors.length} skipped)`);
    lines.push("");
    for (const error of shown) {
      lines.push(`- ${error.path} [${error.kind}]: ${error.message}`);
    }
    if (report.errors.length > shown.length) {
      lines.push(`- ... ${report.errors.length - shown.length} more`);
    }
  }

  return lines.join("\n");
}

function tokenRow(name: string, tokens: number, files: number): string[] {
  return [
    name,
    `${formatNumber(tokens)} (${formatCount(tokens)})`,
    formatFiles(files),
  ];
}

function renderAsciiBox(content: readonly string[]): string {
  const width = Math.max(...content.map((line) => line.length));
  const border = `+${"-".repeat(width + 2)}+`;
  const body = content.map((line) => `| ${line.padEnd(width)} |`);
  return [border, ...body, border].join("\n");
}

export function renderAsciiTable(
  rows: readonly string[][],
  headers: readonly string[],
  align: readonly Align[] = [],
): string {
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => row[index]?.length ?? 0)),
  );
  const pad = (cell: string, index: number): string => {
    const width = widths[index] ?? 0;
    return align[index] === "right" ? cell.padStart(width) : cell.padEnd(width);
  };
  const border = `+${widths.map((w) => "-".repeat(w + 2)).join("+")}+`;
  const headerLine = `| ${headers
    .map((header, index) => header.padEnd(widths[index] ?? 0))
    .join(" | ")} |`;
  const body = rows.map((row) => `| ${row.map(pad).join(" | ")} |`);
  return [border, headerLine, border, ...body, border].join("\n");
}
