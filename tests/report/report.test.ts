import { describe, expect, it } from "vitest";
import type { TokenReport } from "../../src/aggregate/types.js";
import { buildJsonReport, renderJsonReport } from "../../src/report/json-reporter.js";
import {
  formatFiles,
  formatNumber,
  formatPercentage,
  rankEntries,
} from "../../src/report/report-utils.js";
import {
  renderAsciiTable,
  renderTextReport,
} from "../../src/report/text-reporter.js";
import type { ReportInput } from "../../src/report/types.js";

const report: TokenReport = {
  rootPath: "/work/demo",
  tokenizer: "chars",
  totalTokens: 19,
  filesCounted: 3,
  byExtension: { ".css": 4, ".md": 4, ".py": 11 },
  fileCountByExtension: { ".css": 1, ".md": 1, ".py": 1 },
  byTechnology: { CSS: 4, Markdown: 4, Python: 11 },
  fileCountByTechnology: { CSS: 1, Markdown: 1, Python: 1 },
  errors: [{ path: "late.py", kind: "decode", message: "invalid utf-8" }],
};

const input: ReportInput = {
  toolVersion: "0.1.0",
  target: { input: "./demo", resolved_path: "/work/demo", source: "local" },
  report,
  contextWindows: [
    { model: "Small", window: 100, percentage: 19, fits: true },
    { model: "Tiny", window: 10, percentage: 190, fits: false },
  ],
};

describe("formatting", () => {
  it("abbreviates millions and billions", () => {
    expect(formatNumber(0)).toBe("0");
    expect(formatNumber(999)).toBe("999");
    expect(formatNumber(1234)).toBe("1,234");
    expect(formatNumber(999_999)).toBe("999,999");
    expect(formatNumber(1_000_000)).toBe("1.0M");
    expect(formatNumber(2_400_000)).toBe("2.4M");
    expect(formatNumber(1_500_000_000)).toBe("1.5B");
  });

  it("formats file counts and percentages", () => {
    expect(formatFiles(1)).toBe("1 file");
    expect(formatFiles(0)).toBe("0 files");
    expect(formatPercentage(12.345)).toBe("12.3%");
  });

  it("ranks by token count, then name", () => {
    expect(rankEntries(report.byExtension, report.fileCountByExtension)).toEqual(
      [
        { name: ".py", tokens: 11, files: 1 },
        { name: ".css", tokens: 4, files: 1 },
        { name: ".md", tokens: 4, files: 1 },
      ],
    );
  });
});

describe("renderAsciiTable", () => {
  it("pads cells and right-aligns numeric columns", () => {
    const table = renderAsciiTable(
      [
        [".py", "11"],
        [".md", "4"],
      ],
      ["Extension", "Tokens"],
      ["left", "right"],
    );

    expect(table.split("\n")).toEqual([
      "+-----------+--------+",
      "| Extension | Tokens |",
      "+-----------+--------+",
      "| .py       |     11 |",
      "| .md       |      4 |",
      "+-----------+--------+",
    ]);
  });
});

describe("renderTextReport", () => {
  it("renders the summary box", () => {
    const lines = renderTextReport(input).split("\n");

    expect(lines.slice(0, 7)).toEqual([
      "+-----------------------+",
      "| Token Count Report    |",
      "| Target: ./demo        |",
      "| Encoding: chars       |",
      "| Total tokens: 19 (19) |",
      "| Files counted: 3      |",
      "+-----------------------+",
    ]);
  });

  it("renders ranked breakdown rows", () => {
    const lines = renderTextReport(input).split("\n");

    expect(lines).toContain("### Tokens by file extension");
    expect(lines).toContain("| .py       | 11 (11) | 1 file |");
    expect(lines).toContain("| .css      |   4 (4) | 1 file |");
    expect(lines).toContain("### Tokens by technology");
    expect(lines).toContain("| Python     | 11 (11) | 1 file |");
    expect(lines.indexOf("| .css      |   4 (4) | 1 file |")).toBeLessThan(
      lines.indexOf("| .md       |   4 (4) | 1 file |"),
    );
  });

  it("renders context window usage", () => {
    const lines = renderTextReport(input).split("\n");

    expect(lines).toContain("### Context window comparison");
    expect(lines).toContain("| Small |    100 |  19.0% |");
    expect(lines).toContain("| Tiny  |     10 | 190.0% |");
  });

  it("omits context windows when asked", () => {
    const text = renderTextReport(input, { showContextWindows: false });

    expect(text.split("\n")).not.toContain("### Context window comparison");
  });

  it("lists errors and truncates long lists", () => {
    const many: ReportInput = {
      ...input,
      report: {
        ...report,
        errors: [
          { path: "a.py", kind: "read", message: "gone" },
          { path: "b.py", kind: "decode", message: "invalid utf-8" },
          { path: "c.py", kind: "tokenize", message: "boom" },
        ],
      },
    };

    const lines = renderTextReport(many, { maxErrors: 2 }).split("\n");

    expect(lines.slice(-5)).toEqual([
      "### Errors (3 skipped)",
      "",
      "- a.py [read]: gone",
      "- b.py [decode]: invalid utf-8",
      "- ... 1 more",
    ]);
  });

  it("says so when nothing was counted", () => {
    const empty: ReportInput = {
      ...input,
      report: {
        ...report,
        totalTokens: 0,
        filesCounted: 0,
        byExtension: {},
        fileCountByExtension: {},
        byTechnology: {},
        fileCountByTechnology: {},
        errors: [],
      },
      contextWindows: [],
    };

    const lines = renderTextReport(empty).split("\n");

    expect(lines.slice(-1)).toEqual(["No analyzable files found."]);
    expect(lines).not.toContain("### Tokens by file extension");
  });
});

describe("json report", () => {
  it("builds the machine-readable shape", () => {
    expect(buildJsonReport(input)).toEqual({
      tool: { name: "tree-tokens", version: "0.1.0" },
      target: {
        input: "./demo",
        resolved_path: "/work/demo",
        source: "local",
      },
      summary: {
        total_tokens: 19,
        files_counted: 3,
        files_failed: 1,
        encoding: "chars",
      },
      by_extension: [
        { name: ".py", tokens: 11, files: 1 },
        { name: ".css", tokens: 4, files: 1 },
        { name: ".md", tokens: 4, files: 1 },
      ],
      by_technology: [
        { name: "Python", tokens: 11, files: 1 },
        { name: "CSS", tokens: 4, files: 1 },
        { name: "Markdown", tokens: 4, files: 1 },
      ],
      context_windows: [
        { model: "Small", window: 100, percentage: 19, fits: true },
        { model: "Tiny", window: 10, percentage: 190, fits: false },
      ],
      errors: [{ path: "late.py", kind: "decode", message: "invalid utf-8" }],
    });
  });

  it("serializes with two-space indentation", () => {
    const text = renderJsonReport(input);

    expect(text.split("\n")[1]).toBe('  "tool": {');
    expect(JSON.parse(text)).toEqual(buildJsonReport(input));
  });
});
