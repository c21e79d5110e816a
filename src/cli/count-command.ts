import fs from "node:fs/promises";
import path from "node:path";
import { aggregate, DEFAULT_CONCURRENCY } from "../aggregate/index.js";
import type { TokenReport } from "../aggregate/index.js";
import { loadConfig } from "../config/index.js";
import {
  compareContextWindows,
  loadContextWindows,
  mergeContextWindows,
} from "../context-window/index.js";
import { ConfigError } from "../errors.js";
import {
  DEFAULT_EXCLUDED_DIRECTORIES,
  isGitUrl,
  loadExtensionTable,
  loadTarget,
  withExtensionOverrides,
} from "../ingest/index.js";
import { renderJsonReport, renderTextReport } from "../report/index.js";
import type { ReportInput } from "../report/index.js";
import { createTokenizer, DEFAULT_ENCODING } from "../tokenizer/index.js";
import type { Tokenizer } from "../tokenizer/index.js";
import { createDiagnostics, resolveVerbosity } from "./output.js";
import type { Diagnostics } from "./output.js";
import { resolveDataDirectory } from "./runtime-paths.js";

export type OutputFormat = "text" | "json";

export interface CountOptions {
  readonly target: string;
  readonly format?: OutputFormat;
  readonly out?: string;
  /** Print only the total token count and no diagnostics. */
  readonly total?: boolean;
  readonly encoding?: string;
  readonly concurrency?: number;
  /** Text format only: error lines listed before the rest are summarized. */
  readonly maxErrors?: number;
  /** Text format only; JSON always carries the comparison. */
  readonly showContextWindows?: boolean;
  readonly exclude?: readonly string[];
  readonly configPath?: string;
  readonly quiet?: boolean;
  readonly verbose?: boolean;
  readonly signal?: AbortSignal;
  readonly cwd?: string;
  /** Replaces the gpt-tokenizer encoding named by `encoding`. */
  readonly tokenizer?: Tokenizer;
  readonly diagnostics?: Diagnostics;
}

export interface CountResult {
  readonly report: TokenReport;
  readonly output: string;
}

export async function runCountCommand(
  options: CountOptions,
  toolVersion: string,
): Promise<CountResult> {
  const cwd = options.cwd ?? process.cwd();
  const diagnostics =
    options.diagnostics ?? createDiagnostics(resolveVerbosity(options));
  const config = await loadConfig(options.configPath, cwd);

  const concurrency =
    options.concurrency ?? config.concurrency ?? DEFAULT_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency <= 0) {
    throw new ConfigError(
      `Concurrency must be a positive integer, got ${concurrency}`,
    );
  }

  // Startup dependencies load before anything touches the target.
  const tokenizer =
    options.tokenizer ??
    (await createTokenizer(
      options.encoding ?? config.encoding ?? DEFAULT_ENCODING,
    ));
  const dataDir = await resolveDataDirectory();
  const table = withExtensionOverrides(
    await loadExtensionTable(path.join(dataDir, "extensions.yaml")),
    config.extensions,
  );
  const windows = mergeContextWindows(
    await loadContextWindows(path.join(dataDir, "context-windows.yaml")),
    config.contextWindows,
  );
  const excludedDirectories = new Set([
    ...DEFAULT_EXCLUDED_DIRECTORIES,
    ...config.excludeDirs,
    ...(options.exclude ?? []),
  ]);

  diagnostics.info(
    isGitUrl(options.target)
      ? `Cloning repository: ${options.target}`
      : `Analyzing local directory: ${options.target}`,
  );
  const target = await loadTarget(
    isGitUrl(options.target)
      ? options.target
      : path.resolve(cwd, options.target),
  );

  let report: TokenReport;
  try {
    report = await aggregate(target.rootPath, {
      tokenizer,
      table,
      excludedDirectories,
      concurrency,
      signal: options.signal,
      observer: {
        onFile: (record) => {
          diagnostics.detail(
            `${record.path} ${record.tokens} tokens (${record.technology})`,
          );
        },
        onError: (error) => {
          diagnostics.detail(
            `Error processing ${error.path} [${error.kind}]: ${error.message}`,
          );
        },
      },
    });
  } finally {
    await target.cleanup();
  }

  if (report.errors.length > 0) {
    diagnostics.info(
      `Skipped ${report.errors.length} file${report.errors.length === 1 ? "" : "s"} that could not be processed`,
    );
  }

  const input: ReportInput = {
    toolVersion,
    target: {
      input: options.target,
      resolved_path: target.rootPath,
      source: target.source,
    },
    report,
    contextWindows: compareContextWindows(report.totalTokens, windows),
  };
  const output = buildOutput(input, options);

  if (options.out) {
    await fs.writeFile(path.resolve(cwd, options.out), output + "\n", "utf8");
  }

  return { report, output };
}

function buildOutput(input: ReportInput, options: CountOptions): string {
  if (options.total) {
    return String(input.report.totalTokens);
  }
  if (options.format === "json") {
    return renderJsonReport(input);
  }
  return renderTextReport(input, {
    maxErrors: options.maxErrors,
    showContextWindows: options.showContextWindows,
  });
}
