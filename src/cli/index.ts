#!/usr/bin/env node
import { Command } from "commander";
import { ConfigError, exitCodeFor } from "../errors.js";
import { supportedEncodings } from "../tokenizer/index.js";
import { runCountCommand, type OutputFormat } from "./count-command.js";
import { writeError, writeStdout } from "./output.js";
import { loadVersion } from "./runtime-paths.js";

interface CountCliOptions {
  readonly total?: boolean;
  readonly format: string;
  readonly out?: string;
  readonly encoding?: string;
  readonly concurrency?: string;
  readonly exclude?: string[];
  readonly config?: string;
  readonly maxErrors?: string;
  readonly contextWindows: boolean;
}

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("tree-tokens")
  .description("Count language-model tokens in a directory or git repository")
  .version(toolVersion)
  .option("--verbose", "Log every counted file and per-file error")
  .option("--quiet", "Suppress progress and diagnostic output");

program
  .command("count", { isDefault: true })
  .argument("<target>", "Directory path or git URL")
  .option("-t, --total", "Print only the total token count")
  .option("--format <format>", "Output format (text|json)", "text")
  .option("--out <file>", "Also write the report to a file")
  .option(
    "--encoding <name>",
    `Tokenizer encoding (${supportedEncodings().join("|")})`,
  )
  .option("--concurrency <number>", "Files processed in parallel")
  .option("--exclude <dir...>", "Additional directory names to skip")
  .option("--config <path>", "Config file (default: ./tree-tokens.yaml)")
  .option("--max-errors <number>", "Error lines shown in the text report")
  .option("--no-context-windows", "Omit the context window comparison")
  .action(countAction);

async function countAction(
  target: string,
  options: CountCliOptions,
  command: Command,
): Promise<void> {
  const globals = command.optsWithGlobals();
  const controller = new AbortController();
  const onInterrupt = (): void => {
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    const result = await runCountCommand(
      {
        target,
        format: parseFormat(options.format),
        out: options.out,
        total: Boolean(options.total),
        encoding: options.encoding,
        concurrency: options.concurrency
          ? parseConcurrency(options.concurrency)
          : undefined,
        exclude: options.exclude,
        configPath: options.config,
        maxErrors: options.maxErrors
          ? parseMaxErrors(options.maxErrors)
          : undefined,
        showContextWindows: options.contextWindows,
        quiet: Boolean(globals.quiet),
        verbose: Boolean(globals.verbose),
        signal: controller.signal,
      },
      toolVersion,
    );

    if (!options.out || options.total) {
      await writeStdout(result.output + "\n");
    }
  } catch (error) {
    await writeError(error);
    process.exitCode = exitCodeFor(error);
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

function parseFormat(value: string): OutputFormat {
  if (value === "text" || value === "json") {
    return value;
  }
  throw new ConfigError(`Unsupported format: ${value}`);
}

function parseConcurrency(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(
      `--concurrency must be a positive integer, got ${value}`,
    );
  }
  return parsed;
}

function parseMaxErrors(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigError(
      `--max-errors must be a non-negative integer, got ${value}`,
    );
  }
  return parsed;
}

// Accept the single-dash spelling "-total" alongside "--total".
const argv = process.argv.map((arg) => (arg === "-total" ? "--total" : arg));
const separatorIndex = argv.indexOf("--");
if (separatorIndex !== -1) {
  argv.splice(separatorIndex, 1);
}

await program.parseAsync(argv);
