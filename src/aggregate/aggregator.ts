import fs from "node:fs/promises";
import { RunCancelledError, errorMessage } from "../errors.js";
import { isBinary, technologyOf } from "../ingest/file-classifier.js";
import { resolveRoot, walkCandidates } from "../ingest/file-discovery.js";
import type { Candidate, WalkEvent } from "../ingest/types.js";
import { ReportBuilder } from "./report-builder.js";
import type {
  AggregateOptions,
  FileError,
  FileErrorKind,
  TokenReport,
} from "./types.js";
import { work } from "./worker-pool.js";

export const DEFAULT_CONCURRENCY = 8;

type FileOutcome =
  | { readonly status: "counted"; readonly tokens: number }
  | { readonly status: "binary" }
  | {
      readonly status: "failed";
      readonly kind: FileErrorKind;
      readonly message: string;
    };

/**
 * Count tokens for every analyzable file under `rootPath`.
 *
 * Walking is sequential; probing, reading and tokenizing run on a bounded
 * worker pool. Each finished file is folded into the report by one
 * synchronous `record` call, so concurrent workers never interleave partial
 * updates. Rejects with `TraversalError` for a bad root and with
 * `RunCancelledError` when `signal` aborts; per-file failures end up in
 * `report.errors`.
 */
export async function aggregate(
  rootPath: string,
  options: AggregateOptions,
): Promise<TokenReport> {
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  const realRoot = await resolveRoot(rootPath);
  const builder = new ReportBuilder(
    options.table,
    realRoot,
    options.tokenizer.name,
  );
  const observer = options.observer;

  const reportError = (error: FileError): void => {
    builder.recordError(error);
    observer?.onError?.(error);
  };

  const events = walkCandidates(realRoot, {
    table: options.table,
    excludedDirectories: options.excludedDirectories,
    signal: options.signal,
  });

  await work(concurrency, events, async (event: WalkEvent) => {
    throwIfAborted(options.signal);

    if (event.type === "unreadable-directory") {
      reportError({
        path: event.relativePath,
        kind: "unreadable-directory",
        message: event.message,
      });
      return;
    }

    const { candidate } = event;
    const outcome = await countFile(candidate, options);
    // A file finished after cancellation must not land in a report.
    throwIfAborted(options.signal);

    switch (outcome.status) {
      case "binary":
        return;
      case "failed":
        reportError({
          path: candidate.relativePath,
          kind: outcome.kind,
          message: outcome.message,
        });
        return;
      case "counted":
        builder.record(candidate.extension, outcome.tokens);
        observer?.onFile?.({
          path: candidate.relativePath,
          extension: candidate.extension,
          technology: technologyOf(options.table, candidate.extension),
          tokens: outcome.tokens,
        });
        return;
    }
  });

  throwIfAborted(options.signal);
  return builder.finish();
}

async function countFile(
  candidate: Candidate,
  options: AggregateOptions,
): Promise<FileOutcome> {
  let content: Buffer;
  try {
    if (await isBinary(candidate.absolutePath)) {
      return { status: "binary" };
    }
    content = await fs.readFile(candidate.absolutePath);
  } catch (error) {
    return { status: "failed", kind: "read", message: errorMessage(error) };
  }

  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(content);
  } catch (error) {
    return { status: "failed", kind: "decode", message: errorMessage(error) };
  }

  let tokens: number;
  try {
    tokens = options.tokenizer.countTokens(text);
  } catch (error) {
    return {
      status: "failed",
      kind: "tokenize",
      message: errorMessage(error),
    };
  }

  if (!Number.isInteger(tokens) || tokens < 0) {
    return {
      status: "failed",
      kind: "tokenize",
      message: `Tokenizer returned an invalid count: ${tokens}`,
    };
  }
  return { status: "counted", tokens };
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new RunCancelledError();
  }
}
