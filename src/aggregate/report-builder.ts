import { technologyOf } from "../ingest/file-classifier.js";
import type { ExtensionTable } from "../ingest/types.js";
import type { CountMap, FileError, TokenReport } from "./types.js";

interface ExtensionTotals {
  tokens: number;
  files: number;
}

/**
 * Mutable accumulator owned by a single run. Only per-extension totals are
 * tracked while walking; technology totals are folded from them in
 * {@link ReportBuilder.finish}, so every breakdown sums to the same total.
 */
export class ReportBuilder {
  private readonly extensions = new Map<string, ExtensionTotals>();
  private readonly errors: FileError[] = [];
  private totalTokens = 0;
  private finished = false;

  constructor(
    private readonly table: ExtensionTable,
    private readonly rootPath: string,
    private readonly tokenizer: string,
  ) {}

  record(extension: string, tokens: number): void {
    this.assertOpen();
    const totals = this.extensions.get(extension) ?? { tokens: 0, files: 0 };
    totals.tokens += tokens;
    totals.files += 1;
    this.extensions.set(extension, totals);
    this.totalTokens += tokens;
  }

  recordError(error: FileError): void {
    this.assertOpen();
    this.errors.push(error);
  }

  finish(): TokenReport {
    this.assertOpen();
    this.finished = true;

    const extensions = [...this.extensions.keys()].sort(compareKeys);
    const byExtension: Record<string, number> = {};
    const fileCountByExtension: Record<string, number> = {};
    const technologyTotals = new Map<string, ExtensionTotals>();
    let filesCounted = 0;

    for (const extension of extensions) {
      const totals = this.extensions.get(extension);
      if (!totals) {
        continue;
      }
      byExtension[extension] = totals.tokens;
      fileCountByExtension[extension] = totals.files;
      filesCounted += totals.files;

      const technology = technologyOf(this.table, extension);
      const bucket = technologyTotals.get(technology) ?? {
        tokens: 0,
        files: 0,
      };
      bucket.tokens += totals.tokens;
      bucket.files += totals.files;
      technologyTotals.set(technology, bucket);
    }

    const byTechnology: Record<string, number> = {};
    const fileCountByTechnology: Record<string, number> = {};
    for (const technology of [...technologyTotals.keys()].sort(compareKeys)) {
      const bucket = technologyTotals.get(technology);
      if (!bucket) {
        continue;
      }
      byTechnology[technology] = bucket.tokens;
      fileCountByTechnology[technology] = bucket.files;
    }

    const errors = [...this.errors].sort(
      (a, b) => compareKeys(a.path, b.path) || compareKeys(a.kind, b.kind),
    );

    return Object.freeze({
      rootPath: this.rootPath,
      tokenizer: this.tokenizer,
      totalTokens: this.totalTokens,
      filesCounted,
      byExtension: freezeCounts(byExtension),
      fileCountByExtension: freezeCounts(fileCountByExtension),
      byTechnology: freezeCounts(byTechnology),
      fileCountByTechnology: freezeCounts(fileCountByTechnology),
      errors: Object.freeze(errors.map((error) => Object.freeze(error))),
    });
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new Error("Report already finished");
    }
  }
}

function freezeCounts(counts: Record<string, number>): CountMap {
  return Object.freeze(counts);
}

function compareKeys(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}
