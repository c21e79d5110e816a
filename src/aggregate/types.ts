import type { ExtensionTable } from "../ingest/types.js";
import type { Tokenizer } from "../tokenizer/types.js";

export type FileErrorKind =
  | "read"
  | "decode"
  | "tokenize"
  | "unreadable-directory";

export interface FileError {
  readonly path: string;
  readonly kind: FileErrorKind;
  readonly message: string;
}

/** One counted file. Passed to the observer, never kept. */
export interface FileRecord {
  readonly path: string;
  readonly extension: string;
  readonly technology: string;
  readonly tokens: number;
}

export type CountMap = Readonly<Record<string, number>>;

export interface TokenReport {
  readonly rootPath: string;
  readonly tokenizer: string;
  readonly totalTokens: number;
  readonly filesCounted: number;
  readonly byExtension: CountMap;
  readonly fileCountByExtension: CountMap;
  readonly byTechnology: CountMap;
  readonly fileCountByTechnology: CountMap;
  readonly errors: readonly FileError[];
}

export interface AggregateObserver {
  onFile?(record: FileRecord): void;
  onError?(error: FileError): void;
}

export interface AggregateOptions {
  readonly tokenizer: Tokenizer;
  readonly table: ExtensionTable;
  readonly excludedDirectories?: ReadonlySet<string>;
  readonly concurrency?: number;
  readonly observer?: AggregateObserver;
  readonly signal?: AbortSignal;
}
