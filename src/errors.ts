export type ErrorCode =
  | "config"
  | "extension-table"
  | "tokenizer-init"
  | "source"
  | "traversal"
  | "cancelled";

export interface TokenCountErrorOptions {
  readonly cause?: unknown;
}

/**
 * Base class for failures that abort a whole run. Per-file problems are
 * reported as {@link FileError} values on the report instead.
 */
export class TokenCountError extends Error {
  readonly code: ErrorCode;

  constructor(
    code: ErrorCode,
    message: string,
    options: TokenCountErrorOptions = {},
  ) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
  }
}

export class ConfigError extends TokenCountError {
  constructor(message: string, options: TokenCountErrorOptions = {}) {
    super("config", message, options);
  }
}

export class ExtensionTableError extends TokenCountError {
  constructor(message: string, options: TokenCountErrorOptions = {}) {
    super("extension-table", message, options);
  }
}

export class TokenizerInitError extends TokenCountError {
  constructor(message: string, options: TokenCountErrorOptions = {}) {
    super("tokenizer-init", message, options);
  }
}

/** Raised when a remote target cannot be fetched. */
export class SourceError extends TokenCountError {
  constructor(message: string, options: TokenCountErrorOptions = {}) {
    super("source", message, options);
  }
}

export class TraversalError extends TokenCountError {
  constructor(message: string, options: TokenCountErrorOptions = {}) {
    super("traversal", message, options);
  }
}

export class RunCancelledError extends TokenCountError {
  constructor(message = "Run cancelled before completion") {
    super("cancelled", message);
  }
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError) {
    return 2;
  }
  if (error instanceof RunCancelledError) {
    return 130;
  }
  return 1;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
