export interface ExtensionGroup {
  readonly technology: string;
  readonly extensions: readonly string[];
}

/** Normalized extension (".py") to technology label ("Python"). */
export type ExtensionTable = ReadonlyMap<string, string>;

export interface Candidate {
  readonly absolutePath: string;
  readonly relativePath: string;
  readonly extension: string;
}

export type WalkEvent =
  | { readonly type: "file"; readonly candidate: Candidate }
  | {
      readonly type: "unreadable-directory";
      readonly relativePath: string;
      readonly message: string;
    };

export interface WalkOptions {
  readonly table: ExtensionTable;
  readonly excludedDirectories?: ReadonlySet<string>;
  readonly signal?: AbortSignal;
}

export interface LoadedTarget {
  readonly rootPath: string;
  readonly source: "local" | "git";
  readonly repoUrl?: string;
  readonly cleanup: () => Promise<void>;
}
