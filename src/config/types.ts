export interface RunConfig {
  readonly encoding?: string;
  readonly concurrency?: number;
  /** Added to the built-in excluded directory names. */
  readonly excludeDirs: readonly string[];
  /** Extension to technology label; adds or relabels table entries. */
  readonly extensions: Readonly<Record<string, string>>;
  /** Model name to window size; adds or replaces built-in windows. */
  readonly contextWindows: Readonly<Record<string, number>>;
}

export const DEFAULT_CONFIG_FILE = "tree-tokens.yaml";
