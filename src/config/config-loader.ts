import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { ConfigError } from "../errors.js";
import { DEFAULT_CONFIG_FILE, type RunConfig } from "./types.js";

const CONFIG_KEYS = new Set([
  "encoding",
  "concurrency",
  "exclude_dirs",
  "extensions",
  "context_windows",
]);

export function emptyConfig(): RunConfig {
  return { excludeDirs: [], extensions: {}, contextWindows: {} };
}

/**
 * Load `explicitPath`, or `tree-tokens.yaml` from `cwd` when it exists.
 * A missing explicit file is an error; a missing default file is not.
 */
export async function loadConfig(
  explicitPath: string | undefined,
  cwd: string = process.cwd(),
): Promise<RunConfig> {
  const configPath = explicitPath
    ? path.resolve(cwd, explicitPath)
    : path.join(cwd, DEFAULT_CONFIG_FILE);

  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf8");
  } catch (error) {
    if (!explicitPath && isNotFound(error)) {
      return emptyConfig();
    }
    throw new ConfigError(`Unable to read config file: ${configPath}`, {
      cause: error,
    });
  }

  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${configPath}`, { cause: error });
  }
  return validateConfig(doc ?? {}, configPath);
}

/** Validate a parsed config document, reporting every problem at once. */
export function validateConfig(input: unknown, source: string): RunConfig {
  const errors: string[] = [];
  const config = parseConfig(input, errors);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid config in ${source}: ${errors.join("; ")}`);
  }
  return config;
}

function parseConfig(input: unknown, errors: string[]): RunConfig {
  if (!isRecord(input)) {
    errors.push("config must be a mapping");
    return emptyConfig();
  }

  for (const key of Object.keys(input)) {
    if (!CONFIG_KEYS.has(key)) {
      errors.push(`unknown key '${key}'`);
    }
  }

  let encoding: string | undefined;
  if (input.encoding !== undefined) {
    if (typeof input.encoding === "string" && input.encoding.trim()) {
      encoding = input.encoding.trim();
    } else {
      errors.push("encoding must be a non-empty string");
    }
  }

  let concurrency: number | undefined;
  if (input.concurrency !== undefined) {
    if (isPositiveInteger(input.concurrency)) {
      concurrency = input.concurrency;
    } else {
      errors.push("concurrency must be a positive integer");
    }
  }

  const excludeDirs: string[] = [];
  if (input.exclude_dirs !== undefined) {
    if (Array.isArray(input.exclude_dirs)) {
      input.exclude_dirs.forEach((value: unknown, index: number) => {
        if (typeof value === "string" && value && !value.includes("/")) {
          excludeDirs.push(value);
        } else {
          errors.push(`exclude_dirs[${index}] must be a directory name`);
        }
      });
    } else {
      errors.push("exclude_dirs must be a list");
    }
  }

  const extensions: Record<string, string> = {};
  if (input.extensions !== undefined) {
    if (isRecord(input.extensions)) {
      for (const [extension, technology] of Object.entries(input.extensions)) {
        if (!extension.startsWith(".") || extension.length < 2) {
          errors.push(`extensions key '${extension}' must start with a dot`);
        } else if (typeof technology !== "string" || !technology.trim()) {
          errors.push(`extensions.${extension} must be a technology name`);
        } else {
          extensions[extension.toLowerCase()] = technology;
        }
      }
    } else {
      errors.push("extensions must be a mapping");
    }
  }

  const contextWindows: Record<string, number> = {};
  if (input.context_windows !== undefined) {
    if (isRecord(input.context_windows)) {
      for (const [model, tokens] of Object.entries(input.context_windows)) {
        if (isPositiveInteger(tokens)) {
          contextWindows[model] = tokens;
        } else {
          errors.push(`context_windows.${model} must be a positive integer`);
        }
      }
    } else {
      errors.push("context_windows must be a mapping");
    }
  }

  return { encoding, concurrency, excludeDirs, extensions, contextWindows };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
