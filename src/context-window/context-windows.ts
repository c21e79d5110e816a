import fs from "node:fs/promises";
import yaml from "js-yaml";
import { ConfigError } from "../errors.js";
import type { ContextWindow, ContextWindowUsage } from "./types.js";

export async function loadContextWindows(
  filePath: string,
): Promise<ContextWindow[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(`Unable to read context window table: ${filePath}`, {
      cause: error,
    });
  }
  return parseContextWindows(raw, filePath);
}

export function parseContextWindows(
  raw: string,
  source: string,
): ContextWindow[] {
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${source}`, { cause: error });
  }
  if (!isRecord(doc) || !Array.isArray(doc.windows)) {
    throw new ConfigError(`Missing windows list in ${source}`);
  }

  const seen = new Set<string>();
  return doc.windows.map((entry: unknown, index: number) => {
    if (
      !isRecord(entry) ||
      typeof entry.model !== "string" ||
      !isPositiveInteger(entry.tokens)
    ) {
      throw new ConfigError(
        `windows[${index}] in ${source} needs a model name and a positive token count`,
      );
    }
    if (seen.has(entry.model)) {
      throw new ConfigError(`Duplicate model "${entry.model}" in ${source}`);
    }
    seen.add(entry.model);
    return { model: entry.model, tokens: entry.tokens };
  });
}

/**
 * Overrides replace a window of the same model in place; new models are
 * appended in the order given.
 */
export function mergeContextWindows(
  base: readonly ContextWindow[],
  overrides: Readonly<Record<string, number>>,
): ContextWindow[] {
  const merged = base.map((window) => {
    const override = overrides[window.model];
    return override === undefined ? window : { ...window, tokens: override };
  });
  const known = new Set(base.map((window) => window.model));
  for (const [model, tokens] of Object.entries(overrides)) {
    if (!known.has(model)) {
      merged.push({ model, tokens });
    }
  }
  return merged;
}

export function compareContextWindows(
  totalTokens: number,
  windows: readonly ContextWindow[],
): ContextWindowUsage[] {
  return windows.map((window) => ({
    model: window.model,
    window: window.tokens,
    percentage: (totalTokens / window.tokens) * 100,
    fits: totalTokens <= window.tokens,
  }));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}
