import fs from "node:fs/promises";
import yaml from "js-yaml";
import { ExtensionTableError } from "../errors.js";
import type { ExtensionGroup, ExtensionTable } from "./types.js";

const EXTENSION_PATTERN = /^\.[a-z0-9_+-]+$/;

/**
 * Build the extension table from a literal list of groups. A repeated
 * extension is rejected instead of letting the later label win.
 */
export function createExtensionTable(
  groups: readonly ExtensionGroup[],
): ExtensionTable {
  const table = new Map<string, string>();
  const duplicates: string[] = [];

  for (const group of groups) {
    if (!group.technology.trim()) {
      throw new ExtensionTableError("Extension group is missing a technology");
    }
    for (const extension of group.extensions) {
      if (!EXTENSION_PATTERN.test(extension)) {
        throw new ExtensionTableError(
          `Invalid extension "${extension}" for ${group.technology}: expected lowercase with a leading dot`,
        );
      }
      const existing = table.get(extension);
      if (existing !== undefined) {
        duplicates.push(`${extension} (${existing}, ${group.technology})`);
        continue;
      }
      table.set(extension, group.technology);
    }
  }

  if (duplicates.length > 0) {
    throw new ExtensionTableError(
      `Duplicate extensions in table: ${duplicates.join("; ")}`,
    );
  }

  return table;
}

/**
 * Apply explicit relabels or additions on top of a built table. Unlike the
 * base groups, overrides may replace an existing label.
 */
export function withExtensionOverrides(
  table: ExtensionTable,
  overrides: Readonly<Record<string, string>>,
): ExtensionTable {
  const merged = new Map(table);
  for (const [rawExtension, technology] of Object.entries(overrides)) {
    const extension = rawExtension.toLowerCase();
    if (!EXTENSION_PATTERN.test(extension)) {
      throw new ExtensionTableError(
        `Invalid extension override "${rawExtension}"`,
      );
    }
    merged.set(extension, technology);
  }
  return merged;
}

export async function loadExtensionTable(
  filePath: string,
): Promise<ExtensionTable> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new ExtensionTableError(
      `Unable to read extension table: ${filePath}`,
      { cause: error },
    );
  }
  return createExtensionTable(parseExtensionGroups(raw, filePath));
}

export function parseExtensionGroups(
  raw: string,
  source: string,
): ExtensionGroup[] {
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (error) {
    throw new ExtensionTableError(`Invalid YAML in ${source}`, {
      cause: error,
    });
  }

  if (!isRecord(doc) || !Array.isArray(doc.groups)) {
    throw new ExtensionTableError(`Missing groups list in ${source}`);
  }

  const groups: ExtensionGroup[] = [];
  doc.groups.forEach((entry: unknown, index: number) => {
    if (
      !isRecord(entry) ||
      typeof entry.technology !== "string" ||
      !isStringArray(entry.extensions)
    ) {
      throw new ExtensionTableError(
        `groups[${index}] in ${source} needs a technology and an extensions list`,
      );
    }
    groups.push({
      technology: entry.technology,
      extensions: entry.extensions,
    });
  });
  return groups;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return (
    Array.isArray(value) && value.every((item) => typeof item === "string")
  );
}
