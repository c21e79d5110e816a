import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadExtensionTable } from "../src/ingest/extension-table.js";
import type { ExtensionTable } from "../src/ingest/types.js";
import type { Tokenizer } from "../src/tokenizer/types.js";

export const DATA_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
  "data",
);

export async function makeTempDir(prefix: string): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), `tree-tokens-${prefix}-`));
}

export async function removeDir(dirPath: string | undefined): Promise<void> {
  if (dirPath) {
    await fs.rm(dirPath, { recursive: true, force: true });
  }
}

export async function writeText(
  filePath: string,
  contents: string,
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, contents, "utf8");
}

export async function writeBytes(
  filePath: string,
  contents: Uint8Array,
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, contents);
}

export async function bundledTable(): Promise<ExtensionTable> {
  return await loadExtensionTable(path.join(DATA_DIR, "extensions.yaml"));
}

/** One token per UTF-16 code unit; exact and easy to reason about. */
export const charTokenizer: Tokenizer = {
  name: "chars",
  countTokens: (text) => text.length,
};
