import fs from "node:fs/promises";
import path from "node:path";
import type { ExtensionTable } from "./types.js";

/**
 * Bytes sampled by {@link isBinary}. Content that only turns binary past
 * this window is classified as text.
 */
export const BINARY_PROBE_BYTES = 1024;

export function normalizeExtension(fileName: string): string {
  const base = path.basename(fileName.split(path.sep).join(path.posix.sep));
  return path.posix.extname(base).toLowerCase();
}

export function isKnownExtension(
  table: ExtensionTable,
  extension: string,
): boolean {
  return extension !== "" && table.has(extension);
}

export function technologyOf(table: ExtensionTable, extension: string): string {
  const technology = table.get(extension);
  if (technology === undefined) {
    throw new Error(`No technology registered for extension "${extension}"`);
  }
  return technology;
}

/**
 * Probe the first {@link BINARY_PROBE_BYTES} bytes as UTF-8. A multi-byte
 * sequence cut by the end of the window is not a failure.
 */
export async function isBinary(filePath: string): Promise<boolean> {
  const handle = await fs.open(filePath, "r");
  try {
    const buffer = Buffer.alloc(BINARY_PROBE_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, BINARY_PROBE_BYTES, 0);
    return !decodesAsText(buffer.subarray(0, bytesRead));
  } finally {
    await handle.close();
  }
}

/**
 * Extension check first, then the binary probe. The aggregator runs the two
 * halves separately: the walker filters by extension without opening
 * anything, and each worker probes only the files that survive.
 */
export async function isAnalyzable(
  table: ExtensionTable,
  filePath: string,
): Promise<boolean> {
  if (!isKnownExtension(table, normalizeExtension(filePath))) {
    return false;
  }
  return !(await isBinary(filePath));
}

function decodesAsText(prefix: Uint8Array): boolean {
  const decoder = new TextDecoder("utf-8", { fatal: true });
  try {
    decoder.decode(prefix, { stream: true });
    return true;
  } catch {
    return false;
  }
}
