import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

/**
 * Locate the bundled `data/` directory. Sources sit two levels below the
 * package root and compiled output three, so both are tried before the
 * working directory.
 */
export async function resolveDataDirectory(): Promise<string> {
  const candidates = [
    path.resolve(moduleDir, "..", "..", "data"),
    path.resolve(moduleDir, "..", "..", "..", "data"),
    path.resolve(process.cwd(), "data"),
  ];

  for (const candidate of candidates) {
    if (await existsDirectory(candidate)) {
      return candidate;
    }
  }

  throw new Error(
    `Unable to find the data directory. Looked in: ${candidates.join(", ")}`,
  );
}

export async function loadVersion(): Promise<string> {
  const candidates = [
    path.resolve(moduleDir, "..", "..", "package.json"),
    path.resolve(moduleDir, "..", "..", "..", "package.json"),
  ];
  for (const candidate of candidates) {
    try {
      const raw = await fs.readFile(candidate, "utf8");
      const json = JSON.parse(raw) as { version?: string };
      return json.version ?? "0.0.0";
    } catch {
      continue;
    }
  }
  return "0.0.0";
}

async function existsDirectory(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}
