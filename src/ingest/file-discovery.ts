import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import { RunCancelledError, TraversalError, errorMessage } from "../errors.js";
import { isKnownExtension, normalizeExtension } from "./file-classifier.js";
import type { WalkEvent, WalkOptions } from "./types.js";

export const DEFAULT_EXCLUDED_DIRECTORIES: ReadonlySet<string> = new Set([
  ".git",
  "venv",
  ".venv",
  "__pycache__",
  ".pytest_cache",
  ".mypy_cache",
]);

interface WalkContext {
  readonly rootPath: string;
  readonly options: WalkOptions;
  readonly excluded: ReadonlySet<string>;
  readonly visitedDirs: Set<string>;
}

/**
 * Walk `rootPath` depth-first in name order, yielding every file whose
 * extension is in the table. Excluded directories are dropped from each
 * listing before recursion, so their contents are never read.
 */
export async function* walkCandidates(
  rootPath: string,
  options: WalkOptions,
): AsyncGenerator<WalkEvent, void, undefined> {
  const realRoot = await resolveRoot(rootPath);
  const context: WalkContext = {
    rootPath: realRoot,
    options,
    excluded: options.excludedDirectories ?? DEFAULT_EXCLUDED_DIRECTORIES,
    visitedDirs: new Set<string>(),
  };

  yield* walkDirectory(realRoot, context);
}

/** Resolve and check the walk root; every failure here is fatal. */
export async function resolveRoot(rootPath: string): Promise<string> {
  const resolved = path.resolve(rootPath);
  let realRoot: string;
  try {
    realRoot = await fs.realpath(resolved);
  } catch (error) {
    throw new TraversalError(`Target path does not exist: ${resolved}`, {
      cause: error,
    });
  }

  const stats = await fs.stat(realRoot);
  if (!stats.isDirectory()) {
    throw new TraversalError(`Target path must be a directory: ${resolved}`);
  }

  try {
    await fs.access(realRoot, fs.constants.R_OK | fs.constants.X_OK);
  } catch (error) {
    throw new TraversalError(`Target directory is not readable: ${resolved}`, {
      cause: error,
    });
  }
  return realRoot;
}

async function* walkDirectory(
  currentPath: string,
  context: WalkContext,
): AsyncGenerator<WalkEvent, void, undefined> {
  if (context.options.signal?.aborted) {
    throw new RunCancelledError();
  }

  const realCurrent = await fs.realpath(currentPath);
  if (context.visitedDirs.has(realCurrent)) {
    return;
  }
  context.visitedDirs.add(realCurrent);

  let dirEntries: Dirent[];
  try {
    dirEntries = await fs.readdir(currentPath, { withFileTypes: true });
  } catch (error) {
    if (currentPath === context.rootPath) {
      throw new TraversalError(`Unable to list ${currentPath}`, {
        cause: error,
      });
    }
    yield {
      type: "unreadable-directory",
      relativePath: toRelativePosix(context.rootPath, currentPath),
      message: errorMessage(error),
    };
    return;
  }

  const kept = dirEntries
    .filter(
      (dirent) =>
        !(dirent.isDirectory() && context.excluded.has(dirent.name)),
    )
    .sort((a, b) => compareNames(a.name, b.name));

  for (const dirent of kept) {
    const absolutePath = path.join(currentPath, dirent.name);

    if (dirent.isSymbolicLink()) {
      const resolved = await safeRealpath(absolutePath);
      if (
        !resolved ||
        !isWithinRoot(context.rootPath, resolved) ||
        isInsideExcluded(context, resolved)
      ) {
        continue;
      }

      const stats = await fs.stat(resolved);
      if (stats.isDirectory()) {
        if (context.excluded.has(dirent.name)) {
          continue;
        }
        yield* walkDirectory(resolved, context);
      } else if (stats.isFile()) {
        // Classified by the link's own name, read through its target.
        const event = candidateFor(dirent.name, absolutePath, context);
        if (event) {
          yield event;
        }
      }
      continue;
    }

    if (dirent.isDirectory()) {
      yield* walkDirectory(absolutePath, context);
      continue;
    }

    if (dirent.isFile()) {
      const event = candidateFor(dirent.name, absolutePath, context);
      if (event) {
        yield event;
      }
    }
  }
}

function candidateFor(
  name: string,
  absolutePath: string,
  context: WalkContext,
): WalkEvent | null {
  const extension = normalizeExtension(name);
  if (!isKnownExtension(context.options.table, extension)) {
    return null;
  }
  return {
    type: "file",
    candidate: {
      absolutePath,
      relativePath: toRelativePosix(context.rootPath, absolutePath),
      extension,
    },
  };
}

function compareNames(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

function toRelativePosix(rootPath: string, absolutePath: string): string {
  const relative = path.relative(rootPath, absolutePath);
  return relative.split(path.sep).join(path.posix.sep);
}

function isWithinRoot(rootPath: string, targetPath: string): boolean {
  const relative = path.relative(rootPath, targetPath);
  return !relative.startsWith("..") && !path.isAbsolute(relative);
}

/** True when any segment of `targetPath` below the root is excluded. */
function isInsideExcluded(context: WalkContext, targetPath: string): boolean {
  return path
    .relative(context.rootPath, targetPath)
    .split(path.sep)
    .some((segment) => context.excluded.has(segment));
}

async function safeRealpath(targetPath: string): Promise<string | null> {
  try {
    return await fs.realpath(targetPath);
  } catch {
    return null;
  }
}
