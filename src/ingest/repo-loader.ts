import { rmSync } from "node:fs";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { simpleGit } from "simple-git";
import { SourceError, errorMessage } from "../errors.js";
import { resolveRoot } from "./file-discovery.js";
import type { LoadedTarget } from "./types.js";

/**
 * Turn a CLI target into a local directory. Local paths are checked and
 * returned as-is; git URLs are shallow-cloned into a temp directory that
 * `cleanup` removes.
 */
export async function loadTarget(target: string): Promise<LoadedTarget> {
  if (isGitUrl(target)) {
    return await loadFromGit(target);
  }

  const rootPath = await resolveRoot(target);
  return {
    rootPath,
    source: "local",
    cleanup: async () => {},
  };
}

// scp-style `user@host:path`, as accepted by `git clone`.
const SCP_ADDRESS = /^[\w.-]+@[\w.-]+:./;

export function isGitUrl(target: string): boolean {
  if (SCP_ADDRESS.test(target)) {
    return true;
  }

  try {
    const url = new URL(target);
    return (
      url.protocol === "https:" ||
      url.protocol === "http:" ||
      url.protocol === "ssh:" ||
      url.protocol === "git:" ||
      url.protocol === "file:"
    );
  } catch {
    return false;
  }
}

async function loadFromGit(repoUrl: string): Promise<LoadedTarget> {
  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "tree-tokens-"));
  const cleanup = async (): Promise<void> => {
    await fs.rm(tempDir, { recursive: true, force: true });
  };

  try {
    await simpleGit().clone(repoUrl, tempDir, ["--depth", "1"]);
  } catch (error) {
    await cleanup();
    throw new SourceError(
      `Error cloning repository ${repoUrl}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  registerCleanup(tempDir);

  return {
    rootPath: await fs.realpath(tempDir),
    source: "git",
    repoUrl,
    cleanup,
  };
}

// Last-resort removal if the process dies before the caller cleans up.
function registerCleanup(tempDir: string): void {
  process.once("exit", () => {
    removeSync(tempDir);
  });
}

function removeSync(tempDir: string): void {
  try {
    // "exit" listeners cannot await.
    rmSync(tempDir, { recursive: true, force: true });
  } catch (error) {
    process.stderr.write(
      `Failed to remove ${tempDir}: ${errorMessage(error)}\n`,
    );
  }
}
