import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { emptyConfig, loadConfig, validateConfig } from "../../src/config/config-loader.js";
import { ConfigError } from "../../src/errors.js";
import { makeTempDir, removeDir, writeText } from "../helpers.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await makeTempDir("config");
});

afterEach(async () => {
  await removeDir(tempDir);
});

describe("loadConfig", () => {
  it("returns an empty config when the default file is absent", async () => {
    expect(await loadConfig(undefined, tempDir)).toEqual(emptyConfig());
  });

  it("reads tree-tokens.yaml from the working directory", async () => {
    await writeText(
      path.join(tempDir, "tree-tokens.yaml"),
      [
        "encoding: cl100k_base",
        "concurrency: 4",
        "exclude_dirs: [node_modules, dist]",
        "extensions:",
        "  .TF: Terraform",
        "context_windows:",
        "  Local Model: 32768",
      ].join("\n"),
    );

    expect(await loadConfig(undefined, tempDir)).toEqual({
      encoding: "cl100k_base",
      concurrency: 4,
      excludeDirs: ["node_modules", "dist"],
      extensions: { ".tf": "Terraform" },
      contextWindows: { "Local Model": 32768 },
    });
  });

  it("treats an empty file as an empty config", async () => {
    await writeText(path.join(tempDir, "tree-tokens.yaml"), "");

    expect(await loadConfig(undefined, tempDir)).toEqual(emptyConfig());
  });

  it("resolves an explicit path against the working directory", async () => {
    await writeText(path.join(tempDir, "conf", "custom.yaml"), "concurrency: 2\n");

    const config = await loadConfig("conf/custom.yaml", tempDir);

    expect(config.concurrency).toBe(2);
  });

  it("fails for a missing explicit file", async () => {
    await expect(loadConfig("absent.yaml", tempDir)).rejects.toThrow(
      `Unable to read config file: ${path.join(tempDir, "absent.yaml")}`,
    );
  });

  it("fails for invalid YAML", async () => {
    await writeText(path.join(tempDir, "tree-tokens.yaml"), "encoding: [\n");

    await expect(loadConfig(undefined, tempDir)).rejects.toThrow(ConfigError);
  });
});

describe("validateConfig", () => {
  it("reports every problem at once", () => {
    expect(() =>
      validateConfig(
        {
          encoding: "",
          concurrency: 0,
          exclude_dirs: ["ok", "a/b"],
          colour: "blue",
        },
        "test.yaml",
      ),
    ).toThrow(
      "Invalid config in test.yaml: unknown key 'colour'; encoding must be a non-empty string; concurrency must be a positive integer; exclude_dirs[1] must be a directory name",
    );
  });

  it("rejects malformed mappings", () => {
    expect(() =>
      validateConfig(
        {
          exclude_dirs: "build",
          extensions: { tf: "Terraform" },
          context_windows: { Tiny: -5 },
        },
        "test.yaml",
      ),
    ).toThrow(
      "Invalid config in test.yaml: exclude_dirs must be a list; extensions key 'tf' must start with a dot; context_windows.Tiny must be a positive integer",
    );
  });

  it("rejects a document that is not a mapping", () => {
    expect(() => validateConfig(["a"], "test.yaml")).toThrow(
      "Invalid config in test.yaml: config must be a mapping",
    );
  });
});
