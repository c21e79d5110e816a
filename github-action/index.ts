import path from "node:path";
import * as core from "@actions/core";
import { runCountCommand } from "../src/cli/count-command.js";
import { loadVersion } from "../src/cli/runtime-paths.js";
import {
  formatCount,
  formatFiles,
  rankEntries,
} from "../src/report/index.js";

async function run(): Promise<void> {
  const workspace = process.env.GITHUB_WORKSPACE ?? process.cwd();
  const target = path.resolve(workspace, core.getInput("path") || ".");
  const encoding = core.getInput("encoding") || undefined;
  const maxTokensInput = core.getInput("max-tokens");
  const maxTokens = maxTokensInput ? Number(maxTokensInput) : undefined;
  if (maxTokens !== undefined && !Number.isInteger(maxTokens)) {
    core.setFailed(`max-tokens must be an integer, got ${maxTokensInput}`);
    return;
  }

  const toolVersion = await loadVersion();
  const { report } = await runCountCommand(
    { target, encoding, total: true, cwd: workspace },
    toolVersion,
  );

  core.setOutput("total-tokens", String(report.totalTokens));
  core.setOutput("files-counted", String(report.filesCounted));
  for (const error of report.errors) {
    core.warning(`${error.path} [${error.kind}]: ${error.message}`);
  }

  await core.summary
    .addHeading("Token count")
    .addRaw(
      `Total: ${formatCount(report.totalTokens)} tokens in ${formatFiles(report.filesCounted)} (${report.tokenizer})`,
      true,
    )
    .addTable([
      [
        { data: "Technology", header: true },
        { data: "Tokens", header: true },
        { data: "Files", header: true },
      ],
      ...rankEntries(report.byTechnology, report.fileCountByTechnology).map(
        (entry) => [entry.name, formatCount(entry.tokens), String(entry.files)],
      ),
    ])
    .write();

  if (maxTokens !== undefined && report.totalTokens > maxTokens) {
    core.setFailed(
      `Token count ${report.totalTokens} exceeds max-tokens ${maxTokens}`,
    );
  }
}

run().catch((error: unknown) => {
  core.setFailed(error instanceof Error ? error.message : String(error));
});
