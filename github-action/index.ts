import * as core from "@actions/core";
import { runLintCommand } from "../src/cli/lint-command.js";
import { createLogger } from "../src/observability/logger.js";

async function run(): Promise<void> {
  const paths = core
    .getMultilineInput("path")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
  const rulesUrl = core.getInput("rules-url") || undefined;
  const analyzer = core.getInput("analyzer") || undefined;
  const inspector = core.getInput("inspector") || undefined;
  const visualRules = core.getInput("visual-rules") || undefined;
  const verbose = core.getBooleanInput("verbose");

  const result = await runLintCommand(
    { paths, rulesUrl, analyzer, inspector, visualRules, verbose },
    {
      logger: createLogger({
        level: verbose ? "debug" : "info",
        json: false,
        output: process.stdout,
      }),
    },
  );

  const items = [...result.models, ...result.reports];
  const scored = items.filter((item) => item.status === "scored");
  core.setOutput("models", String(result.models.length));
  core.setOutput("reports", String(result.reports.length));
  core.setOutput("scored", String(scored.length));

  if (!result.ok) {
    core.setFailed("One or more items failed to score or scored poorly.");
  }
}

run().catch((error: unknown) => {
  core.setFailed(error instanceof Error ? error.message : String(error));
});
