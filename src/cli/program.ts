import { Command } from "commander";
import type { RunOptions } from "../config/loader.js";
import { renderError, toLinterError } from "../errors/linter-error.js";
import { runLintCommand } from "./lint-command.js";
import { writeStdout, type OutputWriter } from "./output.js";
import {
  executeScoreCommand,
  type CommandDependencies,
} from "./score-command.js";

export interface ProgramDependencies extends CommandDependencies {
  readonly version: string;
  readonly write?: OutputWriter;
  readonly setExitCode?: (code: number) => void;
}

export function createProgram(deps: ProgramDependencies): Command {
  const write = deps.write ?? writeStdout;
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  const program = new Command();
  program
    .name("bpa-score")
    .description("Score tabular models against Best Practice Analyzer rules")
    .version(deps.version);

  withRunOptions(
    program
      .command("score", { isDefault: true })
      .description("Score one model and print the JSON report")
      .argument("[model-path]", "Model file or definition folder"),
  ).action(async (modelPath: string | undefined, options: RunOptions) => {
    const code = await executeScoreCommand(
      { ...options, modelPath },
      deps,
      write,
    );
    setExitCode(code);
  });

  withRunOptions(
    program
      .command("lint")
      .description("Score every item of a workspace folder")
      .argument("[paths...]", "Folders to search for items (default: .)"),
  )
    .option("--inspector <command>", "Report inspector command")
    .option(
      "--visual-rules <path>",
      "Inspector rules file; reports are scored only when set",
    )
    .action(async (paths: string[], options: RunOptions) => {
      try {
        const result = await runLintCommand({ ...options, paths }, deps);
        setExitCode(result.ok ? 0 : 1);
      } catch (error) {
        await write(renderError(toLinterError(error)) + "\n");
        setExitCode(1);
      }
    });

  return program;
}

function withRunOptions(command: Command): Command {
  return command
    .option("--rules-url <url-or-path>", "Rule collection URL or JSON file")
    .option("--analyzer <command>", "Analyzer bridge command")
    .option("--verbose", "Log analyzer output to stderr")
    .option("--log-json", "Write logs as JSON lines");
}
