import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  describeCommandFailure,
  readStderr,
  runCommand,
  type CommandResult,
  type CommandRunner,
  type ExternalTool,
} from "../analyzer/command-runner.js";
import type { LogSink } from "../analyzer/types.js";
import {
  collaboratorError,
  configurationError,
} from "../errors/linter-error.js";
import type { InspectorBackend, InspectorResult } from "./types.js";
import { parseInspectorResults } from "./visual-score.js";

const RULES_REJECTED_MARKER =
  "Error: Could not deserialise rules file with path";

export interface InspectorBackendOptions {
  readonly command: string;
  readonly args?: readonly string[];
  readonly run?: CommandRunner;
  readonly timeoutMs?: number;
}

/**
 * Runs the report inspector CLI with JSON output into a scratch folder and
 * reads back the first result file it writes.
 */
export class InspectorCliBackend implements InspectorBackend {
  private readonly command: string;
  private readonly baseArgs: readonly string[];
  private readonly run: CommandRunner;
  private readonly timeoutMs: number | undefined;

  constructor(options: InspectorBackendOptions) {
    this.command = options.command;
    this.baseArgs = options.args ?? [];
    this.run = options.run ?? runCommand;
    this.timeoutMs = options.timeoutMs;
  }

  async inspect(
    reportPath: string,
    rulesPath: string,
    log: LogSink,
  ): Promise<readonly InspectorResult[]> {
    const workDir = await fs.mkdtemp(
      path.join(os.tmpdir(), "bpa-score-inspect-"),
    );
    try {
      const outputDir = path.join(workDir, "output");
      await fs.mkdir(outputDir);
      const reportRoot = await stageReport(path.resolve(reportPath), workDir);

      const result = await this.invoke(
        [
          "-pbipreport",
          reportRoot,
          "-output",
          outputDir,
          "-rules",
          rulesPath,
          "-formats",
          "JSON",
        ],
        log,
      );
      if (result.stdout.includes(RULES_REJECTED_MARKER)) {
        throw configurationError(`Invalid rules file format: '${rulesPath}'`);
      }
      if (result.stdout.trim()) {
        log.write(result.stdout);
      }

      return parseInspectorResults(await readFirstResult(outputDir));
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }

  private async invoke(
    args: readonly string[],
    log: LogSink,
  ): Promise<CommandResult> {
    let result: CommandResult;
    try {
      result = await this.run(this.command, [...this.baseArgs, ...args], {
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      const stderr = readStderr(error);
      if (stderr) {
        log.write(stderr);
      }
      throw collaboratorError(
        describeCommandFailure(this.tool(), error, stderr, this.timeoutMs),
        error,
      );
    }
    if (result.stderr) {
      log.write(result.stderr);
    }
    return result;
  }

  private tool(): ExternalTool {
    return {
      name: "Inspector",
      command: this.command,
      option: "--inspector",
      description: "the report inspector",
    };
  }
}

// The inspector only accepts a lowercase report path ending in ".report".
export function needsStaging(reportPath: string): boolean {
  return (
    reportPath !== reportPath.toLowerCase() || !reportPath.endsWith(".report")
  );
}

async function stageReport(
  reportPath: string,
  workDir: string,
): Promise<string> {
  if (!needsStaging(reportPath)) {
    return reportPath;
  }
  const staged = path.join(workDir, "staged", ".report");
  await fs.cp(reportPath, staged, { recursive: true });
  return staged;
}

async function readFirstResult(outputDir: string): Promise<unknown> {
  const files = (await fs.readdir(outputDir)).sort();
  const first = files[0];
  if (!first) {
    throw collaboratorError("Inspector did not write a result file.");
  }

  const raw = await fs.readFile(path.join(outputDir, first), "utf8");
  try {
    return JSON.parse(raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw collaboratorError(`Inspector result is not valid JSON: ${message}`);
  }
}
