import { analyzeModel } from "../analyzer/analyze-model.js";
import { BridgeAnalyzerBackend } from "../analyzer/bridge-backend.js";
import type { CommandRunner } from "../analyzer/command-runner.js";
import type { AnalyzerBackend } from "../analyzer/types.js";
import {
  resolveRunConfig,
  type RunConfig,
  type RunOptions,
} from "../config/loader.js";
import {
  renderError,
  toLinterError,
  usageError,
} from "../errors/linter-error.js";
import { createLogger, type Logger } from "../observability/logger.js";
import { serializeReport } from "../report/json-reporter.js";
import type { ScoreReport } from "../report/types.js";
import { InspectorCliBackend } from "../visuals/inspector-backend.js";
import type { InspectorBackend } from "../visuals/types.js";
import { writeStdout, type OutputWriter } from "./output.js";

export interface ScoreOptions extends RunOptions {
  readonly modelPath?: string;
}

export interface CommandDependencies {
  readonly backend?: AnalyzerBackend;
  readonly inspector?: InspectorBackend;
  /** Process runner for the default backends. */
  readonly run?: CommandRunner;
  readonly fetchImpl?: typeof fetch;
  readonly logger?: Logger;
}

export interface BackendOptions {
  readonly run?: CommandRunner;
  readonly timeoutMs?: number;
}

export interface ScoreResult {
  readonly report: ScoreReport;
  readonly output: string;
}

export async function runScoreCommand(
  options: ScoreOptions,
  deps: CommandDependencies = {},
): Promise<ScoreResult> {
  if (!options.modelPath) {
    throw usageError();
  }

  const config = resolveRunConfig(options);
  const report = await analyzeModel(options.modelPath, {
    backend: deps.backend ?? createBackend(config, { run: deps.run }),
    rulesSource: config.rulesSource,
    logger: deps.logger ?? createCommandLogger(config),
    fetchImpl: deps.fetchImpl,
  });
  return { report, output: serializeReport(report) };
}

/**
 * Runs the score command and writes either the report or a single error
 * line to stdout. Resolves to the process exit code.
 */
export async function executeScoreCommand(
  options: ScoreOptions,
  deps: CommandDependencies = {},
  write: OutputWriter = writeStdout,
): Promise<number> {
  let result: ScoreResult;
  try {
    result = await runScoreCommand(options, deps);
  } catch (error) {
    await write(renderError(toLinterError(error)) + "\n");
    return 1;
  }
  await write(result.output + "\n");
  return 0;
}

export function createBackend(
  config: RunConfig,
  options: BackendOptions = {},
): AnalyzerBackend {
  return new BridgeAnalyzerBackend({
    command: config.analyzerCommand,
    args: config.analyzerArgs,
    run: options.run,
    timeoutMs: options.timeoutMs,
  });
}

export function createInspector(
  config: RunConfig,
  options: BackendOptions = {},
): InspectorBackend {
  return new InspectorCliBackend({
    command: config.inspectorCommand,
    args: config.inspectorArgs,
    run: options.run,
    timeoutMs: options.timeoutMs,
  });
}

export function createCommandLogger(config: RunConfig): Logger {
  return createLogger({ level: config.logLevel, json: config.logJson });
}
