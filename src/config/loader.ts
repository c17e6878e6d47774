import path from "node:path";
import { configurationError } from "../errors/linter-error.js";
import type { LogLevel } from "../observability/logger.js";
import {
  DEFAULT_ANALYZER_COMMAND,
  DEFAULT_INSPECTOR_COMMAND,
  DEFAULT_RULES_URL,
} from "./defaults.js";

export interface RunOptions {
  readonly rulesUrl?: string;
  readonly analyzer?: string;
  readonly inspector?: string;
  readonly visualRules?: string;
  readonly verbose?: boolean;
  readonly logJson?: boolean;
}

export interface RunConfig {
  readonly rulesSource: string;
  readonly analyzerCommand: string;
  readonly analyzerArgs: readonly string[];
  readonly inspectorCommand: string;
  readonly inspectorArgs: readonly string[];
  /** Report items are only scored when an inspector rules file is given. */
  readonly visualRulesPath?: string;
  readonly logLevel: LogLevel;
  readonly logJson: boolean;
}

export function resolveRunConfig(options: RunOptions = {}): RunConfig {
  const rulesSource = (options.rulesUrl ?? DEFAULT_RULES_URL).trim();
  if (!rulesSource) {
    throw configurationError("Rules source must not be empty.");
  }

  const [analyzerCommand, ...analyzerArgs] = splitCommand(
    options.analyzer ?? DEFAULT_ANALYZER_COMMAND,
  );
  if (!analyzerCommand) {
    throw configurationError("Analyzer command must not be empty.");
  }

  const [inspectorCommand, ...inspectorArgs] = splitCommand(
    options.inspector ?? DEFAULT_INSPECTOR_COMMAND,
  );
  if (!inspectorCommand) {
    throw configurationError("Inspector command must not be empty.");
  }

  const visualRules = options.visualRules?.trim();

  return {
    rulesSource,
    analyzerCommand,
    analyzerArgs,
    inspectorCommand,
    inspectorArgs,
    visualRulesPath: visualRules ? path.resolve(visualRules) : undefined,
    logLevel: options.verbose ? "debug" : "info",
    logJson: Boolean(options.logJson),
  };
}

// Splits on whitespace; double quotes group an argument that contains spaces.
export function splitCommand(command: string): string[] {
  const parts: string[] = [];
  const pattern = /"([^"]*)"|(\S+)/g;
  let match = pattern.exec(command);
  while (match) {
    parts.push(match[1] ?? match[2] ?? "");
    match = pattern.exec(command);
  }
  return parts;
}
