import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { collaboratorError } from "../errors/linter-error.js";
import type { ModelSummary } from "../report/types.js";
import {
  describeCommandFailure,
  readStderr,
  runCommand,
  type CommandResult,
  type CommandRunner,
  type ExternalTool,
} from "./command-runner.js";
import type {
  AnalyzerBackend,
  LogSink,
  ModelHandle,
  ModelLoadSettings,
  RuleCollection,
  ViolationRecord,
} from "./types.js";

export interface BridgeBackendOptions {
  readonly command: string;
  readonly args?: readonly string[];
  readonly run?: CommandRunner;
  /** Per-invocation limit; the bridge runs unbounded when unset. */
  readonly timeoutMs?: number;
}

/**
 * Drives the external Best Practice Analyzer through its command-line bridge.
 *
 * `inspect <model>` prints `{"measures": n, "columns": m}`;
 * `analyze <model> --rules <file>` prints an array of
 * `{"ruleId", "objectName", "severity"}`. Anything the bridge prints on
 * stderr, or before its JSON payload on stdout, is treated as log output.
 */
export class BridgeAnalyzerBackend implements AnalyzerBackend {
  private readonly command: string;
  private readonly baseArgs: readonly string[];
  private readonly run: CommandRunner;
  private readonly timeoutMs: number | undefined;

  constructor(options: BridgeBackendOptions) {
    this.command = options.command;
    this.baseArgs = options.args ?? [];
    this.run = options.run ?? runCommand;
    this.timeoutMs = options.timeoutMs;
  }

  async loadModel(
    modelPath: string,
    settings: ModelLoadSettings,
    log: LogSink,
  ): Promise<ModelHandle> {
    const resolved = path.resolve(modelPath);
    try {
      await fs.stat(resolved);
    } catch {
      throw collaboratorError(`Model path does not exist: ${resolved}`);
    }

    const payload = await this.invoke(
      ["inspect", resolved, ...settingsFlags(settings)],
      log,
    );
    const summary = parseModelSummary(payload);
    return {
      path: resolved,
      settings,
      summary: () => summary,
    };
  }

  async analyze(
    model: ModelHandle,
    rules: RuleCollection,
    log: LogSink,
  ): Promise<ViolationRecord[]> {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "bpa-score-"));
    try {
      const rulesPath = path.join(tempDir, "rules.json");
      await fs.writeFile(rulesPath, JSON.stringify(rules.rules), "utf8");
      const payload = await this.invoke(
        [
          "analyze",
          model.path,
          "--rules",
          rulesPath,
          ...settingsFlags(model.settings),
        ],
        log,
      );
      return parseViolations(payload);
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  }

  private async invoke(
    args: readonly string[],
    log: LogSink,
  ): Promise<unknown> {
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
    return extractPayload(result.stdout, log);
  }

  private tool(): ExternalTool {
    return {
      name: "Analyzer",
      command: this.command,
      option: "--analyzer",
      description: "the analyzer bridge",
    };
  }
}

export function settingsFlags(settings: ModelLoadSettings): string[] {
  const flags: string[] = [];
  if (settings.autoFixup) {
    flags.push("--auto-fixup");
  }
  if (settings.changeDetectionLocalServers) {
    flags.push("--change-detection-local-servers");
  }
  if (settings.pbiFeaturesOnly) {
    flags.push("--pbi-features-only");
  }
  return flags;
}

/**
 * The payload is the whole of stdout when it parses. Otherwise it is the
 * text from the first line opening a JSON object or array that parses
 * through to the end, so pretty-printed results after progress lines are
 * found too; the lines before it are log output.
 */
export function extractPayload(stdout: string, log: LogSink): unknown {
  const trimmed = stdout.trim();
  if (!trimmed) {
    throw collaboratorError("Analyzer produced no output.");
  }

  const whole = tryParseJson(trimmed);
  if (whole.ok) {
    return whole.value;
  }

  const lines = trimmed.split(/\r?\n/);
  for (let start = 1; start < lines.length; start += 1) {
    const opening = lines[start]?.trimStart() ?? "";
    if (!opening.startsWith("{") && !opening.startsWith("[")) {
      continue;
    }
    const candidate = tryParseJson(lines.slice(start).join("\n"));
    if (!candidate.ok) {
      continue;
    }
    for (const line of lines.slice(0, start)) {
      if (line.trim().length > 0) {
        log.write(line);
      }
    }
    return candidate.value;
  }
  throw collaboratorError("Analyzer output did not contain a JSON result.");
}

export function parseModelSummary(payload: unknown): ModelSummary {
  if (
    !isRecord(payload) ||
    !isCount(payload.measures) ||
    !isCount(payload.columns)
  ) {
    throw collaboratorError(
      "Analyzer returned an invalid model summary; expected measures and columns counts.",
    );
  }
  return { measureCount: payload.measures, columnCount: payload.columns };
}

export function parseViolations(payload: unknown): ViolationRecord[] {
  if (!Array.isArray(payload)) {
    throw collaboratorError(
      "Analyzer returned invalid results; expected an array of violations.",
    );
  }

  return payload.map((entry: unknown, index) => {
    if (!isRecord(entry) || typeof entry.severity !== "number") {
      throw collaboratorError(
        `Analyzer returned an invalid violation at index ${index}.`,
      );
    }
    return {
      ruleId: typeof entry.ruleId === "string" ? entry.ruleId : "",
      objectName:
        typeof entry.objectName === "string" ? entry.objectName : "",
      severity: entry.severity,
    };
  });
}

function tryParseJson(
  text: string,
): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

function isCount(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
