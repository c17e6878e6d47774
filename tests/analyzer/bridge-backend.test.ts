import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  BridgeAnalyzerBackend,
  extractPayload,
  parseModelSummary,
  parseViolations,
  settingsFlags,
} from "../../src/analyzer/bridge-backend.js";
import type {
  CommandOptions,
  CommandResult,
  CommandRunner,
} from "../../src/analyzer/command-runner.js";
import { CapturedLog, discardSink } from "../../src/analyzer/log-sink.js";
import type { RuleCollection } from "../../src/analyzer/types.js";
import { MODEL_LOAD_SETTINGS } from "../../src/config/defaults.js";
import { LinterError } from "../../src/errors/linter-error.js";

interface Invocation {
  readonly command: string;
  readonly args: readonly string[];
}

function scriptedRunner(
  respond: (args: readonly string[]) => Promise<CommandResult>,
): {
  run: CommandRunner;
  calls: Invocation[];
  options: Array<CommandOptions | undefined>;
} {
  const calls: Invocation[] = [];
  const options: Array<CommandOptions | undefined> = [];
  return {
    calls,
    options,
    run: async (command, args, runOptions) => {
      calls.push({ command, args });
      options.push(runOptions);
      return await respond(args);
    },
  };
}

const rules: RuleCollection = {
  source: "https://rules.test/bpa.json",
  rules: [{ ID: "HIDE_FOREIGN_KEYS", Severity: 2 }],
  issues: [],
};

let tempDir: string;
let modelPath: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "bpa-score-bridge-"));
  modelPath = path.join(tempDir, "model.bim");
  await fs.writeFile(modelPath, "{}", "utf8");
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("bridge analyzer backend", () => {
  it("inspects the model with the load settings as flags", async () => {
    const { run, calls } = scriptedRunner(async () => ({
      stdout: '{"measures":3,"columns":7}\n',
      stderr: "Loading model...\n",
    }));
    const backend = new BridgeAnalyzerBackend({
      command: "dotnet",
      args: ["bpa-bridge.dll"],
      run,
    });
    const log = new CapturedLog();

    const model = await backend.loadModel(modelPath, MODEL_LOAD_SETTINGS, log);

    expect(calls).toEqual([
      {
        command: "dotnet",
        args: ["bpa-bridge.dll", "inspect", modelPath, "--auto-fixup"],
      },
    ]);
    expect(model.path).toBe(modelPath);
    expect(model.summary()).toEqual({ measureCount: 3, columnCount: 7 });
    expect(log.close()).toEqual(["Loading model..."]);
  });

  it("fails before invoking the bridge when the model is missing", async () => {
    const { run, calls } = scriptedRunner(async () => ({
      stdout: "",
      stderr: "",
    }));
    const backend = new BridgeAnalyzerBackend({ command: "bpa-bridge", run });
    const missing = path.join(tempDir, "missing.bim");

    await expect(
      backend.loadModel(missing, MODEL_LOAD_SETTINGS, discardSink),
    ).rejects.toThrow(`Model path does not exist: ${missing}`);
    expect(calls).toEqual([]);
  });

  it("passes the rules through a temporary file and parses violations", async () => {
    let rulesFileContent = "";
    let rulesFilePath = "";
    const { run } = scriptedRunner(async (args) => {
      if (args[0] === "inspect") {
        return { stdout: '{"measures":1,"columns":1}', stderr: "" };
      }
      rulesFilePath = args[args.indexOf("--rules") + 1] ?? "";
      rulesFileContent = await fs.readFile(rulesFilePath, "utf8");
      return {
        stdout: [
          "Analyzing 1 rule...",
          '[{"ruleId":"HIDE_FOREIGN_KEYS","objectName":"Sales[CustomerKey]","severity":2}]',
        ].join("\n"),
        stderr: "",
      };
    });
    const backend = new BridgeAnalyzerBackend({ command: "bpa-bridge", run });
    const log = new CapturedLog();

    const model = await backend.loadModel(modelPath, MODEL_LOAD_SETTINGS, log);
    const violations = await backend.analyze(model, rules, log);

    expect(violations).toEqual([
      {
        ruleId: "HIDE_FOREIGN_KEYS",
        objectName: "Sales[CustomerKey]",
        severity: 2,
      },
    ]);
    expect(JSON.parse(rulesFileContent)).toEqual(rules.rules);
    await expect(fs.access(rulesFilePath)).rejects.toThrow();
    expect(log.close()).toEqual(["Analyzing 1 rule..."]);
  });

  it("removes the temporary rules file when the bridge fails", async () => {
    let rulesFilePath = "";
    const { run } = scriptedRunner(async (args) => {
      if (args[0] === "inspect") {
        return { stdout: '{"measures":1,"columns":0}', stderr: "" };
      }
      rulesFilePath = args[args.indexOf("--rules") + 1] ?? "";
      throw Object.assign(new Error("Command failed: bpa-bridge analyze"), {
        stderr: "Starting analysis\nUnsupported compatibility level\n",
      });
    });
    const backend = new BridgeAnalyzerBackend({ command: "bpa-bridge", run });
    const log = new CapturedLog();
    const model = await backend.loadModel(modelPath, MODEL_LOAD_SETTINGS, log);

    await expect(backend.analyze(model, rules, log)).rejects.toThrow(
      "Unsupported compatibility level",
    );
    await expect(fs.access(rulesFilePath)).rejects.toThrow();
    expect(log.close()).toEqual([
      "Starting analysis",
      "Unsupported compatibility level",
    ]);
  });

  it("explains a missing bridge executable", async () => {
    const { run } = scriptedRunner(async () => {
      throw Object.assign(new Error("spawn bpa-bridge ENOENT"), {
        code: "ENOENT",
      });
    });
    const backend = new BridgeAnalyzerBackend({ command: "bpa-bridge", run });

    await expect(
      backend.loadModel(modelPath, MODEL_LOAD_SETTINGS, discardSink),
    ).rejects.toThrow(
      "Analyzer command not found: bpa-bridge. Pass --analyzer <command> to point at the analyzer bridge.",
    );
  });

  it("runs without a time limit unless one is configured", async () => {
    const unbounded = scriptedRunner(async () => ({
      stdout: '{"measures":1,"columns":1}',
      stderr: "",
    }));
    await new BridgeAnalyzerBackend({
      command: "bpa-bridge",
      run: unbounded.run,
    }).loadModel(modelPath, MODEL_LOAD_SETTINGS, discardSink);

    const bounded = scriptedRunner(async () => ({
      stdout: '{"measures":1,"columns":1}',
      stderr: "",
    }));
    await new BridgeAnalyzerBackend({
      command: "bpa-bridge",
      run: bounded.run,
      timeoutMs: 120_000,
    }).loadModel(modelPath, MODEL_LOAD_SETTINGS, discardSink);

    expect(unbounded.options).toEqual([{ timeoutMs: undefined }]);
    expect(bounded.options).toEqual([{ timeoutMs: 120_000 }]);
  });

  it("reports a bridge killed by its time limit", async () => {
    const { run } = scriptedRunner(async () => {
      throw Object.assign(new Error("Command failed: bpa-bridge inspect"), {
        killed: true,
        signal: "SIGTERM",
        stderr: "",
      });
    });
    const backend = new BridgeAnalyzerBackend({
      command: "bpa-bridge",
      run,
      timeoutMs: 120_000,
    });

    await expect(
      backend.loadModel(modelPath, MODEL_LOAD_SETTINGS, discardSink),
    ).rejects.toThrow("Analyzer timed out after 120 seconds.");
  });
});

describe("bridge output parsing", () => {
  it("maps load settings to flags", () => {
    expect(
      settingsFlags({
        autoFixup: false,
        changeDetectionLocalServers: true,
        pbiFeaturesOnly: true,
      }),
    ).toEqual(["--change-detection-local-servers", "--pbi-features-only"]);
  });

  it("rejects empty or non-JSON output", () => {
    expect(() => extractPayload("  \n", discardSink)).toThrow(
      "Analyzer produced no output.",
    );
    expect(() => extractPayload("done\nstill not json", discardSink)).toThrow(
      "Analyzer output did not contain a JSON result.",
    );
  });

  it("finds pretty-printed JSON after progress lines", () => {
    const log = new CapturedLog();
    const payload = extractPayload(
      'Loading model...\nResolving [Sales] table\n{\n  "measures": 2,\n  "columns": 5\n}\n',
      log,
    );

    expect(payload).toEqual({ measures: 2, columns: 5 });
    expect(log.close()).toEqual([
      "Loading model...",
      "Resolving [Sales] table",
    ]);
  });

  it("validates model summaries", () => {
    expect(parseModelSummary({ measures: 0, columns: 12 })).toEqual({
      measureCount: 0,
      columnCount: 12,
    });
    expect(() => parseModelSummary({ measures: -1, columns: 2 })).toThrow(
      LinterError,
    );
    expect(() => parseModelSummary({ measures: 1.5, columns: 2 })).toThrow(
      LinterError,
    );
    expect(() => parseModelSummary([])).toThrow(LinterError);
  });

  it("validates violations", () => {
    expect(parseViolations([{ severity: 4 }])).toEqual([
      { ruleId: "", objectName: "", severity: 4 },
    ]);
    expect(() => parseViolations({})).toThrow(
      "Analyzer returned invalid results; expected an array of violations.",
    );
    expect(() => parseViolations([{ ruleId: "X" }])).toThrow(
      "Analyzer returned an invalid violation at index 0.",
    );
  });
});
