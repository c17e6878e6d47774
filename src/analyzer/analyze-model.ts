import { MODEL_LOAD_SETTINGS } from "../config/defaults.js";
import { configurationError, toLinterError } from "../errors/linter-error.js";
import type { Logger } from "../observability/logger.js";
import { buildScoreReport } from "../report/json-reporter.js";
import type { ScoreReport } from "../report/types.js";
import { withLogCapture } from "./log-sink.js";
import { loadRuleCollection } from "./rule-source.js";
import type { AnalyzerBackend } from "./types.js";

export const NO_RULES_MESSAGE =
  "No rules loaded from the external URL. Please verify the URL and rule format.";

export interface AnalyzeContext {
  readonly backend: AnalyzerBackend;
  readonly rulesSource: string;
  readonly logger: Logger;
  readonly fetchImpl?: typeof fetch;
}

/**
 * Loads the model, fetches the rules, runs the analyzer and builds the
 * report. Analyzer output stays inside the capture scope; every failure
 * leaves as a LinterError.
 */
export async function analyzeModel(
  modelPath: string,
  context: AnalyzeContext,
): Promise<ScoreReport> {
  try {
    return await withLogCapture(context.logger, async (log) => {
      const model = await context.backend.loadModel(
        modelPath,
        MODEL_LOAD_SETTINGS,
        log,
      );

      const rules = await loadRuleCollection(context.rulesSource, {
        log,
        fetchImpl: context.fetchImpl,
      });
      if (rules.rules.length === 0) {
        throw configurationError(noRulesMessage(rules.issues));
      }

      const violations = [
        ...(await context.backend.analyze(model, rules, log)),
      ];
      return buildScoreReport(model.summary(), violations);
    });
  } catch (error) {
    throw toLinterError(error);
  }
}

function noRulesMessage(issues: readonly string[]): string {
  if (issues.length === 0) {
    return NO_RULES_MESSAGE;
  }
  return `${NO_RULES_MESSAGE} (${issues.join("; ")})`;
}
