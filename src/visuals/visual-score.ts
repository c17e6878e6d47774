import { collaboratorError } from "../errors/linter-error.js";
import { formatReport } from "../report/json-reporter.js";
import type { ScoreReport } from "../report/types.js";
import {
  FAILED_TEST_COUNT,
  InspectorLogType,
  MAX_SCORE,
  PENALTY_MULTIPLIER,
  VISUAL_SEVERITY_WEIGHTS,
} from "../scoring/weights.js";
import type { InspectorResult } from "./types.js";

/**
 * Score in [0, 10] for a report: ten minus the weighted penalty averaged
 * over its visuals. A report without visuals scores zero.
 */
export function scoreInspectorResults(
  results: readonly InspectorResult[],
  visualCount: number,
): ScoreReport {
  let infos = 0;
  let warnings = 0;
  let errors = 0;

  for (const result of results) {
    const count =
      result.actual === false ? FAILED_TEST_COUNT : result.actual.length;
    switch (result.logType) {
      case InspectorLogType.Error:
        errors += count;
        break;
      case InspectorLogType.Warning:
        warnings += count;
        break;
      default:
        infos += count;
        break;
    }
  }

  const penalty =
    errors * VISUAL_SEVERITY_WEIGHTS.error +
    warnings * VISUAL_SEVERITY_WEIGHTS.warning;
  const score =
    visualCount > 0
      ? Math.max(MAX_SCORE - (penalty / visualCount) * PENALTY_MULTIPLIER, 0)
      : 0;
  return formatReport(visualCount, errors, warnings, infos, score);
}

export function parseInspectorResults(doc: unknown): InspectorResult[] {
  if (!isRecord(doc) || !Array.isArray(doc.Results)) {
    throw collaboratorError(
      "Inspector returned invalid results; expected a Results array.",
    );
  }

  return doc.Results.map((entry: unknown, index) => {
    if (
      !isRecord(entry) ||
      typeof entry.LogType !== "number" ||
      !(entry.Actual === false || Array.isArray(entry.Actual))
    ) {
      throw collaboratorError(
        `Inspector returned an invalid result at index ${index}.`,
      );
    }
    return {
      ruleId: typeof entry.RuleId === "string" ? entry.RuleId : "",
      ruleName: typeof entry.RuleName === "string" ? entry.RuleName : "",
      logType: entry.LogType,
      actual: entry.Actual,
    };
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
