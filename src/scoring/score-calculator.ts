import { arithmeticError } from "../errors/linter-error.js";
import type { SeverityCounts, SeverityTagged } from "./types.js";
import {
  MAX_SCORE,
  PENALTY_MULTIPLIER,
  SCORE_DECIMALS,
  SEVERITY_WEIGHTS,
  SeverityLevel,
} from "./weights.js";

export function tallySeverities(
  violations: Iterable<SeverityTagged>,
): SeverityCounts {
  let infos = 0;
  let warnings = 0;
  let errors = 0;

  for (const violation of violations) {
    switch (violation.severity) {
      case SeverityLevel.Info:
        infos += 1;
        break;
      case SeverityLevel.Warning:
        warnings += 1;
        break;
      case SeverityLevel.Error:
        errors += 1;
        break;
      default:
        break;
    }
  }

  return { infos, warnings, errors };
}

/**
 * Score in [0, 10]: ten minus the weighted penalty averaged over the
 * model's measures and columns, floored at zero.
 *
 * A model with no measures or columns has nothing to average over and is
 * rejected instead of producing an infinite or NaN score.
 */
export function computeScore(
  objects: number,
  warnings: number,
  errors: number,
): number {
  if (!Number.isInteger(objects) || objects <= 0) {
    throw arithmeticError(
      `Model has no measures or columns to score (objects: ${objects}).`,
    );
  }

  const penalty =
    (warnings * SEVERITY_WEIGHTS.warning + errors * SEVERITY_WEIGHTS.error) *
    PENALTY_MULTIPLIER;
  const unbound = MAX_SCORE - penalty / objects;
  return Math.max(unbound, 0);
}

// toFixed rounds on the exact binary value and never applies locale rules.
export function formatScore(score: number): string {
  return score.toFixed(SCORE_DECIMALS);
}
