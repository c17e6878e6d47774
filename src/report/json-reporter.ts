import {
  computeScore,
  formatScore,
  tallySeverities,
} from "../scoring/score-calculator.js";
import type { SeverityTagged } from "../scoring/types.js";
import type { ModelSummary, ScoreReport } from "./types.js";

export function formatReport(
  objects: number,
  errors: number,
  warnings: number,
  infos: number,
  score: number,
): ScoreReport {
  return Object.freeze({
    objects,
    errors,
    warnings,
    infos,
    score: formatScore(score),
  });
}

export function buildScoreReport(
  summary: ModelSummary,
  violations: readonly SeverityTagged[],
): ScoreReport {
  const { infos, warnings, errors } = tallySeverities(violations);
  const objects = summary.measureCount + summary.columnCount;
  const score = computeScore(objects, warnings, errors);
  return formatReport(objects, errors, warnings, infos, score);
}

export function serializeReport(report: ScoreReport): string {
  return JSON.stringify({
    objects: report.objects,
    errors: report.errors,
    warnings: report.warnings,
    infos: report.infos,
    score: report.score,
  });
}
