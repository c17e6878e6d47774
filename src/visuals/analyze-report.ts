import { withLogCapture } from "../analyzer/log-sink.js";
import { toLinterError } from "../errors/linter-error.js";
import type { Logger } from "../observability/logger.js";
import type { ScoreReport } from "../report/types.js";
import { countVisuals } from "./report-definition.js";
import type { InspectorBackend } from "./types.js";
import { scoreInspectorResults } from "./visual-score.js";

export interface InspectReportContext {
  readonly backend: InspectorBackend;
  readonly rulesPath: string;
  readonly logger: Logger;
}

/** Runs the inspector over a report folder and scores it per visual. */
export async function analyzeReport(
  reportPath: string,
  context: InspectReportContext,
): Promise<ScoreReport> {
  try {
    return await withLogCapture(context.logger, async (log) => {
      const results = await context.backend.inspect(
        reportPath,
        context.rulesPath,
        log,
      );
      const visuals = await countVisuals(reportPath);
      return scoreInspectorResults(results, visuals);
    });
  } catch (error) {
    throw toLinterError(error);
  }
}
