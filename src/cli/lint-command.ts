import fs from "node:fs/promises";
import path from "node:path";
import { analyzeModel } from "../analyzer/analyze-model.js";
import {
  LINT_TIMEOUT_MS,
  MODEL_DEFINITION_FOLDER,
} from "../config/defaults.js";
import { resolveRunConfig, type RunOptions } from "../config/loader.js";
import { toLinterError } from "../errors/linter-error.js";
import type { Logger } from "../observability/logger.js";
import { ratingForScore, ratingLabel } from "../report/report-utils.js";
import type { ScoreRating, ScoreReport } from "../report/types.js";
import { analyzeReport } from "../visuals/analyze-report.js";
import { listItems } from "../workspace/item-discovery.js";
import type { WorkspaceIndex } from "../workspace/types.js";
import {
  createBackend,
  createCommandLogger,
  createInspector,
  type CommandDependencies,
} from "./score-command.js";

export interface LintOptions extends RunOptions {
  readonly paths?: readonly string[];
}

export type ItemLintResult =
  | {
      readonly item: string;
      readonly status: "scored";
      readonly report: ScoreReport;
      readonly rating: ScoreRating;
    }
  | {
      readonly item: string;
      readonly status: "failed";
      readonly error: string;
    };

export interface LintResult {
  readonly ok: boolean;
  readonly models: readonly ItemLintResult[];
  readonly reports: readonly ItemLintResult[];
}

/**
 * Scores every semantic model, and every report when visual rules are
 * configured, found under the given folders. The run is not ok when a
 * path is missing or unreadable, an item fails to score, or an item rates
 * poor.
 */
export async function runLintCommand(
  options: LintOptions,
  deps: CommandDependencies = {},
): Promise<LintResult> {
  const config = resolveRunConfig(options);
  const logger = deps.logger ?? createCommandLogger(config);
  const backendOptions = { run: deps.run, timeoutMs: LINT_TIMEOUT_MS };
  const backend = deps.backend ?? createBackend(config, backendOptions);
  const inspector = deps.inspector ?? createInspector(config, backendOptions);
  const paths =
    options.paths && options.paths.length > 0 ? options.paths : ["."];

  const models: ItemLintResult[] = [];
  const reports: ItemLintResult[] = [];
  let ok = true;
  const record = (results: ItemLintResult[], result: ItemLintResult) => {
    if (result.status === "failed" || result.rating === "poor") {
      ok = false;
    }
    results.push(result);
  };

  for (const target of paths) {
    const rootPath = path.resolve(target);
    if (!(await pathExists(rootPath))) {
      logger.error(`Path ${target} does not exist.`);
      ok = false;
      continue;
    }

    let index: WorkspaceIndex;
    try {
      index = await listItems(rootPath);
    } catch (error) {
      const message = toLinterError(error).message;
      logger.error(`Listing items at ${target} failed with error: ${message}`);
      ok = false;
      continue;
    }
    if (index.size === 0) {
      logger.warn(`No items found at ${target}`);
      continue;
    }

    for (const [folder, items] of index) {
      logger.info(`In '${folder}', reviewing items`, {
        semanticModels: items.semanticModels.map((item) => path.basename(item)),
        reports: items.reports.map((item) => path.basename(item)),
      });

      for (const model of items.semanticModels) {
        const result = await lintItem(model, logger, () =>
          analyzeModel(path.join(model, MODEL_DEFINITION_FOLDER), {
            backend,
            rulesSource: config.rulesSource,
            logger,
            fetchImpl: deps.fetchImpl,
          }),
        );
        record(models, result);
      }

      const rulesPath = config.visualRulesPath;
      for (const report of items.reports) {
        if (!rulesPath) {
          logger.debug(
            `Skipping report '${path.basename(report)}': no visual rules configured`,
          );
          continue;
        }
        const result = await lintItem(report, logger, () =>
          analyzeReport(report, { backend: inspector, rulesPath, logger }),
        );
        record(reports, result);
      }
    }
  }

  return { ok, models, reports };
}

async function lintItem(
  item: string,
  logger: Logger,
  score: () => Promise<ScoreReport>,
): Promise<ItemLintResult> {
  const name = path.basename(item);
  const itemLogger = logger.child({ item: name });
  let report: ScoreReport;
  try {
    report = await score();
  } catch (error) {
    const message = toLinterError(error).message;
    itemLogger.error(`Scoring '${name}' failed with error: ${message}`);
    return { item, status: "failed", error: message };
  }

  const rating = ratingForScore(Number(report.score));
  const details = {
    objects: report.objects,
    errors: report.errors,
    warnings: report.warnings,
    infos: report.infos,
  };
  const message = `'${name}' - Score: ${report.score} - ${ratingLabel(rating)}`;
  switch (rating) {
    case "excellent":
      itemLogger.info(message, details);
      break;
    case "needs-attention":
      itemLogger.warn(message, details);
      break;
    case "poor":
      itemLogger.error(message, details);
      break;
  }
  return { item, status: "scored", report, rating };
}

async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
}
