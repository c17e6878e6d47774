import type { ModelLoadSettings } from "../analyzer/types.js";

export const DEFAULT_RULES_URL =
  "https://raw.githubusercontent.com/microsoft/Analysis-Services/master/BestPracticeRules/BPARules.json";

export const DEFAULT_ANALYZER_COMMAND = "bpa-bridge";

export const DEFAULT_INSPECTOR_COMMAND = "PBIXInspectorCLI";

/** Limit for each external tool run during `lint`. `score` has none. */
export const LINT_TIMEOUT_MS = 120_000;

export const MODEL_LOAD_SETTINGS: Readonly<ModelLoadSettings> = {
  autoFixup: true,
  changeDetectionLocalServers: false,
  pbiFeaturesOnly: false,
};

export const WORKSPACE_MAX_DEPTH = 5;

/** Semantic model folders keep their model files under this subfolder. */
export const MODEL_DEFINITION_FOLDER = "definition";

export const REPORT_DEFINITION_FILE = "report.json";

export const RATING_THRESHOLDS = {
  excellent: 8,
  needsAttention: 6,
} as const;
