import type { ModelSummary } from "../report/types.js";

/** Options the external analyzer applies when it opens a model. */
export interface ModelLoadSettings {
  readonly autoFixup: boolean;
  readonly changeDetectionLocalServers: boolean;
  readonly pbiFeaturesOnly: boolean;
}

export interface ViolationRecord {
  readonly ruleId: string;
  readonly objectName: string;
  readonly severity: number;
}

/**
 * One rule of a Best Practice Analyzer collection. Only the identifier and
 * severity are read here; the expression and scope belong to the analyzer.
 */
export interface BestPracticeRule {
  readonly ID: string;
  readonly Severity: number;
  readonly [key: string]: unknown;
}

export interface RuleCollection {
  readonly source: string;
  readonly rules: readonly BestPracticeRule[];
  /** Why rules were dropped or the document was rejected. */
  readonly issues: readonly string[];
}

export interface ModelHandle {
  readonly path: string;
  readonly settings: ModelLoadSettings;
  summary(): ModelSummary;
}

export interface LogSink {
  write(line: string): void;
}

export interface AnalyzerBackend {
  loadModel(
    modelPath: string,
    settings: ModelLoadSettings,
    log: LogSink,
  ): Promise<ModelHandle>;
  analyze(
    model: ModelHandle,
    rules: RuleCollection,
    log: LogSink,
  ): Promise<readonly ViolationRecord[]>;
}
