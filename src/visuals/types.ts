import type { LogSink } from "../analyzer/types.js";

/** One test outcome from the report inspector. */
export interface InspectorResult {
  readonly ruleId: string;
  readonly ruleName: string;
  readonly logType: number;
  /**
   * The offending items, or `false` when the test failed without
   * listing any.
   */
  readonly actual: readonly unknown[] | false;
}

export interface InspectorBackend {
  inspect(
    reportPath: string,
    rulesPath: string,
    log: LogSink,
  ): Promise<readonly InspectorResult[]>;
}
