export const enum SeverityLevel {
  Info = 1,
  Warning = 2,
  Error = 3,
}

export const MAX_SCORE = 10;

/** Penalty points per object, before the per-object average is taken. */
export const PENALTY_MULTIPLIER = 5;

export const SEVERITY_WEIGHTS: Readonly<Record<"warning" | "error", number>> =
  {
    warning: 1,
    error: 5,
  };

export const SCORE_DECIMALS = 2;

/** Log types written by the report inspector; any other value is info. */
export const enum InspectorLogType {
  Error = 0,
  Warning = 1,
}

export const VISUAL_SEVERITY_WEIGHTS: Readonly<
  Record<"warning" | "error", number>
> = {
  warning: 1,
  error: 2,
};

/** Charged for a failed test that does not list the offending items. */
export const FAILED_TEST_COUNT = 5;
