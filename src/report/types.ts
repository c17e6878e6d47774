export interface ModelSummary {
  readonly measureCount: number;
  readonly columnCount: number;
}

export interface ScoreReport {
  readonly objects: number;
  readonly errors: number;
  readonly warnings: number;
  readonly infos: number;
  readonly score: string;
}

export type ScoreRating = "excellent" | "needs-attention" | "poor";
