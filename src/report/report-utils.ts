import { RATING_THRESHOLDS } from "../config/defaults.js";
import type { ScoreRating } from "./types.js";

export function ratingForScore(score: number): ScoreRating {
  if (score >= RATING_THRESHOLDS.excellent) {
    return "excellent";
  }
  if (score >= RATING_THRESHOLDS.needsAttention) {
    return "needs-attention";
  }
  return "poor";
}

export function ratingLabel(rating: ScoreRating): string {
  switch (rating) {
    case "excellent":
      return "Excellent!";
    case "needs-attention":
      return "Needs attention.";
    case "poor":
      return "Poor performance.";
  }
}
