export { calculateScore, countBySeverity } from "./score-calculator.js";
export type { ScoreResult, SeverityCounts } from "./types.js";
export {
  DEFAULT_GATING_POLICY,
  DEFAULT_REVIEW_THRESHOLD,
  MAX_RISK_SCORE,
  SEVERITY_ORDER,
  SEVERITY_WEIGHTS,
} from "./weights.js";
