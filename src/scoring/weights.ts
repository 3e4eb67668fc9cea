import { Severity } from "../scanner/types.js";
import type { GatingPolicy, SeverityWeights } from "../scanner/types.js";

export const SEVERITY_ORDER: readonly Severity[] = [
  Severity.Critical,
  Severity.High,
  Severity.Medium,
  Severity.Low,
];

export const SEVERITY_WEIGHTS: SeverityWeights = {
  CRITICAL: 25,
  HIGH: 10,
  MEDIUM: 5,
  LOW: 2,
};

export const MAX_RISK_SCORE = 100;

export const DEFAULT_REVIEW_THRESHOLD = 40;

export const DEFAULT_GATING_POLICY: GatingPolicy = {
  severity_weights: SEVERITY_WEIGHTS,
  review_threshold: DEFAULT_REVIEW_THRESHOLD,
};
