import { calculateScore } from "../scoring/score-calculator.js";
import { DEFAULT_GATING_POLICY } from "../scoring/weights.js";
import type { Finding, GatingPolicy } from "../scanner/types.js";
import type { SeverityCounts } from "../scoring/types.js";
import { buildRecommendations, missingRequirements } from "./requirements.js";
import { GateStatus, type ScanResult } from "./types.js";

/**
 * Reduce an ordered findings list to the scan verdict. A single CRITICAL
 * finding blocks regardless of the score.
 */
export function aggregateFindings(
  findings: readonly Finding[],
  policy: GatingPolicy = DEFAULT_GATING_POLICY,
): ScanResult {
  const score = calculateScore(findings, policy.severity_weights);
  const missing = missingRequirements(findings);

  return Object.freeze({
    status: gateStatus(score.counts, score.total, policy.review_threshold),
    total_issues: findings.length,
    counts: Object.freeze({ ...score.counts }),
    risk_score: score.total,
    issues: Object.freeze([...findings]),
    compliance: Object.freeze({
      production_ready: missing.length === 0 && !score.hasCritical,
      missing_requirements: Object.freeze(missing),
    }),
    recommendations: Object.freeze(
      buildRecommendations(findings, score.hasCritical),
    ),
  });
}

export function gateStatus(
  counts: Readonly<SeverityCounts>,
  riskScore: number,
  reviewThreshold: number,
): GateStatus {
  if (counts.critical > 0) {
    return GateStatus.Blocked;
  }
  if (counts.high > 0 || riskScore > reviewThreshold) {
    return GateStatus.ReviewRequired;
  }
  return GateStatus.Approved;
}
