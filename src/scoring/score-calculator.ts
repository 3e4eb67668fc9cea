import { Severity } from "../scanner/types.js";
import type { Finding, SeverityWeights } from "../scanner/types.js";
import type { ScoreResult, SeverityCounts } from "./types.js";
import { MAX_RISK_SCORE, SEVERITY_WEIGHTS } from "./weights.js";

export function calculateScore(
  findings: readonly Finding[],
  weights: SeverityWeights = SEVERITY_WEIGHTS,
): ScoreResult {
  const counts = countBySeverity(findings);
  const weighted =
    counts.critical * weights.CRITICAL +
    counts.high * weights.HIGH +
    counts.medium * weights.MEDIUM +
    counts.low * weights.LOW;

  const total = Math.max(0, Math.min(Math.round(weighted), MAX_RISK_SCORE));
  return { total, counts, hasCritical: counts.critical > 0 };
}

export function countBySeverity(findings: readonly Finding[]): SeverityCounts {
  const counts: SeverityCounts = {
    critical: 0,
    high: 0,
    medium: 0,
    low: 0,
  };

  for (const finding of findings) {
    switch (finding.severity) {
      case Severity.Critical:
        counts.critical += 1;
        break;
      case Severity.High:
        counts.high += 1;
        break;
      case Severity.Medium:
        counts.medium += 1;
        break;
      case Severity.Low:
        counts.low += 1;
        break;
      default:
        break;
    }
  }

  return counts;
}
