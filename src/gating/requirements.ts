import type { Finding } from "../scanner/types.js";
import type { ProductionRequirement, Recommendation } from "./types.js";

export const PRODUCTION_REQUIREMENTS: readonly ProductionRequirement[] = [
  { name: "Non-root user", rule_id: "SG-USER-001" },
  { name: "Specific image tags", rule_id: "SG-IMAGE-001" },
  { name: "Resource limits", rule_id: "SG-LIMITS-001" },
  { name: "Security context", rule_id: "SG-CONTEXT-001" },
  { name: "No hardcoded secrets", rule_id: "SG-SECRET-001" },
];

export const CRITICAL_RECOMMENDATION =
  "CRITICAL issues must be fixed before deployment";

export const BEST_PRACTICES_RECOMMENDATION =
  "Configuration follows security best practices";

export const GENERIC_RECOMMENDATION = "Review and fix the reported findings";

export const RECOMMENDATIONS: readonly Recommendation[] = [
  { rule_id: "SG-USER-001", text: "Add a non-root user to the build file" },
  {
    rule_id: "SG-SECRET-001",
    text: "Move hardcoded secrets into runtime environment variables",
  },
  {
    rule_id: "SG-PRIV-001",
    text: "Disable privilege escalation in the container security context",
  },
  { rule_id: "SG-PRIV-002", text: "Remove privileged mode from containers" },
  {
    rule_id: "SG-IMAGE-001",
    text: "Use specific version tags instead of :latest",
  },
  {
    rule_id: "SG-LIMITS-001",
    text: "Set resource limits to prevent resource exhaustion",
  },
  {
    rule_id: "SG-CONTEXT-001",
    text: "Configure security context with runAsNonRoot: true",
  },
  { rule_id: "SG-PORT-001", text: "Avoid exposing SSH and database ports" },
  { rule_id: "SG-HEALTH-001", text: "Add health checks for better reliability" },
  { rule_id: "SG-FS-001", text: "Use a read-only root filesystem" },
  { rule_id: "SG-IMAGE-002", text: "Use slim or alpine base images" },
];

export function missingRequirements(
  findings: readonly Finding[],
  requirements: readonly ProductionRequirement[] = PRODUCTION_REQUIREMENTS,
): string[] {
  const triggered = new Set(findings.map((finding) => finding.rule_id));
  return requirements
    .filter((requirement) => triggered.has(requirement.rule_id))
    .map((requirement) => requirement.name);
}

export function buildRecommendations(
  findings: readonly Finding[],
  hasCritical: boolean,
): string[] {
  const triggered = new Set(findings.map((finding) => finding.rule_id));
  const recommendations: string[] = [];

  if (hasCritical) {
    recommendations.push(CRITICAL_RECOMMENDATION);
  }
  for (const recommendation of RECOMMENDATIONS) {
    if (triggered.has(recommendation.rule_id)) {
      recommendations.push(recommendation.text);
    }
  }

  if (findings.length === 0) {
    recommendations.push(BEST_PRACTICES_RECOMMENDATION);
  } else if (recommendations.length === 0) {
    recommendations.push(GENERIC_RECOMMENDATION);
  }
  return recommendations;
}
