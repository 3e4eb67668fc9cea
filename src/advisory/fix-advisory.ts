import type { Rule } from "../scanner/types.js";

export const GENERIC_FIX = "Review and apply the recommended fix for this rule.";

const BUILT_IN_FIXES: Readonly<Record<string, string>> = {
  "SG-SECRET-001":
    "Remove the literal value and pass it at runtime: ENV API_KEY=${API_KEY} or a secrets manager.",
  "SG-USER-001": "Add: RUN useradd -m appuser && USER appuser",
  "SG-PRIV-001": "Set: allowPrivilegeEscalation: false",
  "SG-PRIV-002":
    "Remove privileged: true and grant only the capabilities the workload needs.",
  "SG-IMAGE-001": "Pin a specific version: FROM python:3.11-slim",
  "SG-IMAGE-002": "Use a slim variant: python:3.11-slim or node:18-alpine",
  "SG-LIMITS-001": "Add CPU and memory limits in the resources section.",
  "SG-CONTEXT-001": "Add: runAsNonRoot: true in securityContext",
  "SG-PORT-001": "Remove EXPOSE for database and SSH ports.",
  "SG-HEALTH-001": "Add a HEALTHCHECK instruction or a livenessProbe.",
  "SG-FS-001": "Set: readOnlyRootFilesystem: true when possible",
};

export interface FixAdvisory {
  fixFor(ruleId: string): string;
}

export function fixFor(ruleId: string): string {
  return Object.hasOwn(BUILT_IN_FIXES, ruleId)
    ? (BUILT_IN_FIXES[ruleId] ?? GENERIC_FIX)
    : GENERIC_FIX;
}

/**
 * Remediation declared on the rule wins over the built-in table.
 */
export function createFixAdvisory(rules: readonly Rule[]): FixAdvisory {
  const declared = new Map<string, string>();
  for (const rule of rules) {
    if (rule.remediation && rule.remediation.trim().length > 0) {
      declared.set(rule.id, rule.remediation.trim());
    }
  }
  return {
    fixFor: (ruleId) => declared.get(ruleId) ?? fixFor(ruleId),
  };
}
