import { createFixAdvisory } from "./advisory/fix-advisory.js";
import { aggregateFindings } from "./gating/gate.js";
import type { ScanResult } from "./gating/types.js";
import { evaluateRules } from "./scanner/rule-engine.js";
import type { ArtifactSet, RuleSet } from "./scanner/types.js";

export function scanArtifacts(
  ruleSet: RuleSet,
  artifacts: ArtifactSet,
): ScanResult {
  const advisory = createFixAdvisory(ruleSet.rules);
  const findings = evaluateRules(ruleSet.rules, artifacts, advisory);
  return aggregateFindings(findings, ruleSet.policy);
}
