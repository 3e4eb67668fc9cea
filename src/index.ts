export { scanArtifacts } from "./scan.js";
export {
  ArtifactKind,
  ArtifactLoadError,
  CheckKind,
  RuleLoadError,
  Severity,
  evaluateRule,
  evaluateRules,
  loadRules,
  parseRuleDocument,
  PREDICATE_NAMES,
} from "./scanner/index.js";
export type {
  ArtifactSet,
  Finding,
  GatingPolicy,
  LogicRule,
  PatternRule,
  PredicateName,
  Rule,
  RuleSet,
  RuleSource,
  SeverityWeights,
} from "./scanner/index.js";
export { aggregateFindings, GateStatus } from "./gating/index.js";
export type { Compliance, ScanResult } from "./gating/index.js";
export { createFixAdvisory, fixFor, GENERIC_FIX } from "./advisory/index.js";
export type { FixAdvisory } from "./advisory/index.js";
export { calculateScore, DEFAULT_GATING_POLICY } from "./scoring/index.js";
export { discoverArtifacts, readArtifacts } from "./ingest/index.js";
export {
  buildJsonReport,
  renderJsonReport,
  renderMarkdownReport,
  renderSarifReport,
} from "./report/index.js";
export type { ScanReport } from "./report/index.js";
