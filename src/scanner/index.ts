export { loadRules, parseRuleDocument } from "./rule-loader.js";
export { evaluateRule, evaluateRules } from "./rule-engine.js";
export { locateFirstLine, splitLines } from "./evidence.js";
export { createFinding, createFindingId } from "./finding-factory.js";
export {
  PREDICATES,
  PREDICATE_NAMES,
  isPredicateName,
  isRootUser,
} from "./predicates.js";
export type { ArtifactPredicate, PredicateResult } from "./predicates.js";
export { ArtifactLoadError, RuleLoadError } from "./errors.js";
export type {
  ArtifactSet,
  Evidence,
  Finding,
  GatingPolicy,
  LogicRule,
  PatternRule,
  PredicateName,
  Rule,
  RuleSet,
  RuleSource,
  SeverityWeights,
} from "./types.js";
export { ArtifactKind, CheckKind, Severity } from "./types.js";
