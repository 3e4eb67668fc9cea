export const enum Severity {
  Critical = "CRITICAL",
  High = "HIGH",
  Medium = "MEDIUM",
  Low = "LOW",
}

export const enum CheckKind {
  Pattern = "pattern",
  Logic = "logic",
}

export const enum ArtifactKind {
  BuildFile = "build-file",
  ComposeFile = "compose-file",
  OrchestrationManifest = "orchestration-manifest",
}

export type PredicateName =
  | "no-non-root-user"
  | "no-health-check"
  | "no-resource-limits"
  | "privilege-escalation-enabled"
  | "run-as-non-root-not-enforced";

interface RuleBase {
  readonly id: string;
  readonly severity: Severity;
  readonly description: string;
  readonly applies_to: readonly string[];
  readonly remediation?: string;
}

export interface PatternRule extends RuleBase {
  readonly check: CheckKind.Pattern;
  readonly patterns: readonly RegExp[];
}

export interface LogicRule extends RuleBase {
  readonly check: CheckKind.Logic;
  readonly predicate: PredicateName;
}

export type Rule = PatternRule | LogicRule;

/**
 * Raw artifact text keyed by artifact kind. A missing or blank entry means
 * there is nothing to check for that kind.
 */
export type ArtifactSet = Readonly<Record<string, string | undefined>>;

export interface Evidence {
  readonly line?: number;
  readonly matched?: string;
}

export interface Finding {
  readonly id: string;
  readonly rule_id: string;
  readonly severity: Severity;
  readonly message: string;
  readonly location: string;
  readonly line?: number;
  readonly matched?: string;
  readonly fix: string;
}

export interface SeverityWeights {
  readonly CRITICAL: number;
  readonly HIGH: number;
  readonly MEDIUM: number;
  readonly LOW: number;
}

export interface GatingPolicy {
  readonly severity_weights: SeverityWeights;
  readonly review_threshold: number;
}

export interface RuleSet {
  readonly origin: string;
  readonly rules: readonly Rule[];
  readonly policy: GatingPolicy;
}

export type RuleSource =
  | { readonly kind: "file"; readonly path: string }
  | { readonly kind: "text"; readonly text: string; readonly origin?: string };
