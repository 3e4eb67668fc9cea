import fs from "node:fs/promises";
import yaml from "js-yaml";
import { DEFAULT_GATING_POLICY, SEVERITY_ORDER } from "../scoring/weights.js";
import { RuleLoadError } from "./errors.js";
import { PREDICATE_NAMES, isPredicateName } from "./predicates.js";
import { CheckKind } from "./types.js";
import type {
  GatingPolicy,
  Rule,
  RuleSet,
  RuleSource,
  Severity,
  SeverityWeights,
} from "./types.js";

const DOCUMENT_KEYS = new Set(["version", "policy", "rules"]);
const POLICY_KEYS = new Set(["severity_weights", "review_threshold"]);
const COMMON_RULE_KEYS = [
  "id",
  "severity",
  "description",
  "check",
  "applies_to",
  "remediation",
];
const PATTERN_RULE_KEYS = new Set([...COMMON_RULE_KEYS, "patterns"]);
const LOGIC_RULE_KEYS = new Set([...COMMON_RULE_KEYS, "predicate"]);
const SEVERITIES = new Set<string>(SEVERITY_ORDER);
const SUPPORTED_VERSION = 1;

/**
 * Load a rule document. Nothing is read implicitly: the caller names the
 * file or hands over the document text.
 */
export async function loadRules(source: RuleSource): Promise<RuleSet> {
  if (source.kind === "text") {
    return parseRuleDocument(source.text, source.origin ?? "<inline>");
  }

  let raw: string;
  try {
    raw = await fs.readFile(source.path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RuleLoadError(source.path, [`unreadable: ${reason}`], error);
  }
  return parseRuleDocument(raw, source.path);
}

export function parseRuleDocument(text: string, origin: string): RuleSet {
  let doc: unknown;
  try {
    doc = yaml.load(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RuleLoadError(origin, [`malformed YAML: ${reason}`], error);
  }

  const errors: string[] = [];
  const ruleSet = parseDocument(doc, origin, errors);
  if (errors.length > 0) {
    throw new RuleLoadError(origin, errors);
  }
  return deepFreeze(ruleSet);
}

function parseDocument(
  input: unknown,
  origin: string,
  errors: string[],
): RuleSet {
  if (!isRecord(input)) {
    errors.push("document must be a mapping");
    return { origin, rules: [], policy: DEFAULT_GATING_POLICY };
  }
  assertNoExtraKeys(input, DOCUMENT_KEYS, "document", errors);

  if (input.version !== undefined && input.version !== SUPPORTED_VERSION) {
    errors.push(`version must be ${SUPPORTED_VERSION}`);
  }

  const policy =
    input.policy === undefined
      ? DEFAULT_GATING_POLICY
      : parsePolicy(input.policy, errors);

  const rules = parseRules(input.rules, errors);
  return { origin, rules, policy };
}

function parseRules(input: unknown, errors: string[]): Rule[] {
  if (!Array.isArray(input)) {
    errors.push("rules must be a list");
    return [];
  }
  if (input.length === 0) {
    errors.push("rules must not be empty");
    return [];
  }

  const rules: Rule[] = [];
  const seenIds = new Set<string>();
  input.forEach((entry: unknown, index) => {
    const rule = parseRule(entry, `rules[${index}]`, errors);
    if (!rule) {
      return;
    }
    if (seenIds.has(rule.id)) {
      errors.push(`rules[${index}].id '${rule.id}' is a duplicate`);
      return;
    }
    seenIds.add(rule.id);
    rules.push(rule);
  });
  return rules;
}

function parseRule(
  input: unknown,
  path: string,
  errors: string[],
): Rule | undefined {
  if (!isRecord(input)) {
    errors.push(`${path} must be a mapping`);
    return undefined;
  }
  const before = errors.length;
  const label = typeof input.id === "string" ? `${path} (${input.id})` : path;

  const id = requireString(input.id, `${label}.id`, errors);
  const description = requireString(
    input.description,
    `${label}.description`,
    errors,
  );
  const severity = parseSeverity(input.severity, label, errors);
  const appliesTo = parseAppliesTo(input.applies_to, label, errors);
  const remediation = optionalString(
    input.remediation,
    `${label}.remediation`,
    errors,
  );

  const check = input.check;
  if (check === undefined) {
    errors.push(`${label}.check is required`);
    return undefined;
  }

  if (check === CheckKind.Pattern) {
    assertNoExtraKeys(input, PATTERN_RULE_KEYS, label, errors);
    const patterns = parsePatterns(input.patterns, label, errors);
    if (errors.length > before || !id || !description || !severity) {
      return undefined;
    }
    return {
      id,
      severity,
      description,
      check: CheckKind.Pattern,
      patterns,
      applies_to: appliesTo,
      ...(remediation === undefined ? {} : { remediation }),
    };
  }

  if (check === CheckKind.Logic) {
    assertNoExtraKeys(input, LOGIC_RULE_KEYS, label, errors);
    const predicate = input.predicate;
    if (typeof predicate !== "string" || predicate.length === 0) {
      errors.push(`${label}.predicate is required for logic rules`);
      return undefined;
    }
    if (!isPredicateName(predicate)) {
      errors.push(
        `${label}.predicate '${predicate}' is not one of ${PREDICATE_NAMES.join(", ")}`,
      );
      return undefined;
    }
    if (errors.length > before || !id || !description || !severity) {
      return undefined;
    }
    return {
      id,
      severity,
      description,
      check: CheckKind.Logic,
      predicate,
      applies_to: appliesTo,
      ...(remediation === undefined ? {} : { remediation }),
    };
  }

  errors.push(`${label}.check must be 'pattern' or 'logic'`);
  return undefined;
}

function parseSeverity(
  input: unknown,
  label: string,
  errors: string[],
): Severity | undefined {
  if (input === undefined) {
    errors.push(`${label}.severity is required`);
    return undefined;
  }
  const match = SEVERITY_ORDER.find((severity) => severity === input);
  if (!match) {
    errors.push(
      `${label}.severity '${String(input)}' is not one of ${SEVERITY_ORDER.join(", ")}`,
    );
  }
  return match;
}

function parseAppliesTo(
  input: unknown,
  label: string,
  errors: string[],
): string[] {
  const path = `${label}.applies_to`;
  if (input === undefined) {
    errors.push(`${path} is required`);
    return [];
  }
  const values = typeof input === "string" ? [input] : input;
  if (!Array.isArray(values) || values.length === 0) {
    errors.push(`${path} must be an artifact kind or a non-empty list`);
    return [];
  }

  const kinds: string[] = [];
  values.forEach((value: unknown, index) => {
    if (typeof value !== "string" || value.trim().length === 0) {
      errors.push(`${path}[${index}] must be a non-empty string`);
      return;
    }
    if (!kinds.includes(value)) {
      kinds.push(value);
    }
  });
  return kinds;
}

function parsePatterns(
  input: unknown,
  label: string,
  errors: string[],
): RegExp[] {
  const path = `${label}.patterns`;
  const values = typeof input === "string" ? [input] : input;
  if (!Array.isArray(values) || values.length === 0) {
    errors.push(`${path} must be a non-empty list for pattern rules`);
    return [];
  }

  const patterns: RegExp[] = [];
  values.forEach((value: unknown, index) => {
    if (typeof value !== "string" || value.length === 0) {
      errors.push(`${path}[${index}] must be a non-empty string`);
      return;
    }
    try {
      patterns.push(new RegExp(value, "i"));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      errors.push(`${path}[${index}] is not a valid expression: ${reason}`);
    }
  });
  return patterns;
}

function parsePolicy(input: unknown, errors: string[]): GatingPolicy {
  if (!isRecord(input)) {
    errors.push("policy must be a mapping");
    return DEFAULT_GATING_POLICY;
  }
  assertNoExtraKeys(input, POLICY_KEYS, "policy", errors);

  const weights =
    input.severity_weights === undefined
      ? DEFAULT_GATING_POLICY.severity_weights
      : parseWeights(input.severity_weights, errors);

  const threshold = input.review_threshold;
  let reviewThreshold = DEFAULT_GATING_POLICY.review_threshold;
  if (threshold !== undefined) {
    if (
      typeof threshold !== "number" ||
      !Number.isInteger(threshold) ||
      threshold < 0 ||
      threshold > 100
    ) {
      errors.push("policy.review_threshold must be an integer in 0..100");
    } else {
      reviewThreshold = threshold;
    }
  }

  return { severity_weights: weights, review_threshold: reviewThreshold };
}

function parseWeights(input: unknown, errors: string[]): SeverityWeights {
  if (!isRecord(input)) {
    errors.push("policy.severity_weights must be a mapping");
    return DEFAULT_GATING_POLICY.severity_weights;
  }
  assertNoExtraKeys(input, SEVERITIES, "policy.severity_weights", errors);

  const values: number[] = [];
  for (const severity of SEVERITY_ORDER) {
    const value = input[severity];
    if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
      errors.push(
        `policy.severity_weights.${severity} must be a positive integer`,
      );
      return DEFAULT_GATING_POLICY.severity_weights;
    }
    values.push(value);
  }

  for (let i = 1; i < values.length; i += 1) {
    if ((values[i] ?? 0) >= (values[i - 1] ?? 0)) {
      errors.push(
        "policy.severity_weights must strictly decrease from CRITICAL to LOW",
      );
      return DEFAULT_GATING_POLICY.severity_weights;
    }
  }

  const [critical = 0, high = 0, medium = 0, low = 0] = values;
  return { CRITICAL: critical, HIGH: high, MEDIUM: medium, LOW: low };
}

function requireString(
  input: unknown,
  path: string,
  errors: string[],
): string | undefined {
  if (input === undefined) {
    errors.push(`${path} is required`);
    return undefined;
  }
  if (typeof input !== "string" || input.trim().length === 0) {
    errors.push(`${path} must be a non-empty string`);
    return undefined;
  }
  return input;
}

function optionalString(
  input: unknown,
  path: string,
  errors: string[],
): string | undefined {
  if (input === undefined || input === null) {
    return undefined;
  }
  if (typeof input !== "string") {
    errors.push(`${path} must be a string`);
    return undefined;
  }
  return input;
}

function assertNoExtraKeys(
  input: Record<string, unknown>,
  allowed: ReadonlySet<string>,
  path: string,
  errors: string[],
): void {
  for (const key of Object.keys(input)) {
    if (!allowed.has(key)) {
      errors.push(`${path} contains unsupported field '${key}'`);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function deepFreeze(ruleSet: RuleSet): RuleSet {
  for (const rule of ruleSet.rules) {
    Object.freeze(rule.applies_to);
    if (rule.check === CheckKind.Pattern) {
      Object.freeze(rule.patterns);
    }
    Object.freeze(rule);
  }
  Object.freeze(ruleSet.rules);
  return Object.freeze(ruleSet);
}
