import { createFixAdvisory, type FixAdvisory } from "../advisory/fix-advisory.js";
import { locateFirstLine, splitLines } from "./evidence.js";
import { createFinding } from "./finding-factory.js";
import { PREDICATES } from "./predicates.js";
import { CheckKind } from "./types.js";
import type { ArtifactSet, Evidence, Finding, Rule } from "./types.js";

/**
 * Run every rule against every artifact kind it names. Emits at most one
 * finding per (rule, artifact kind), in rule order and then in the order of
 * the rule's applies_to list.
 */
export function evaluateRules(
  rules: readonly Rule[],
  artifacts: ArtifactSet,
  advisory: FixAdvisory = createFixAdvisory(rules),
): Finding[] {
  const findings: Finding[] = [];
  const seen = new Set<string>();

  for (const rule of rules) {
    for (const kind of rule.applies_to) {
      const source = presentArtifact(artifacts, kind);
      if (source === undefined) {
        continue;
      }

      // Loaded rules never repeat a kind; hand-built ones may.
      const key = `${rule.id}\u0000${kind}`;
      if (seen.has(key)) {
        continue;
      }

      const evidence = evaluateRule(rule, source);
      if (!evidence) {
        continue;
      }
      seen.add(key);
      findings.push(
        createFinding(rule, kind, evidence, advisory.fixFor(rule.id)),
      );
    }
  }

  return findings;
}

export function evaluateRule(rule: Rule, source: string): Evidence | null {
  switch (rule.check) {
    case CheckKind.Pattern:
      return locateFirstLine(splitLines(source), rule.patterns) ?? null;
    case CheckKind.Logic: {
      const result = PREDICATES[rule.predicate](source);
      if (!result.triggered) {
        return null;
      }
      return {
        ...(result.line === undefined ? {} : { line: result.line }),
        ...(result.matched === undefined ? {} : { matched: result.matched }),
      };
    }
    default:
      return null;
  }
}

function presentArtifact(
  artifacts: ArtifactSet,
  kind: string,
): string | undefined {
  if (!Object.hasOwn(artifacts, kind)) {
    return undefined;
  }
  const source = artifacts[kind];
  if (typeof source !== "string" || source.trim().length === 0) {
    return undefined;
  }
  return source;
}
