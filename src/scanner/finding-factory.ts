import crypto from "node:crypto";
import type { Evidence, Finding, Rule } from "./types.js";

export function createFinding(
  rule: Rule,
  location: string,
  evidence: Evidence,
  fix: string,
): Finding {
  return {
    id: createFindingId(rule.id, location, evidence.line, evidence.matched),
    rule_id: rule.id,
    severity: rule.severity,
    message: rule.description,
    location,
    ...(evidence.line === undefined ? {} : { line: evidence.line }),
    ...(evidence.matched === undefined ? {} : { matched: evidence.matched }),
    fix,
  };
}

export function createFindingId(
  ruleId: string,
  location: string,
  line: number | undefined,
  matchedText: string | undefined,
): string {
  const input = `${ruleId}:${location}:${line ?? 0}:${matchedText ?? ""}`;
  const hash = crypto.createHash("sha256").update(input).digest("hex");
  return hash.slice(0, 12);
}
