import path from "node:path";
import { beforeAll, describe, expect, it } from "vitest";
import { createFixAdvisory } from "../../src/advisory/fix-advisory.js";
import { createFindingId } from "../../src/scanner/finding-factory.js";
import { evaluateRules } from "../../src/scanner/rule-engine.js";
import { loadRules, parseRuleDocument } from "../../src/scanner/rule-loader.js";
import { Severity } from "../../src/scanner/types.js";
import type { Rule } from "../../src/scanner/types.js";

let defaultRules: readonly Rule[];

beforeAll(async () => {
  const ruleSet = await loadRules({
    kind: "file",
    path: path.join(process.cwd(), "rules", "default-rules.yaml"),
  });
  defaultRules = ruleSet.rules;
});

const customRules = parseRuleDocument(
  [
    "rules:",
    "  - id: SECRET-ASSIGN",
    "    severity: HIGH",
    "    description: Secret assigned inline",
    "    check: pattern",
    "    patterns: ['TOKEN=', 'SECRET=']",
    "    applies_to: [build-file, compose-file]",
    "  - id: ROOT-USER",
    "    severity: CRITICAL",
    "    description: Runs as root",
    "    check: logic",
    "    predicate: no-non-root-user",
    "    applies_to: build-file",
    "    remediation: Add a USER instruction",
  ].join("\n"),
  "custom.yaml",
).rules;

const ruleCases = [
  {
    ruleId: "SG-SECRET-001",
    kind: "build-file",
    content: "FROM node:20-slim\nUSER app\nENV API_KEY=abcdef123456",
    line: 3,
  },
  {
    ruleId: "SG-PRIV-002",
    kind: "compose-file",
    content: "services:\n  web:\n    privileged: true",
    line: 3,
  },
  {
    ruleId: "SG-IMAGE-001",
    kind: "build-file",
    content: "FROM python:latest\nUSER app",
    line: 1,
  },
  {
    ruleId: "SG-IMAGE-001",
    kind: "orchestration-manifest",
    content: "containers:\n  - name: web\n    image: nginx:latest",
    line: 3,
  },
  {
    ruleId: "SG-IMAGE-001",
    kind: "build-file",
    content: "FROM --platform=linux/amd64 node:latest\nUSER app",
    line: 1,
  },
  {
    ruleId: "SG-IMAGE-001",
    kind: "orchestration-manifest",
    content: '{\n  "image": "nginx:latest"\n}',
    line: 2,
  },
  {
    ruleId: "SG-PRIV-002",
    kind: "orchestration-manifest",
    content: "containers:\n  - { name: web, privileged: true }",
    line: 2,
  },
  {
    ruleId: "SG-PORT-001",
    kind: "build-file",
    content: "FROM postgres:16\nEXPOSE 5432",
    line: 2,
  },
  {
    ruleId: "SG-PORT-001",
    kind: "compose-file",
    content: 'services:\n  db:\n    ports:\n      - "6379:6379"',
    line: 4,
  },
  {
    ruleId: "SG-FS-001",
    kind: "orchestration-manifest",
    content: "securityContext:\n  readOnlyRootFilesystem: false",
    line: 2,
  },
  {
    ruleId: "SG-IMAGE-002",
    kind: "build-file",
    content: "FROM python:3.11\nUSER app",
    line: 1,
  },
];

describe("rule engine", () => {
  it.each(ruleCases)(
    "matches $ruleId in $kind",
    ({ ruleId, kind, content, line }) => {
      const findings = evaluateRules([findRule(ruleId)], { [kind]: content });
      expect(findings).toHaveLength(1);
      expect(findings[0]?.rule_id).toBe(ruleId);
      expect(findings[0]?.location).toBe(kind);
      expect(findings[0]?.line).toBe(line);
    },
  );

  it.each(ruleCases)(
    "does not match $ruleId on safe content",
    ({ ruleId, kind }) => {
      const findings = evaluateRules([findRule(ruleId)], {
        [kind]: "safe content",
      });
      expect(findings).toHaveLength(0);
    },
  );

  it("reports only the first matching line per rule and artifact", () => {
    const source = [
      "FROM alpine:3.20",
      "USER app",
      "ENV DEBUG=1",
      "ENV SECRET=abc12345",
      "ENV TOKEN=def67890",
      "ENV SECRET=again",
    ].join("\n");

    const findings = evaluateRules(customRules, { "build-file": source });
    expect(findings).toEqual([
      {
        id: createFindingId("SECRET-ASSIGN", "build-file", 4, "ENV SECRET=abc12345"),
        rule_id: "SECRET-ASSIGN",
        severity: Severity.High,
        message: "Secret assigned inline",
        location: "build-file",
        line: 4,
        matched: "ENV SECRET=abc12345",
        fix: "Review and apply the recommended fix for this rule.",
      },
    ]);
  });

  it("matches case-insensitively and trims the snippet", () => {
    const findings = evaluateRules(customRules, {
      "build-file": "USER app\n    export secret=value  ",
    });
    expect(findings).toHaveLength(1);
    expect(findings[0]?.line).toBe(2);
    expect(findings[0]?.matched).toBe("export secret=value");
  });

  it("orders findings by rule, then by applies_to order", () => {
    const findings = evaluateRules(customRules, {
      "compose-file": "environment:\n  - TOKEN=abc",
      "build-file": "FROM alpine\nENV SECRET=x",
    });
    expect(
      findings.map((finding) => [finding.rule_id, finding.location]),
    ).toEqual([
      ["SECRET-ASSIGN", "build-file"],
      ["SECRET-ASSIGN", "compose-file"],
      ["ROOT-USER", "build-file"],
    ]);
  });

  it("reports a kind listed twice on a hand-built rule once", () => {
    const rule = findRule("SG-USER-001");
    const findings = evaluateRules(
      [{ ...rule, applies_to: ["build-file", "build-file"] }],
      { "build-file": "FROM alpine:3.20" },
    );
    expect(findings.map((finding) => finding.location)).toEqual([
      "build-file",
    ]);
  });

  it("attaches no line to whole-artifact logic findings", () => {
    const [finding] = evaluateRules(customRules, {
      "build-file": "FROM alpine",
    });
    expect(finding).toEqual({
      id: createFindingId("ROOT-USER", "build-file", undefined, undefined),
      rule_id: "ROOT-USER",
      severity: Severity.Critical,
      message: "Runs as root",
      location: "build-file",
      fix: "Add a USER instruction",
    });
  });

  it("never reports rules whose artifact kinds are absent or blank", () => {
    expect(evaluateRules(customRules, {})).toEqual([]);
    expect(evaluateRules(customRules, { "build-file": "" })).toEqual([]);
    expect(evaluateRules(customRules, { "build-file": "  \n\t" })).toEqual([]);
    expect(
      evaluateRules(customRules, { "compose-file": undefined }),
    ).toEqual([]);
  });

  it("ignores artifact kinds no rule applies to", () => {
    const artifacts = { "build-file": "FROM alpine\nENV SECRET=x" };
    const before = evaluateRules(customRules, artifacts);
    const after = evaluateRules(customRules, {
      ...artifacts,
      "helm-values": "SECRET=value\nUSER root",
    });
    expect(after).toEqual(before);
  });

  it("is deterministic", () => {
    const artifacts = {
      "build-file": "FROM python:latest\nENV API_KEY=abcdef123456\nEXPOSE 22",
      "orchestration-manifest":
        "image: web:latest\nallowPrivilegeEscalation: true",
      "compose-file": "services:\n  web:\n    privileged: true",
    };
    const first = evaluateRules(defaultRules, artifacts);
    const second = evaluateRules(defaultRules, artifacts);
    expect(second).toEqual(first);
    expect(first.map((finding) => finding.id)).toEqual(
      second.map((finding) => finding.id),
    );
  });

  it("uses the supplied fix advisory", () => {
    const findings = evaluateRules(
      customRules,
      { "build-file": "FROM alpine" },
      { fixFor: (ruleId) => `fix ${ruleId}` },
    );
    expect(findings.map((finding) => finding.fix)).toEqual(["fix ROOT-USER"]);
  });

  it("fills fixes from the built-in table for default rules", () => {
    const findings = evaluateRules(
      defaultRules,
      { "build-file": "FROM alpine:3.20\nHEALTHCHECK CMD true" },
      createFixAdvisory(defaultRules),
    );
    expect(findings.map((finding) => [finding.rule_id, finding.fix])).toEqual(
      [["SG-USER-001", "Add: RUN useradd -m appuser && USER appuser"]],
    );
  });

  it("produces stable finding ids", () => {
    const idOne = createFindingId("SG-USER-001", "build-file", 3, "USER root");
    const idTwo = createFindingId("SG-USER-001", "build-file", 3, "USER root");
    expect(idOne).toBe(idTwo);
    expect(idOne).toMatch(/^[0-9a-f]{12}$/);
  });
});

function findRule(ruleId: string): Rule {
  const rule = defaultRules.find((entry) => entry.id === ruleId);
  if (!rule) {
    throw new Error(`Missing rule: ${ruleId}`);
  }
  return rule;
}
