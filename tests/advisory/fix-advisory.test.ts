import { describe, expect, it } from "vitest";
import {
  GENERIC_FIX,
  createFixAdvisory,
  fixFor,
} from "../../src/advisory/fix-advisory.js";
import { parseRuleDocument } from "../../src/scanner/rule-loader.js";

describe("fixFor", () => {
  it("returns the built-in fix for known rules", () => {
    expect(fixFor("SG-PRIV-001")).toBe("Set: allowPrivilegeEscalation: false");
    expect(fixFor("SG-CONTEXT-001")).toBe(
      "Add: runAsNonRoot: true in securityContext",
    );
  });

  it("falls back to the generic fix", () => {
    expect(fixFor("CUSTOM-001")).toBe(GENERIC_FIX);
    expect(fixFor("toString")).toBe(GENERIC_FIX);
  });
});

describe("createFixAdvisory", () => {
  const { rules } = parseRuleDocument(
    [
      "rules:",
      "  - id: SG-USER-001",
      "    severity: CRITICAL",
      "    description: No user",
      "    check: logic",
      "    predicate: no-non-root-user",
      "    applies_to: build-file",
      "    remediation: '  Add USER app  '",
      "  - id: CUSTOM-002",
      "    severity: LOW",
      "    description: Custom",
      "    check: pattern",
      "    patterns: [foo]",
      "    applies_to: build-file",
      "    remediation: '   '",
    ].join("\n"),
    "advisory.yaml",
  );
  const advisory = createFixAdvisory(rules);

  it("prefers the trimmed remediation declared on the rule", () => {
    expect(advisory.fixFor("SG-USER-001")).toBe("Add USER app");
  });

  it("ignores blank remediation text", () => {
    expect(advisory.fixFor("CUSTOM-002")).toBe(GENERIC_FIX);
  });

  it("uses the built-in table for rules without remediation", () => {
    expect(advisory.fixFor("SG-FS-001")).toBe(
      "Set: readOnlyRootFilesystem: true when possible",
    );
  });
});
