import { Severity } from "../scanner/types.js";
import type { Finding } from "../scanner/types.js";
import type { ScanReport } from "./types.js";

type SarifLevel = "error" | "warning" | "note";

interface SarifRule {
  readonly id: string;
  readonly name: string;
  readonly shortDescription: { readonly text: string };
  readonly help: { readonly text: string };
  readonly properties: Record<string, string>;
}

interface SarifResult {
  readonly ruleId: string;
  readonly level: SarifLevel;
  readonly message: { readonly text: string };
  readonly locations: readonly {
    readonly physicalLocation: {
      readonly artifactLocation: { readonly uri: string };
      readonly region?: {
        readonly startLine: number;
        readonly snippet?: { readonly text: string };
      };
    };
  }[];
  readonly partialFingerprints: Record<string, string>;
}

interface SarifLog {
  readonly version: "2.1.0";
  readonly $schema: string;
  readonly runs: readonly {
    readonly tool: {
      readonly driver: {
        readonly name: string;
        readonly version: string;
        readonly rules: readonly SarifRule[];
      };
    };
    readonly results: readonly SarifResult[];
    readonly properties: Record<string, string | number | boolean>;
  }[];
}

/**
 * SARIF locations point at artifact paths when the scan knows them and at
 * the artifact kind otherwise.
 */
export function renderSarifReport(report: ScanReport): string {
  const paths = new Map(
    (report.scan_metadata?.artifacts ?? []).map((artifact) => [
      artifact.kind,
      artifact.path,
    ]),
  );
  const { rules, results } = toSarif(report.issues, paths);
  const sarif: SarifLog = {
    version: "2.1.0",
    $schema: "https://json.schemastore.org/sarif-2.1.0.json",
    runs: [
      {
        tool: {
          driver: {
            name: "Shipgate",
            version: report.tool.version,
            rules,
          },
        },
        results,
        properties: {
          status: report.status,
          risk_score: report.risk_score,
          production_ready: report.compliance.production_ready,
        },
      },
    ],
  };
  return JSON.stringify(sarif, null, 2);
}

function toSarif(
  findings: readonly Finding[],
  paths: ReadonlyMap<string, string>,
): {
  readonly rules: SarifRule[];
  readonly results: SarifResult[];
} {
  const rules: SarifRule[] = [];
  const seen = new Set<string>();
  const results = findings.map((finding) => {
    if (!seen.has(finding.rule_id)) {
      seen.add(finding.rule_id);
      rules.push(buildRule(finding));
    }
    return buildResult(finding, paths.get(finding.location) ?? finding.location);
  });
  return { rules, results };
}

function buildRule(finding: Finding): SarifRule {
  return {
    id: finding.rule_id,
    name: finding.rule_id,
    shortDescription: { text: finding.message },
    help: { text: finding.fix },
    properties: { severity: finding.severity },
  };
}

function buildResult(finding: Finding, uri: string): SarifResult {
  return {
    ruleId: finding.rule_id,
    level: toSarifLevel(finding.severity),
    message: { text: finding.message },
    locations: [
      {
        physicalLocation: {
          artifactLocation: { uri },
          ...(finding.line === undefined
            ? {}
            : {
                region: {
                  startLine: finding.line,
                  ...(finding.matched === undefined
                    ? {}
                    : { snippet: { text: finding.matched } }),
                },
              }),
        },
      },
    ],
    partialFingerprints: { shipgateFindingId: finding.id },
  };
}

function toSarifLevel(severity: Severity): SarifLevel {
  switch (severity) {
    case Severity.Critical:
    case Severity.High:
      return "error";
    case Severity.Medium:
      return "warning";
    case Severity.Low:
    default:
      return "note";
  }
}
