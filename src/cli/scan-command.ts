import fs from "node:fs/promises";
import { GateStatus } from "../gating/types.js";
import { discoverArtifacts, readArtifacts } from "../ingest/artifact-loader.js";
import type { ArtifactEntry } from "../ingest/types.js";
import type { Logger } from "../logging/logger.js";
import { buildJsonReport, renderJsonReport } from "../report/json-reporter.js";
import { renderMarkdownReport } from "../report/markdown-reporter.js";
import { renderSarifReport } from "../report/sarif-reporter.js";
import type { ScanReport } from "../report/types.js";
import { scanArtifacts } from "../scan.js";
import { loadRules } from "../scanner/rule-loader.js";
import type { ArtifactSet } from "../scanner/types.js";
import { resolveRulesFile } from "./runtime-paths.js";

export type ReportFormat = "json" | "md" | "sarif";

export type FailOn = "blocked" | "review" | "never";

export interface ScanOptions {
  /** Directory to discover artifacts in. */
  readonly target?: string;
  /** Explicit artifact files keyed by kind; these win over discovered ones. */
  readonly artifactPaths?: Readonly<Record<string, string>>;
  readonly rulesFile?: string;
  readonly format: ReportFormat;
  readonly out?: string;
  readonly failOn?: FailOn;
  readonly maxFindings?: number;
  readonly showEvidence?: boolean;
}

export interface ScanCommandResult {
  readonly report: ScanReport;
  readonly output: string;
  readonly gatePassed: boolean;
}

export async function runScanCommand(
  options: ScanOptions,
  toolVersion: string,
  logger: Logger,
): Promise<ScanCommandResult> {
  const startedAt = new Date();
  const rulesFile = await resolveRulesFile(options.rulesFile);
  const ruleSet = await loadRules({ kind: "file", path: rulesFile });
  logger.debug(
    { rules: ruleSet.rules.length, origin: ruleSet.origin },
    "rules loaded",
  );

  const { artifacts, entries } = await collectArtifacts(options, logger);
  if (entries.length === 0) {
    logger.warn("no artifacts found to scan");
  }

  const result = scanArtifacts(ruleSet, artifacts);
  const completedAt = new Date();
  logger.info(
    {
      status: result.status,
      risk_score: result.risk_score,
      issues: result.total_issues,
    },
    "scan completed",
  );

  const report = buildJsonReport({
    toolVersion,
    result,
    scanMetadata: {
      started_at: startedAt.toISOString(),
      completed_at: completedAt.toISOString(),
      duration_ms: completedAt.getTime() - startedAt.getTime(),
      rules_loaded: ruleSet.rules.length,
      rules_origin: ruleSet.origin,
      artifacts: entries.map((entry) => ({
        kind: entry.kind,
        path: entry.relativePath,
      })),
    },
  });

  const output = buildOutput(report, options);
  if (options.out) {
    await fs.writeFile(options.out, output, "utf8");
  }

  return {
    report,
    output,
    gatePassed: gatePasses(result.status, options.failOn ?? "blocked"),
  };
}

export function gatePasses(status: GateStatus, failOn: FailOn): boolean {
  switch (failOn) {
    case "never":
      return true;
    case "review":
      return status === GateStatus.Approved;
    case "blocked":
    default:
      return status !== GateStatus.Blocked;
  }
}

async function collectArtifacts(
  options: ScanOptions,
  logger: Logger,
): Promise<{ artifacts: ArtifactSet; entries: ArtifactEntry[] }> {
  const explicit = await readArtifacts(options.artifactPaths ?? {});
  if (!options.target) {
    return { artifacts: explicit.artifacts, entries: [...explicit.entries] };
  }

  const discovered = await discoverArtifacts(options.target);
  for (const entry of discovered.skipped) {
    logger.warn(
      { kind: entry.kind, path: entry.relativePath },
      "additional artifact of an already-discovered kind skipped",
    );
  }

  const explicitKinds = new Set(explicit.entries.map((entry) => entry.kind));
  const entries = [
    ...discovered.entries.filter((entry) => !explicitKinds.has(entry.kind)),
    ...explicit.entries,
  ];
  for (const entry of entries) {
    logger.debug({ kind: entry.kind, path: entry.relativePath }, "artifact");
  }
  return {
    artifacts: { ...discovered.artifacts, ...explicit.artifacts },
    entries,
  };
}

function buildOutput(report: ScanReport, options: ScanOptions): string {
  if (options.format === "json") {
    return renderJsonReport(report);
  }
  if (options.format === "sarif") {
    return renderSarifReport(report);
  }
  return renderMarkdownReport(report, {
    maxFindings: options.maxFindings,
    showEvidence: options.showEvidence,
  });
}
