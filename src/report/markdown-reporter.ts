import type { ScanReport } from "./types.js";
import {
  formatLocation,
  renderAsciiBox,
  renderAsciiTable,
  sortBySeverity,
  truncateText,
} from "./report-utils.js";

export interface MarkdownRenderOptions {
  readonly maxFindings?: number;
  readonly showEvidence?: boolean;
  readonly snippetWidth?: number;
}

export function renderMarkdownReport(
  report: ScanReport,
  options: MarkdownRenderOptions = {},
): string {
  const snippetWidth = options.snippetWidth ?? 80;
  const lines: string[] = [];

  lines.push(renderHeaderBlock(report));
  lines.push("");
  lines.push(
    renderAsciiTable(
      [
        ["CRITICAL", String(report.counts.critical)],
        ["HIGH", String(report.counts.high)],
        ["MEDIUM", String(report.counts.medium)],
        ["LOW", String(report.counts.low)],
      ],
      ["Severity", "Issues"],
    ),
  );

  if (report.compliance.missing_requirements.length > 0) {
    lines.push("");
    lines.push("### Missing Requirements");
    lines.push("");
    for (const requirement of report.compliance.missing_requirements) {
      lines.push(`- ${requirement}`);
    }
  }

  lines.push("");
  lines.push("### Findings");
  lines.push("");
  const sorted = sortBySeverity(report.issues);
  const findings = applyFindingLimit(sorted, options.maxFindings);
  if (findings.length === 0) {
    lines.push("No findings detected.");
  } else {
    lines.push(
      renderAsciiTable(
        findings.map((finding) => [
          finding.severity,
          finding.rule_id,
          formatLocation(finding),
          truncateText(finding.message, snippetWidth),
        ]),
        ["Severity", "Rule", "Location", "Message"],
      ),
    );
    if (sorted.length > findings.length) {
      lines.push("");
      lines.push(
        `Showing ${findings.length} of ${sorted.length} findings. Use --max-findings to adjust.`,
      );
    }

    lines.push("");
    lines.push("### Fixes");
    lines.push("");
    for (const finding of findings) {
      lines.push(`- ${finding.rule_id}: ${finding.fix}`);
      if (options.showEvidence && finding.matched !== undefined) {
        lines.push("```text");
        lines.push(truncateText(finding.matched, snippetWidth));
        lines.push("```");
      }
    }
  }

  lines.push("");
  lines.push("### Recommendations");
  lines.push("");
  for (const recommendation of report.recommendations) {
    lines.push(`- ${recommendation}`);
  }

  return lines.join("\n");
}

function renderHeaderBlock(report: ScanReport): string {
  return renderAsciiBox([
    "Shipgate Scan Report",
    `Status: ${report.status}`,
    `Risk Score: ${report.risk_score}/100`,
    `Production Ready: ${report.compliance.production_ready ? "yes" : "no"}`,
  ]);
}

function applyFindingLimit<T>(items: readonly T[], limit?: number): T[] {
  if (!limit || limit <= 0) {
    return [...items];
  }
  return items.slice(0, limit);
}
