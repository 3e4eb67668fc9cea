export { buildJsonReport, renderJsonReport } from "./json-reporter.js";
export { renderMarkdownReport } from "./markdown-reporter.js";
export type { MarkdownRenderOptions } from "./markdown-reporter.js";
export { renderSarifReport } from "./sarif-reporter.js";
export { formatLocation, severityRank, sortBySeverity } from "./report-utils.js";
export type {
  ReportInput,
  ScanMetadata,
  ScanReport,
  ScannedArtifact,
  ToolInfo,
} from "./types.js";
