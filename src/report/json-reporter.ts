import type { ReportInput, ScanReport } from "./types.js";

export function buildJsonReport(input: ReportInput): ScanReport {
  return {
    tool: { name: "shipgate", version: input.toolVersion },
    ...input.result,
    ...(input.scanMetadata ? { scan_metadata: input.scanMetadata } : {}),
  };
}

export function renderJsonReport(report: ScanReport): string {
  return JSON.stringify(report, null, 2);
}
