import type { ScanResult } from "../gating/types.js";

export interface ToolInfo {
  readonly name: "shipgate";
  readonly version: string;
}

export interface ScannedArtifact {
  readonly kind: string;
  readonly path: string;
}

export interface ScanMetadata {
  readonly started_at?: string;
  readonly completed_at?: string;
  readonly duration_ms?: number;
  readonly rules_loaded?: number;
  readonly rules_origin?: string;
  readonly artifacts?: readonly ScannedArtifact[];
}

/** The scan result with tool and run details alongside it. */
export interface ScanReport extends ScanResult {
  readonly tool: ToolInfo;
  readonly scan_metadata?: ScanMetadata;
}

export interface ReportInput {
  readonly toolVersion: string;
  readonly result: ScanResult;
  readonly scanMetadata?: ScanMetadata;
}
