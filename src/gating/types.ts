import type { Finding } from "../scanner/types.js";
import type { SeverityCounts } from "../scoring/types.js";

export const enum GateStatus {
  Blocked = "BLOCKED",
  ReviewRequired = "REVIEW_REQUIRED",
  Approved = "APPROVED",
}

export interface ProductionRequirement {
  readonly name: string;
  readonly rule_id: string;
}

export interface Recommendation {
  readonly rule_id: string;
  readonly text: string;
}

export interface Compliance {
  readonly production_ready: boolean;
  readonly missing_requirements: readonly string[];
}

export interface ScanResult {
  readonly status: GateStatus;
  readonly total_issues: number;
  readonly counts: Readonly<SeverityCounts>;
  readonly risk_score: number;
  readonly issues: readonly Finding[];
  readonly compliance: Compliance;
  readonly recommendations: readonly string[];
}
