export interface SeverityCounts {
  critical: number;
  high: number;
  medium: number;
  low: number;
}

export interface ScoreResult {
  readonly total: number;
  readonly counts: SeverityCounts;
  readonly hasCritical: boolean;
}
