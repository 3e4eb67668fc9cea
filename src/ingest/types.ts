import type { ArtifactSet } from "../scanner/types.js";

export interface ArtifactEntry {
  readonly kind: string;
  readonly absolutePath: string;
  readonly relativePath: string;
  readonly sizeBytes: number;
}

export interface DiscoveryOptions {
  readonly maxFileSizeBytes?: number;
  readonly maxDepth?: number;
}

export interface LoadedArtifacts {
  readonly artifacts: ArtifactSet;
  readonly entries: readonly ArtifactEntry[];
  /** Files of an already-filled kind, in discovery order. */
  readonly skipped: readonly ArtifactEntry[];
}
