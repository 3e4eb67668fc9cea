import path from "node:path";
import { ArtifactKind } from "../scanner/types.js";

const BUILD_FILE_MATCHERS = [
  /^dockerfile$/i,
  /^dockerfile\.[\w.-]+$/i,
  /\.dockerfile$/i,
  /^containerfile$/i,
];
const COMPOSE_FILE_MATCHERS = [/^(docker-)?compose(\.[\w-]+)?\.ya?ml$/i];
const MANIFEST_DIRECTORIES = /(^|\/)(k8s|kubernetes|manifests)\//i;
const YAML_EXTENSIONS = new Set([".yml", ".yaml"]);

/**
 * Classify by path alone. Returns null for YAML files that need a look at
 * their content, and for everything else.
 */
export function classifyArtifactPath(relativePath: string): ArtifactKind | null {
  const normalized = relativePath.split(path.sep).join(path.posix.sep);
  const base = path.posix.basename(normalized);

  if (BUILD_FILE_MATCHERS.some((pattern) => pattern.test(base))) {
    return ArtifactKind.BuildFile;
  }
  if (COMPOSE_FILE_MATCHERS.some((pattern) => pattern.test(base))) {
    return ArtifactKind.ComposeFile;
  }
  if (isYamlPath(normalized) && MANIFEST_DIRECTORIES.test(normalized)) {
    return ArtifactKind.OrchestrationManifest;
  }
  return null;
}

export function isYamlPath(relativePath: string): boolean {
  return YAML_EXTENSIONS.has(path.posix.extname(relativePath.toLowerCase()));
}

export function looksLikeManifest(source: string): boolean {
  return /^apiVersion:\s*\S+/m.test(source) && /^kind:\s*\S+/m.test(source);
}
