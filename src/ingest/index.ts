export { discoverArtifacts, readArtifacts } from "./artifact-loader.js";
export {
  classifyArtifactPath,
  isYamlPath,
  looksLikeManifest,
} from "./artifact-classifier.js";
export type { ArtifactEntry, DiscoveryOptions, LoadedArtifacts } from "./types.js";
