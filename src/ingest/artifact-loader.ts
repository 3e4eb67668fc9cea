import fs from "node:fs/promises";
import path from "node:path";
import { ArtifactLoadError } from "../scanner/errors.js";
import { ArtifactKind } from "../scanner/types.js";
import {
  classifyArtifactPath,
  isYamlPath,
  looksLikeManifest,
} from "./artifact-classifier.js";
import type {
  ArtifactEntry,
  DiscoveryOptions,
  LoadedArtifacts,
} from "./types.js";

const DEFAULT_MAX_FILE_SIZE_BYTES = 1_000_000;
const DEFAULT_MAX_DEPTH = 4;
const IGNORED_DIRECTORIES = new Set([".git", "node_modules", "dist"]);

/**
 * Read explicitly named artifact files, keyed by artifact kind.
 */
export async function readArtifacts(
  paths: Readonly<Record<string, string>>,
): Promise<LoadedArtifacts> {
  const artifacts: Record<string, string> = {};
  const entries: ArtifactEntry[] = [];

  for (const [kind, filePath] of Object.entries(paths)) {
    const absolutePath = path.resolve(filePath);
    const source = await readText(absolutePath);
    artifacts[kind] = source;
    entries.push({
      kind,
      absolutePath,
      relativePath: filePath,
      sizeBytes: Buffer.byteLength(source, "utf8"),
    });
  }

  return { artifacts, entries, skipped: [] };
}

/**
 * Walk a directory and pick one file per artifact kind. Shallower paths win;
 * later candidates of a kind already filled are reported as skipped.
 */
export async function discoverArtifacts(
  rootPath: string,
  options: DiscoveryOptions = {},
): Promise<LoadedArtifacts> {
  const resolvedRoot = path.resolve(rootPath);
  let stats: Awaited<ReturnType<typeof fs.stat>>;
  try {
    stats = await fs.stat(resolvedRoot);
  } catch (error) {
    throw new ArtifactLoadError(
      resolvedRoot,
      "Target path does not exist",
      error,
    );
  }
  if (!stats.isDirectory()) {
    throw new ArtifactLoadError(
      resolvedRoot,
      "Target path must be a directory",
    );
  }

  const candidates: ArtifactEntry[] = [];
  await walkDirectory(resolvedRoot, resolvedRoot, 0, candidates, {
    maxFileSizeBytes: options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE_BYTES,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
  });
  candidates.sort(byDepthThenPath);

  const artifacts: Record<string, string> = {};
  const entries: ArtifactEntry[] = [];
  const skipped: ArtifactEntry[] = [];
  for (const candidate of candidates) {
    if (Object.hasOwn(artifacts, candidate.kind)) {
      skipped.push(candidate);
      continue;
    }
    artifacts[candidate.kind] = await readText(candidate.absolutePath);
    entries.push(candidate);
  }

  return { artifacts, entries, skipped };
}

interface WalkContext {
  readonly maxFileSizeBytes: number;
  readonly maxDepth: number;
}

async function walkDirectory(
  rootPath: string,
  currentPath: string,
  depth: number,
  candidates: ArtifactEntry[],
  context: WalkContext,
): Promise<void> {
  let dirEntries = await fs.readdir(currentPath, { withFileTypes: true });
  dirEntries = dirEntries.sort((a, b) => a.name.localeCompare(b.name));

  for (const dirent of dirEntries) {
    const absolutePath = path.join(currentPath, dirent.name);
    if (dirent.isDirectory()) {
      if (depth < context.maxDepth && !IGNORED_DIRECTORIES.has(dirent.name)) {
        await walkDirectory(
          rootPath,
          absolutePath,
          depth + 1,
          candidates,
          context,
        );
      }
      continue;
    }
    if (!dirent.isFile()) {
      continue;
    }

    const { size } = await fs.stat(absolutePath);
    if (size > context.maxFileSizeBytes) {
      continue;
    }
    const relativePath = toRelativePosix(rootPath, absolutePath);
    const kind = await resolveKind(relativePath, absolutePath);
    if (kind) {
      candidates.push({ kind, absolutePath, relativePath, sizeBytes: size });
    }
  }
}

async function resolveKind(
  relativePath: string,
  absolutePath: string,
): Promise<ArtifactKind | null> {
  const byPath = classifyArtifactPath(relativePath);
  if (byPath || !isYamlPath(relativePath)) {
    return byPath;
  }
  const source = await readText(absolutePath);
  return looksLikeManifest(source) ? ArtifactKind.OrchestrationManifest : null;
}

async function readText(absolutePath: string): Promise<string> {
  try {
    return await fs.readFile(absolutePath, "utf8");
  } catch (error) {
    throw new ArtifactLoadError(absolutePath, "Unable to read artifact", error);
  }
}

function byDepthThenPath(a: ArtifactEntry, b: ArtifactEntry): number {
  const depth = depthOf(a.relativePath) - depthOf(b.relativePath);
  return depth !== 0 ? depth : a.relativePath.localeCompare(b.relativePath);
}

function depthOf(relativePath: string): number {
  return relativePath.split("/").length;
}

function toRelativePosix(rootPath: string, absolutePath: string): string {
  const relative = path.relative(rootPath, absolutePath);
  return relative.split(path.sep).join(path.posix.sep);
}
