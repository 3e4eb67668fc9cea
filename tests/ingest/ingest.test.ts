import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  classifyArtifactPath,
  isYamlPath,
  looksLikeManifest,
} from "../../src/ingest/artifact-classifier.js";
import {
  discoverArtifacts,
  readArtifacts,
} from "../../src/ingest/artifact-loader.js";
import { ArtifactLoadError } from "../../src/scanner/errors.js";

describe("classifyArtifactPath", () => {
  it.each([
    ["Dockerfile", "build-file"],
    ["services/api/Dockerfile.prod", "build-file"],
    ["docker/app.dockerfile", "build-file"],
    ["Containerfile", "build-file"],
    ["docker-compose.yml", "compose-file"],
    ["compose.prod.yaml", "compose-file"],
    ["k8s/deployment.yaml", "orchestration-manifest"],
    ["deploy/manifests/service.yml", "orchestration-manifest"],
    ["deploy/app.yaml", null],
    ["README.md", null],
    ["k8s/notes.txt", null],
  ])("classifies %s", (relativePath, expected) => {
    expect(classifyArtifactPath(relativePath)).toBe(expected);
  });

  it("recognises YAML extensions case-insensitively", () => {
    expect(isYamlPath("deploy/APP.YML")).toBe(true);
    expect(isYamlPath("deploy/app.json")).toBe(false);
  });

  it("detects manifests by apiVersion and kind", () => {
    expect(looksLikeManifest("apiVersion: v1\nkind: Pod\n")).toBe(true);
    expect(looksLikeManifest("apiVersion: v1\nmetadata: {}\n")).toBe(false);
  });
});

describe("artifact loading", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "shipgate-ingest-"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  async function writeFile(relativePath: string, content: string) {
    const target = path.join(root, relativePath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, "utf8");
  }

  it("discovers one artifact per kind, shallowest first", async () => {
    await writeFile("Dockerfile", "FROM alpine:3.20\nUSER app\n");
    await writeFile("services/api/Dockerfile", "FROM node:20\n");
    await writeFile("docker-compose.yml", "services:\n  web:\n    image: web\n");
    await writeFile(
      "deploy/app.yaml",
      "apiVersion: apps/v1\nkind: Deployment\n",
    );
    await writeFile("node_modules/pkg/Dockerfile", "FROM scratch\n");
    await writeFile("notes.yaml", "owner: platform\n");

    const loaded = await discoverArtifacts(root);

    expect(Object.keys(loaded.artifacts).sort()).toEqual([
      "build-file",
      "compose-file",
      "orchestration-manifest",
    ]);
    expect(loaded.artifacts["build-file"]).toBe("FROM alpine:3.20\nUSER app\n");
    expect(
      loaded.entries.map((entry) => [entry.kind, entry.relativePath]).sort(),
    ).toEqual([
      ["build-file", "Dockerfile"],
      ["compose-file", "docker-compose.yml"],
      ["orchestration-manifest", "deploy/app.yaml"],
    ]);
    expect(loaded.skipped.map((entry) => entry.relativePath)).toEqual([
      "services/api/Dockerfile",
    ]);
  });

  it("respects the depth limit", async () => {
    await writeFile("infra/docker/Dockerfile", "FROM alpine:3.20\n");

    const shallow = await discoverArtifacts(root, { maxDepth: 1 });
    expect(shallow.entries).toEqual([]);

    const deep = await discoverArtifacts(root, { maxDepth: 2 });
    expect(deep.entries.map((entry) => entry.relativePath)).toEqual([
      "infra/docker/Dockerfile",
    ]);
  });

  it("skips files above the size limit", async () => {
    await writeFile("Dockerfile", "FROM alpine:3.20\n");
    const loaded = await discoverArtifacts(root, { maxFileSizeBytes: 5 });
    expect(loaded.artifacts).toEqual({});
  });

  it("rejects a missing target", async () => {
    const missing = path.join(root, "missing");
    await expect(discoverArtifacts(missing)).rejects.toThrow(
      `Target path does not exist: ${missing}`,
    );
  });

  it("rejects a file as the target", async () => {
    await writeFile("Dockerfile", "FROM alpine:3.20\n");
    await expect(
      discoverArtifacts(path.join(root, "Dockerfile")),
    ).rejects.toBeInstanceOf(ArtifactLoadError);
  });

  it("reads explicitly named artifacts", async () => {
    await writeFile("build/Containerfile", "FROM alpine:3.20\n");
    const filePath = path.join(root, "build", "Containerfile");

    const loaded = await readArtifacts({ "build-file": filePath });

    expect(loaded.artifacts).toEqual({ "build-file": "FROM alpine:3.20\n" });
    expect(loaded.entries).toEqual([
      {
        kind: "build-file",
        absolutePath: filePath,
        relativePath: filePath,
        sizeBytes: 17,
      },
    ]);
  });

  it("fails on an unreadable artifact", async () => {
    const filePath = path.join(root, "nope", "Dockerfile");
    await expect(readArtifacts({ "build-file": filePath })).rejects.toThrow(
      `Unable to read artifact: ${filePath}`,
    );
  });
});
