export class RuleLoadError extends Error {
  readonly origin: string;
  readonly problems: readonly string[];

  constructor(origin: string, problems: readonly string[], cause?: unknown) {
    super(`Invalid rule document ${origin}: ${problems.join("; ")}`, {
      cause,
    });
    this.name = "RuleLoadError";
    this.origin = origin;
    this.problems = problems;
  }
}

export class ArtifactLoadError extends Error {
  readonly path: string;

  constructor(filePath: string, message: string, cause?: unknown) {
    super(`${message}: ${filePath}`, { cause });
    this.name = "ArtifactLoadError";
    this.path = filePath;
  }
}
