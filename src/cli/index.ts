#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import {
  createLogger,
  resolveLogLevel,
  type Logger,
} from "../logging/logger.js";
import { ArtifactLoadError, RuleLoadError } from "../scanner/errors.js";
import { ArtifactKind } from "../scanner/types.js";
import { runRulesCheck } from "./rules-command.js";
import {
  runScanCommand,
  type FailOn,
  type ReportFormat,
} from "./scan-command.js";
import { loadVersion } from "./runtime-paths.js";

const EXIT_CONFIG_ERROR = 1;
const EXIT_GATE_FAILED = 2;

interface ScanCliOptions {
  readonly buildFile?: string;
  readonly composeFile?: string;
  readonly manifest?: string;
  readonly artifact: Record<string, string>;
  readonly rules?: string;
  readonly format: string;
  readonly out?: string;
  readonly failOn: string;
  readonly maxFindings?: number;
  readonly showEvidence?: boolean;
}

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("shipgate")
  .version(toolVersion)
  .option("--verbose", "Verbose output")
  .option("--quiet", "Suppress non-essential output");

program
  .command("scan")
  .argument("[dir]", "Directory to discover artifacts in")
  .option("--build-file <path>", "Container build file (Dockerfile)")
  .option("--compose-file <path>", "Compose file")
  .option("--manifest <path>", "Orchestration manifest")
  .option(
    "--artifact <kind=path>",
    "Artifact of any kind (repeatable)",
    collectArtifact,
    {},
  )
  .option("--rules <path>", "Rule document")
  .option("--format <format>", "Output format (json|md|sarif)", "md")
  .option("--out <file>", "Write report to file")
  .option("--fail-on <status>", "Gate on blocked|review|never", "blocked")
  .option(
    "--max-findings <number>",
    "Limit findings in output",
    parsePositiveInteger,
  )
  .option("--show-evidence", "Include matched lines")
  .action(async (dir: string | undefined, options: ScanCliOptions) => {
    const logger = createCliLogger();
    try {
      const artifactPaths: Record<string, string> = { ...options.artifact };
      if (options.buildFile) {
        artifactPaths[ArtifactKind.BuildFile] = options.buildFile;
      }
      if (options.composeFile) {
        artifactPaths[ArtifactKind.ComposeFile] = options.composeFile;
      }
      if (options.manifest) {
        artifactPaths[ArtifactKind.OrchestrationManifest] = options.manifest;
      }
      const hasExplicit = Object.keys(artifactPaths).length > 0;

      const result = await runScanCommand(
        {
          target: dir ?? (hasExplicit ? undefined : "."),
          artifactPaths,
          rulesFile: options.rules,
          format: parseFormat(options.format),
          out: options.out,
          failOn: parseFailOn(options.failOn),
          maxFindings: options.maxFindings,
          showEvidence: Boolean(options.showEvidence),
        },
        toolVersion,
        logger,
      );

      if (!options.out) {
        await writeStdout(result.output + "\n");
      }
      if (!result.gatePassed) {
        process.exitCode = EXIT_GATE_FAILED;
      }
    } catch (error) {
      await reportError(error, logger);
      process.exitCode = EXIT_CONFIG_ERROR;
    }
  });

const rulesCommand = program.command("rules");
rulesCommand
  .command("check")
  .argument("[path]", "Rule document (defaults to the bundled rules)")
  .action(async (rulesFile: string | undefined) => {
    const logger = createCliLogger();
    try {
      const summary = await runRulesCheck({ rulesFile }, logger);
      await writeStdout(summary + "\n");
    } catch (error) {
      await reportError(error, logger);
      process.exitCode = EXIT_CONFIG_ERROR;
    }
  });

function createCliLogger(): Logger {
  const flags = program.opts<{ verbose?: boolean; quiet?: boolean }>();
  return createLogger({ level: resolveLogLevel(flags) });
}

function collectArtifact(
  value: string,
  previous: Record<string, string>,
): Record<string, string> {
  const separator = value.indexOf("=");
  if (separator <= 0 || separator === value.length - 1) {
    throw new InvalidArgumentError(`Expected <kind=path>, got: ${value}`);
  }
  return {
    ...previous,
    [value.slice(0, separator)]: value.slice(separator + 1),
  };
}

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(
      `Expected a positive integer, got: ${value}`,
    );
  }
  return parsed;
}

function parseFormat(value: string): ReportFormat {
  if (value === "json" || value === "md" || value === "sarif") {
    return value;
  }
  throw new Error(`Unsupported format: ${value}`);
}

function parseFailOn(value: string): FailOn {
  if (value === "blocked" || value === "review" || value === "never") {
    return value;
  }
  throw new Error(`Unsupported --fail-on value: ${value}`);
}

async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

async function reportError(error: unknown, logger: Logger): Promise<void> {
  if (error instanceof RuleLoadError) {
    logger.error(
      { origin: error.origin, problems: error.problems },
      "rule load failed",
    );
  } else if (error instanceof ArtifactLoadError) {
    logger.error({ path: error.path }, "artifact load failed");
  }
  const message = error instanceof Error ? error.message : String(error);
  const prefix =
    error instanceof RuleLoadError ? "Rule document error: " : "Error: ";
  await new Promise<void>((resolve) => {
    process.stderr.write(prefix + message + "\n", () => resolve());
  });
}

await program.parseAsync(process.argv);
