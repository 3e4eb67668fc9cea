import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

export const DEFAULT_RULES_FILE = "default-rules.yaml";

const MAX_PARENT_LEVELS = 4;

/**
 * An explicit path always wins. Otherwise the rule document bundled next to
 * package.json is used, then ./rules in the working directory.
 */
export async function resolveRulesFile(
  customRulesFile?: string,
): Promise<string> {
  if (customRulesFile) {
    return path.resolve(customRulesFile);
  }

  const packageRoot = await findPackageRoot();
  if (packageRoot) {
    const bundled = path.join(packageRoot, "rules", DEFAULT_RULES_FILE);
    if (await existsFile(bundled)) {
      return bundled;
    }
  }

  const fromCwd = path.resolve(process.cwd(), "rules", DEFAULT_RULES_FILE);
  if (await existsFile(fromCwd)) {
    return fromCwd;
  }

  throw new Error(
    "Unable to find the built-in rule document. " +
      "Pass --rules <path> to use a custom rule document.",
  );
}

export async function loadVersion(): Promise<string> {
  const packageRoot = await findPackageRoot();
  if (!packageRoot) {
    return "0.0.0";
  }
  const raw = await fs.readFile(
    path.join(packageRoot, "package.json"),
    "utf8",
  );
  const json: unknown = JSON.parse(raw);
  if (
    typeof json === "object" &&
    json !== null &&
    "version" in json &&
    typeof json.version === "string"
  ) {
    return json.version;
  }
  return "0.0.0";
}

async function findPackageRoot(): Promise<string | null> {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (let level = 0; level <= MAX_PARENT_LEVELS; level += 1) {
    if (await existsFile(path.join(dir, "package.json"))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }
  return null;
}

async function existsFile(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isFile();
  } catch {
    return false;
  }
}
