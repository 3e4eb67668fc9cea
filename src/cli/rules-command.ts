import type { Logger } from "../logging/logger.js";
import { loadRules } from "../scanner/rule-loader.js";
import { CheckKind } from "../scanner/types.js";
import { resolveRulesFile } from "./runtime-paths.js";

export interface RulesCheckOptions {
  readonly rulesFile?: string;
}

export async function runRulesCheck(
  options: RulesCheckOptions,
  logger: Logger,
): Promise<string> {
  const rulesFile = await resolveRulesFile(options.rulesFile);
  const ruleSet = await loadRules({ kind: "file", path: rulesFile });
  const pattern = ruleSet.rules.filter(
    (rule) => rule.check === CheckKind.Pattern,
  ).length;
  const logic = ruleSet.rules.length - pattern;
  logger.debug({ origin: ruleSet.origin, pattern, logic }, "rules validated");

  const counts = `pattern: ${pattern}, logic: ${logic}`;
  return `${ruleSet.rules.length} rules OK in ${ruleSet.origin} (${counts})`;
}
