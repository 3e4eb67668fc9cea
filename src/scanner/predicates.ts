import { evidenceAt, locateFirstLine, splitLines } from "./evidence.js";
import type { Evidence, PredicateName } from "./types.js";

export type PredicateResult =
  | { readonly triggered: false }
  | ({ readonly triggered: true } & Evidence);

export type ArtifactPredicate = (source: string) => PredicateResult;

interface UserDeclaration {
  readonly line: number;
  readonly root: boolean;
}

const NOT_TRIGGERED: PredicateResult = { triggered: false };

const DOCKERFILE_USER = /^\s*USER\s+(\S+)/i;
const COMPOSE_USER = keyDeclaration(
  "user",
  String.raw`\s*["']?([^"'\s#,}]+)`,
);
const RUN_AS_USER = keyDeclaration("runAsUser", String.raw`\s*["']?(\d+)`);
const RUN_AS_NON_ROOT = keyDeclaration(
  "runAsNonRoot",
  String.raw`\s*["']?(true|false)\b`,
  "i",
);

const HEALTH_CHECK_DECLARATIONS = [
  /^\s*HEALTHCHECK\s+(?!NONE\b)\S/i,
  keyDeclaration("healthcheck"),
  keyDeclaration("livenessProbe"),
];

const RESOURCE_LIMIT_DECLARATIONS = [
  keyDeclaration("limits"),
  keyDeclaration("mem_limit"),
  keyDeclaration("cpus"),
];

const PRIVILEGE_ESCALATION = keyDeclaration(
  "allowPrivilegeEscalation",
  String.raw`\s*["']?true\b`,
  "i",
);

const RUN_AS_NON_ROOT_ENFORCED = keyDeclaration(
  "runAsNonRoot",
  String.raw`\s*["']?true\b`,
  "i",
);

/**
 * A mapping key in block, flow or JSON form: `key:`, `{ key: ...`,
 * `, key: ...` or `"key": ...`. The key must not be the tail of a longer
 * name, so `ulimits:` is not `limits:`.
 */
function keyDeclaration(key: string, value = "", flags = ""): RegExp {
  return new RegExp(
    String.raw`(?:^|[\s{,])["']?${key}["']?\s*:${value}`,
    flags,
  );
}

export const PREDICATES: Readonly<Record<PredicateName, ArtifactPredicate>> = {
  "no-non-root-user": noNonRootUser,
  "no-health-check": (source) =>
    absenceOf(source, HEALTH_CHECK_DECLARATIONS),
  "no-resource-limits": (source) =>
    absenceOf(source, RESOURCE_LIMIT_DECLARATIONS),
  "privilege-escalation-enabled": (source) =>
    presenceOf(source, [PRIVILEGE_ESCALATION]),
  "run-as-non-root-not-enforced": (source) =>
    absenceOf(source, [RUN_AS_NON_ROOT_ENFORCED]),
};

export const PREDICATE_NAMES: readonly PredicateName[] = Object.keys(
  PREDICATES,
).filter(isPredicateName);

export function isPredicateName(value: string): value is PredicateName {
  return Object.hasOwn(PREDICATES, value);
}

/**
 * The effective user is the last declaration in the artifact; it triggers
 * when there is none or when that declaration names root.
 */
function noNonRootUser(source: string): PredicateResult {
  const lines = splitLines(source);
  let effective: UserDeclaration | undefined;
  for (let i = 0; i < lines.length; i += 1) {
    effective = parseUserDeclaration(lines[i] ?? "", i + 1) ?? effective;
  }

  if (!effective) {
    return { triggered: true };
  }
  if (effective.root) {
    return { triggered: true, ...evidenceAt(lines, effective.line) };
  }
  return NOT_TRIGGERED;
}

function parseUserDeclaration(
  line: string,
  lineNumber: number,
): UserDeclaration | undefined {
  const named =
    DOCKERFILE_USER.exec(line)?.[1] ??
    COMPOSE_USER.exec(line)?.[1] ??
    RUN_AS_USER.exec(line)?.[1];
  if (named !== undefined) {
    return { line: lineNumber, root: isRootUser(named) };
  }

  const nonRoot = RUN_AS_NON_ROOT.exec(line)?.[1];
  if (nonRoot !== undefined) {
    return { line: lineNumber, root: nonRoot.toLowerCase() === "false" };
  }
  return undefined;
}

export function isRootUser(value: string): boolean {
  const user = value.replace(/["']/g, "").split(":")[0] ?? "";
  if (/^\d+$/.test(user)) {
    return Number(user) === 0;
  }
  return user.toLowerCase() === "root";
}

function absenceOf(
  source: string,
  declarations: readonly RegExp[],
): PredicateResult {
  const found = locateFirstLine(splitLines(source), declarations);
  return found ? NOT_TRIGGERED : { triggered: true };
}

function presenceOf(
  source: string,
  declarations: readonly RegExp[],
): PredicateResult {
  const found = locateFirstLine(splitLines(source), declarations);
  return found ? { triggered: true, ...found } : NOT_TRIGGERED;
}
