import pino from "pino";

export type Logger = pino.Logger;

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

const LOG_LEVELS = new Set<string>(["silent", "error", "warn", "info", "debug"]);

export interface LoggingConfig {
  readonly level?: LogLevel;
  readonly destination?: number | string;
}

/**
 * Logs go to stderr by default so that stdout carries only the report.
 */
export function createLogger(config: LoggingConfig = {}): Logger {
  const level = config.level ?? "info";
  return pino(
    { name: "shipgate", level },
    pino.destination(config.destination ?? 2),
  );
}

export function resolveLogLevel(
  flags: { readonly verbose?: boolean; readonly quiet?: boolean },
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  const fromEnv = env["SHIPGATE_LOG_LEVEL"]?.toLowerCase();
  if (fromEnv && isLogLevel(fromEnv)) {
    return fromEnv;
  }
  if (flags.quiet) {
    return "silent";
  }
  return flags.verbose ? "debug" : "info";
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}
