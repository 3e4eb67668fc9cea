import type { Evidence } from "./types.js";

export function splitLines(source: string): string[] {
  return source.split(/\r?\n/);
}

/**
 * Finds the first line on which any of the patterns matches. Lines are
 * visited in document order and, for each line, patterns in declared order.
 */
export function locateFirstLine(
  lines: readonly string[],
  patterns: readonly RegExp[],
): Required<Evidence> | undefined {
  for (let i = 0; i < lines.length; i += 1) {
    const line = lines[i] ?? "";
    if (patterns.some((pattern) => pattern.test(line))) {
      return { line: i + 1, matched: line.trim() };
    }
  }
  return undefined;
}

export function evidenceAt(
  lines: readonly string[],
  lineNumber: number,
): Required<Evidence> {
  return { line: lineNumber, matched: (lines[lineNumber - 1] ?? "").trim() };
}
