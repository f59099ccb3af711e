/**
 * Structured reading of gcc/clang diagnostic lines, used for verbose output
 * and the debug log.
 */

import type { Diagnostic, DiagnosticSeverity } from "./types.js";

/** Lines longer than this are skipped (data dumps, long macro expansions) */
const MAX_LINE_LENGTH = 2000;

// biome-ignore lint/suspicious/noControlCharactersInRegex: intentional ANSI escape sequence matching
const ansiEscapePattern = /\x1b\[[0-9;:?]*[A-Za-z]/g;

/**
 * Example: <source>:3:5: warning: unused variable 'x' [-Wunused-variable]
 */
const diagnosticPattern =
  /^([^:\n]+):(\d+)(?::(\d+))?:\s+(fatal error|error|warning|note):\s+(.*)$/;

export const stripAnsi = (s: string): string =>
  s.replace(ansiEscapePattern, "");

const isSeverity = (value: string): value is DiagnosticSeverity =>
  value === "fatal error" ||
  value === "error" ||
  value === "warning" ||
  value === "note";

export const parseDiagnosticLine = (line: string): Diagnostic | undefined => {
  if (line.length > MAX_LINE_LENGTH) {
    return undefined;
  }

  const match = diagnosticPattern.exec(stripAnsi(line).trimEnd());
  if (!match) {
    return undefined;
  }

  const [, file = "", lineNumber = "", column, severity = "", message = ""] =
    match;
  if (!isSeverity(severity)) {
    return undefined;
  }

  return {
    file,
    line: Number.parseInt(lineNumber, 10),
    ...(column === undefined ? {} : { column: Number.parseInt(column, 10) }),
    severity,
    message,
  };
};

export const parseDiagnostics = (text: string): Diagnostic[] =>
  text.split("\n").flatMap((line) => {
    const diagnostic = parseDiagnosticLine(line);
    return diagnostic ? [diagnostic] : [];
  });

/**
 * One-line rendering, e.g. `<source>:3:5 warning unused variable 'x'`.
 */
export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const location =
    diagnostic.column === undefined
      ? `${diagnostic.file}:${diagnostic.line}`
      : `${diagnostic.file}:${diagnostic.line}:${diagnostic.column}`;
  return `${location} ${diagnostic.severity} ${diagnostic.message}`;
};
