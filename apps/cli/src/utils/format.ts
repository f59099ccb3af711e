import { formatDiagnostic, parseDiagnostics } from "@macrobench/diagnostics";
import type { TestResult } from "../runner/types.js";
import { formatErrorForTUI } from "./error.js";

/**
 * Formats a duration in seconds to a human-readable string.
 *
 * Examples:
 * - 45 -> "45s"
 * - 90 -> "1m 30s"
 * - 3661 -> "61m 1s" (no hours)
 */
export const formatDuration = (seconds: number): string => {
  if (seconds < 60) {
    return `${seconds}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  return `${minutes}m ${remainingSeconds}s`;
};

/**
 * Formats a duration in milliseconds, with one decimal under a minute.
 */
export const formatDurationMs = (ms: number): string => {
  const seconds = ms / 1000;

  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);

  return `${minutes}m ${remainingSeconds}s`;
};

/**
 * "impl_native on GCC 13.2"
 */
export const formatJobLabel = (result: TestResult): string =>
  `${result.testName} on ${result.compiler.displayName}`;

/**
 * One line for a failed job, e.g. "✗ impl_native on GCC 13.2 (stage: runtime)".
 */
export const formatFailureLine = (result: TestResult): string =>
  `✗ ${formatJobLabel(result)} (stage: ${result.stage})`;

/**
 * The first line of the stderr captured for a failed job's stage, if any.
 */
export const failureReason = (result: TestResult): string | undefined => {
  const text =
    result.stage === "runtime"
      ? result.stderr.run
      : result.stage === "compilation"
        ? result.stderr.compile
        : result.stderr.preprocess;
  if (result.stage !== "runtime") {
    const firstError = parseDiagnostics(text).find(
      (diagnostic) => diagnostic.severity === "error" || diagnostic.severity === "fatal error"
    );
    if (firstError) {
      return formatDiagnostic(firstError);
    }
  }
  const reason = formatErrorForTUI(text);
  return reason.length > 0 ? reason : undefined;
};

export const formatSummaryLine = (passed: number, total: number): string =>
  `Results: ${passed}/${total} passed`;
