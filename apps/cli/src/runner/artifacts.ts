import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { CompilerTarget, TestVariant } from "../config/types.js";
import type { TestResult } from "./types.js";

export const SUMMARY_FILE = "summary.json";
export const TABLE_FILE = "table.md";
export const DEBUG_LOG_FILE = "debug.log";

const UNSAFE_NAME_CHARS = /[ /]/g;

/**
 * Directory name for one job's artifacts, e.g. `impl_native_GCC_13.2`.
 */
export const jobDirectoryName = (
  test: TestVariant,
  target: CompilerTarget
): string =>
  `${test.testName}_${target.displayName.replace(UNSAFE_NAME_CHARS, "_")}`;

/**
 * File name of every artifact a job can write, by artifact name.
 */
export const ARTIFACT_FILE_NAMES = {
  preprocessed: "preprocessed.c",
  preprocess_err: "preprocess_err.txt",
  compile_err: "compile_err.txt",
  assembly: "output.s",
  run_stdout: "run_stdout.txt",
  run_stderr: "run_stderr.txt",
  result: "result.json",
  debug_response: "debug_response.json",
} as const;

export type ArtifactName = keyof typeof ARTIFACT_FILE_NAMES;

export interface ArtifactOptions {
  readonly preprocessOnly: boolean;
  readonly debug: boolean;
}

const PREPROCESS_ARTIFACTS: readonly ArtifactName[] = [
  "preprocessed",
  "preprocess_err",
];
const RUN_ARTIFACTS: readonly ArtifactName[] = [
  "compile_err",
  "run_stdout",
  "run_stderr",
];

/**
 * Paths of the artifacts a job may write. Only some of them exist after a
 * run, depending on how far the job got.
 */
export const artifactPaths = (
  dir: string,
  options: ArtifactOptions
): Record<string, string> => {
  const names: ArtifactName[] = [...PREPROCESS_ARTIFACTS];
  if (!options.preprocessOnly) {
    names.push(...RUN_ARTIFACTS);
  }
  names.push("result");
  if (options.debug) {
    names.push("debug_response");
  }
  return Object.fromEntries(
    names.map((name) => [name, join(dir, ARTIFACT_FILE_NAMES[name])])
  );
};

export const writeText = (path: string, content: string): Promise<void> =>
  writeFile(path, content, "utf-8");

export const writeJson = (path: string, data: unknown): Promise<void> =>
  writeFile(path, JSON.stringify(data, null, 2), "utf-8");

/**
 * Removes and recreates the results directory.
 */
export const prepareResultsDir = async (dir: string): Promise<void> => {
  await rm(dir, { recursive: true, force: true });
  await mkdir(dir, { recursive: true });
};

/**
 * On-disk shape of a result in `result.json` and `summary.json`.
 */
export interface SummaryRecord {
  readonly test_name: string;
  readonly group: string;
  readonly variant: string;
  readonly variant_display: string;
  readonly is_auto: boolean;
  readonly detect_value: number | null;
  readonly compiler: {
    readonly nickname: string | null;
    readonly display_name: string;
    readonly api_name: string;
  };
  readonly stage: string;
  readonly passed: boolean;
  readonly warnings: boolean;
  readonly errors: boolean;
  readonly api_error: boolean;
  readonly impl_value: number | null;
  readonly files: Readonly<Record<string, string>>;
  readonly stderr: {
    readonly preprocess: string;
    readonly compile: string;
    readonly run: string;
  };
}

export const toSummaryRecord = (result: TestResult): SummaryRecord => ({
  test_name: result.testName,
  group: result.group,
  variant: result.variant,
  variant_display: result.variantDisplay,
  is_auto: result.isAuto,
  detect_value: result.detectValue ?? null,
  compiler: {
    nickname: result.compiler.alias ?? null,
    display_name: result.compiler.displayName,
    api_name: result.compiler.id,
  },
  stage: result.stage,
  passed: result.passed,
  warnings: result.hasWarnings,
  errors: result.hasErrors,
  api_error: result.apiError,
  impl_value: result.implValue ?? null,
  files: result.files,
  stderr: result.stderr,
});

export const writeSummary = async (
  resultsDir: string,
  results: readonly TestResult[]
): Promise<string> => {
  const path = join(resultsDir, SUMMARY_FILE);
  await writeJson(path, results.map(toSummaryRecord));
  return path;
};
