import { join } from "node:path";
import { err, ok, type Result } from "@macrobench/result";
import type { Settings } from "../config/types.js";
import { TABLE_FILE } from "../runner/artifacts.js";

export const DEFAULT_RESULTS_DIR = "results";
export const DEFAULT_DELAY_SECONDS = 0.5;
export const DEFAULT_LANGUAGE = "c";

/**
 * Raw flag values as the argument parser hands them over. Repeatable flags
 * arrive as a string or a list of strings.
 */
export interface RunArgs {
  readonly config: string;
  readonly resultsDir?: unknown;
  readonly debug?: unknown;
  readonly compiler?: unknown;
  readonly test?: unknown;
  readonly group?: unknown;
  readonly all?: unknown;
  readonly table?: unknown;
  readonly tableFile?: unknown;
  readonly delay?: unknown;
  readonly language?: unknown;
  readonly preprocessOnly?: unknown;
  readonly verbose?: unknown;
  readonly tui?: unknown;
}

export interface RunOptions {
  readonly configPath: string;
  readonly resultsDir: string;
  /**
   * Set when a table is to be written.
   */
  readonly tableFile?: string;
  readonly debug: boolean;
  readonly compilers: readonly string[];
  readonly tests: readonly string[];
  readonly groups: readonly string[];
  readonly runAll: boolean;
  readonly delayMs: number;
  readonly language: string;
  readonly preprocessOnly: boolean;
  readonly verbose: boolean;
  readonly tui: boolean;
}

/**
 * Flattens a repeatable flag. Each occurrence may itself be comma separated.
 */
export const toList = (value: unknown): string[] => {
  const values = Array.isArray(value) ? value : [value];
  return values
    .filter((item): item is string | number => typeof item === "string" || typeof item === "number")
    .flatMap((item) => String(item).split(","))
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

const toText = (value: unknown): string | undefined => {
  if (typeof value === "number") {
    return String(value);
  }
  if (typeof value === "string" && value.length > 0) {
    return value;
  }
  return undefined;
};

const toFlag = (value: unknown): boolean => value === true || value === "true";

/**
 * Merges command-line flags over the config file's settings.
 */
export const resolveRunOptions = (
  args: RunArgs,
  settings: Settings = {}
): Result<RunOptions> => {
  const delayText = toText(args.delay);
  const delaySeconds =
    delayText === undefined ? (settings.delay ?? DEFAULT_DELAY_SECONDS) : Number(delayText);
  if (!Number.isFinite(delaySeconds) || delaySeconds < 0) {
    return err(`Invalid --delay: expected a non-negative number of seconds, got '${delayText}'`);
  }

  const resultsDir = toText(args.resultsDir) ?? settings.resultsDir ?? DEFAULT_RESULTS_DIR;
  const table = toFlag(args.table);

  return ok({
    configPath: args.config,
    resultsDir,
    tableFile: table ? (toText(args.tableFile) ?? join(resultsDir, TABLE_FILE)) : undefined,
    debug: toFlag(args.debug),
    compilers: toList(args.compiler),
    tests: toList(args.test),
    groups: toList(args.group),
    runAll: toFlag(args.all) || table,
    delayMs: Math.round(delaySeconds * 1000),
    language: toText(args.language) ?? settings.language ?? DEFAULT_LANGUAGE,
    preprocessOnly: toFlag(args.preprocessOnly),
    verbose: toFlag(args.verbose),
    tui: args.tui !== false && args.tui !== "false",
  });
};
