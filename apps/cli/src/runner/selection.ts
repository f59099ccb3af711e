import { err, ok, type Result } from "@macrobench/result";
import type {
  CompilerTarget,
  MatrixConfig,
  TestVariant,
} from "../config/types.js";

export interface SelectionFilters {
  /**
   * Compiler aliases.
   */
  readonly compilers?: readonly string[];
  /**
   * Test names or variant names.
   */
  readonly tests?: readonly string[];
  readonly groups?: readonly string[];
  readonly runAll: boolean;
}

export interface Selection {
  readonly compilers: readonly CompilerTarget[];
  readonly tests: readonly TestVariant[];
}

const isSet = (values: readonly string[] | undefined): values is readonly string[] =>
  values !== undefined && values.length > 0;

/**
 * Without `--all` (or an explicit test filter), only auto variants run,
 * plus every variant of groups that have no auto variant.
 */
export const defaultTests = (
  tests: readonly TestVariant[]
): TestVariant[] => {
  const groupsWithAuto = new Set(
    tests.filter((test) => test.isAuto).map((test) => test.group)
  );
  return tests.filter(
    (test) => test.isAuto || !groupsWithAuto.has(test.group)
  );
};

/**
 * Applies the command-line filters to the configured matrix. An empty
 * selection is a failure naming the filter that emptied it.
 */
export const selectMatrix = (
  config: MatrixConfig,
  filters: SelectionFilters
): Result<Selection> => {
  let compilers = [...config.compilers];
  let tests = [...config.tests];

  if (isSet(filters.compilers)) {
    const wanted = filters.compilers;
    compilers = compilers.filter(
      (compiler) => compiler.alias !== undefined && wanted.includes(compiler.alias)
    );
    if (compilers.length === 0) {
      return err(`No compilers matching: ${wanted.join(", ")}`);
    }
  }

  if (isSet(filters.tests)) {
    const wanted = filters.tests;
    tests = tests.filter(
      (test) => wanted.includes(test.testName) || wanted.includes(test.variant)
    );
    if (tests.length === 0) {
      return err(`No tests matching: ${wanted.join(", ")}`);
    }
  }

  if (isSet(filters.groups)) {
    const wanted = filters.groups;
    tests = tests.filter((test) => wanted.includes(test.group));
    if (tests.length === 0) {
      return err(`No tests matching groups: ${wanted.join(", ")}`);
    }
  }

  if (!(filters.runAll || isSet(filters.tests))) {
    tests = defaultTests(tests);
  }

  if (compilers.length === 0 || tests.length === 0) {
    return err("No compilers or tests to run.");
  }

  return ok({ compilers, tests });
};
