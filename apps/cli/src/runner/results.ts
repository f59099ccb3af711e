import type { CompilerTarget, TestVariant } from "../config/types.js";
import type { TestResult } from "./types.js";

/**
 * A copy of an auto variant's result that stands in for a variant whose
 * expected value the auto variant detected. Everything but the variant's
 * identity is shared, artifacts included.
 */
export const reuseResult = (
  auto: TestResult,
  variant: TestVariant
): TestResult =>
  Object.freeze({
    ...auto,
    testName: variant.testName,
    variant: variant.variant,
    variantDisplay: variant.displayName,
    isAuto: false,
    detectValue: variant.detectValue,
  });

/**
 * Result for a job that threw instead of returning.
 */
export const crashedResult = (
  test: TestVariant,
  target: CompilerTarget,
  message: string
): TestResult =>
  Object.freeze({
    testName: test.testName,
    group: test.group,
    variant: test.variant,
    variantDisplay: test.displayName,
    isAuto: test.isAuto,
    detectValue: test.detectValue,
    compiler: Object.freeze({
      alias: target.alias,
      displayName: target.displayName,
      id: target.id,
    }),
    stage: "preprocessing",
    passed: false,
    hasWarnings: false,
    hasErrors: false,
    apiError: true,
    files: Object.freeze({}),
    stderr: Object.freeze({ preprocess: message, compile: "", run: "" }),
  });
