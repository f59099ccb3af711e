import type { CompilerTarget, TestVariant } from "../config/types.js";
import type { DebugLogger } from "../utils/debug-logger.js";
import { formatError } from "../utils/error.js";
import type { MatrixEventEmitter } from "./event-emitter.js";
import { crashedResult, reuseResult } from "./results.js";
import type { JobExecutor, RunSummary, TestResult } from "./types.js";

export interface MatrixRunnerOptions {
  readonly executor: JobExecutor;
  /**
   * Every selected variant runs. Auto variants then only seed reuse and do
   * not count toward the total.
   */
  readonly runAll: boolean;
  readonly eventEmitter?: MatrixEventEmitter;
  readonly debugLogger?: DebugLogger;
}

/**
 * Number of results the pass count is measured against.
 */
export const effectiveTotal = (
  tests: readonly TestVariant[],
  compilers: readonly CompilerTarget[],
  runAll: boolean
): number => {
  const nonAuto = tests.filter((test) => !test.isAuto).length;
  return runAll && nonAuto > 0
    ? nonAuto * compilers.length
    : tests.length * compilers.length;
};

/**
 * Auto variant results by compiler and group, then by detected value.
 */
class AutoResultCache {
  private readonly entries = new Map<string, Map<number, TestResult>>();

  private static key(compiler: string, group: string): string {
    return JSON.stringify([compiler, group]);
  }

  add(result: TestResult): void {
    if (result.implValue === undefined) {
      return;
    }
    const key = AutoResultCache.key(result.compiler.displayName, result.group);
    const values = this.entries.get(key) ?? new Map<number, TestResult>();
    values.set(result.implValue, result);
    this.entries.set(key, values);
  }

  find(
    compiler: CompilerTarget,
    test: TestVariant
  ): TestResult | undefined {
    if (test.detectValue === undefined) {
      return undefined;
    }
    return this.entries
      .get(AutoResultCache.key(compiler.displayName, test.group))
      ?.get(test.detectValue);
  }
}

/**
 * Runs every (test, compiler) pair of the matrix, test-major, one job at a
 * time. A failing job never stops the matrix; an abort stops it between
 * jobs.
 *
 * A non-auto variant whose expected value an auto variant of its group
 * already detected on the same compiler reuses that result instead of
 * running.
 */
export class MatrixRunner {
  private readonly executor: JobExecutor;
  private readonly runAll: boolean;
  private readonly eventEmitter?: MatrixEventEmitter;
  private readonly debugLogger?: DebugLogger;
  private aborted = false;

  constructor(options: MatrixRunnerOptions) {
    this.executor = options.executor;
    this.runAll = options.runAll;
    this.eventEmitter = options.eventEmitter;
    this.debugLogger = options.debugLogger;
  }

  abort(): void {
    if (!this.aborted) {
      this.aborted = true;
      this.debugLogger?.log("[Runner] Abort requested");
    }
  }

  private async runJob(
    test: TestVariant,
    compiler: CompilerTarget
  ): Promise<TestResult> {
    try {
      return await this.executor.run(test, compiler);
    } catch (error) {
      this.debugLogger?.logError(error, "Runner");
      return crashedResult(test, compiler, formatError(error));
    }
  }

  async run(
    tests: readonly TestVariant[],
    compilers: readonly CompilerTarget[]
  ): Promise<RunSummary> {
    const startTime = Date.now();
    const total = effectiveTotal(tests, compilers, this.runAll);
    const skipAutoCounting =
      this.runAll && tests.some((test) => !test.isAuto);
    const cache = new AutoResultCache();
    const results: TestResult[] = [];
    let passed = 0;

    this.eventEmitter?.emit({
      type: "start",
      total,
      tests: tests.length,
      compilers: compilers.length,
    });
    this.debugLogger?.logSection("MATRIX");
    this.debugLogger?.startPhase("Matrix");

    matrix: for (const test of tests) {
      for (const compiler of compilers) {
        if (this.aborted) {
          break matrix;
        }

        const auto = test.isAuto ? undefined : cache.find(compiler, test);
        if (auto) {
          const reused = reuseResult(auto, test);
          results.push(reused);
          if (reused.passed) {
            passed++;
          }
          this.debugLogger?.logPhase(
            "Runner",
            `${test.testName} on ${compiler.displayName}: reused ${auto.testName}`
          );
          this.eventEmitter?.emit({
            type: "result",
            result: reused,
            reused: true,
            counted: true,
          });
          continue;
        }

        this.eventEmitter?.emit({
          type: "job",
          testName: test.testName,
          compiler: compiler.displayName,
        });

        const result = await this.runJob(test, compiler);
        results.push(result);

        if (test.isAuto) {
          cache.add(result);
        }

        const counted = !(skipAutoCounting && test.isAuto);
        if (counted && result.passed) {
          passed++;
        }

        this.eventEmitter?.emit({
          type: "result",
          result,
          reused: false,
          counted,
        });
      }
    }

    this.debugLogger?.endPhase("Matrix");
    this.debugLogger?.log(`Passed ${passed}/${total}`);

    const summary: RunSummary = {
      results,
      passed,
      total,
      aborted: this.aborted,
      duration: Date.now() - startTime,
    };

    this.eventEmitter?.emit({
      type: "done",
      passed,
      total,
      duration: summary.duration,
      aborted: summary.aborted,
    });

    return summary;
  }
}
