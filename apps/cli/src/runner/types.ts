import type { CompilerTarget, TestVariant } from "../config/types.js";

/**
 * The stage a job reached. Failed jobs report the stage that failed;
 * passing jobs report `success` (or `preprocessing` in preprocess-only runs).
 */
export type Stage = "preprocessing" | "compilation" | "runtime" | "success";

/**
 * Captured stderr of each stage.
 */
export interface StageStderr {
  readonly preprocess: string;
  readonly compile: string;
  readonly run: string;
}

export interface CompilerIdentity {
  readonly alias?: string;
  readonly displayName: string;
  readonly id: string;
}

/**
 * Outcome of one (test variant, compiler) pair. Frozen once created.
 */
export interface TestResult {
  readonly testName: string;
  readonly group: string;
  readonly variant: string;
  readonly variantDisplay: string;
  readonly isAuto: boolean;
  readonly detectValue?: number;
  readonly compiler: CompilerIdentity;
  readonly stage: Stage;
  readonly passed: boolean;
  readonly hasWarnings: boolean;
  readonly hasErrors: boolean;
  /**
   * The remote service could not be reached or answered with a failure.
   */
  readonly apiError: boolean;
  /**
   * Value the probed macro expanded to, when one was probed and read.
   */
  readonly implValue?: number;
  /**
   * Artifact name to absolute path.
   */
  readonly files: Readonly<Record<string, string>>;
  readonly stderr: StageStderr;
}

/**
 * Runs a single job. The real one talks to the remote service and the
 * local toolchain; tests substitute fakes.
 */
export interface JobExecutor {
  run(test: TestVariant, target: CompilerTarget): Promise<TestResult>;
}

/**
 * Options for a matrix run, after flags and config settings are merged.
 */
export interface RunConfig {
  readonly resultsDir: string;
  readonly language: string;
  /**
   * Milliseconds to wait after each remote request.
   */
  readonly delayMs: number;
  /**
   * Save raw service responses next to each job's artifacts.
   */
  readonly debug: boolean;
  readonly preprocessOnly: boolean;
  /**
   * Every selected variant runs, not just auto variants.
   */
  readonly runAll: boolean;
  readonly verbose?: boolean;
}

export interface RunSummary {
  readonly results: readonly TestResult[];
  readonly passed: number;
  readonly total: number;
  readonly aborted: boolean;
  readonly duration: number;
}
