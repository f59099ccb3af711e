import { mkdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { type CompilationService, CompilerProject } from "@macrobench/explorer";
import { fromPromise } from "@macrobench/result";
import { loadAuxiliaryFiles } from "../config/files.js";
import type { CompilerTarget, TestVariant } from "../config/types.js";
import type { DebugLogger } from "../utils/debug-logger.js";
import { formatError } from "../utils/error.js";
import {
  ARTIFACT_FILE_NAMES,
  type ArtifactName,
  type ArtifactOptions,
  artifactPaths,
  jobDirectoryName,
  toSummaryRecord,
  writeJson,
  writeText,
} from "./artifacts.js";
import { dispatch } from "./dispatcher.js";
import type { ResponseRecorder } from "./recorder.js";
import type {
  JobExecutor,
  RunConfig,
  Stage,
  StageStderr,
  TestResult,
} from "./types.js";

const NO_INTEGRATED_AS = "-fno-integrated-as";
const NO_PREPROCESSED_OUTPUT = "No preprocessed output";

/**
 * Remote compiler flags for a target. Clang targets whose assembly is
 * assembled locally get `-fno-integrated-as` so they emit GNU as syntax.
 */
export const compilerFlags = (
  target: CompilerTarget,
  preprocessOnly = false
): string[] => {
  const flags = [...target.extraFlags];
  if (
    !preprocessOnly &&
    target.local.kind === "assemble" &&
    target.id.toLowerCase().includes("clang") &&
    !flags.includes(NO_INTEGRATED_AS)
  ) {
    flags.push(NO_INTEGRATED_AS);
  }
  return flags;
};

/**
 * Source text sent for a test: prepended lines, then the file.
 */
export const composeSource = (test: TestVariant, contents: string): string =>
  test.prependLines.length > 0
    ? `${test.prependLines.join("\n")}\n${contents}`
    : contents;

export interface JobRunnerOptions {
  readonly service: CompilationService;
  readonly config: RunConfig;
  readonly logger?: DebugLogger;
  /**
   * Source of raw responses for `debug_response.json`.
   */
  readonly recorder?: ResponseRecorder;
  readonly onWarning?: (message: string) => void;
  readonly pause?: (ms: number) => Promise<void>;
}

interface ResultFlags {
  readonly hasWarnings?: boolean;
  readonly hasErrors?: boolean;
  readonly apiError?: boolean;
  readonly implValue?: number;
}

/**
 * State of one job while it runs.
 */
class JobContext {
  readonly test: TestVariant;
  readonly target: CompilerTarget;
  readonly stderr = { preprocess: "", compile: "", run: "" };
  readonly files: Record<string, string>;
  private readonly dir: string;

  constructor(
    test: TestVariant,
    target: CompilerTarget,
    dir: string,
    options: ArtifactOptions
  ) {
    this.test = test;
    this.target = target;
    this.dir = dir;
    this.files = artifactPaths(dir, options);
  }

  /**
   * Path of an artifact, registering it in `files` on first use.
   */
  artifact(name: ArtifactName): string {
    const path = this.files[name] ?? join(this.dir, ARTIFACT_FILE_NAMES[name]);
    this.files[name] = path;
    return path;
  }
}

/**
 * Runs one (test variant, compiler) job end to end and writes its
 * artifacts: preprocess, optionally probe a macro, then build and run the
 * way the target asks for.
 */
export class JobRunner implements JobExecutor {
  private readonly service: CompilationService;
  private readonly config: RunConfig;
  private readonly logger?: DebugLogger;
  private readonly recorder?: ResponseRecorder;
  private readonly onWarning?: (message: string) => void;
  private readonly pauseFor: (ms: number) => Promise<void>;

  constructor(options: JobRunnerOptions) {
    this.service = options.service;
    this.config = options.config;
    this.logger = options.logger;
    this.recorder = options.recorder;
    this.onWarning = options.onWarning;
    this.pauseFor =
      options.pause ??
      (async (ms) => {
        await sleep(ms);
      });
  }

  private readonly pause = (): Promise<void> =>
    this.config.delayMs > 0 ? this.pauseFor(this.config.delayMs) : Promise.resolve();

  async run(test: TestVariant, target: CompilerTarget): Promise<TestResult> {
    const dir = join(
      this.config.resultsDir,
      jobDirectoryName(test, target)
    );
    const ctx = new JobContext(test, target, dir, {
      preprocessOnly: this.config.preprocessOnly,
      debug: this.config.debug,
    });

    this.logger?.logPhase("Job", `${test.testName} on ${target.displayName}`);

    try {
      await mkdir(dir, { recursive: true });
      return await this.runStages(ctx);
    } catch (error) {
      this.logger?.logError(error, "Job");
      if (!ctx.stderr.preprocess) {
        ctx.stderr.preprocess = formatError(error);
      }
      return this.finish(ctx, "preprocessing", false, { apiError: true });
    }
  }

  private async runStages(ctx: JobContext): Promise<TestResult> {
    const { test, target, stderr } = ctx;

    const read = await fromPromise(readFile(test.fileName, "utf-8"), formatError);
    if (!read.success) {
      stderr.preprocess = `Failed to read source: ${read.error}`;
      return this.finish(ctx, "preprocessing", false, { apiError: true });
    }
    const contents = read.value;

    const project = new CompilerProject(this.service, {
      compilerId: target.id,
      source: composeSource(test, contents),
      language: this.config.language,
      compilerArgs: compilerFlags(target, this.config.preprocessOnly).join(" "),
    });

    if (test.additionalFiles.length > 0 || test.includeDirs.length > 0) {
      const loaded = await loadAuxiliaryFiles(test);
      for (const warning of loaded.warnings) {
        this.logger?.logPhase("Files", warning);
        this.onWarning?.(warning);
      }
      for (const file of loaded.files) {
        project.addFile(file.filename, file.contents);
      }
    }

    if (test.detectMacro) {
      project.injectMacroProbe(test.detectMacro);
    }

    // Preprocess
    const preprocessed = await project.preprocess({
      filterHeaders: true,
      restoreIncludes: true,
      trim: true,
    });
    await this.pause();

    if (!preprocessed.success) {
      stderr.preprocess = preprocessed.error;
      await writeText(ctx.artifact("preprocess_err"), preprocessed.error);
      return this.finish(ctx, "preprocessing", false, { apiError: true });
    }

    if (this.config.debug) {
      await writeJson(
        ctx.artifact("debug_response"),
        this.recorder?.take() ?? project.response
      );
    }

    stderr.preprocess = project.compilerStderr;
    let warnings = project.hasWarnings;
    const preprocessFailed = project.hasErrors;

    if (preprocessFailed) {
      this.logger?.logOutput("Preprocessor stderr", project.compilerStderr);
      this.logger?.logDiagnostics("Preprocess", project.compilerStderr);
      await writeText(ctx.artifact("preprocess_err"), project.compilerStderr);
      if (!this.config.preprocessOnly) {
        return this.finish(ctx, "preprocessing", false, {
          hasWarnings: warnings,
          hasErrors: true,
        });
      }
    }

    const text = project.preprocessed;
    if (text === undefined || text.trim() === "") {
      await writeText(ctx.artifact("preprocess_err"), NO_PREPROCESSED_OUTPUT);
      return this.finish(ctx, "preprocessing", false, {
        hasWarnings: warnings,
      });
    }
    await writeText(ctx.artifact("preprocessed"), text);

    let implValue: number | undefined;
    if (test.detectMacro) {
      const probed = project.macroProbeValue(test.detectMacro);
      if (probed.success) {
        implValue = probed.value;
        this.logger?.logPhase(
          "Probe",
          `${test.detectMacro} = ${probed.value} on ${target.displayName}`
        );
      }
    }

    if (this.config.preprocessOnly) {
      return this.finish(ctx, "preprocessing", !preprocessFailed, {
        implValue,
        hasWarnings: warnings,
        hasErrors: preprocessFailed,
      });
    }

    // Build and run
    const dispatched = await dispatch(project, target, {
      pause: this.pause,
      onCommand: (line) => this.logger?.logPhase("Toolchain", line),
    });

    const assembly = dispatched.success
      ? dispatched.value.assembly
      : dispatched.error.assembly;
    if (assembly !== undefined) {
      await writeText(ctx.artifact("assembly"), assembly);
    }

    if (!dispatched.success) {
      const failure = dispatched.error;
      stderr.compile = failure.message;
      this.logger?.logOutput("Build failure", failure.message);
      this.logger?.logDiagnostics("Build", failure.message);
      await writeText(ctx.artifact("compile_err"), failure.message);
      return this.finish(ctx, "compilation", false, {
        implValue,
        hasWarnings: warnings || failure.hasWarnings,
        hasErrors: failure.hasErrors,
        apiError: failure.apiError,
      });
    }

    const output = dispatched.value;
    stderr.compile = output.compileStderr;
    stderr.run = output.stderr;
    await writeText(ctx.artifact("run_stdout"), output.stdout);
    await writeText(ctx.artifact("run_stderr"), output.stderr);
    warnings = warnings || output.warnings || output.stderr.length > 0;

    const succeeded = output.exitCode === 0;
    return this.finish(ctx, succeeded ? "success" : "runtime", succeeded, {
      implValue,
      hasWarnings: warnings,
    });
  }

  /**
   * Freezes the result and writes `result.json`.
   */
  private async finish(
    ctx: JobContext,
    stage: Stage,
    passed: boolean,
    flags: ResultFlags
  ): Promise<TestResult> {
    const { test, target } = ctx;
    const stderr: StageStderr = Object.freeze({ ...ctx.stderr });
    const result: TestResult = Object.freeze({
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
      stage,
      passed,
      hasWarnings: flags.hasWarnings ?? false,
      hasErrors: flags.hasErrors ?? false,
      apiError: flags.apiError ?? false,
      implValue: flags.implValue,
      files: Object.freeze({ ...ctx.files }),
      stderr,
    });

    try {
      await writeJson(ctx.artifact("result"), toSummaryRecord(result));
    } catch (error) {
      this.logger?.logError(error, "Job");
    }

    this.logger?.logPhase(
      "Job",
      `${test.testName} on ${target.displayName}: ${passed ? "passed" : `failed at ${stage}`}`
    );
    return result;
  }
}
