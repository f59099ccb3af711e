import type { CompilerProject } from "@macrobench/explorer";
import { err, map, mapErr, ok, type Result } from "@macrobench/result";
import { assembleAndRun, compileAndRun } from "@macrobench/toolchain";
import type { CompilerTarget } from "../config/types.js";

/**
 * Captured output of a program that built and ran, whatever its exit code.
 */
export interface ExecutionOutput {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly warnings: boolean;
  /**
   * Compiler or build-step stderr that did not stop the build.
   */
  readonly compileStderr: string;
  /**
   * Assembly text, in local-assemble mode.
   */
  readonly assembly?: string;
}

/**
 * The program never ran.
 */
export interface DispatchFailure {
  readonly stage: "compilation";
  readonly message: string;
  readonly apiError: boolean;
  readonly hasErrors: boolean;
  readonly hasWarnings: boolean;
  readonly assembly?: string;
}

export interface DispatchOptions {
  /**
   * Awaited after every remote request.
   */
  readonly pause: () => Promise<void>;
  /**
   * Receives each local command line before it runs.
   */
  readonly onCommand?: (commandLine: string) => void;
}

export type DispatchResult = Result<ExecutionOutput, DispatchFailure>;

/**
 * Exit code used when the service ran the program but reported none.
 */
const MISSING_EXIT_CODE = -1;

type FailureFlags = Partial<Omit<DispatchFailure, "stage" | "message">>;

const buildFailure = (
  message: string,
  flags: FailureFlags = {}
): DispatchFailure => ({
  stage: "compilation",
  message,
  apiError: flags.apiError ?? false,
  hasErrors: flags.hasErrors ?? false,
  hasWarnings: flags.hasWarnings ?? false,
  assembly: flags.assembly,
});

const failure = (message: string, flags: FailureFlags = {}): DispatchResult =>
  err(buildFailure(message, flags));

const executeRemotely = async (
  project: CompilerProject,
  options: DispatchOptions
): Promise<DispatchResult> => {
  const executed = await project.execute();
  await options.pause();

  if (!executed.success) {
    return failure(executed.error, {
      apiError: true,
      hasWarnings: project.hasWarnings,
    });
  }

  if (!project.didExecute && project.hasErrors) {
    return failure(project.compilerStderr, {
      hasErrors: true,
      hasWarnings: project.hasWarnings,
    });
  }

  return ok({
    stdout: project.stdout ?? "",
    stderr: project.stderr ?? "",
    exitCode: project.exitCode ?? MISSING_EXIT_CODE,
    warnings: project.hasWarnings,
    compileStderr: project.didExecute ? "" : project.compilerStderr,
  });
};

const assembleLocally = async (
  project: CompilerProject,
  target: Extract<CompilerTarget["local"], { kind: "assemble" }>,
  options: DispatchOptions
): Promise<DispatchResult> => {
  // Unfiltered output keeps the directives the assembler needs.
  const compiled = await project.compile({
    intel: false,
    directives: false,
    labels: false,
    commentOnly: false,
  });
  await options.pause();

  if (!compiled.success) {
    return failure(compiled.error, {
      apiError: true,
      hasWarnings: project.hasWarnings,
    });
  }

  if (project.hasErrors) {
    return failure(project.compilerStderr, {
      hasErrors: true,
      hasWarnings: project.hasWarnings,
    });
  }

  const assembly = project.assembly ?? "";
  const ran = await assembleAndRun(assembly, {
    assembler: target.assembler,
    assemblerArgs: target.assemblerArgs,
    linker: target.linker,
    linkerArgs: target.linkerArgs,
    onCommand: options.onCommand,
  });

  return mapErr(
    map(ran, (value): ExecutionOutput => ({
      stdout: value.stdout,
      stderr: value.stderr,
      exitCode: value.exitCode,
      warnings: project.hasWarnings,
      compileStderr: value.buildStderr,
      assembly,
    })),
    (message) => buildFailure(message, { hasWarnings: project.hasWarnings, assembly })
  );
};

const compileLocally = async (
  project: CompilerProject,
  target: Extract<CompilerTarget["local"], { kind: "compile" }>,
  options: DispatchOptions
): Promise<DispatchResult> => {
  const preprocessed = project.getPreprocessed();
  if (!preprocessed.success) {
    return failure(preprocessed.error, { hasWarnings: project.hasWarnings });
  }

  const ran = await compileAndRun(preprocessed.value, project.auxiliaryFiles, {
    compiler: target.compiler,
    compilerArgs: target.compilerArgs,
    onCommand: options.onCommand,
  });

  return mapErr(
    map(ran, (value): ExecutionOutput => ({
      stdout: value.stdout,
      stderr: value.stderr,
      exitCode: value.exitCode,
      warnings: project.hasWarnings,
      compileStderr: value.buildStderr,
    })),
    (message) => buildFailure(message, { hasWarnings: project.hasWarnings })
  );
};

/**
 * Builds and runs an already preprocessed project the way its compiler
 * target asks for: remotely, by assembling remote assembly locally, or by
 * compiling the restored preprocessed text locally.
 */
export const dispatch = (
  project: CompilerProject,
  target: CompilerTarget,
  options: DispatchOptions
): Promise<DispatchResult> => {
  const local = target.local;
  switch (local.kind) {
    case "remote":
      return executeRemotely(project, options);
    case "assemble":
      return assembleLocally(project, local, options);
    case "compile":
      return compileLocally(project, local, options);
  }
};
