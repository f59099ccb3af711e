import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join, resolve, sep } from "node:path";
import { err, ok, type Result } from "@macrobench/result";
import { needsNoPie } from "./pie.js";
import { formatCommand, type ProcessOutput, runProcess } from "./process.js";
import { withTempDir } from "./temp.js";

/**
 * Timeout for compile, assemble and link steps.
 */
export const TOOLCHAIN_TIMEOUT_MS = 30_000;

/**
 * Timeout for running a built program.
 */
export const EXECUTION_TIMEOUT_MS = 10_000;

const NO_PIE_FLAG = "-no-pie";

export interface SourceFile {
  readonly filename: string;
  readonly contents: string;
}

export interface ExecuteOptions {
  readonly args?: readonly string[];
  readonly stdin?: string;
  readonly timeoutMs?: number;
}

interface StepObserver {
  /**
   * Called with each command line before it runs.
   */
  readonly onCommand?: (commandLine: string) => void;
}

export interface AssembleOptions extends ExecuteOptions, StepObserver {
  readonly assembler: string;
  readonly assemblerArgs?: readonly string[];
  readonly linker: string;
  readonly linkerArgs?: readonly string[];
}

export interface CompileOptions extends ExecuteOptions, StepObserver {
  readonly compiler: string;
  readonly compilerArgs?: readonly string[];
}

export interface LocalRunOutput extends ProcessOutput {
  /**
   * Combined stderr of the build steps (assembler, linker or compiler).
   */
  readonly buildStderr: string;
}

const run = (
  observer: StepObserver,
  command: string,
  args: readonly string[],
  options: Parameters<typeof runProcess>[2]
): ReturnType<typeof runProcess> => {
  observer.onCommand?.(formatCommand(command, args));
  return runProcess(command, args, options);
};

/**
 * Runs a build step and turns a non-zero exit into a failure.
 */
const buildStep = async (
  observer: StepObserver,
  prefix: string,
  command: string,
  args: readonly string[],
  cwd?: string
): Promise<Result<ProcessOutput>> => {
  const result = await run(observer, command, args, {
    cwd,
    timeoutMs: TOOLCHAIN_TIMEOUT_MS,
    label: prefix.replace(/ failed$/, ""),
  });
  if (!result.success) {
    return err(`${prefix}: ${result.error}`);
  }
  if (result.value.exitCode !== 0) {
    return err(`${prefix}:\n${result.value.stderr}`);
  }
  return result;
};

const describeThrown = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Runs `fn` in a scratch directory. Filesystem errors become failures.
 */
const inScratchDir = async <T>(
  dirPrefix: string,
  failurePrefix: string,
  fn: (dir: string) => Promise<Result<T>>
): Promise<Result<T>> => {
  try {
    return await withTempDir(dirPrefix, fn);
  } catch (error) {
    return err(`${failurePrefix}: ${describeThrown(error)}`);
  }
};

/**
 * Runs a built program. A non-zero exit status is a successful run.
 */
export const executeBinary = (
  path: string,
  options: ExecuteOptions = {}
): Promise<Result<ProcessOutput>> =>
  runProcess(path, options.args ?? [], {
    input: options.stdin,
    timeoutMs: options.timeoutMs ?? EXECUTION_TIMEOUT_MS,
    label: "Program execution",
  });

/**
 * Assembles, links and runs assembly text in a scratch directory.
 * `-no-pie` is added to the link step when the assembly needs it.
 */
export const assembleAndRun = (
  assembly: string,
  options: AssembleOptions
): Promise<Result<LocalRunOutput>> =>
  inScratchDir("macrobench-asm-", "Assembly failed", async (dir) => {
    const sourcePath = join(dir, "source.s");
    const objectPath = join(dir, "source.o");
    const executablePath = join(dir, "program");
    await writeFile(sourcePath, assembly, "utf8");

    const assembled = await buildStep(
      options,
      "Assembly failed",
      options.assembler,
      [...(options.assemblerArgs ?? []), "-o", objectPath, sourcePath]
    );
    if (!assembled.success) {
      return assembled;
    }

    const linkerArgs = [...(options.linkerArgs ?? [])];
    if (needsNoPie(assembly) && !linkerArgs.includes(NO_PIE_FLAG)) {
      linkerArgs.push(NO_PIE_FLAG);
    }

    const linked = await buildStep(options, "Linking failed", options.linker, [
      ...linkerArgs,
      "-o",
      executablePath,
      objectPath,
    ]);
    if (!linked.success) {
      return linked;
    }

    options.onCommand?.(formatCommand(executablePath, options.args ?? []));
    const executed = await executeBinary(executablePath, options);
    if (!executed.success) {
      return executed;
    }

    return ok({
      ...executed.value,
      buildStderr: [assembled.value.stderr, linked.value.stderr]
        .filter((text) => text.length > 0)
        .join("\n"),
    });
  });

/**
 * Resolves an auxiliary file name inside the scratch directory, refusing
 * names that would escape it.
 */
const scratchPath = (dir: string, filename: string): string | undefined => {
  const target = resolve(dir, filename);
  return target.startsWith(`${resolve(dir)}${sep}`) ? target : undefined;
};

/**
 * Writes preprocessed source and auxiliary files into one scratch directory,
 * compiles there and runs the result.
 */
export const compileAndRun = (
  preprocessed: string,
  files: readonly SourceFile[],
  options: CompileOptions
): Promise<Result<LocalRunOutput>> =>
  inScratchDir("macrobench-cc-", "Local compilation failed", async (dir) => {
    await writeFile(join(dir, "source.c"), preprocessed, "utf8");

    for (const file of files) {
      const target = scratchPath(dir, file.filename);
      if (target === undefined) {
        return err(
          `Local compilation failed: '${file.filename}' is outside the build directory`
        );
      }
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, file.contents, "utf8");
    }

    const executablePath = join(dir, "program");
    const compiled = await buildStep(
      options,
      "Local compilation failed",
      options.compiler,
      [...(options.compilerArgs ?? []), "-o", executablePath, "source.c"],
      dir
    );
    if (!compiled.success) {
      return compiled;
    }

    options.onCommand?.(formatCommand(executablePath, options.args ?? []));
    const executed = await executeBinary(executablePath, options);
    if (!executed.success) {
      return executed;
    }

    return ok({ ...executed.value, buildStderr: compiled.value.stderr });
  });
