import { spawn } from "node:child_process";
import { constants } from "node:os";
import { err, ok, type Result } from "@macrobench/result";

/**
 * Maximum output retained per stream (8MB). Programs under test that loop
 * on printf must not exhaust memory.
 */
const MAX_OUTPUT_SIZE = 8 * 1024 * 1024;

/**
 * Grace period between SIGTERM and SIGKILL once a timeout fires.
 */
const KILL_GRACE_MS = 1500;

export interface ProcessOutput {
  readonly stdout: string;
  readonly stderr: string;
  /**
   * Exit status. A process ended by a signal reports 128 + signal number.
   */
  readonly exitCode: number;
}

export interface RunProcessOptions {
  readonly cwd?: string;
  readonly timeoutMs?: number;
  /**
   * Written to stdin, which is then closed.
   */
  readonly input?: string;
  /**
   * Names the step in timeout messages. Defaults to the command.
   */
  readonly label?: string;
}

interface OutputAccumulator {
  chunks: Buffer[];
  totalSize: number;
}

const addChunk = (accumulator: OutputAccumulator, chunk: Buffer): void => {
  if (accumulator.totalSize >= MAX_OUTPUT_SIZE) {
    return;
  }
  accumulator.chunks.push(chunk);
  accumulator.totalSize += chunk.length;
};

const collect = (accumulator: OutputAccumulator): string =>
  Buffer.concat(accumulator.chunks).toString("utf8");

const SIGNAL_NUMBERS = new Map<string, number>(
  Object.entries(constants.signals)
);

const signalExitCode = (signal: NodeJS.Signals | null): number => {
  const signalNumber = signal === null ? undefined : SIGNAL_NUMBERS.get(signal);
  return signalNumber === undefined ? -1 : 128 + signalNumber;
};

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;

/**
 * Runs a command to completion and captures its output.
 *
 * Never rejects. A missing binary fails with `'<cmd>' not found`; a process
 * still running after `timeoutMs` is killed and fails with
 * `<label> timed out`.
 */
export const runProcess = (
  command: string,
  args: readonly string[],
  options: RunProcessOptions = {}
): Promise<Result<ProcessOutput>> =>
  new Promise((resolve) => {
    const stdout: OutputAccumulator = { chunks: [], totalSize: 0 };
    const stderr: OutputAccumulator = { chunks: [], totalSize: 0 };
    let settled = false;
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    let killTimer: NodeJS.Timeout | undefined;

    const settle = (result: Result<ProcessOutput>): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      clearTimeout(killTimer);
      resolve(result);
    };

    const child = spawn(command, [...args], {
      cwd: options.cwd,
      stdio: ["pipe", "pipe", "pipe"],
    });

    child.stdout.on("data", (chunk: Buffer) => addChunk(stdout, chunk));
    child.stderr.on("data", (chunk: Buffer) => addChunk(stderr, chunk));

    child.on("error", (error) => {
      if (isErrnoException(error) && error.code === "ENOENT") {
        settle(err(`'${command}' not found`));
        return;
      }
      settle(err(`Failed to run '${command}': ${error.message}`));
    });

    child.on("close", (code, signal) => {
      if (timedOut) {
        settle(err(`${options.label ?? command} timed out`));
        return;
      }
      settle(
        ok({
          stdout: collect(stdout),
          stderr: collect(stderr),
          exitCode: code ?? signalExitCode(signal),
        })
      );
    });

    // The program may exit without reading its input.
    child.stdin.on("error", (error) => {
      if (!(isErrnoException(error) && error.code === "EPIPE")) {
        settle(err(`Failed to write stdin of '${command}': ${error.message}`));
      }
    });
    child.stdin.end(options.input ?? "");

    if (options.timeoutMs !== undefined && options.timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGTERM");
        killTimer = setTimeout(() => child.kill("SIGKILL"), KILL_GRACE_MS);
      }, options.timeoutMs);
    }
  });

/**
 * Renders a command line for logs.
 */
export const formatCommand = (
  command: string,
  args: readonly string[]
): string =>
  [command, ...args]
    .map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part))
    .join(" ");
