import type { CompilerOutput, CompilerStreams, OutputLine } from "./types.js";

const WARNING_WORD = /\bwarning\b/i;
const ERROR_TAG = /\berror:/gi;
const WARNING_TAG = /\bwarning:/gi;

/**
 * Joins the `text` of every line that has one.
 */
export const joinLines = (lines: readonly OutputLine[] | undefined): string =>
  (lines ?? [])
    .flatMap((line) => (line.text === undefined ? [] : [line.text]))
    .join("\n");

/**
 * Selects the streams that hold compiler diagnostics for a response.
 */
export const compilerStreams = (
  response: CompilerOutput | undefined
): CompilerStreams => {
  if (!response) {
    return { stderr: [], stdout: [] };
  }

  const build = response.buildResult;
  if (build && (build.stderr !== undefined || build.stdout !== undefined)) {
    return { stderr: build.stderr ?? [], stdout: build.stdout ?? [] };
  }

  return { stderr: response.stderr ?? [], stdout: response.stdout ?? [] };
};

/**
 * Compiler stderr as one string, falling back to stdout when stderr is empty.
 */
export const compilerStderr = (response: CompilerOutput | undefined): string => {
  const { stderr, stdout } = compilerStreams(response);
  return joinLines(stderr.length > 0 ? stderr : stdout);
};

/**
 * True when the response reports a non-zero top-level status. Runtime exit
 * codes of an executed program live elsewhere and do not count.
 */
export const hasErrors = (response: CompilerOutput | undefined): boolean =>
  response?.code !== undefined && response.code !== 0;

export const hasWarnings = (response: CompilerOutput | undefined): boolean => {
  const { stderr, stdout } = compilerStreams(response);
  const text = [stderr, stdout]
    .filter((lines) => lines.length > 0)
    .map(joinLines)
    .join("\n");
  return WARNING_WORD.test(text);
};

const countMatches = (text: string, pattern: RegExp): number =>
  text.match(pattern)?.length ?? 0;

export const errorCount = (response: CompilerOutput | undefined): number =>
  countMatches(compilerStderr(response), ERROR_TAG);

export const warningCount = (response: CompilerOutput | undefined): number =>
  countMatches(compilerStderr(response), WARNING_TAG);
