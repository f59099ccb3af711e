import type { BuildResult, OutputLine } from "@macrobench/diagnostics";
import type { AsmLine, CompileResponse, PpOutput } from "./types.js";

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readNumber = (value: unknown): number | undefined =>
  typeof value === "number" && Number.isFinite(value) ? value : undefined;

const readTime = (value: unknown): number | string | undefined =>
  typeof value === "string" ? value : readNumber(value);

const readLine = (value: unknown): OutputLine | undefined => {
  if (!isObject(value)) {
    return undefined;
  }
  const text = typeof value.text === "string" ? value.text : undefined;
  const tag = isObject(value.tag)
    ? {
        line: readNumber(value.tag.line),
        column: readNumber(value.tag.column),
        text: typeof value.tag.text === "string" ? value.tag.text : undefined,
        severity: readNumber(value.tag.severity),
      }
    : undefined;
  return tag === undefined ? { text } : { text, tag };
};

const readLines = (value: unknown): OutputLine[] | undefined => {
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.flatMap((entry) => {
    const line = readLine(entry);
    return line ? [line] : [];
  });
};

const readAsm = (value: unknown): AsmLine[] | undefined =>
  readLines(value)?.map((line) => ({ text: line.text ?? "" }));

const readPpOutput = (value: unknown): PpOutput | undefined => {
  if (!isObject(value)) {
    return undefined;
  }
  return typeof value.output === "string" ? { output: value.output } : {};
};

const readBuildResult = (value: unknown): BuildResult | undefined => {
  if (!isObject(value)) {
    return undefined;
  }
  return {
    code: readNumber(value.code),
    stdout: readLines(value.stdout),
    stderr: readLines(value.stderr),
    execTime: readTime(value.execTime),
  };
};

/**
 * Reads the fields this tool uses from a decoded JSON body. Returns
 * undefined when the body is not an object. Fields of the wrong type are
 * left undefined.
 */
export const readCompileResponse = (
  body: unknown
): CompileResponse | undefined => {
  if (!isObject(body)) {
    return undefined;
  }
  return {
    code: readNumber(body.code),
    stdout: readLines(body.stdout),
    stderr: readLines(body.stderr),
    asm: readAsm(body.asm),
    ppOutput: readPpOutput(body.ppOutput),
    didExecute:
      typeof body.didExecute === "boolean" ? body.didExecute : undefined,
    execTime: readTime(body.execTime),
    buildResult: readBuildResult(body.buildResult),
  };
};
