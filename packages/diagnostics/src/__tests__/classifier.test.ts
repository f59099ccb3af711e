import { describe, expect, it } from "vitest";
import {
  compilerStderr,
  compilerStreams,
  errorCount,
  hasErrors,
  hasWarnings,
  joinLines,
  warningCount,
} from "../classifier.js";
import type { CompilerOutput } from "../types.js";

const lines = (...texts: string[]) => texts.map((text) => ({ text }));

describe("compilerStreams", () => {
  it("prefers the build result of an execution response", () => {
    const response: CompilerOutput = {
      code: 3,
      stdout: lines("program output"),
      stderr: [],
      buildResult: {
        code: 0,
        stderr: lines("<source>:1:1: warning: foo"),
      },
    };
    expect(compilerStreams(response)).toEqual({
      stderr: lines("<source>:1:1: warning: foo"),
      stdout: [],
    });
  });

  it("falls back to top-level streams when the build result has none", () => {
    const response: CompilerOutput = {
      code: 0,
      stderr: lines("top"),
      buildResult: { code: 0 },
    };
    expect(compilerStreams(response).stderr).toEqual(lines("top"));
  });

  it("returns empty streams without a response", () => {
    expect(compilerStreams(undefined)).toEqual({ stderr: [], stdout: [] });
  });
});

describe("joinLines", () => {
  it("skips lines without text", () => {
    expect(joinLines([{ text: "a" }, {}, { text: "b" }])).toBe("a\nb");
  });
});

describe("hasErrors", () => {
  it("reads the top-level status code", () => {
    expect(hasErrors({ code: 1 })).toBe(true);
    expect(hasErrors({ code: 0 })).toBe(false);
    expect(hasErrors({})).toBe(false);
    expect(hasErrors(undefined)).toBe(false);
  });

  it("ignores the build result status", () => {
    expect(hasErrors({ code: 0, buildResult: { code: 1 } })).toBe(false);
  });
});

describe("hasWarnings", () => {
  it("matches the word case-insensitively in either stream", () => {
    expect(hasWarnings({ stdout: lines("1 WARNING generated.") })).toBe(true);
    expect(hasWarnings({ stderr: lines("all good") })).toBe(false);
  });

  it("does not match inside a longer word", () => {
    expect(hasWarnings({ stderr: lines("-Wno-warnings-as-errors") })).toBe(
      false
    );
  });

  it("ignores program output of an execution response", () => {
    const response: CompilerOutput = {
      stdout: lines("warning from the program"),
      buildResult: { stderr: [] },
    };
    expect(hasWarnings(response)).toBe(false);
  });
});

describe("counts", () => {
  const response: CompilerOutput = {
    code: 1,
    stderr: lines(
      "<source>:2:3: warning: implicit declaration",
      "<source>:4:1: error: expected ';'",
      "<source>:5:1: Error: unknown type",
      "note: error: appears twice"
    ),
  };

  it("counts tagged errors and warnings in compiler stderr", () => {
    expect(errorCount(response)).toBe(3);
    expect(warningCount(response)).toBe(1);
  });

  it("falls back to stdout when stderr is empty", () => {
    const fromStdout: CompilerOutput = {
      stderr: [],
      stdout: lines("a.c:1:1: error: x"),
    };
    expect(compilerStderr(fromStdout)).toBe("a.c:1:1: error: x");
    expect(errorCount(fromStdout)).toBe(1);
  });

  it("is zero without output", () => {
    expect(errorCount({})).toBe(0);
    expect(warningCount(undefined)).toBe(0);
  });
});
