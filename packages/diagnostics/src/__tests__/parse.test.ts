import { describe, expect, it } from "vitest";
import {
  formatDiagnostic,
  parseDiagnosticLine,
  parseDiagnostics,
} from "../parse.js";

describe("parseDiagnosticLine", () => {
  it("parses a line with a column", () => {
    expect(
      parseDiagnosticLine(
        "<source>:3:5: warning: unused variable 'x' [-Wunused-variable]"
      )
    ).toEqual({
      file: "<source>",
      line: 3,
      column: 5,
      severity: "warning",
      message: "unused variable 'x' [-Wunused-variable]",
    });
  });

  it("parses a line without a column", () => {
    expect(parseDiagnosticLine("main.c:10: error: expected ';'")).toEqual({
      file: "main.c",
      line: 10,
      severity: "error",
      message: "expected ';'",
    });
  });

  it("recognises fatal errors and notes", () => {
    expect(
      parseDiagnosticLine(
        "<source>:1:10: fatal error: missing.h: No such file or directory"
      )?.severity
    ).toBe("fatal error");
    expect(
      parseDiagnosticLine("<source>:7:1: note: declared here")?.severity
    ).toBe("note");
  });

  it("strips colour codes", () => {
    expect(
      parseDiagnosticLine("\x1b[1ma.c:1:2: \x1b[31merror: \x1b[0mbad")
    ).toEqual({
      file: "a.c",
      line: 1,
      column: 2,
      severity: "error",
      message: "bad",
    });
  });

  it("rejects lines that are not diagnostics", () => {
    expect(parseDiagnosticLine("In file included from a.c:3:")).toBeUndefined();
    expect(parseDiagnosticLine("1 warning generated.")).toBeUndefined();
  });
});

describe("parseDiagnostics", () => {
  it("keeps only diagnostic lines in order", () => {
    const text = [
      "In file included from a.c:1:",
      "b.h:2:1: warning: w",
      "    2 | int x",
      "a.c:5:3: error: e",
    ].join("\n");
    expect(parseDiagnostics(text).map(formatDiagnostic)).toEqual([
      "b.h:2:1 warning w",
      "a.c:5:3 error e",
    ]);
  });
});
