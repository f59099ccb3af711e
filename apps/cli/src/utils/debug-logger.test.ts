import { fs, vol } from "memfs";
import { afterEach, describe, expect, it, vi } from "vitest";
import { DebugLogger } from "./debug-logger.js";

vi.mock("node:fs", () => fs);

const LOG_PATH = "/results/debug.log";

const loggedLines = (): string[] =>
  vol
    .readFileSync(LOG_PATH, "utf-8")
    .toString()
    .split("\n")
    .filter((line) => line.includes("["))
    .map((line) => line.slice(line.indexOf(" ") + 1));

describe("DebugLogger", () => {
  afterEach(() => {
    vol.reset();
  });

  it("logs one line per compiler diagnostic", () => {
    const logger = new DebugLogger(LOG_PATH);

    logger.logDiagnostics(
      "Build",
      "main.c: In function 'main':\nmain.c:3:1: error: expected ';'\nmain.c:2:7: warning: unused variable 'x'\n"
    );

    expect(loggedLines()).toEqual([
      "[Build] main.c:3:1 error expected ';'",
      "[Build] main.c:2:7 warning unused variable 'x'",
    ]);
  });

  it("indents multi-line output under its label", () => {
    const logger = new DebugLogger(LOG_PATH);

    logger.logOutput("Build failure", "line one\nline two\n");

    const content = vol.readFileSync(LOG_PATH, "utf-8").toString();
    expect(content).toContain("Build failure:\n    line one\n    line two\n");
  });

  it("writes nothing after close", () => {
    const logger = new DebugLogger(LOG_PATH);
    logger.close();

    logger.logPhase("Job", "impl_auto on GCC");

    expect(loggedLines()).toEqual([]);
  });
});
