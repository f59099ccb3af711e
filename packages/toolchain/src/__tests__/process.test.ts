import { existsSync } from "node:fs";
import { describe, expect, it } from "vitest";
import { formatCommand, runProcess } from "../process.js";
import { withTempDir } from "../temp.js";

const node = process.execPath;

describe("runProcess", () => {
  it("captures both streams and the exit code", async () => {
    const result = await runProcess(node, [
      "-e",
      "process.stdout.write('hi'); process.stderr.write('oops'); process.exit(3)",
    ]);
    expect(result).toEqual({
      success: true,
      value: { stdout: "hi", stderr: "oops", exitCode: 3 },
    });
  });

  it("feeds input to stdin", async () => {
    const result = await runProcess(
      node,
      ["-e", "process.stdin.pipe(process.stdout)"],
      { input: "abc" }
    );
    expect(result.success && result.value.stdout).toBe("abc");
  });

  it("reports a missing binary", async () => {
    const result = await runProcess("macrobench-no-such-tool", ["--help"]);
    expect(result).toEqual({
      success: false,
      error: "'macrobench-no-such-tool' not found",
    });
  });

  it("kills a process that outlives its timeout", async () => {
    const result = await runProcess(
      node,
      ["-e", "setTimeout(() => {}, 10000)"],
      { timeoutMs: 200, label: "Sleep" }
    );
    expect(result).toEqual({ success: false, error: "Sleep timed out" });
  });
});

describe("formatCommand", () => {
  it("quotes arguments containing spaces", () => {
    expect(formatCommand("gcc", ["-O2", "my file.c"])).toBe(
      'gcc -O2 "my file.c"'
    );
  });
});

describe("withTempDir", () => {
  it("removes the directory after the callback resolves", async () => {
    let seen = "";
    const value = await withTempDir("macrobench-test-", async (dir) => {
      seen = dir;
      expect(existsSync(dir)).toBe(true);
      return 7;
    });
    expect(value).toBe(7);
    expect(existsSync(seen)).toBe(false);
  });

  it("removes the directory when the callback throws", async () => {
    let seen = "";
    await expect(
      withTempDir("macrobench-test-", async (dir) => {
        seen = dir;
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(seen).not.toBe("");
    expect(existsSync(seen)).toBe(false);
  });
});
