import type {
  CompilationService,
  CompileRequest,
  CompileResponse,
} from "@macrobench/explorer";
import { err, ok, type Result } from "@macrobench/result";
import { fs, vol } from "memfs";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { CompilerTarget, TestVariant } from "../config/types.js";
import { compilerFlags, composeSource, JobRunner } from "./job.js";
import { ResponseRecorder } from "./recorder.js";
import type { RunConfig } from "./types.js";

vi.mock("node:fs/promises", () => fs.promises);

class QueuedService implements CompilationService {
  readonly requests: CompileRequest[] = [];
  private readonly responses: Result<CompileResponse>[];

  constructor(responses: Result<CompileResponse>[]) {
    this.responses = responses;
  }

  compile(
    _compilerId: string,
    request: CompileRequest
  ): Promise<Result<CompileResponse>> {
    this.requests.push(request);
    return Promise.resolve(this.responses.shift() ?? err("no response queued"));
  }
}

const lines = (...texts: string[]) => texts.map((text) => ({ text }));

const target = (overrides: Partial<CompilerTarget> = {}): CompilerTarget => ({
  id: "cg132",
  displayName: "GCC 13.2",
  alias: "gcc",
  extraFlags: [],
  local: { kind: "remote" },
  ...overrides,
});

const variant = (overrides: Partial<TestVariant> = {}): TestVariant => ({
  testName: "impl_auto",
  variant: "auto",
  group: "impl",
  fileName: "/work/impl.c",
  displayName: "auto",
  prependLines: [],
  isAuto: true,
  includeInTable: false,
  additionalFiles: [],
  includeDirs: [],
  ...overrides,
});

const config = (overrides: Partial<RunConfig> = {}): RunConfig => ({
  resultsDir: "/results",
  language: "c",
  delayMs: 0,
  debug: false,
  preprocessOnly: false,
  runAll: false,
  ...overrides,
});

const SOURCE = "int main(void) { return 0; }\n";
const JOB_DIR = "/results/impl_auto_GCC_13.2";

const readArtifact = (name: string): string =>
  vol.readFileSync(`${JOB_DIR}/${name}`, "utf-8").toString();

const preprocessed = (output: string): Result<CompileResponse> =>
  ok({ code: 0, stdout: [], stderr: [], ppOutput: { output } });

const executed = (
  code: number,
  stdout: string[],
  stderr: string[]
): Result<CompileResponse> =>
  ok({
    code,
    didExecute: true,
    stdout: lines(...stdout),
    stderr: lines(...stderr),
    buildResult: { code: 0, stdout: [], stderr: [] },
  });

describe("compilerFlags", () => {
  const clangAsm = target({
    id: "armv7-clang1810",
    local: {
      kind: "assemble",
      assembler: "as",
      assemblerArgs: [],
      linker: "gcc",
      linkerArgs: [],
    },
  });

  it("disables the integrated assembler for clang assembled locally", () => {
    expect(compilerFlags({ ...clangAsm, extraFlags: ["-O2"] })).toEqual([
      "-O2",
      "-fno-integrated-as",
    ]);
  });

  it("leaves the flags alone when only preprocessing", () => {
    expect(compilerFlags(clangAsm, true)).toEqual([]);
  });

  it("does not add the flag twice", () => {
    expect(
      compilerFlags({ ...clangAsm, extraFlags: ["-fno-integrated-as"] })
    ).toEqual(["-fno-integrated-as"]);
  });

  it("leaves other compilers alone", () => {
    expect(compilerFlags(target({ extraFlags: ["-std=c99"] }))).toEqual([
      "-std=c99",
    ]);
  });
});

describe("composeSource", () => {
  it("puts prepended lines before the file", () => {
    expect(
      composeSource(variant({ prependLines: ["#define A 1", "#define B 2"] }), SOURCE)
    ).toBe("#define A 1\n#define B 2\nint main(void) { return 0; }\n");
  });

  it("returns the file unchanged without prepended lines", () => {
    expect(composeSource(variant(), SOURCE)).toBe(SOURCE);
  });
});

describe("JobRunner", () => {
  afterEach(() => {
    vol.reset();
  });

  it("preprocesses, probes and runs a remote job", async () => {
    vol.fromJSON({ "/work/impl.c": SOURCE });
    const service = new QueuedService([
      preprocessed(
        "int main(void) { return 0; }\nint __GODBOLT_MACRO_PROBE_IMPL__ = (int)(2);\n"
      ),
      executed(0, ["ok"], []),
    ]);
    const runner = new JobRunner({ service, config: config() });

    const result = await runner.run(
      variant({ detectMacro: "IMPL", prependLines: ["#define IMPL 2"] }),
      target()
    );

    expect(service.requests[0]?.source).toBe(
      "#define IMPL 2\nint main(void) { return 0; }\nint __GODBOLT_MACRO_PROBE_IMPL__ = (int)(IMPL);\n"
    );
    expect(result).toMatchObject({
      testName: "impl_auto",
      compiler: { alias: "gcc", displayName: "GCC 13.2", id: "cg132" },
      stage: "success",
      passed: true,
      hasWarnings: false,
      hasErrors: false,
      apiError: false,
      implValue: 2,
    });
    expect(readArtifact("preprocessed.c")).toBe("int main(void) { return 0; }");
    expect(readArtifact("run_stdout.txt")).toBe("ok");
    expect(readArtifact("run_stderr.txt")).toBe("");
    expect(JSON.parse(readArtifact("result.json"))).toMatchObject({
      test_name: "impl_auto",
      stage: "success",
      impl_value: 2,
    });
    expect(Object.isFrozen(result)).toBe(true);
  });

  it("pauses after each remote request when a delay is set", async () => {
    vol.fromJSON({ "/work/impl.c": SOURCE });
    const service = new QueuedService([
      preprocessed("int main(void) { return 0; }"),
      executed(0, [], []),
    ]);
    const pause = vi.fn(async () => undefined);
    const runner = new JobRunner({
      service,
      config: config({ delayMs: 500 }),
      pause,
    });

    await runner.run(variant(), target());

    expect(pause).toHaveBeenCalledTimes(2);
    expect(pause).toHaveBeenCalledWith(500);
  });

  it("fails at runtime on a non-zero exit and flags program stderr", async () => {
    vol.fromJSON({ "/work/impl.c": SOURCE });
    const service = new QueuedService([
      preprocessed("int main(void) { return 0; }"),
      executed(1, [], ["assertion failed"]),
    ]);
    const runner = new JobRunner({ service, config: config() });

    const result = await runner.run(variant(), target());

    expect(result).toMatchObject({
      stage: "runtime",
      passed: false,
      hasWarnings: true,
      stderr: { preprocess: "", compile: "", run: "assertion failed" },
    });
  });

  it("reports an unreadable source as an API failure", async () => {
    const service = new QueuedService([]);
    const runner = new JobRunner({ service, config: config() });

    const result = await runner.run(variant({ fileName: "/work/missing.c" }), target());

    expect(result.stage).toBe("preprocessing");
    expect(result.apiError).toBe(true);
    expect(result.stderr.preprocess).toMatch(/^Failed to read source: ENOENT/);
    expect(service.requests).toHaveLength(0);
  });

  it("records a failed preprocess request", async () => {
    vol.fromJSON({ "/work/impl.c": SOURCE });
    const service = new QueuedService([err("HTTP 503: Service Unavailable")]);
    const runner = new JobRunner({ service, config: config() });

    const result = await runner.run(variant(), target());

    expect(result).toMatchObject({
      stage: "preprocessing",
      passed: false,
      apiError: true,
      stderr: { preprocess: "HTTP 503: Service Unavailable" },
    });
    expect(readArtifact("preprocess_err.txt")).toBe("HTTP 503: Service Unavailable");
  });

  it("stops at preprocessing on compiler errors", async () => {
    vol.fromJSON({ "/work/impl.c": SOURCE });
    const service = new QueuedService([
      ok({ code: 1, stdout: [], stderr: lines("impl.c:3:2: error: #error unsupported") }),
    ]);
    const runner = new JobRunner({ service, config: config() });

    const result = await runner.run(variant(), target());

    expect(result).toMatchObject({
      stage: "preprocessing",
      passed: false,
      hasErrors: true,
      apiError: false,
    });
    expect(readArtifact("preprocess_err.txt")).toBe(
      "impl.c:3:2: error: #error unsupported"
    );
    expect(service.requests).toHaveLength(1);
  });

  it("treats empty preprocessor output as a failure", async () => {
    vol.fromJSON({ "/work/impl.c": SOURCE });
    const service = new QueuedService([preprocessed("  \n")]);
    const runner = new JobRunner({ service, config: config() });

    const result = await runner.run(variant(), target());

    expect(result.stage).toBe("preprocessing");
    expect(result.passed).toBe(false);
    expect(readArtifact("preprocess_err.txt")).toBe("No preprocessed output");
  });

  it("passes a clean preprocess-only job without running it", async () => {
    vol.fromJSON({ "/work/impl.c": SOURCE });
    const service = new QueuedService([preprocessed("int x;")]);
    const runner = new JobRunner({
      service,
      config: config({ preprocessOnly: true }),
    });

    const result = await runner.run(variant(), target());

    expect(result.stage).toBe("preprocessing");
    expect(result.passed).toBe(true);
    expect(Object.keys(result.files).sort()).toEqual([
      "preprocess_err",
      "preprocessed",
      "result",
    ]);
    expect(service.requests).toHaveLength(1);
  });

  it("keeps going after preprocess errors in preprocess-only mode", async () => {
    vol.fromJSON({ "/work/impl.c": SOURCE });
    const service = new QueuedService([
      ok({
        code: 1,
        stdout: [],
        stderr: lines("impl.c:1:10: error: missing.h: No such file"),
        ppOutput: { output: "int x;" },
      }),
    ]);
    const runner = new JobRunner({
      service,
      config: config({ preprocessOnly: true }),
    });

    const result = await runner.run(variant(), target());

    expect(result).toMatchObject({
      stage: "preprocessing",
      passed: false,
      hasErrors: true,
    });
    expect(readArtifact("preprocessed.c")).toBe("int x;");
  });

  it("saves the recorded raw response in debug mode", async () => {
    vol.fromJSON({ "/work/impl.c": SOURCE });
    const service = new QueuedService([
      preprocessed("int x;"),
      executed(0, [], []),
    ]);
    const recorder = new ResponseRecorder();
    recorder.record({ raw: "body" });
    const runner = new JobRunner({
      service,
      config: config({ debug: true }),
      recorder,
    });

    await runner.run(variant(), target());

    expect(JSON.parse(readArtifact("debug_response.json"))).toEqual({
      raw: "body",
    });
  });

  it("adds auxiliary files to the request", async () => {
    vol.fromJSON({
      "/work/impl.c": SOURCE,
      "/work/include/config.h": "#define LEVEL 3\n",
    });
    const service = new QueuedService([
      preprocessed("int x;"),
      executed(0, [], []),
    ]);
    const runner = new JobRunner({ service, config: config() });

    await runner.run(variant({ includeDirs: ["/work/include"] }), target());

    expect(service.requests[0]?.files).toEqual([
      { filename: "config.h", contents: "#define LEVEL 3\n" },
    ]);
  });
});
