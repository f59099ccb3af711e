import {
  type CompilationService,
  type CompileRequest,
  type CompileResponse,
  CompilerProject,
} from "@macrobench/explorer";
import { err, ok, type Result } from "@macrobench/result";
import { assembleAndRun, compileAndRun } from "@macrobench/toolchain";
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { CompilerTarget } from "../config/types.js";
import { dispatch } from "./dispatcher.js";

vi.mock("@macrobench/toolchain", () => ({
  assembleAndRun: vi.fn(),
  compileAndRun: vi.fn(),
}));

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

const remote: CompilerTarget = {
  id: "cg132",
  displayName: "GCC 13.2",
  extraFlags: [],
  local: { kind: "remote" },
};

const assembling: CompilerTarget = {
  id: "armv7-clang",
  displayName: "ARM Clang",
  extraFlags: [],
  local: {
    kind: "assemble",
    assembler: "as",
    assemblerArgs: ["--32"],
    linker: "gcc",
    linkerArgs: ["-static"],
  },
};

const compiling: CompilerTarget = {
  id: "rv64-gcc",
  displayName: "RISC-V GCC",
  extraFlags: [],
  local: { kind: "compile", compiler: "cc", compilerArgs: ["-w"] },
};

const lines = (...texts: string[]) => texts.map((text) => ({ text }));

const createProject = (service: CompilationService): CompilerProject =>
  new CompilerProject(service, {
    compilerId: "cg132",
    source: "int main(void) { return 0; }\n",
  });

describe("dispatch", () => {
  const pause = vi.fn(async () => undefined);

  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe("remote execution", () => {
    it("returns the program's streams and exit code", async () => {
      const service = new QueuedService([
        ok({
          code: 3,
          didExecute: true,
          stdout: lines("hello", "world"),
          stderr: lines("oops"),
          buildResult: { code: 0, stdout: [], stderr: [] },
        }),
      ]);

      const result = await dispatch(createProject(service), remote, { pause });

      expect(result).toEqual({
        success: true,
        value: {
          stdout: "hello\nworld",
          stderr: "oops",
          exitCode: 3,
          warnings: false,
          compileStderr: "",
        },
      });
      expect(pause).toHaveBeenCalledTimes(1);
    });

    it("reports compiler errors when nothing executed", async () => {
      const service = new QueuedService([
        ok({
          code: 1,
          didExecute: false,
          buildResult: {
            code: 1,
            stdout: [],
            stderr: lines("main.c:1:1: warning: x", "main.c:2:1: error: y"),
          },
        }),
      ]);

      const result = await dispatch(createProject(service), remote, { pause });

      expect(result).toEqual({
        success: false,
        error: {
          stage: "compilation",
          message: "main.c:1:1: warning: x\nmain.c:2:1: error: y",
          apiError: false,
          hasErrors: true,
          hasWarnings: true,
          assembly: undefined,
        },
      });
    });

    it("flags transport failures as API errors", async () => {
      const service = new QueuedService([err("HTTP 503: Service Unavailable", 503)]);

      const result = await dispatch(createProject(service), remote, { pause });

      expect(result.success).toBe(false);
      expect(!result.success && result.error).toMatchObject({
        message: "HTTP 503: Service Unavailable",
        apiError: true,
        hasErrors: false,
      });
    });

    it("uses -1 when the service reports no exit code", async () => {
      const service = new QueuedService([ok({ didExecute: true })]);

      const result = await dispatch(createProject(service), remote, { pause });

      expect(result.success && result.value.exitCode).toBe(-1);
    });
  });

  describe("local assembly", () => {
    it("requests unfiltered assembly and runs it locally", async () => {
      vi.mocked(assembleAndRun).mockResolvedValue(
        ok({ stdout: "42", stderr: "", exitCode: 0, buildStderr: "note" })
      );
      const service = new QueuedService([
        ok({ code: 0, asm: [{ text: "main:" }, { text: "\tret" }] }),
      ]);

      const result = await dispatch(createProject(service), assembling, {
        pause,
      });

      expect(service.requests[0]?.options.filters).toMatchObject({
        intel: false,
        directives: false,
        labels: false,
        commentOnly: false,
      });
      expect(vi.mocked(assembleAndRun)).toHaveBeenCalledWith("main:\n\tret", {
        assembler: "as",
        assemblerArgs: ["--32"],
        linker: "gcc",
        linkerArgs: ["-static"],
        onCommand: undefined,
      });
      expect(result).toEqual({
        success: true,
        value: {
          stdout: "42",
          stderr: "",
          exitCode: 0,
          warnings: false,
          compileStderr: "note",
          assembly: "main:\n\tret",
        },
      });
    });

    it("stops at remote compile errors", async () => {
      const service = new QueuedService([
        ok({ code: 1, stderr: lines("main.c:1:1: error: nope") }),
      ]);

      const result = await dispatch(createProject(service), assembling, {
        pause,
      });

      expect(!result.success && result.error.message).toBe(
        "main.c:1:1: error: nope"
      );
      expect(vi.mocked(assembleAndRun)).not.toHaveBeenCalled();
    });

    it("keeps the assembly when the local build fails", async () => {
      vi.mocked(assembleAndRun).mockResolvedValue(
        err("Assembly failed:\nbad\n")
      );
      const service = new QueuedService([ok({ code: 0, asm: [{ text: "x" }] })]);

      const result = await dispatch(createProject(service), assembling, {
        pause,
      });

      expect(!result.success && result.error).toEqual({
        stage: "compilation",
        message: "Assembly failed:\nbad\n",
        apiError: false,
        hasErrors: false,
        hasWarnings: false,
        assembly: "x",
      });
    });
  });

  describe("local compilation", () => {
    it("compiles the preprocessed text with the auxiliary files", async () => {
      vi.mocked(compileAndRun).mockResolvedValue(
        ok({ stdout: "ok", stderr: "", exitCode: 0, buildStderr: "" })
      );
      const service = new QueuedService([
        ok({ code: 0, ppOutput: { output: "int main(void) { return 0; }" } }),
      ]);
      const project = createProject(service).addFile("defs.h", "#define X 1");
      await project.preprocess({ restoreIncludes: true });

      const onCommand = vi.fn();
      const result = await dispatch(project, compiling, { pause, onCommand });

      expect(vi.mocked(compileAndRun)).toHaveBeenCalledWith(
        "int main(void) { return 0; }",
        [{ filename: "defs.h", contents: "#define X 1" }],
        { compiler: "cc", compilerArgs: ["-w"], onCommand }
      );
      expect(result.success && result.value.stdout).toBe("ok");
      expect(pause).not.toHaveBeenCalled();
    });

    it("reports a failed local build with the compiler's stderr", async () => {
      vi.mocked(compileAndRun).mockResolvedValue(
        err("Compilation failed:\nmain.c:2: error: bad\n")
      );
      const service = new QueuedService([
        ok({ code: 0, ppOutput: { output: "int main(void) { return 0; }" } }),
      ]);
      const project = createProject(service);
      await project.preprocess();

      const result = await dispatch(project, compiling, { pause });

      expect(result).toEqual({
        success: false,
        error: {
          stage: "compilation",
          message: "Compilation failed:\nmain.c:2: error: bad\n",
          apiError: false,
          hasErrors: false,
          hasWarnings: false,
          assembly: undefined,
        },
      });
    });

    it("fails without preprocessed text", async () => {
      const result = await dispatch(
        createProject(new QueuedService([])),
        compiling,
        { pause }
      );

      expect(!result.success && result.error.message).toBe(
        "No response available; call preprocess() first"
      );
    });
  });
});
