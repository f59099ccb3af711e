import {
  compilerStderr,
  compilerStreams,
  errorCount,
  hasErrors,
  hasWarnings,
  joinLines,
  type OutputLine,
  warningCount,
} from "@macrobench/diagnostics";
import {
  extractMacroProbes,
  injectIncludeProbes,
  injectMacroProbe,
  macroProbeValue,
  ProbeSet,
  restoreIncludes,
  stripProbeLines,
} from "@macrobench/probe";
import { err, ok, type Result, unwrapOr } from "@macrobench/result";
import type { CompilationService } from "./client.js";
import {
  buildCompileRequest,
  buildExecuteRequest,
  buildPreprocessRequest,
  type RequestSource,
} from "./requests.js";
import type {
  CompileOptions,
  CompileRequest,
  CompileResponse,
  ExecuteOptions,
  FileEntry,
  Library,
  PreprocessOptions,
} from "./types.js";

export interface CompilerProjectOptions {
  readonly compilerId: string;
  readonly source?: string;
  readonly language?: string;
  /**
   * Flags passed to the remote compiler, space separated.
   */
  readonly compilerArgs?: string;
}

const NO_RESPONSE = "No response available";

const successValue = <T>(result: Result<T>): T | undefined =>
  unwrapOr<T | undefined, string>(result, undefined);

const toInteger = (value: number | string | undefined): number | undefined => {
  if (value === undefined) {
    return undefined;
  }
  const parsed = typeof value === "number" ? value : Number(value);
  return Number.isFinite(parsed) ? Math.trunc(parsed) : undefined;
};

/**
 * One compilation unit: source, auxiliary files, libraries and flags for a
 * single remote compiler, plus its probe state and the last response.
 */
export class CompilerProject {
  readonly compilerId: string;
  readonly language: string;
  readonly probes = new ProbeSet();
  compilerArgs: string;
  private currentSource: string;
  private readonly files: FileEntry[] = [];
  private readonly libraries: Library[] = [];
  private lastResponse: CompileResponse | undefined;
  private readonly service: CompilationService;

  constructor(service: CompilationService, options: CompilerProjectOptions) {
    this.service = service;
    this.compilerId = options.compilerId;
    this.currentSource = options.source ?? "";
    this.language = options.language ?? "c";
    this.compilerArgs = options.compilerArgs ?? "";
  }

  get source(): string {
    return this.currentSource;
  }

  get auxiliaryFiles(): readonly FileEntry[] {
    return this.files;
  }

  get response(): CompileResponse | undefined {
    return this.lastResponse;
  }

  setSource(source: string): this {
    this.currentSource = source;
    this.probes.clearIncludeProbes();
    return this;
  }

  addFile(filename: string, contents: string): this {
    this.files.push({ filename, contents });
    return this;
  }

  addLibrary(id: string, version: string): this {
    this.libraries.push({ id, version });
    return this;
  }

  clearFiles(): this {
    this.files.length = 0;
    return this;
  }

  clearLibraries(): this {
    this.libraries.length = 0;
    return this;
  }

  /**
   * Appends a probe that captures the value `name` expands to. The value is
   * available from {@link macroProbeValue} after the next preprocess.
   */
  injectMacroProbe(name: string): this {
    this.currentSource = injectMacroProbe(this.currentSource, this.probes, name);
    return this;
  }

  macroProbeValue(name: string): Result<number> {
    return macroProbeValue(this.probes, name);
  }

  clearMacroProbes(): this {
    this.probes.clearMacroProbes();
    return this;
  }

  private requestSource(): RequestSource {
    return {
      source: this.currentSource,
      compilerId: this.compilerId,
      language: this.language,
      files: [...this.files],
      libraries: [...this.libraries],
      compilerArgs: this.compilerArgs,
    };
  }

  private async submit(
    request: CompileRequest
  ): Promise<Result<CompileResponse>> {
    const result = await this.service.compile(this.compilerId, request);
    if (result.success) {
      this.lastResponse = result.value;
    }
    return result;
  }

  /**
   * Runs the preprocessor.
   *
   * Order matters: the original source is restored before anything else
   * happens, includes are collapsed before macro values are read, and probe
   * lines are stripped only after the values are cached.
   */
  async preprocess(
    options: PreprocessOptions = {}
  ): Promise<Result<CompileResponse>> {
    const originalSource = this.currentSource;
    if (options.restoreIncludes) {
      const instrumented = injectIncludeProbes(originalSource);
      this.probes.setIncludeProbes(instrumented.probes);
      this.currentSource = instrumented.source;
    } else {
      this.probes.clearIncludeProbes();
    }

    let result: Result<CompileResponse>;
    try {
      result = await this.service.compile(
        this.compilerId,
        buildPreprocessRequest(this.requestSource(), options)
      );
    } finally {
      this.currentSource = originalSource;
    }

    if (!result.success) {
      return result;
    }

    let output = result.value.ppOutput?.output;
    if (output !== undefined) {
      if (options.restoreIncludes) {
        output = restoreIncludes(output, this.probes.includeProbes);
      }
      if (this.probes.hasMacroProbes) {
        extractMacroProbes(output, this.probes);
        output = stripProbeLines(output, this.probes);
      }
      if (options.trim ?? true) {
        output = output.trim();
      }
    }

    const response: CompileResponse =
      output === undefined
        ? result.value
        : { ...result.value, ppOutput: { ...result.value.ppOutput, output } };
    this.lastResponse = response;
    return ok(response);
  }

  compile(options: CompileOptions = {}): Promise<Result<CompileResponse>> {
    return this.submit(buildCompileRequest(this.requestSource(), options));
  }

  execute(options: ExecuteOptions = {}): Promise<Result<CompileResponse>> {
    return this.submit(buildExecuteRequest(this.requestSource(), options));
  }

  getPreprocessed(): Result<string> {
    if (!this.lastResponse) {
      return err(`${NO_RESPONSE}; call preprocess() first`);
    }
    const output = this.lastResponse.ppOutput?.output;
    if (output === undefined) {
      return err("No preprocessed output in last response");
    }
    return ok(output);
  }

  get preprocessed(): string | undefined {
    return successValue(this.getPreprocessed());
  }

  getAssembly(): Result<string> {
    if (!this.lastResponse) {
      return err(`${NO_RESPONSE}; call compile() first`);
    }
    return ok((this.lastResponse.asm ?? []).map((line) => line.text).join("\n"));
  }

  get assembly(): string | undefined {
    return successValue(this.getAssembly());
  }

  getStdout(): Result<string> {
    if (!this.lastResponse) {
      return err(`${NO_RESPONSE}; call execute() first`);
    }
    return ok(joinLines(this.lastResponse.stdout));
  }

  get stdout(): string | undefined {
    return successValue(this.getStdout());
  }

  getStderr(): Result<string> {
    if (!this.lastResponse) {
      return err(`${NO_RESPONSE}; call execute() first`);
    }
    return ok(joinLines(this.lastResponse.stderr));
  }

  get stderr(): string | undefined {
    return successValue(this.getStderr());
  }

  getExitCode(): Result<number> {
    if (!this.lastResponse) {
      return err(`${NO_RESPONSE}; call execute() first`);
    }
    const code = this.lastResponse.code;
    if (code === undefined) {
      return err("No exit code present in last response");
    }
    return ok(code);
  }

  get exitCode(): number | undefined {
    return successValue(this.getExitCode());
  }

  getExecTime(): Result<number> {
    if (!this.lastResponse) {
      return err(`${NO_RESPONSE}; call execute() or compile() first`);
    }
    const time = toInteger(this.lastResponse.execTime);
    if (time === undefined) {
      return err("No execTime present in last response");
    }
    return ok(time);
  }

  get execTime(): number | undefined {
    return successValue(this.getExecTime());
  }

  getBuildExecTime(): Result<number> {
    if (!this.lastResponse) {
      return err(`${NO_RESPONSE}; call execute() first`);
    }
    const time = toInteger(this.lastResponse.buildResult?.execTime);
    if (time === undefined) {
      return err("No buildResult.execTime present in last response");
    }
    return ok(time);
  }

  get buildExecTime(): number | undefined {
    return successValue(this.getBuildExecTime());
  }

  get compilationSucceeded(): boolean {
    return this.lastResponse?.code === 0;
  }

  get executionSucceeded(): boolean {
    return this.lastResponse?.didExecute === true && this.lastResponse.code === 0;
  }

  get didExecute(): boolean {
    return this.lastResponse?.didExecute === true;
  }

  /**
   * Compiler diagnostics lines, stderr first.
   */
  get compilerMessages(): readonly OutputLine[] {
    const { stderr, stdout } = compilerStreams(this.lastResponse);
    return [...stderr, ...stdout];
  }

  get compilerStderr(): string {
    return compilerStderr(this.lastResponse);
  }

  get hasErrors(): boolean {
    return hasErrors(this.lastResponse);
  }

  get hasWarnings(): boolean {
    return hasWarnings(this.lastResponse);
  }

  get errorCount(): number {
    return errorCount(this.lastResponse);
  }

  get warningCount(): number {
    return warningCount(this.lastResponse);
  }
}
