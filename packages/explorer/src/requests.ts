import type {
  CompileOptions,
  CompileRequest,
  ExecuteOptions,
  FileEntry,
  Library,
  PreprocessOptions,
  RequestOptions,
} from "./types.js";

/**
 * Inputs shared by every request kind.
 */
export interface RequestSource {
  readonly source: string;
  readonly compilerId: string;
  readonly language: string;
  readonly files: readonly FileEntry[];
  readonly libraries: readonly Library[];
  readonly compilerArgs: string;
}

type VariableOptions = Pick<
  RequestOptions,
  "compilerOptions" | "filters" | "executeParameters"
>;

const buildRequest = (
  input: RequestSource,
  options: VariableOptions
): CompileRequest => ({
  source: input.source,
  compiler: input.compilerId,
  lang: input.language,
  files: input.files,
  bypassCache: false,
  allowStoreCodeDebug: true,
  options: {
    userArguments: input.compilerArgs,
    tools: [],
    libraries: input.libraries,
    ...options,
  },
});

export const buildPreprocessRequest = (
  input: RequestSource,
  options: PreprocessOptions = {}
): CompileRequest =>
  buildRequest(input, {
    executeParameters: { args: [], stdin: "" },
    compilerOptions: {
      producePp: {
        "filter-headers": options.filterHeaders ?? true,
        "clang-format": options.clangFormat ?? false,
      },
      produceGccDump: {},
      produceOptInfo: false,
      produceCfg: false,
      produceIr: null,
      produceDevice: false,
      overrides: [],
    },
    filters: {
      binaryObject: false,
      binary: false,
      execute: false,
      intel: true,
      demangle: true,
      labels: true,
      libraryCode: true,
      directives: true,
      commentOnly: true,
      trim: false,
      debugCalls: false,
    },
  });

/**
 * Compile to assembly. AT&T syntax by default so the output can be fed to a
 * GNU assembler.
 */
export const buildCompileRequest = (
  input: RequestSource,
  options: CompileOptions = {}
): CompileRequest =>
  buildRequest(input, {
    executeParameters: { args: [], stdin: "" },
    compilerOptions: {
      skipAsm: false,
      executorRequest: false,
      overrides: [],
    },
    filters: {
      binary: false,
      binaryObject: false,
      commentOnly: options.commentOnly ?? true,
      demangle: true,
      directives: options.directives ?? true,
      execute: false,
      intel: options.intel ?? false,
      labels: options.labels ?? true,
      libraryCode: false,
      trim: false,
      debugCalls: false,
    },
  });

export const buildExecuteRequest = (
  input: RequestSource,
  options: ExecuteOptions = {}
): CompileRequest =>
  buildRequest(input, {
    executeParameters: {
      args: options.args ?? [],
      stdin: options.stdin ?? "",
      runtimeTools: [],
    },
    compilerOptions: { executorRequest: true },
    filters: { execute: true },
  });
