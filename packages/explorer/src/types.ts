import type { BuildResult, CompilerOutput, OutputLine } from "@macrobench/diagnostics";

export interface FileEntry {
  readonly filename: string;
  readonly contents: string;
}

export interface Library {
  readonly id: string;
  readonly version: string;
}

export interface ExecuteParameters {
  readonly args: readonly string[];
  readonly stdin: string;
  readonly runtimeTools?: readonly unknown[];
}

export interface Filters {
  readonly binary?: boolean;
  readonly binaryObject?: boolean;
  readonly commentOnly?: boolean;
  readonly debugCalls?: boolean;
  readonly demangle?: boolean;
  readonly directives?: boolean;
  readonly execute?: boolean;
  readonly intel?: boolean;
  readonly labels?: boolean;
  readonly libraryCode?: boolean;
  readonly trim?: boolean;
}

export interface CompilerOptions {
  readonly producePp?: {
    readonly "filter-headers": boolean;
    readonly "clang-format": boolean;
  };
  readonly produceGccDump?: Record<string, never>;
  readonly produceOptInfo?: boolean;
  readonly produceCfg?: boolean;
  readonly produceIr?: null;
  readonly produceDevice?: boolean;
  readonly skipAsm?: boolean;
  readonly executorRequest?: boolean;
  readonly overrides?: readonly unknown[];
}

export interface RequestOptions {
  readonly userArguments: string;
  readonly tools: readonly unknown[];
  readonly libraries: readonly Library[];
  readonly executeParameters: ExecuteParameters;
  readonly compilerOptions: CompilerOptions;
  readonly filters: Filters;
}

/**
 * Body of `POST <base>/<compiler>/compile`.
 */
export interface CompileRequest {
  readonly source: string;
  readonly compiler: string;
  readonly lang: string;
  readonly files: readonly FileEntry[];
  readonly bypassCache: boolean;
  readonly allowStoreCodeDebug: boolean;
  readonly options: RequestOptions;
}

export interface AsmLine {
  readonly text: string;
}

export interface PpOutput {
  readonly output?: string;
}

/**
 * The fields of a compile response this tool reads. Which ones are present
 * depends on the request kind.
 */
export interface CompileResponse extends CompilerOutput {
  readonly asm?: readonly AsmLine[];
  readonly ppOutput?: PpOutput;
  readonly didExecute?: boolean;
  readonly execTime?: number | string;
  readonly buildResult?: BuildResult;
  readonly stdout?: readonly OutputLine[];
  readonly stderr?: readonly OutputLine[];
}

export interface PreprocessOptions {
  readonly filterHeaders?: boolean;
  readonly clangFormat?: boolean;
  /**
   * Trim leading and trailing whitespace from the output. Defaults to true.
   */
  readonly trim?: boolean;
  /**
   * Instrument includes and collapse header expansions back into the
   * original directives.
   */
  readonly restoreIncludes?: boolean;
}

export interface CompileOptions {
  readonly intel?: boolean;
  readonly directives?: boolean;
  readonly labels?: boolean;
  readonly commentOnly?: boolean;
}

export interface ExecuteOptions {
  readonly args?: readonly string[];
  readonly stdin?: string;
}
