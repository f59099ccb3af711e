/**
 * Where a compiled test runs.
 *
 * - `remote`: the service compiles and executes
 * - `assemble`: the service emits assembly, assembled and linked locally
 * - `compile`: the service only preprocesses, compiled locally
 */
export type LocalMode =
  | { readonly kind: "remote" }
  | {
      readonly kind: "assemble";
      readonly assembler: string;
      readonly assemblerArgs: readonly string[];
      readonly linker: string;
      readonly linkerArgs: readonly string[];
    }
  | {
      readonly kind: "compile";
      readonly compiler: string;
      readonly compilerArgs: readonly string[];
    };

export type LocalModeKind = LocalMode["kind"];

export interface CompilerTarget {
  /**
   * Remote compiler id, e.g. `cg132`.
   */
  readonly id: string;
  readonly displayName: string;
  /**
   * Short name used by `--compiler`.
   */
  readonly alias?: string;
  readonly extraFlags: readonly string[];
  readonly local: LocalMode;
}

export interface AuxiliaryFile {
  /**
   * Name as configured; used as the remote file name.
   */
  readonly name: string;
  /**
   * Absolute path on disk.
   */
  readonly path: string;
}

export interface TestVariant {
  readonly testName: string;
  readonly variant: string;
  readonly group: string;
  readonly fileName: string;
  readonly displayName: string;
  readonly prependLines: readonly string[];
  readonly detectMacro?: string;
  readonly detectValue?: number;
  readonly isAuto: boolean;
  readonly includeInTable: boolean;
  readonly additionalFiles: readonly AuxiliaryFile[];
  readonly includeDirs: readonly string[];
}

export interface Settings {
  readonly language?: string;
  /**
   * Seconds to wait after each remote request.
   */
  readonly delay?: number;
  readonly apiUrl?: string;
  readonly resultsDir?: string;
}

export interface MatrixConfig {
  readonly compilers: readonly CompilerTarget[];
  readonly tests: readonly TestVariant[];
  readonly settings: Settings;
}
