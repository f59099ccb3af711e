/**
 * One line of captured output as the compilation service returns it.
 */
export interface OutputLine {
  readonly text?: string;
  readonly tag?: {
    readonly line?: number;
    readonly column?: number;
    readonly text?: string;
    readonly severity?: number;
  };
}

export interface BuildResult {
  readonly code?: number;
  readonly stdout?: readonly OutputLine[];
  readonly stderr?: readonly OutputLine[];
  readonly execTime?: number | string;
}

/**
 * The parts of a service response that carry compiler diagnostics.
 *
 * Execution responses nest the compiler's streams under `buildResult` and use
 * the top-level streams for program output. Preprocess and compile responses
 * put compiler diagnostics at the top level.
 */
export interface CompilerOutput {
  readonly code?: number;
  readonly stdout?: readonly OutputLine[];
  readonly stderr?: readonly OutputLine[];
  readonly buildResult?: BuildResult;
}

export interface CompilerStreams {
  readonly stderr: readonly OutputLine[];
  readonly stdout: readonly OutputLine[];
}

export type DiagnosticSeverity = "fatal error" | "error" | "warning" | "note";

export interface Diagnostic {
  readonly file: string;
  readonly line: number;
  readonly column?: number;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
}
