// biome-ignore-all lint/performance/noBarrelFile: This is the package entry point
export {
  compilerStderr,
  compilerStreams,
  errorCount,
  hasErrors,
  hasWarnings,
  joinLines,
  warningCount,
} from "./classifier.js";
export {
  formatDiagnostic,
  parseDiagnosticLine,
  parseDiagnostics,
  stripAnsi,
} from "./parse.js";
export type {
  BuildResult,
  CompilerOutput,
  CompilerStreams,
  Diagnostic,
  DiagnosticSeverity,
  OutputLine,
} from "./types.js";
