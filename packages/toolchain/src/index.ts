// biome-ignore-all lint/performance/noBarrelFile: This is the package entry point
export type {
  AssembleOptions,
  CompileOptions,
  ExecuteOptions,
  LocalRunOutput,
  SourceFile,
} from "./local.js";
export {
  assembleAndRun,
  compileAndRun,
  EXECUTION_TIMEOUT_MS,
  executeBinary,
  TOOLCHAIN_TIMEOUT_MS,
} from "./local.js";
export { needsNoPie } from "./pie.js";
export type { ProcessOutput, RunProcessOptions } from "./process.js";
export { formatCommand, runProcess } from "./process.js";
export { withTempDir } from "./temp.js";
export type { ToolchainName, ToolchainVersion } from "./version.js";
export {
  detectToolchainVersion,
  formatToolchainVersion,
  parseToolchainVersion,
} from "./version.js";
