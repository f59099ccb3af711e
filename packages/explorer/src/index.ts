// biome-ignore-all lint/performance/noBarrelFile: This is the package entry point
export type {
  CompilationService,
  ExplorerClientOptions,
} from "./client.js";
export {
  DEFAULT_API_URL,
  DEFAULT_TIMEOUT_MS,
  ExplorerClient,
  resolveApiUrl,
} from "./client.js";
export { ExplorerRequestError } from "./errors.js";
export { readCompileResponse } from "./parse-response.js";
export type { CompilerProjectOptions } from "./project.js";
export { CompilerProject } from "./project.js";
export type { RequestSource } from "./requests.js";
export {
  buildCompileRequest,
  buildExecuteRequest,
  buildPreprocessRequest,
} from "./requests.js";
export type {
  AsmLine,
  CompileOptions,
  CompileRequest,
  CompileResponse,
  ExecuteOptions,
  FileEntry,
  Library,
  PreprocessOptions,
} from "./types.js";
