// biome-ignore-all lint/performance/noBarrelFile: This is the module entry point
export { ConfigError } from "./errors.js";
export type { LoadedFile, LoadedFiles } from "./files.js";
export { loadAuxiliaryFiles } from "./files.js";
export { loadConfig, parseConfig } from "./loader.js";
export type {
  AuxiliaryFile,
  CompilerTarget,
  LocalMode,
  LocalModeKind,
  MatrixConfig,
  Settings,
  TestVariant,
} from "./types.js";
