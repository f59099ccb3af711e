import { readFile } from "node:fs/promises";
import { isAbsolute, resolve } from "node:path";
import { load } from "js-yaml";
import { ConfigError } from "./errors.js";
import type {
  AuxiliaryFile,
  CompilerTarget,
  LocalMode,
  MatrixConfig,
  Settings,
  TestVariant,
} from "./types.js";

/**
 * Maximum allowed size for a config file (1MB).
 */
const MAX_CONFIG_SIZE_BYTES = 1 * 1024 * 1024;

const DEFAULT_GROUP = "default";
const DEFAULT_ASSEMBLER = "as";
const DEFAULT_LINKER = "gcc";
const DEFAULT_LOCAL_COMPILER = "gcc";

type RawObject = Readonly<Record<string, unknown>>;

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

// ============================================================================
// Field readers
// ============================================================================

const readText = (
  obj: RawObject,
  key: string,
  path: string
): string | undefined => {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  throw new ConfigError("expected a string", `${path}.${key}`);
};

const readBoolean = (
  obj: RawObject,
  key: string,
  path: string
): boolean | undefined => {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new ConfigError("expected true or false", `${path}.${key}`);
  }
  return value;
};

const readInteger = (
  obj: RawObject,
  key: string,
  path: string
): number | undefined => {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isSafeInteger(value)) {
    throw new ConfigError("expected an integer", `${path}.${key}`);
  }
  return value;
};

const readNumber = (
  obj: RawObject,
  key: string,
  path: string
): number | undefined => {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new ConfigError("expected a non-negative number", `${path}.${key}`);
  }
  return value;
};

/**
 * Reads a list of strings. A single string is a one-item list.
 */
const readList = (obj: RawObject, key: string, path: string): string[] => {
  const value = obj[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (typeof value === "string") {
    return [value];
  }
  if (!Array.isArray(value)) {
    throw new ConfigError("expected a list of strings", `${path}.${key}`);
  }
  return value.map((item, index) => {
    if (typeof item === "string") {
      return item;
    }
    if (typeof item === "number" && Number.isFinite(item)) {
      return String(item);
    }
    throw new ConfigError("expected a string", `${path}.${key}[${index}]`);
  });
};

const pushUnique = (target: string[], items: readonly string[]): void => {
  for (const item of items) {
    if (!target.includes(item)) {
      target.push(item);
    }
  }
};

const resolvePath = (baseDir: string, path: string): string =>
  isAbsolute(path) ? path : resolve(baseDir, path);

// ============================================================================
// Compilers
// ============================================================================

const parseLocalMode = (entry: RawObject, path: string): LocalMode => {
  const localAsm = readBoolean(entry, "local_asm", path) ?? false;
  const localCompile = readBoolean(entry, "local_compile", path) ?? false;

  if (localAsm && localCompile) {
    throw new ConfigError(
      "local_asm and local_compile cannot both be enabled",
      path
    );
  }

  if (localAsm) {
    return {
      kind: "assemble",
      assembler: readText(entry, "assembler", path) ?? DEFAULT_ASSEMBLER,
      assemblerArgs: readList(entry, "assembler_args", path),
      linker: readText(entry, "linker", path) ?? DEFAULT_LINKER,
      linkerArgs: readList(entry, "local_linker_args", path),
    };
  }

  if (localCompile) {
    return {
      kind: "compile",
      compiler: readText(entry, "local_compiler", path) ?? DEFAULT_LOCAL_COMPILER,
      compilerArgs: readList(entry, "local_compiler_args", path),
    };
  }

  return { kind: "remote" };
};

const parseCompiler = (entry: unknown, path: string): CompilerTarget => {
  if (!isObject(entry)) {
    throw new ConfigError("expected an object", path);
  }

  const id = readText(entry, "api_name", path);
  if (!id) {
    throw new ConfigError("api_name is required", path);
  }

  return {
    id,
    displayName: readText(entry, "display_name", path) ?? id,
    alias: readText(entry, "nickname", path),
    extraFlags: readList(entry, "extra_flags", path),
    local: parseLocalMode(entry, path),
  };
};

// ============================================================================
// Tests
// ============================================================================

const INCLUDE_DIR_KEYS = ["include_dirs", "include_directories"] as const;

/**
 * Builds one variant with its group's fields as defaults. Scalars in the
 * variant win; lists are the group's items followed by the variant's,
 * without duplicates.
 */
const parseVariant = (
  variant: RawObject,
  group: RawObject,
  groupName: string,
  path: string,
  groupPath: string,
  baseDir: string
): TestVariant => {
  const scalarText = (key: string): string | undefined =>
    readText(variant, key, path) ?? readText(group, key, groupPath);

  const variantName =
    readText(variant, "variant", path) ??
    readText(variant, "name", path) ??
    readText(variant, "test_name", path) ??
    "";
  const testName =
    readText(variant, "test_name", path) ?? `${groupName}_${variantName}`;
  const isAuto =
    readBoolean(variant, "auto", path) ??
    readBoolean(group, "auto", groupPath) ??
    false;

  const fileName = scalarText("file_name");
  if (!fileName) {
    throw new ConfigError("file_name is required", path);
  }

  const detectValue =
    readInteger(variant, "detect_value", path) ??
    readInteger(group, "detect_value", groupPath);

  const includeInTable =
    readBoolean(variant, "include_in_table", path) ??
    readBoolean(group, "include_in_table", groupPath) ??
    !isAuto;

  const prependLines: string[] = [];
  pushUnique(prependLines, readList(group, "prepend_lines", groupPath));
  pushUnique(prependLines, readList(variant, "prepend_lines", path));

  const fileNames: string[] = [];
  pushUnique(fileNames, readList(group, "additional_files", groupPath));
  pushUnique(fileNames, readList(variant, "additional_files", path));

  const includeDirs: string[] = [];
  for (const key of INCLUDE_DIR_KEYS) {
    pushUnique(includeDirs, readList(group, key, groupPath));
  }
  for (const key of INCLUDE_DIR_KEYS) {
    pushUnique(includeDirs, readList(variant, key, path));
  }

  const additionalFiles: AuxiliaryFile[] = fileNames.map((name) => ({
    name,
    path: resolvePath(baseDir, name),
  }));

  return {
    testName,
    variant: variantName,
    group: groupName,
    fileName: resolvePath(baseDir, fileName),
    displayName: scalarText("display_name") ?? variantName,
    prependLines,
    detectMacro: scalarText("detect_macro"),
    detectValue,
    isAuto,
    includeInTable,
    additionalFiles,
    includeDirs: includeDirs.map((dir) => resolvePath(baseDir, dir)),
  };
};

const parseTestEntry = (
  entry: unknown,
  path: string,
  baseDir: string
): TestVariant[] => {
  if (!isObject(entry)) {
    throw new ConfigError("expected an object", path);
  }

  const groupName = readText(entry, "group", path) ?? DEFAULT_GROUP;

  const { variants, ...defaults } = entry;
  if (variants === undefined || variants === null) {
    // A flat entry is a group of one; only its group name is shared.
    return [
      parseVariant(entry, { group: groupName }, groupName, path, path, baseDir),
    ];
  }

  if (!Array.isArray(variants)) {
    throw new ConfigError("expected a list", `${path}.variants`);
  }

  return variants.map((variant, index) => {
    const variantPath = `${path}.variants[${index}]`;
    if (!isObject(variant)) {
      throw new ConfigError("expected an object", variantPath);
    }
    return parseVariant(variant, defaults, groupName, variantPath, path, baseDir);
  });
};

const assertSingleAutoPerGroup = (tests: readonly TestVariant[]): void => {
  const autoByGroup = new Map<string, string>();
  for (const test of tests) {
    if (!test.isAuto) {
      continue;
    }
    const existing = autoByGroup.get(test.group);
    if (existing !== undefined) {
      throw new ConfigError(
        `group '${test.group}' has more than one auto variant ('${existing}' and '${test.variant}')`
      );
    }
    autoByGroup.set(test.group, test.variant);
  }
};

// ============================================================================
// Settings
// ============================================================================

const parseSettings = (value: unknown): Settings => {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isObject(value)) {
    throw new ConfigError("expected an object", "settings");
  }
  return {
    language: readText(value, "language", "settings"),
    delay: readNumber(value, "delay", "settings"),
    apiUrl: readText(value, "api_url", "settings"),
    resultsDir: readText(value, "results_dir", "settings"),
  };
};

// ============================================================================
// Entry points
// ============================================================================

const readEntries = (doc: RawObject, key: string): unknown[] => {
  const value = doc[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ConfigError("expected a list", key);
  }
  return value;
};

/**
 * Parses a YAML matrix config. Relative paths resolve against `baseDir`.
 *
 * @throws ConfigError when the document is malformed
 */
export const parseConfig = (content: string, baseDir: string): MatrixConfig => {
  if (content.length > MAX_CONFIG_SIZE_BYTES) {
    throw new ConfigError(
      `Config file exceeds maximum size of ${MAX_CONFIG_SIZE_BYTES} bytes`
    );
  }

  let doc: unknown;
  try {
    doc = load(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid YAML: ${message}`);
  }

  if (!isObject(doc)) {
    throw new ConfigError("Config YAML must be an object");
  }

  const compilers = readEntries(doc, "compilers").map((entry, index) =>
    parseCompiler(entry, `compilers[${index}]`)
  );
  const tests = readEntries(doc, "tests").flatMap((entry, index) =>
    parseTestEntry(entry, `tests[${index}]`, baseDir)
  );
  assertSingleAutoPerGroup(tests);

  return { compilers, tests, settings: parseSettings(doc.settings) };
};

/**
 * Reads and parses a config file. Relative paths inside it resolve against
 * the working directory, not the file's own directory.
 */
export const loadConfig = async (
  configPath: string,
  cwd: string = process.cwd()
): Promise<MatrixConfig> => {
  let content: string;
  try {
    content = await readFile(resolvePath(cwd, configPath), "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read config file: ${message}`);
  }
  return parseConfig(content, cwd);
};
