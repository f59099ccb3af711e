import { readdir, readFile, stat } from "node:fs/promises";
import { basename, join } from "node:path";
import type { TestVariant } from "./types.js";

export interface LoadedFile {
  readonly filename: string;
  readonly contents: string;
}

export interface LoadedFiles {
  readonly files: readonly LoadedFile[];
  readonly warnings: readonly string[];
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const isFile = async (path: string): Promise<boolean> => {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
};

const isDirectory = async (path: string): Promise<boolean> => {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
};

/**
 * Finds an auxiliary file: the configured path first, then each include
 * directory by the configured relative name, then by basename.
 */
const locate = async (
  name: string,
  path: string,
  includeDirs: readonly string[]
): Promise<string | undefined> => {
  if (await isFile(path)) {
    return path;
  }
  for (const dir of includeDirs) {
    for (const candidate of [join(dir, name), join(dir, basename(name))]) {
      if (await isFile(candidate)) {
        return candidate;
      }
    }
  }
  return undefined;
};

/**
 * Reads a test's auxiliary files and the contents of its include
 * directories. Explicit files keep their configured name; directory
 * entries are named by basename. A name is only added once. Unreadable
 * entries are reported as warnings and skipped.
 */
export const loadAuxiliaryFiles = async (
  test: TestVariant
): Promise<LoadedFiles> => {
  const files: LoadedFile[] = [];
  const warnings: string[] = [];
  const seen = new Set<string>();

  for (const file of test.additionalFiles) {
    if (seen.has(file.name)) {
      continue;
    }
    const resolved = await locate(file.name, file.path, test.includeDirs);
    if (resolved === undefined) {
      warnings.push(
        `Could not read file ${file.path} (also not found in include directories)`
      );
      continue;
    }
    try {
      files.push({
        filename: file.name,
        contents: await readFile(resolved, "utf-8"),
      });
      seen.add(file.name);
    } catch (error) {
      warnings.push(`Could not read file ${resolved}: ${describeError(error)}`);
    }
  }

  for (const dir of test.includeDirs) {
    if (!(await isDirectory(dir))) {
      warnings.push(`Include directory does not exist: ${dir}`);
      continue;
    }

    let entries: string[];
    try {
      entries = (await readdir(dir)).sort();
    } catch (error) {
      warnings.push(`Could not list directory ${dir}: ${describeError(error)}`);
      continue;
    }

    for (const entry of entries) {
      const path = join(dir, entry);
      if (seen.has(entry) || !(await isFile(path))) {
        continue;
      }
      try {
        files.push({ filename: entry, contents: await readFile(path, "utf-8") });
        seen.add(entry);
      } catch (error) {
        warnings.push(`Could not read file ${path}: ${describeError(error)}`);
      }
    }
  }

  return { files, warnings };
};
