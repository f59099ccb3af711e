import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

interface PackageJson {
  version?: string;
}

const FALLBACK_VERSION = "0.0.0";

let cachedVersion: string | undefined;

/**
 * Version of the CLI package, read from its package.json.
 */
export const getVersion = (): string => {
  if (cachedVersion !== undefined) {
    return cachedVersion;
  }
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    const pkgPath = join(__dirname, "..", "..", "package.json");
    const pkg: PackageJson = JSON.parse(readFileSync(pkgPath, "utf-8"));
    cachedVersion = pkg.version ?? FALLBACK_VERSION;
  } catch {
    cachedVersion = FALLBACK_VERSION;
  }
  return cachedVersion;
};
