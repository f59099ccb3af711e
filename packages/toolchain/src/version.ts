import { match } from "@macrobench/result";
import { runProcess } from "./process.js";

const VERSION_TIMEOUT_MS = 5000;

export type ToolchainName = "gcc" | "clang" | "tcc";

export interface ToolchainVersion {
  readonly name: ToolchainName;
  readonly version: string;
}

/**
 * Checked in order: clang and tcc before gcc, since their banners can
 * mention gcc compatibility.
 */
const VERSION_PATTERNS: readonly [ToolchainName, RegExp][] = [
  ["clang", /clang version (\d+\.\d+(?:\.\d+)?)/i],
  ["tcc", /tcc version ([\d.]+\w*)/i],
  ["gcc", /gcc.*?(\d+\.\d+(?:\.\d+)?)/i],
];

/**
 * Reads the toolchain name and version from `--version` output.
 */
export const parseToolchainVersion = (
  output: string
): ToolchainVersion | undefined => {
  for (const [name, pattern] of VERSION_PATTERNS) {
    const version = pattern.exec(output)?.[1];
    if (version !== undefined) {
      return { name, version };
    }
  }
  return undefined;
};

export const formatToolchainVersion = (version: ToolchainVersion): string =>
  `${version.name} ${version.version}`;

/**
 * Runs `<command> --version`. Undefined when the command is missing or its
 * banner is not recognised.
 */
export const detectToolchainVersion = async (
  command: string
): Promise<ToolchainVersion | undefined> => {
  const result = await runProcess(command, ["--version"], {
    timeoutMs: VERSION_TIMEOUT_MS,
  });
  return match(result, {
    ok: ({ stdout, stderr }) => parseToolchainVersion(`${stdout}${stderr}`),
    err: () => undefined,
  });
};
