import {
  detectToolchainVersion,
  formatToolchainVersion,
  type ToolchainVersion,
} from "@macrobench/toolchain";
import type { CompilerTarget } from "../config/types.js";

export type VersionDetector = (
  command: string
) => Promise<ToolchainVersion | undefined>;

const MARKERS = ["*", "**", "***", "****"] as const;

type LocalKind = "assemble" | "compile";

export interface Footnotes {
  /**
   * Marker by compiler display name.
   */
  readonly markers: ReadonlyMap<string, string>;
  /**
   * Footnote lines in marker order.
   */
  readonly lines: readonly string[];
}

const footnoteText = (kind: LocalKind, toolchain: string): string =>
  kind === "compile"
    ? `This compiler was only used for preprocessing and then the result was compiled locally with ${toolchain}.  `
    : `This compiler outputted assembly which was then assembled and run locally with ${toolchain}.  `;

/**
 * The local command whose version a footnote names: the compiler for local
 * compilation, the linker for local assembly.
 */
const localCommand = (
  target: CompilerTarget
): { kind: LocalKind; command: string } | undefined => {
  switch (target.local.kind) {
    case "compile":
      return { kind: "compile", command: target.local.compiler };
    case "assemble":
      return { kind: "assemble", command: target.local.linker };
    default:
      return undefined;
  }
};

/**
 * Assigns footnote markers to compilers that build or run locally.
 * Compilers with the same mode and local toolchain share a marker; once the
 * markers run out, further toolchains get none.
 */
export const resolveFootnotes = async (
  compilers: readonly CompilerTarget[],
  detect: VersionDetector = detectToolchainVersion
): Promise<Footnotes> => {
  const versions = new Map<string, string>();
  const describeToolchain = async (command: string): Promise<string> => {
    const cached = versions.get(command);
    if (cached !== undefined) {
      return cached;
    }
    const version = await detect(command);
    const label = version ? formatToolchainVersion(version) : command;
    versions.set(command, label);
    return label;
  };

  const byKey = new Map<string, string>();
  const markers = new Map<string, string>();
  const lines: string[] = [];

  for (const compiler of compilers) {
    const local = localCommand(compiler);
    if (!local) {
      continue;
    }

    const toolchain = await describeToolchain(local.command);
    const key = JSON.stringify([local.kind, toolchain]);
    let marker = byKey.get(key);
    if (marker === undefined) {
      marker = MARKERS[byKey.size];
      if (marker === undefined) {
        continue;
      }
      byKey.set(key, marker);
      lines.push(`\\${marker} ${footnoteText(local.kind, toolchain)}`);
    }
    markers.set(compiler.displayName, marker);
  }

  return { markers, lines };
};
