import { writeFile } from "node:fs/promises";
import type { CompilerTarget, TestVariant } from "../config/types.js";
import type { TestResult } from "../runner/types.js";
import { type Footnotes, resolveFootnotes, type VersionDetector } from "./footnotes.js";
import { ICON_DETECTED, statusIcon, visualWidth } from "./status.js";

export interface TableInput {
  readonly results: readonly TestResult[];
  readonly compilers: readonly CompilerTarget[];
  readonly tests: readonly TestVariant[];
}

const NO_FOOTNOTES: Footnotes = { markers: new Map<string, string>(), lines: [] };

/**
 * Results by compiler display name, then group, then variant.
 * A later result for the same cell replaces an earlier one.
 */
const indexResults = (
  results: readonly TestResult[]
): Map<string, Map<string, Map<string, TestResult>>> => {
  const index = new Map<string, Map<string, Map<string, TestResult>>>();
  for (const result of results) {
    const groups =
      index.get(result.compiler.displayName) ??
      new Map<string, Map<string, TestResult>>();
    const variants = groups.get(result.group) ?? new Map<string, TestResult>();
    variants.set(result.variant, result);
    groups.set(result.group, variants);
    index.set(result.compiler.displayName, groups);
  }
  return index;
};

/**
 * Value each group's auto variant detected on one compiler.
 */
const detectedValues = (
  groups: ReadonlyMap<string, ReadonlyMap<string, TestResult>>
): Map<string, number> => {
  const values = new Map<string, number>();
  for (const [group, variants] of groups) {
    for (const result of variants.values()) {
      if (result.isAuto && result.implValue !== undefined) {
        values.set(group, result.implValue);
      }
    }
  }
  return values;
};

const pad = (cell: string, width: number): string =>
  cell + " ".repeat(Math.max(0, width - visualWidth(cell)));

/**
 * Renders the compiler-by-variant Markdown table. Rows are compilers,
 * columns the non-auto variants shown in the table.
 */
export const buildMarkdownTable = (
  input: TableInput,
  footnotes: Footnotes = NO_FOOTNOTES
): string => {
  const columns = input.tests.filter((test) => test.includeInTable && !test.isAuto);
  const multiGroup = new Set(input.tests.map((test) => test.group)).size > 1;
  const index = indexResults(input.results);

  const header = [
    "CC",
    ...columns.map((test) =>
      multiGroup ? `${test.group}:${test.displayName}` : test.displayName
    ),
  ];

  const rows = input.compilers.map((compiler) => {
    const groups =
      index.get(compiler.displayName) ??
      new Map<string, Map<string, TestResult>>();
    const detected = detectedValues(groups);
    const name = `${compiler.displayName}${footnotes.markers.get(compiler.displayName) ?? ""}`;

    return [
      name,
      ...columns.map((test) => {
        const cell = statusIcon(groups.get(test.group)?.get(test.variant));
        const value = detected.get(test.group);
        return value !== undefined && value === test.detectValue
          ? `${ICON_DETECTED}${cell}`
          : cell;
      }),
    ];
  });

  const widths = header.map((_, column) =>
    Math.max(...[header, ...rows].map((row) => visualWidth(row[column] ?? "")))
  );
  const formatRow = (cells: readonly string[]): string =>
    `| ${cells.map((cell, column) => pad(cell, widths[column] ?? 0)).join(" | ")} |`;

  const lines = [
    formatRow(header),
    `| ${widths.map((width) => "-".repeat(width)).join(" | ")} |`,
    ...rows.map(formatRow),
  ];

  if (footnotes.lines.length > 0) {
    lines.push("", ...footnotes.lines);
  }

  return `${lines.join("\n")}\n`;
};

/**
 * Detects the local toolchains named in footnotes, then writes the table.
 */
export const writeTable = async (
  path: string,
  input: TableInput,
  detect?: VersionDetector
): Promise<void> => {
  const footnotes = await resolveFootnotes(input.compilers, detect);
  await writeFile(path, buildMarkdownTable(input, footnotes), "utf-8");
};
