import { escapeRegExp } from "./regexp.js";

/**
 * Include probes.
 *
 * Every `#include` line is wrapped in a pair of forward-declared functions
 * whose names encode the probe number, the include kind and the header path.
 * The declarations survive preprocessing, so the expanded header content can
 * later be located between them and collapsed back into the directive.
 */

export type IncludeKind = "system" | "local";

export interface IncludeProbe {
  readonly startMarker: string;
  readonly endMarker: string;
  /**
   * Directive text from `#` through the closing delimiter.
   */
  readonly original: string;
  readonly kind: IncludeKind;
  readonly header: string;
}

export interface InstrumentedSource {
  readonly source: string;
  readonly probes: readonly IncludeProbe[];
}

const INCLUDE_LINE_PATTERN = /^(\s*)(#\s*include\s*)([<"])([^>"]+)([>"])/;

const START_PREFIX = "__godbolt_start_probe";
const END_PREFIX = "__godbolt_end_probe";

/**
 * Makes a header path usable inside a C identifier.
 */
export const encodeHeaderPath = (header: string): string =>
  header
    .replaceAll(".", "__PERIOD")
    .replaceAll("/", "__SLASH")
    .replaceAll("\\", "__BACKSLASH");

const probeDeclaration = (indent: string, marker: string): string =>
  `${indent}void ${marker}(void);`;

/**
 * Wraps every include directive with start/end marker declarations.
 * Lines that are not include directives are left byte-identical.
 */
export const injectIncludeProbes = (source: string): InstrumentedSource => {
  const probes: IncludeProbe[] = [];
  const output: string[] = [];

  for (const line of source.split("\n")) {
    const match = INCLUDE_LINE_PATTERN.exec(line);
    if (!match) {
      output.push(line);
      continue;
    }

    const [, indent = "", directive = "", open = "", header = "", close = ""] =
      match;
    const kind: IncludeKind = open === "<" ? "system" : "local";
    const suffix = `${probes.length + 1}_${kind}_${encodeHeaderPath(header)}`;
    const probe: IncludeProbe = {
      startMarker: `${START_PREFIX}${suffix}`,
      endMarker: `${END_PREFIX}${suffix}`,
      original: `${directive}${open}${header}${close}`,
      kind,
      header,
    };
    probes.push(probe);

    output.push(probeDeclaration(indent, probe.startMarker));
    output.push(line);
    output.push(probeDeclaration(indent, probe.endMarker));
  }

  return { source: output.join("\n"), probes };
};

/**
 * Matches `void <marker>(void);` and `void <marker>();` with any spacing.
 */
const declarationPattern = (marker: string): string =>
  `void\\s+${escapeRegExp(marker)}\\s*\\(\\s*(?:void\\s*)?\\)\\s*;`;

/**
 * Collapses each probed region of preprocessed text back into the original
 * include directive.
 *
 * The span runs from the start declaration to the last matching end
 * declaration, covering the whole header expansion. When the end marker is
 * missing (the header failed to resolve and output stopped early), only the
 * start declaration is replaced.
 */
export const restoreIncludes = (
  text: string,
  probes: readonly IncludeProbe[]
): string => {
  let result = text;

  for (const probe of probes) {
    const start = declarationPattern(probe.startMarker);
    const end = declarationPattern(probe.endMarker);
    // A replacer function keeps `$` and `\` in header paths literal.
    const replacement = (): string => probe.original;

    const spanning = new RegExp(`${start}[\\s\\S]*${end}`);
    if (spanning.test(result)) {
      result = result.replace(spanning, replacement);
      continue;
    }

    result = result.replace(new RegExp(start, "g"), replacement);
  }

  return result;
};
