import { err, ok, type Result } from "@macrobench/result";
import type { ProbeSet } from "./probe-set.js";
import { escapeRegExp } from "./regexp.js";

/**
 * Macro probes.
 *
 * A probe is a top-level `int` definition initialised from the macro. After
 * preprocessing, the initialiser holds whatever the macro expanded to, which
 * is read back as an integer literal.
 */

const TRAILING_NEWLINES = /\n+$/;
const HEX_LITERAL = /^-?0x[0-9a-f]+$/i;
const DECIMAL_LITERAL = /^-?(?:0+|[1-9]\d*)$/;

export const macroProbeMarker = (name: string): string =>
  `__GODBOLT_MACRO_PROBE_${name}__`;

export const macroProbeDeclaration = (name: string): string =>
  `int ${macroProbeMarker(name)} = (int)(${name});`;

/**
 * Appends a probe for `name` to the source. Repeated calls with the same
 * name leave the source unchanged.
 */
export const injectMacroProbe = (
  source: string,
  probes: ProbeSet,
  name: string
): string => {
  if (!probes.addMacro(name)) {
    return source;
  }
  return `${source.replace(TRAILING_NEWLINES, "")}\n${macroProbeDeclaration(name)}\n`;
};

/**
 * Parses a hexadecimal (`0x` prefix) or decimal integer literal. Other
 * literals with a leading zero, such as `010`, are rejected.
 */
export const parseIntegerLiteral = (literal: string): number | undefined => {
  let value: number;
  if (HEX_LITERAL.test(literal)) {
    value = Number.parseInt(literal, 16);
  } else if (DECIMAL_LITERAL.test(literal)) {
    value = Number.parseInt(literal, 10);
  } else {
    return undefined;
  }
  return Number.isSafeInteger(value) ? value : undefined;
};

/**
 * Reads the value a probed macro expanded to. Returns undefined when the
 * probe is absent or its initialiser is not a plain integer literal.
 *
 * Must run on text that still contains the probe lines.
 */
export const extractProbe = (text: string, name: string): number | undefined => {
  const marker = escapeRegExp(macroProbeMarker(name));
  const pattern = new RegExp(
    `${marker}\\s*=\\s*(?:\\([^)]*\\)\\s*)?(?:\\(?\\s*(-?0x[0-9a-fA-F]+|-?\\d+)\\s*\\)?)`
  );
  const literal = pattern.exec(text)?.[1];
  return literal === undefined ? undefined : parseIntegerLiteral(literal);
};

/**
 * Refreshes the cached value of every registered macro probe.
 */
export const extractMacroProbes = (text: string, probes: ProbeSet): void => {
  const values = new Map<string, number>();
  for (const name of probes.macroNames) {
    const value = extractProbe(text, name);
    if (value !== undefined) {
      values.set(name, value);
    }
  }
  probes.replaceValues(values);
};

/**
 * Removes every line carrying a registered macro probe marker.
 */
export const stripProbeLines = (text: string, probes: ProbeSet): string => {
  if (!probes.hasMacroProbes) {
    return text;
  }
  const markers = probes.macroNames.map(macroProbeMarker);
  return text
    .split("\n")
    .filter((line) => !markers.some((marker) => line.includes(marker)))
    .join("\n");
};

export const macroProbeValue = (
  probes: ProbeSet,
  name: string
): Result<number> => {
  const value = probes.valueFor(name);
  if (value === undefined) {
    return err(
      `No cached value for macro '${name}'; was it probed and preprocessed?`
    );
  }
  return ok(value);
};
