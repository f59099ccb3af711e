// biome-ignore-all lint/performance/noBarrelFile: This is the package entry point
export type {
  IncludeKind,
  IncludeProbe,
  InstrumentedSource,
} from "./include-probes.js";
export {
  encodeHeaderPath,
  injectIncludeProbes,
  restoreIncludes,
} from "./include-probes.js";
export {
  extractMacroProbes,
  extractProbe,
  injectMacroProbe,
  macroProbeDeclaration,
  macroProbeMarker,
  macroProbeValue,
  parseIntegerLiteral,
  stripProbeLines,
} from "./macro-probes.js";
export { ProbeSet } from "./probe-set.js";
