// biome-ignore-all lint/performance/noBarrelFile: Report entry point
export type { Footnotes, VersionDetector } from "./footnotes.js";
export { resolveFootnotes } from "./footnotes.js";
export { statusIcon, visualWidth } from "./status.js";
export type { TableInput } from "./table.js";
export { buildMarkdownTable, writeTable } from "./table.js";
