/**
 * Terminal palette:
 * - brand: green, passing runs and the header
 * - text: primary content
 * - muted: hints and secondary detail
 * - error: failures
 * - warn: cancellation and runtime failures
 */

export const colors = {
  brand: "#00d787", // ANSI 42
  text: "#FFFFFF",
  muted: "#767676", // ANSI 243
  error: "#ff5f5f", // ANSI 203
  warn: "#ffaf00", // ANSI 214
} as const;

/**
 * Converts a hex color to ANSI escape code for true color (24-bit) terminals.
 */
export const hexToAnsi = (hex: string): string => {
  const cleaned = hex.replace("#", "");
  const r = Number.parseInt(cleaned.slice(0, 2), 16);
  const g = Number.parseInt(cleaned.slice(2, 4), 16);
  const b = Number.parseInt(cleaned.slice(4, 6), 16);
  return `\x1b[38;2;${r};${g};${b}m`;
};

export const ANSI_RESET = "\x1b[0m";
