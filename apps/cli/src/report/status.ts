import type { TestResult } from "../runner/types.js";

export const ICON_PASS = "✅";
export const ICON_BUILD_FAILURE = "❌";
export const ICON_RUNTIME_FAILURE = "⚠️";
export const ICON_WARNINGS = "ℹ️";
export const ICON_DETECTED = "⭐";
export const ICON_MISSING = "—";

/**
 * Icons that render two columns wide in most terminals and Markdown viewers.
 */
const WIDE_ICONS = [
  ICON_PASS,
  ICON_BUILD_FAILURE,
  ICON_DETECTED,
  ICON_RUNTIME_FAILURE,
  ICON_WARNINGS,
];

/**
 * Table cell for one result. API errors render as an empty cell.
 */
export const statusIcon = (result: TestResult | undefined): string => {
  if (!result) {
    return ICON_MISSING;
  }
  if (result.apiError) {
    return "";
  }

  let icon: string;
  if (result.passed) {
    icon = ICON_PASS;
  } else if (result.stage === "preprocessing" || result.stage === "compilation") {
    icon = ICON_BUILD_FAILURE;
  } else {
    icon = ICON_RUNTIME_FAILURE;
  }

  return result.passed && result.hasWarnings ? `${icon}${ICON_WARNINGS}` : icon;
};

const countOccurrences = (text: string, search: string): number =>
  text.split(search).length - 1;

/**
 * Display width of a cell: code points, plus one per wide icon.
 */
export const visualWidth = (text: string): number =>
  [...text].length +
  WIDE_ICONS.reduce((sum, icon) => sum + countOccurrences(text, icon), 0);
