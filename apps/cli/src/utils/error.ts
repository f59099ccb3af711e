/**
 * Formats an unknown thrown value into a message.
 * Handles Error instances, objects with a string `message`, and falls back
 * to String().
 */
export const formatError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  return String(error);
};

const ERROR_PREFIX_REGEX = /^Error:\s*/i;
const MAX_ERROR_LENGTH = 100;

/**
 * Formats an error message for TUI display:
 * strips an "Error:" prefix, keeps the first non-empty line, and truncates
 * to ~100 chars.
 */
export const formatErrorForTUI = (message: string): string => {
  const stripped = message.replace(ERROR_PREFIX_REGEX, "");
  const firstLine =
    stripped.split("\n").find((line) => line.trim().length > 0) ?? "";
  const trimmed = firstLine.trim();

  if (trimmed.length > MAX_ERROR_LENGTH) {
    return `${trimmed.slice(0, MAX_ERROR_LENGTH - 3)}...`;
  }
  return trimmed;
};
