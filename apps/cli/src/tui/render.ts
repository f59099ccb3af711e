/**
 * Whether progress renders as the interactive TUI.
 *
 * Needs a TTY on both ends; verbose runs and `--no-tui` print plain lines
 * instead.
 */
export const shouldUseTUI = (
  options: { readonly verbose?: boolean; readonly tui?: boolean } = {}
): boolean => {
  if (options.verbose || options.tui === false) {
    return false;
  }

  return Boolean(process.stdout.isTTY && process.stdin.isTTY);
};
