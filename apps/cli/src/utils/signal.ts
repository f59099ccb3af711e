/**
 * SIGINT exit code (128 + signal number).
 */
export const SIGINT_EXIT_CODE = 130;

const SIGNALS = ["SIGINT", "SIGTERM"] as const;

export interface InterruptHandle {
  /**
   * Removes the signal handlers. Must be called when the run is over.
   */
  readonly cleanup: () => void;
  readonly interrupted: boolean;
}

/**
 * Routes SIGINT/SIGTERM to `onInterrupt`, which should stop the matrix after
 * the job in flight. A second signal exits at once.
 *
 * @example
 * ```ts
 * const interrupts = handleInterrupts(() => runner.abort());
 * try {
 *   await runner.run(tests, compilers);
 * } finally {
 *   interrupts.cleanup();
 * }
 * ```
 */
export const handleInterrupts = (
  onInterrupt: () => void,
  exit: (code: number) => void = process.exit
): InterruptHandle => {
  let interrupted = false;

  const handleSignal = (): void => {
    if (interrupted) {
      exit(SIGINT_EXIT_CODE);
      return;
    }
    interrupted = true;
    onInterrupt();
  };

  for (const signal of SIGNALS) {
    process.on(signal, handleSignal);
  }

  return {
    cleanup: () => {
      for (const signal of SIGNALS) {
        process.off(signal, handleSignal);
      }
    },
    get interrupted() {
      return interrupted;
    },
  };
};
