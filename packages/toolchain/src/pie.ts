/**
 * Immediate-operand references to symbols, as older compilers emit for
 * position-dependent code (`movl $.LC0, %eax`, `pushl $msg`).
 */
const NON_PIE_PATTERNS: readonly RegExp[] = [
  /\bmovl?\s+\$\.?[A-Za-z_]/,
  /\bmovq?\s+\$\.?[A-Za-z_]/,
  /\bpush[lq]?\s+\$\.?[A-Za-z_]/,
];

/**
 * True when the assembly takes absolute symbol addresses, which a linker
 * producing position-independent executables by default will reject.
 */
export const needsNoPie = (assembly: string): boolean =>
  NON_PIE_PATTERNS.some((pattern) => pattern.test(assembly));
