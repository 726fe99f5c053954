/**
 * CLI exit codes. Every failure exits 1; the error code on the diagnostic
 * line tells failures apart.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILED: 1,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
