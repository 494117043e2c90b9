/**
 * CLI exit codes. The first three mirror the matrix aggregate.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILED: 1,
  CANCELLED: 2,
  INVALID_CONFIG: 3,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
