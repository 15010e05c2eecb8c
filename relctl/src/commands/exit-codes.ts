/**
 * CLI exit codes. Project failures are logged, not signalled: a completed
 * run exits SUCCESS whatever its outcomes.
 */
export const EXIT = {
  SUCCESS: 0,
  INVALID_ARGS: 2,
  CONFIG_INVALID: 3,
} as const;
