/**
 * CLI exit codes. When several apply, the budget wins over unit failures,
 * and unit failures win over infrastructure.
 */
export const EXIT = {
  SUCCESS: 0,
  UNIT_FAILURES: 1,
  INFRASTRUCTURE: 2,
  BUDGET_EXCEEDED: 3,
  INVALID_ARGS: 4
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
