export const EXIT_CODES = {
  SUCCESS: 0,
  WARNINGS: 1,
  BLOCKED: 2,
  ERRORS: 3,
  NETWORK_ERROR: 4,
  USER_CANCELLED: 10,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
