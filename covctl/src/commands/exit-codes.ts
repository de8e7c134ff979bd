/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  TOOL_FAILED: 1,
  CONFIG_INVALID: 2,
  INVALID_ARGS: 3,
} as const;
