/** Outcome of one external process invocation. */
export type ProcessResult = {
  exit_code: number;
  stdout: string;
  stderr: string;
  duration_ms: number;
  timed_out: boolean;
};

/** `Tests run: N, Failures: N, Errors: N, Skipped: N` as printed by Surefire. */
export type BuildSummary = {
  tests_run: number;
  failures: number;
  errors: number;
  skipped: number;
};

export type BuildRunResult = ProcessResult & {
  command: string[];
  summary: BuildSummary | null;
};
