import path from "node:path";
import type { BuildConfig } from "../types/config.js";
import type { BuildRunResult, BuildSummary } from "../types/process-result.js";
import type { Logger } from "../log/logger.js";
import { redactSensitiveInfo } from "./security.js";
import { assertRunnable, type ProcessRunner } from "./runner.js";

const SUMMARY_LINE = /Tests run:\s*(\d+),\s*Failures:\s*(\d+),\s*Errors:\s*(\d+),\s*Skipped:\s*(\d+)/;

/**
 * Parse the aggregate test counts from build output.
 *
 * Surefire prints one line per test class and a final aggregate line;
 * the last match wins.
 */
export function parseBuildSummary(output: string): BuildSummary | null {
  let summary: BuildSummary | null = null;
  for (const line of output.split(/\r?\n/)) {
    const m = SUMMARY_LINE.exec(line);
    if (!m) continue;
    summary = {
      tests_run: Number(m[1]),
      failures: Number(m[2]),
      errors: Number(m[3]),
      skipped: Number(m[4]),
    };
  }
  return summary;
}

export type RunTestsOptions = {
  timeoutSeconds?: number;
};

/** Run the configured build/test command inside `projectPath`. */
export async function runTests(
  runner: ProcessRunner,
  config: BuildConfig,
  projectPath: string,
  log: Logger,
  opts: RunTestsOptions = {},
): Promise<BuildRunResult> {
  const cwd = path.resolve(projectPath);
  const timeoutMs = (opts.timeoutSeconds ?? config.timeout_seconds) * 1000;
  const runOptions = { cwd, timeoutMs, maxOutputBytes: config.max_output_bytes };
  assertRunnable(runOptions);

  const command = [config.command, ...config.args];
  log.info("Running tests", { command: redactSensitiveInfo(command.join(" ")), cwd, timeoutMs });

  const result = await runner.run(config.command, config.args, runOptions);
  const summary = parseBuildSummary(result.stdout);

  log.info("Tests finished", {
    exitCode: result.exit_code,
    timedOut: result.timed_out,
    durationMs: result.duration_ms,
    testsRun: summary?.tests_run ?? null,
  });

  return { ...result, command, summary };
}
