import { spawn, type ChildProcess } from "node:child_process";
import fs from "node:fs";
import { InvalidArgumentError, NotFoundError } from "../errors/tool-errors.js";
import type { ProcessResult } from "../types/process-result.js";
import { sanitizeEnv } from "./security.js";

/** exit_code when the process was killed for exceeding its timeout. */
export const TIMEOUT_EXIT_CODE = -1;
/** exit_code when the process could not be started at all. */
export const LAUNCH_FAILURE_EXIT_CODE = -2;
/** exit_code when the process died from a signal it was not sent by the runner. */
export const SIGNAL_EXIT_CODE = -3;

export const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;
const DEFAULT_KILL_GRACE_MS = 2000;

export type RunOptions = {
  cwd: string;
  timeoutMs: number;
  env?: Record<string, string>;
  /** Per-stream cap; only the tail is kept beyond it. */
  maxOutputBytes?: number;
  /** Delay between SIGTERM and SIGKILL once the timeout fires. */
  killGraceMs?: number;
};

/**
 * Executes external commands. Implementations never throw for process
 * failures: timeouts and launch errors are reported in the result.
 */
export interface ProcessRunner {
  run(command: string, args: string[], options: RunOptions): Promise<ProcessResult>;
}

/** Throw before spawning when the working directory or timeout is unusable. */
export function assertRunnable(options: RunOptions): void {
  if (!Number.isFinite(options.timeoutMs) || options.timeoutMs <= 0) {
    throw new InvalidArgumentError(`timeout must be a positive number of milliseconds, got ${options.timeoutMs}`);
  }

  let stat: fs.Stats;
  try {
    stat = fs.statSync(options.cwd);
  } catch {
    throw new NotFoundError(`Working directory not found: ${options.cwd}`, { path: options.cwd });
  }
  if (!stat.isDirectory()) {
    throw new InvalidArgumentError(`Working directory is not a directory: ${options.cwd}`);
  }
  try {
    fs.accessSync(options.cwd, fs.constants.R_OK);
  } catch {
    throw new InvalidArgumentError(`Working directory is not readable: ${options.cwd}`);
  }
}

/** Keeps at most `limit` bytes, discarding from the head. */
class TailBuffer {
  private chunks: Buffer[] = [];
  private size = 0;
  private dropped = 0;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.size += chunk.length;
    while (this.chunks.length > 1 && this.size - this.chunks[0].length >= this.limit) {
      const head = this.chunks.shift();
      if (!head) break;
      this.size -= head.length;
      this.dropped += head.length;
    }
  }

  toString(): string {
    let all = Buffer.concat(this.chunks);
    let dropped = this.dropped;
    if (all.length > this.limit) {
      dropped += all.length - this.limit;
      all = all.subarray(all.length - this.limit);
    }
    const text = all.toString("utf8");
    return dropped > 0 ? `[... ${dropped} bytes truncated ...]\n${text}` : text;
  }
}

function launchFailure(command: string, err: unknown): string {
  const code = err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : "ERROR";
  const message = err instanceof Error ? err.message : String(err);
  return `Failed to launch '${command}': ${code} ${message}`;
}

function signalTree(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined || child.exitCode !== null || child.signalCode !== null) return;
  try {
    // Negative pid targets the process group, so forked JVMs die with the build tool.
    process.kill(-child.pid, signal);
  } catch {
    child.kill(signal);
  }
}

/**
 * Default runner on top of `child_process.spawn`: no shell, sanitized
 * environment, own process group, bounded output capture.
 */
export class NodeProcessRunner implements ProcessRunner {
  async run(command: string, args: string[], options: RunOptions): Promise<ProcessResult> {
    assertRunnable(options);

    const maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    const startedAt = Date.now();

    return new Promise<ProcessResult>((resolve) => {
      const stdout = new TailBuffer(maxOutputBytes);
      const stderr = new TailBuffer(maxOutputBytes);
      let timedOut = false;
      let spawned = false;
      let settled = false;
      let timeoutTimer: NodeJS.Timeout | undefined;
      let killTimer: NodeJS.Timeout | undefined;

      const finish = (exitCode: number, extraStderr?: string) => {
        if (settled) return;
        settled = true;
        if (timeoutTimer) clearTimeout(timeoutTimer);
        if (killTimer) clearTimeout(killTimer);
        const err = stderr.toString();
        resolve(
          Object.freeze({
            exit_code: exitCode,
            stdout: stdout.toString(),
            stderr: extraStderr ? (err ? `${err}\n${extraStderr}` : extraStderr) : err,
            duration_ms: Date.now() - startedAt,
            timed_out: timedOut,
          }),
        );
      };

      let child: ChildProcess;
      try {
        child = spawn(command, args, {
          cwd: options.cwd,
          env: { ...sanitizeEnv(process.env), ...options.env },
          shell: false,
          stdio: ["ignore", "pipe", "pipe"],
          detached: process.platform !== "win32",
        });
      } catch (err) {
        // spawn throws synchronously on invalid arguments, e.g. NUL bytes.
        finish(LAUNCH_FAILURE_EXIT_CODE, launchFailure(command, err));
        return;
      }

      timeoutTimer = setTimeout(() => {
        timedOut = true;
        signalTree(child, "SIGTERM");
        killTimer = setTimeout(() => signalTree(child, "SIGKILL"), killGraceMs);
      }, options.timeoutMs);

      child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));

      child.on("spawn", () => {
        spawned = true;
      });

      child.on("error", (err: NodeJS.ErrnoException) => {
        if (!spawned) {
          finish(LAUNCH_FAILURE_EXIT_CODE, launchFailure(command, err));
          return;
        }
        stderr.push(Buffer.from(`\n[runner] ${err.message}\n`));
      });

      child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
        if (timedOut) {
          finish(TIMEOUT_EXIT_CODE, `[runner] timed out after ${options.timeoutMs} ms`);
        } else if (code === null) {
          finish(SIGNAL_EXIT_CODE, `[runner] terminated by ${signal ?? "unknown signal"}`);
        } else {
          finish(code);
        }
      });
    });
  }
}
