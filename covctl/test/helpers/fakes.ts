import { Logger } from "../../src/log/logger.js";
import type { GitClient, WorkingTree } from "../../src/git/client.js";
import type { ProcessRunner, RunOptions } from "../../src/process/runner.js";
import type { CovctlConfig } from "../../src/types/config.js";
import type { ProcessResult } from "../../src/types/process-result.js";

export const TEST_CONFIG: CovctlConfig = {
  schema_version: "1.0.0",
  build: { command: "mvn", args: ["test"], timeout_seconds: 30, max_output_bytes: 4096 },
  git: { timeout_seconds: 10, add_exclude: ["target/**", ".idea/**", "**/*.class"] },
  pull_request: {
    cli: "gh",
    default_base: "main",
    default_title: "Automated Test/Coverage Update",
    footer: "Automated testing agent update.",
    timeout_seconds: 10,
  },
  logging: { level: "debug" },
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Logger that keeps parsed entries in memory. */
export function captureLogger(): { log: Logger; entries: Array<Record<string, unknown>> } {
  const entries: Array<Record<string, unknown>> = [];
  const log = new Logger("debug", (line) => {
    const parsed: unknown = JSON.parse(line);
    if (isRecord(parsed)) entries.push(parsed);
  });
  return { log, entries };
}

export function result(partial: Partial<ProcessResult> = {}): ProcessResult {
  return { exit_code: 0, stdout: "", stderr: "", duration_ms: 5, timed_out: false, ...partial };
}

export type RunnerCall = { command: string; args: string[]; options: RunOptions };

export class FakeRunner implements ProcessRunner {
  calls: RunnerCall[] = [];

  constructor(private readonly respond: (call: RunnerCall) => ProcessResult = () => result()) {}

  async run(command: string, args: string[], options: RunOptions): Promise<ProcessResult> {
    const call = { command, args, options };
    this.calls.push(call);
    return this.respond(call);
  }
}

export type PushCall = { remote: string; branch: string; setUpstream: boolean };

export class FakeGitClient implements GitClient {
  branch = "feature/coverage";
  tree: WorkingTree = { branch: "feature/coverage", tracking: null, ahead: 0, behind: 0, files: [] };
  staged: string[] = [];
  upstream: string | null = "origin";
  remoteNames: string[] = ["origin"];
  commitId = "3f2a9c1";
  pushError: Error | null = null;
  statusError: Error | null = null;

  added: string[][] = [];
  commits: string[] = [];
  pushes: PushCall[] = [];

  async currentBranch(): Promise<string> {
    return this.branch;
  }

  async workingTree(): Promise<WorkingTree> {
    if (this.statusError) throw this.statusError;
    return this.tree;
  }

  async stagedFiles(): Promise<string[]> {
    return this.staged;
  }

  async add(files: string[]): Promise<void> {
    this.added.push(files);
  }

  async commit(message: string): Promise<string> {
    this.commits.push(message);
    return this.commitId;
  }

  async upstreamRemote(): Promise<string | null> {
    return this.upstream;
  }

  async remotes(): Promise<string[]> {
    return this.remoteNames;
  }

  async push(remote: string, branch: string, setUpstream: boolean): Promise<void> {
    if (this.pushError) throw this.pushError;
    this.pushes.push({ remote, branch, setUpstream });
  }
}
