import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import {
  GitCommandError,
  InvalidArgumentError,
  NoUpstreamError,
  NotFoundError,
  NothingToCommitError,
  ProtectedBranchError,
  PushRejectedError,
  ToolError,
  errorMessage,
} from "../errors/tool-errors.js";
import type { Logger } from "../log/logger.js";
import { formatPercent } from "../coverage/summary.js";
import type { GitConfig } from "../types/config.js";
import type {
  AddAllResult,
  CommitCoverage,
  CommitResult,
  CoverageFigures,
  GitStatusReport,
  PushResult,
} from "../types/git.js";
import { checkCommitAllowed } from "./branch-guard.js";
import type { GitClient, GitClientFactory } from "./client.js";
import { classifyWorkingTree, isConflict } from "./status.js";

const PUSH_REJECTED = /\[rejected\]|\[remote rejected\]|non-fast-forward|fetch first|failed to push some refs/i;

function signed(value: number): string {
  const rounded = Math.round(value * 100) / 100;
  return rounded >= 0 ? `+${rounded}` : `${rounded}`;
}

function figureLine(label: string, before: number | undefined, after: number | undefined): string {
  if (before === undefined) return `- ${label}: ${formatPercent(after)}`;
  const change = after === undefined ? "" : ` (${signed(after - before)})`;
  return `- ${label}: ${formatPercent(before)} -> ${formatPercent(after)}${change}`;
}

/**
 * Append a `Coverage:` trailer to a commit message.
 *
 * With `before`/`after` figures each line shows the transition; the flat
 * `line_coverage`/`branch_coverage` fields stand in for a missing `after`.
 */
export function buildCommitMessage(message: string, coverage?: CommitCoverage): string {
  const subject = message.trimEnd();
  if (!coverage) return subject;

  const before: CoverageFigures | undefined = coverage.before;
  const after: CoverageFigures = {
    line_coverage: coverage.after?.line_coverage ?? coverage.line_coverage,
    branch_coverage: coverage.after?.branch_coverage ?? coverage.branch_coverage,
  };

  return [
    subject,
    "",
    "Coverage:",
    figureLine("Line", before?.line_coverage, after.line_coverage),
    figureLine("Branch", before?.branch_coverage, after.branch_coverage),
  ].join("\n");
}

/**
 * Repository operations. Every call names its repository explicitly and
 * every unexpected git failure surfaces as a typed error.
 */
export class RepositoryOperations {
  constructor(
    private readonly clientFactory: GitClientFactory,
    private readonly config: GitConfig,
    private readonly log: Logger,
  ) {}

  async status(repoPath: string): Promise<GitStatusReport> {
    const git = this.open(repoPath);
    const branch = await this.run("branch", () => git.currentBranch());
    const tree = await this.run("status", () => git.workingTree());
    return classifyWorkingTree(tree, branch);
  }

  /** Stage every changed, deleted and untracked path not matched by `add_exclude`. */
  async addAll(repoPath: string): Promise<AddAllResult> {
    const git = this.open(repoPath);
    const tree = await this.run("status", () => git.workingTree());

    const files: string[] = [];
    const skipped: string[] = [];
    for (const entry of tree.files) {
      if (isConflict(entry)) {
        skipped.push(entry.path);
        continue;
      }
      if (entry.working_dir === " " || entry.working_dir === "") continue;
      if (this.isExcluded(entry.path)) {
        skipped.push(entry.path);
        continue;
      }
      files.push(entry.path);
    }

    await this.run("add", () => git.add(files));
    this.log.info("Staged files", { repoPath, count: files.length, skipped: skipped.length });
    return { count: files.length, files, skipped };
  }

  /**
   * Commit what is already staged. Refuses on `main`/`master` before
   * touching the index or history.
   */
  async commit(repoPath: string, message: string, coverage?: CommitCoverage): Promise<CommitResult> {
    if (message.trim().length === 0) {
      throw new InvalidArgumentError("Commit message must not be empty");
    }

    const git = this.open(repoPath);
    const branch = await this.run("branch", () => git.currentBranch());

    const guard = checkCommitAllowed(branch);
    if (!guard.allowed) {
      this.log.warn("Commit blocked by branch guard", { repoPath, branch, reason: guard.reason });
      throw new ProtectedBranchError(branch);
    }

    const staged = await this.run("diff", () => git.stagedFiles());
    if (staged.length === 0) {
      throw new NothingToCommitError(branch);
    }

    const fullMessage = buildCommitMessage(message, coverage);
    const commitId = await this.run("commit", () => git.commit(fullMessage));
    if (!commitId) {
      throw new GitCommandError("commit", "git reported no new commit");
    }

    this.log.info("Committed", { repoPath, branch, commitId, files: staged.length });
    return { commit_id: commitId, branch, message: fullMessage };
  }

  /**
   * Push HEAD to `<remote>/<branch>`. Without an explicit remote the
   * branch's configured upstream remote is used.
   */
  async push(repoPath: string, remote?: string): Promise<PushResult> {
    const git = this.open(repoPath);
    const branch = await this.run("branch", () => git.currentBranch());
    if (branch === "HEAD") {
      throw new GitCommandError("push", "HEAD is detached; check out a branch before pushing");
    }

    const upstream = await this.run("config", () => git.upstreamRemote(branch));
    const target = remote ?? upstream;
    if (!target) {
      throw new NoUpstreamError(branch);
    }

    if (remote !== undefined) {
      const known = await this.run("remote", () => git.remotes());
      if (!known.includes(remote)) {
        throw new InvalidArgumentError(`Unknown remote '${remote}'. Configured remotes: ${known.join(", ") || "(none)"}`);
      }
    }

    const setUpstream = upstream === null;
    try {
      await git.push(target, branch, setUpstream);
    } catch (err) {
      const message = errorMessage(err);
      if (PUSH_REJECTED.test(message)) {
        this.log.warn("Push rejected", { repoPath, remote: target, branch });
        throw new PushRejectedError(target, branch, err);
      }
      throw new GitCommandError("push", message, err);
    }

    this.log.info("Pushed", { repoPath, remote: target, branch, setUpstream });
    return { remote: target, branch, set_upstream: setUpstream };
  }

  /** Current branch name, for callers outside this class. */
  async currentBranch(repoPath: string): Promise<string> {
    const git = this.open(repoPath);
    return this.run("branch", () => git.currentBranch());
  }

  private isExcluded(file: string): boolean {
    return this.config.add_exclude.some((pattern) => minimatch(file, pattern, { dot: true }));
  }

  private open(repoPath: string): GitClient {
    const resolved = path.resolve(repoPath);
    let isDirectory = false;
    try {
      isDirectory = fs.statSync(resolved).isDirectory();
    } catch {
      throw new NotFoundError(`Repository path not found: ${repoPath}`, { path: repoPath });
    }
    if (!isDirectory) {
      throw new NotFoundError(`Repository path is not a directory: ${repoPath}`, { path: repoPath });
    }
    return this.clientFactory(resolved);
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof ToolError) throw err;
      throw new GitCommandError(operation, errorMessage(err), err);
    }
  }
}
