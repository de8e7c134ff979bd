import fs from "node:fs";
import path from "node:path";
import {
  AuthenticationError,
  HostingCliError,
  NoChangesError,
  NotFoundError,
  PullRequestExistsError,
} from "../errors/tool-errors.js";
import type { Logger } from "../log/logger.js";
import type { RepositoryOperations } from "../git/repository.js";
import { LAUNCH_FAILURE_EXIT_CODE, type ProcessRunner } from "../process/runner.js";
import type { PullRequestConfig } from "../types/config.js";
import type { ProcessResult } from "../types/process-result.js";
import type { PullRequestBody, PullRequestHandle } from "../types/pull-request.js";
import { renderPullRequestBody } from "./body.js";

/** `gh` exits with 4 when a command needs authentication. */
export const AUTH_REQUIRED_EXIT_CODE = 4;

const AUTH_PATTERN = /gh auth login|not logged in|authentication (required|failed)|HTTP 401|bad credentials/i;
const NO_CHANGES_PATTERN = /no commits between|no changes/i;
const EXISTS_PATTERN = /already exists/i;
const URL_PATTERN = /^https?:\/\/\S+$/;

export type OpenPullRequestInput = {
  base?: string;
  title?: string;
  body?: PullRequestBody | string;
};

function lastLine(text: string): string {
  const lines = text.trim().split(/\r?\n/);
  return lines[lines.length - 1] ?? "";
}

/** Pull the PR URL (and number) out of the CLI's stdout. */
export function parsePullRequestUrl(stdout: string): { url: string; number: number | null } | null {
  const urls = stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => URL_PATTERN.test(line));
  const url = urls[urls.length - 1];
  if (!url) return null;
  const m = /\/(?:pull|merge_requests)\/(\d+)/.exec(url);
  return { url, number: m ? Number(m[1]) : null };
}

/**
 * Opens pull requests through the hosting CLI. Not idempotent: two calls
 * create two requests unless the CLI refuses the duplicate.
 */
export class PullRequestService {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly repository: RepositoryOperations,
    private readonly config: PullRequestConfig,
    private readonly log: Logger,
  ) {}

  async open(repoPath: string, input: OpenPullRequestInput): Promise<PullRequestHandle> {
    const cwd = path.resolve(repoPath);
    if (!fs.existsSync(cwd)) {
      throw new NotFoundError(`Repository path not found: ${repoPath}`, { path: repoPath });
    }

    const base = input.base ?? this.config.default_base;
    const title = input.title ?? this.config.default_title;
    const head = await this.repository.currentBranch(cwd);
    if (head === base) {
      throw new NoChangesError(base, head);
    }

    const body = renderPullRequestBody(input.body ?? "", this.config.footer);
    const args = ["pr", "create", "--base", base, "--head", head, "--title", title, "--body", body];

    this.log.info("Opening pull request", { repoPath: cwd, base, head, cli: this.config.cli });
    const result = await this.runner.run(this.config.cli, args, {
      cwd,
      timeoutMs: this.config.timeout_seconds * 1000,
    });

    const handle = this.interpret(result, base, head);
    this.log.info("Pull request opened", { url: handle.url, number: handle.number });
    return handle;
  }

  private interpret(result: ProcessResult, base: string, head: string): PullRequestHandle {
    const cli = this.config.cli;

    if (result.exit_code === LAUNCH_FAILURE_EXIT_CODE) {
      throw new HostingCliError(`Hosting CLI '${cli}' could not be started: ${lastLine(result.stderr)}`, { cli });
    }
    if (result.timed_out) {
      throw new HostingCliError(`Hosting CLI '${cli}' timed out after ${result.duration_ms} ms`, { cli });
    }

    const detail = lastLine(result.stderr) || lastLine(result.stdout);
    if (result.exit_code === 0) {
      const parsed = parsePullRequestUrl(result.stdout);
      if (!parsed) {
        throw new HostingCliError(`Hosting CLI '${cli}' succeeded but printed no pull request URL`, { cli });
      }
      return { ...parsed, base, head };
    }

    const output = `${result.stderr}\n${result.stdout}`;
    if (result.exit_code === AUTH_REQUIRED_EXIT_CODE || AUTH_PATTERN.test(output)) {
      throw new AuthenticationError(cli, detail);
    }
    if (NO_CHANGES_PATTERN.test(output)) {
      throw new NoChangesError(base, head);
    }
    if (EXISTS_PATTERN.test(output)) {
      throw new PullRequestExistsError(head, detail);
    }
    throw new HostingCliError(`Hosting CLI '${cli}' failed with exit code ${result.exit_code}: ${detail}`, {
      cli,
      exit_code: result.exit_code,
    });
  }
}
