import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  AuthenticationError,
  HostingCliError,
  NoChangesError,
  NotFoundError,
  PullRequestExistsError,
} from "../src/errors/tool-errors.js";
import { RepositoryOperations } from "../src/git/repository.js";
import { renderPullRequestBody } from "../src/review/body.js";
import { PullRequestService, parsePullRequestUrl } from "../src/review/pull-request.js";
import { FakeGitClient, FakeRunner, TEST_CONFIG, captureLogger, result } from "./helpers/fakes.js";

const FOOTER = "Automated testing agent update.";

describe("renderPullRequestBody", () => {
  it("renders the structured template and drops empty sections", () => {
    const body = renderPullRequestBody(
      {
        summary: "Raised coverage of the calculator module.",
        coverage_delta: "Line 51.43% -> 80% (+28.57)",
        classes_improved: ["com.example.Foo", " ", "com.example.util.Baz"],
        bugs_found: [],
        next_steps: "Cover Baz.parse error paths.",
      },
      FOOTER,
    );
    expect(body).toBe(
      [
        "## Summary\n\nRaised coverage of the calculator module.",
        "## Coverage\n\nLine 51.43% -> 80% (+28.57)",
        "## Classes improved\n\n- com.example.Foo\n- com.example.util.Baz",
        "## Next steps\n\nCover Baz.parse error paths.",
        `---\n${FOOTER}`,
      ].join("\n\n"),
    );
  });

  it("treats free text as the summary", () => {
    expect(renderPullRequestBody("Adds FooTest.", FOOTER)).toBe(`## Summary\n\nAdds FooTest.\n\n---\n${FOOTER}`);
  });

  it("omits a blank footer", () => {
    expect(renderPullRequestBody("Adds FooTest.", "  ")).toBe("## Summary\n\nAdds FooTest.");
  });
});

describe("parsePullRequestUrl", () => {
  it("reads the last URL line and its number", () => {
    const stdout = "Creating pull request for feature/coverage into main in acme/calc\n\nhttps://github.com/acme/calc/pull/42\n";
    expect(parsePullRequestUrl(stdout)).toEqual({ url: "https://github.com/acme/calc/pull/42", number: 42 });
  });

  it("understands merge request URLs", () => {
    expect(parsePullRequestUrl("https://gitlab.example.com/acme/calc/-/merge_requests/7")).toEqual({
      url: "https://gitlab.example.com/acme/calc/-/merge_requests/7",
      number: 7,
    });
  });

  it("returns null without a URL", () => {
    expect(parsePullRequestUrl("done\n")).toBeNull();
  });
});

describe("PullRequestService", () => {
  let repoDir: string;
  let git: FakeGitClient;

  beforeEach(() => {
    repoDir = fs.mkdtempSync(path.join(os.tmpdir(), "covctl-pr-"));
    git = new FakeGitClient();
  });

  afterEach(() => {
    fs.rmSync(repoDir, { recursive: true, force: true });
  });

  function service(runner: FakeRunner): PullRequestService {
    const { log } = captureLogger();
    const repository = new RepositoryOperations(() => git, TEST_CONFIG.git, log);
    return new PullRequestService(runner, repository, TEST_CONFIG.pull_request, log);
  }

  it("opens a pull request from the current branch with defaults", async () => {
    const runner = new FakeRunner(() => result({ stdout: "https://github.com/acme/calc/pull/42\n" }));

    const handle = await service(runner).open(repoDir, {});

    expect(handle).toEqual({
      url: "https://github.com/acme/calc/pull/42",
      number: 42,
      base: "main",
      head: "feature/coverage",
    });
    expect(runner.calls).toEqual([
      {
        command: "gh",
        args: [
          "pr",
          "create",
          "--base",
          "main",
          "--head",
          "feature/coverage",
          "--title",
          "Automated Test/Coverage Update",
          "--body",
          `---\n${FOOTER}`,
        ],
        options: { cwd: repoDir, timeoutMs: 10_000 },
      },
    ]);
  });

  it("passes title, base and rendered body through", async () => {
    const runner = new FakeRunner(() => result({ stdout: "https://github.com/acme/calc/pull/43\n" }));

    await service(runner).open(repoDir, { base: "develop", title: "Cover Foo", body: { summary: "Adds FooTest." } });

    const args = runner.calls[0].args;
    expect(args.slice(2, 8)).toEqual(["--base", "develop", "--head", "feature/coverage", "--title", "Cover Foo"]);
    expect(args[9]).toBe(`## Summary\n\nAdds FooTest.\n\n---\n${FOOTER}`);
  });

  it("refuses when the head is the base without running the CLI", async () => {
    git.branch = "main";
    const runner = new FakeRunner();

    await expect(service(runner).open(repoDir, {})).rejects.toBeInstanceOf(NoChangesError);
    expect(runner.calls).toHaveLength(0);
  });

  it("fails with NotFoundError for a missing repository", async () => {
    const runner = new FakeRunner();
    await expect(service(runner).open(path.join(repoDir, "missing"), {})).rejects.toBeInstanceOf(NotFoundError);
  });

  it.each([
    ["exit code 4", result({ exit_code: 4, stderr: "To get started with GitHub CLI, please run: gh auth login" })],
    ["an auth message", result({ exit_code: 1, stderr: "HTTP 401: Bad credentials (https://api.github.com/graphql)" })],
  ])("maps %s to AuthenticationError", async (_label, response) => {
    const runner = new FakeRunner(() => response);
    await expect(service(runner).open(repoDir, {})).rejects.toBeInstanceOf(AuthenticationError);
  });

  it("maps 'no commits between' to NoChangesError", async () => {
    const runner = new FakeRunner(() =>
      result({
        exit_code: 1,
        stderr: "pull request create failed: GraphQL: No commits between main and feature/coverage (createPullRequest)",
      }),
    );
    await expect(service(runner).open(repoDir, {})).rejects.toBeInstanceOf(NoChangesError);
  });

  it("maps an existing pull request to PullRequestExistsError", async () => {
    const runner = new FakeRunner(() =>
      result({
        exit_code: 1,
        stderr: 'a pull request for branch "feature/coverage" into branch "main" already exists:\nhttps://github.com/acme/calc/pull/41',
      }),
    );
    await expect(service(runner).open(repoDir, {})).rejects.toBeInstanceOf(PullRequestExistsError);
  });

  it("reports a CLI that cannot be started", async () => {
    const runner = new FakeRunner(() => result({ exit_code: -2, stderr: "Failed to launch 'gh': ENOENT spawn gh ENOENT" }));
    await expect(service(runner).open(repoDir, {})).rejects.toThrow(
      "Hosting CLI 'gh' could not be started: Failed to launch 'gh': ENOENT spawn gh ENOENT",
    );
  });

  it("reports success without a URL as a CLI error", async () => {
    const runner = new FakeRunner(() => result({ stdout: "ok\n" }));
    await expect(service(runner).open(repoDir, {})).rejects.toBeInstanceOf(HostingCliError);
  });

  it("reports other failures with the exit code", async () => {
    const runner = new FakeRunner(() => result({ exit_code: 1, stderr: "HTTP 422: Validation Failed" }));
    await expect(service(runner).open(repoDir, {})).rejects.toThrow(
      "Hosting CLI 'gh' failed with exit code 1: HTTP 422: Validation Failed",
    );
  });
});
