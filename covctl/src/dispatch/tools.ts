import { compareCoverage } from "../coverage/summary.js";
import { parseJacocoXmlFile } from "../coverage/jacoco-xml.js";
import type { RepositoryOperations } from "../git/repository.js";
import type { Logger } from "../log/logger.js";
import { runTests } from "../process/build.js";
import type { ProcessRunner } from "../process/runner.js";
import type { PullRequestService } from "../review/pull-request.js";
import type { CovctlConfig } from "../types/config.js";
import type { CommitCoverage } from "../types/git.js";
import type { PullRequestBody } from "../types/pull-request.js";
import { writeTestFile } from "../workspace/test-file.js";
import { defineTool, type JsonSchema, type RegisteredTool } from "./tool.js";

export type ToolDeps = {
  config: CovctlConfig;
  runner: ProcessRunner;
  repository: RepositoryOperations;
  pullRequests: PullRequestService;
  log: Logger;
};

type RepoArgs = { repo_path: string };

const pathArg = (description: string): JsonSchema => ({ type: "string", minLength: 1, description });

const REPO_PATH = pathArg("Path to the git working tree");

const FIGURES_SCHEMA: JsonSchema = {
  type: "object",
  properties: {
    line_coverage: { type: "number", minimum: 0, maximum: 100 },
    branch_coverage: { type: "number", minimum: 0, maximum: 100 },
  },
  additionalProperties: false,
};

const PR_BODY_SCHEMA: JsonSchema = {
  anyOf: [
    { type: "string" },
    {
      type: "object",
      required: ["summary"],
      properties: {
        summary: { type: "string" },
        coverage_delta: { type: "string" },
        classes_improved: { type: "array", items: { type: "string" } },
        bugs_found: { type: "array", items: { type: "string" } },
        next_steps: { type: "string" },
      },
      additionalProperties: false,
    },
  ],
  description: "Free text, or the structured template fields",
};

/** Every tool exposed to the orchestrator, in listing order. */
export function createTools(deps: ToolDeps): RegisteredTool[] {
  const { config, runner, repository, pullRequests, log } = deps;

  return [
    defineTool<{ project_path: string; timeout_seconds?: number }>({
      name: "run_tests",
      description:
        "Run the project's build/test command (default `mvn test`) in project_path. Returns exit_code, stdout, stderr, timed_out and a parsed test summary.",
      inputSchema: {
        type: "object",
        properties: {
          project_path: pathArg("Project directory to build"),
          timeout_seconds: { type: "number", exclusiveMinimum: 0, description: "Overrides the configured build timeout" },
        },
        required: ["project_path"],
        additionalProperties: false,
      },
      lockPath: (args) => args.project_path,
      handler: (args) => runTests(runner, config.build, args.project_path, log, { timeoutSeconds: args.timeout_seconds }),
    }),

    defineTool<{ xml_path: string }>({
      name: "read_coverage",
      description:
        "Parse a JaCoCo XML report into per-class line/branch coverage, worst-covered classes first, with aggregate totals.",
      inputSchema: {
        type: "object",
        properties: { xml_path: pathArg("Path to jacoco.xml") },
        required: ["xml_path"],
        additionalProperties: false,
      },
      handler: async (args) => parseJacocoXmlFile(args.xml_path),
    }),

    defineTool<{ before_xml: string; after_xml: string }>({
      name: "compare_coverage",
      description:
        "Compare two JaCoCo XML reports. `improved` is true when aggregate line coverage did not decrease.",
      inputSchema: {
        type: "object",
        properties: {
          before_xml: pathArg("Report taken before the change"),
          after_xml: pathArg("Report taken after the change"),
        },
        required: ["before_xml", "after_xml"],
        additionalProperties: false,
      },
      handler: async (args) =>
        compareCoverage(parseJacocoXmlFile(args.before_xml).summary, parseJacocoXmlFile(args.after_xml).summary),
    }),

    defineTool<RepoArgs>({
      name: "git_status",
      description: "Report branch, tracking info and staged/unstaged/untracked/conflicted files.",
      inputSchema: {
        type: "object",
        properties: { repo_path: REPO_PATH },
        required: ["repo_path"],
        additionalProperties: false,
      },
      lockPath: (args) => args.repo_path,
      handler: (args) => repository.status(args.repo_path),
    }),

    defineTool<RepoArgs>({
      name: "git_add_all",
      description: "Stage all changed, deleted and untracked files except build output and IDE files.",
      inputSchema: {
        type: "object",
        properties: { repo_path: REPO_PATH },
        required: ["repo_path"],
        additionalProperties: false,
      },
      lockPath: (args) => args.repo_path,
      handler: (args) => repository.addAll(args.repo_path),
    }),

    defineTool<RepoArgs & { message: string; coverage?: CommitCoverage }>({
      name: "git_commit",
      description:
        "Commit the staged changes with a coverage trailer. Refuses to commit on main or master; stages nothing itself.",
      inputSchema: {
        type: "object",
        properties: {
          repo_path: REPO_PATH,
          message: { type: "string", minLength: 1, pattern: "\\S", description: "Commit message" },
          coverage: {
            type: "object",
            properties: {
              line_coverage: { type: "number", minimum: 0, maximum: 100 },
              branch_coverage: { type: "number", minimum: 0, maximum: 100 },
              before: FIGURES_SCHEMA,
              after: FIGURES_SCHEMA,
            },
            additionalProperties: false,
            description: "Coverage percentages appended to the message",
          },
        },
        required: ["repo_path", "message"],
        additionalProperties: false,
      },
      lockPath: (args) => args.repo_path,
      handler: (args) => repository.commit(args.repo_path, args.message, args.coverage),
    }),

    defineTool<RepoArgs & { remote?: string }>({
      name: "git_push",
      description:
        "Push the current branch. Uses the branch's upstream remote unless `remote` is given; never forces.",
      inputSchema: {
        type: "object",
        properties: {
          repo_path: REPO_PATH,
          remote: { type: "string", minLength: 1, description: "Remote name, e.g. origin" },
        },
        required: ["repo_path"],
        additionalProperties: false,
      },
      lockPath: (args) => args.repo_path,
      handler: (args) => repository.push(args.repo_path, args.remote),
    }),

    defineTool<RepoArgs & { base?: string; title?: string; body?: PullRequestBody | string }>({
      name: "git_pull_request",
      description: `Open a pull request from the current branch with the hosting CLI (${config.pull_request.cli}).`,
      inputSchema: {
        type: "object",
        properties: {
          repo_path: REPO_PATH,
          base: { type: "string", minLength: 1, description: `Target branch (default ${config.pull_request.default_base})` },
          title: { type: "string", minLength: 1, description: "Pull request title" },
          body: PR_BODY_SCHEMA,
        },
        required: ["repo_path"],
        additionalProperties: false,
      },
      lockPath: (args) => args.repo_path,
      handler: (args) => pullRequests.open(args.repo_path, { base: args.base, title: args.title, body: args.body }),
    }),

    defineTool<{ project_path: string; relative_path: string; content: string; overwrite?: boolean }>({
      name: "write_test_file",
      description:
        "Write test source code you have authored to relative_path inside project_path. Refuses paths outside the project and existing files unless overwrite is true.",
      inputSchema: {
        type: "object",
        properties: {
          project_path: pathArg("Project root"),
          relative_path: pathArg("Path of the test file relative to project_path"),
          content: { type: "string", description: "Full file content" },
          overwrite: { type: "boolean" },
        },
        required: ["project_path", "relative_path", "content"],
        additionalProperties: false,
      },
      lockPath: (args) => args.project_path,
      handler: (args) => writeTestFile(args.project_path, args.relative_path, args.content, args.overwrite ?? false),
    }),
  ];
}
