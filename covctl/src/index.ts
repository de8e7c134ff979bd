export { createApp, type App, type AppOptions } from "./app.js";
export { loadRawConfig } from "./config/loader.js";
export { loadConfig, validateConfig } from "./config/validator.js";
export { parseJacocoXml, parseJacocoXmlFile } from "./coverage/jacoco-xml.js";
export { compareCoverage, summarizeClasses } from "./coverage/summary.js";
export { Dispatcher, type ToolOutcome } from "./dispatch/dispatcher.js";
export { KeyedMutex } from "./dispatch/mutex.js";
export { ToolRegistry } from "./dispatch/registry.js";
export { defineTool, type RegisteredTool, type ToolSpec } from "./dispatch/tool.js";
export * from "./errors/tool-errors.js";
export { checkCommitAllowed, PROTECTED_BRANCHES } from "./git/branch-guard.js";
export { SimpleGitClient, type GitClient, type GitClientFactory } from "./git/client.js";
export { RepositoryOperations, buildCommitMessage } from "./git/repository.js";
export { Logger, logger } from "./log/logger.js";
export { runTests, parseBuildSummary } from "./process/build.js";
export {
  LAUNCH_FAILURE_EXIT_CODE,
  NodeProcessRunner,
  SIGNAL_EXIT_CODE,
  TIMEOUT_EXIT_CODE,
  type ProcessRunner,
  type RunOptions,
} from "./process/runner.js";
export { PullRequestService } from "./review/pull-request.js";
export { renderPullRequestBody } from "./review/body.js";
export { createMcpServer } from "./server/mcp-server.js";
export type * from "./types/config.js";
export type * from "./types/coverage.js";
export type * from "./types/git.js";
export type * from "./types/process-result.js";
export type * from "./types/pull-request.js";
