import { Dispatcher } from "./dispatch/dispatcher.js";
import { ToolRegistry } from "./dispatch/registry.js";
import { createTools } from "./dispatch/tools.js";
import { simpleGitFactory, type GitClientFactory } from "./git/client.js";
import { RepositoryOperations } from "./git/repository.js";
import type { Logger } from "./log/logger.js";
import { NodeProcessRunner, type ProcessRunner } from "./process/runner.js";
import { PullRequestService } from "./review/pull-request.js";
import type { CovctlConfig } from "./types/config.js";

export type AppOptions = {
  config: CovctlConfig;
  log: Logger;
  /** Substitutes for tests; default to real processes and simple-git. */
  runner?: ProcessRunner;
  gitFactory?: GitClientFactory;
};

export type App = {
  registry: ToolRegistry;
  dispatcher: Dispatcher;
};

/** Wire every tool against one configuration. */
export function createApp(opts: AppOptions): App {
  const { config, log } = opts;
  const runner = opts.runner ?? new NodeProcessRunner();
  const gitFactory = opts.gitFactory ?? simpleGitFactory(config.git.timeout_seconds * 1000);

  const repository = new RepositoryOperations(gitFactory, config.git, log.child({ component: "git" }));
  const pullRequests = new PullRequestService(runner, repository, config.pull_request, log.child({ component: "pr" }));

  const registry = new ToolRegistry();
  for (const tool of createTools({ config, runner, repository, pullRequests, log: log.child({ component: "build" }) })) {
    registry.register(tool);
  }

  return { registry, dispatcher: new Dispatcher(registry, log) };
}
