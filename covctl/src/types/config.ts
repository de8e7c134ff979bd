/** Shape of the layered configuration. */
export type LogLevelName = "debug" | "info" | "warn" | "error";

export type BuildConfig = {
  command: string;
  args: string[];
  timeout_seconds: number;
  max_output_bytes: number;
};

export type GitConfig = {
  timeout_seconds: number;
  add_exclude: string[];
};

export type PullRequestConfig = {
  cli: string;
  default_base: string;
  default_title: string;
  footer: string;
  timeout_seconds: number;
};

export type LoggingConfig = {
  level: LogLevelName;
};

export type CovctlConfig = {
  schema_version: string;
  build: BuildConfig;
  git: GitConfig;
  pull_request: PullRequestConfig;
  logging: LoggingConfig;
};
