/** Pull request payloads for the hosting CLI. */
export type PullRequestBody = {
  summary: string;
  coverage_delta?: string;
  classes_improved?: string[];
  bugs_found?: string[];
  next_steps?: string;
};

export type PullRequestHandle = {
  url: string;
  number: number | null;
  base: string;
  head: string;
};
