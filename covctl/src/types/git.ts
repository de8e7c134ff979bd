/** Shapes returned by the repository operations. */
export type GitStatusReport = {
  branch: string;
  tracking: string | null;
  ahead: number;
  behind: number;
  staged: string[];
  unstaged: string[];
  untracked: string[];
  conflicts: string[];
  clean: boolean;
};

export type AddAllResult = {
  count: number;
  files: string[];
  skipped: string[];
};

/** Coverage figures a caller may attach to a commit, in percent. */
export type CoverageFigures = {
  line_coverage?: number;
  branch_coverage?: number;
};

export type CommitCoverage = CoverageFigures & {
  before?: CoverageFigures;
  after?: CoverageFigures;
};

export type CommitResult = {
  commit_id: string;
  branch: string;
  message: string;
};

export type PushResult = {
  remote: string;
  branch: string;
  set_upstream: boolean;
};
