import { simpleGit, type SimpleGit } from "simple-git";

/** One porcelain status entry; `index`/`working_dir` are the two XY status letters. */
export type WorkingTreeEntry = {
  path: string;
  index: string;
  working_dir: string;
};

export type WorkingTree = {
  branch: string | null;
  tracking: string | null;
  ahead: number;
  behind: number;
  files: WorkingTreeEntry[];
};

/**
 * The git primitives the repository operations rely on.
 * Abstracts simple-git for testability.
 */
export interface GitClient {
  currentBranch(): Promise<string>;
  workingTree(): Promise<WorkingTree>;
  stagedFiles(): Promise<string[]>;
  add(files: string[]): Promise<void>;
  /** Returns the new commit id. */
  commit(message: string): Promise<string>;
  /** Remote configured as `branch.<name>.remote`, if any. */
  upstreamRemote(branch: string): Promise<string | null>;
  remotes(): Promise<string[]>;
  push(remote: string, branch: string, setUpstream: boolean): Promise<void>;
}

export type GitClientFactory = (repoPath: string) => GitClient;

export class SimpleGitClient implements GitClient {
  private git: SimpleGit;

  constructor(repoPath: string, timeoutMs: number, git?: SimpleGit) {
    this.git = git ?? simpleGit({ baseDir: repoPath, timeout: { block: timeoutMs } });
  }

  /** Works on unborn branches too; a detached HEAD reads as `HEAD`. */
  async currentBranch(): Promise<string> {
    const result = await this.git.raw(["branch", "--show-current"]);
    return result.trim() || "HEAD";
  }

  async workingTree(): Promise<WorkingTree> {
    const status = await this.git.status();
    return {
      branch: status.current,
      tracking: status.tracking,
      ahead: status.ahead,
      behind: status.behind,
      files: status.files.map((f) => ({ path: f.path, index: f.index, working_dir: f.working_dir })),
    };
  }

  async stagedFiles(): Promise<string[]> {
    const diff = await this.git.diff(["--cached", "--name-only"]);
    return diff
      .trim()
      .split("\n")
      .filter((f) => f.length > 0);
  }

  async add(files: string[]): Promise<void> {
    if (files.length === 0) return;
    await this.git.raw(["add", "--", ...files]);
  }

  async commit(message: string): Promise<string> {
    const result = await this.git.commit(message);
    return result.commit;
  }

  async upstreamRemote(branch: string): Promise<string | null> {
    const result = await this.git.getConfig(`branch.${branch}.remote`);
    return result.value;
  }

  async remotes(): Promise<string[]> {
    const remotes = await this.git.getRemotes();
    return remotes.map((r) => r.name);
  }

  async push(remote: string, branch: string, setUpstream: boolean): Promise<void> {
    await this.git.push(remote, `HEAD:refs/heads/${branch}`, setUpstream ? ["--set-upstream"] : []);
  }
}

export function simpleGitFactory(timeoutMs: number): GitClientFactory {
  return (repoPath) => new SimpleGitClient(repoPath, timeoutMs);
}
