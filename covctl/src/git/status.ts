import type { GitStatusReport } from "../types/git.js";
import type { WorkingTree, WorkingTreeEntry } from "./client.js";

const CONFLICT_PAIRS = new Set(["DD", "AU", "UD", "UA", "DU", "AA", "UU"]);

export function isConflict(entry: WorkingTreeEntry): boolean {
  return CONFLICT_PAIRS.has(`${entry.index}${entry.working_dir}`);
}

export function isUntracked(entry: WorkingTreeEntry): boolean {
  return entry.index === "?" && entry.working_dir === "?";
}

function isChange(code: string): boolean {
  return code !== " " && code !== "" && code !== "?" && code !== "!";
}

/**
 * Bucket porcelain entries. A file modified both in the index and the
 * working tree (`MM`) shows up as staged and unstaged.
 */
export function classifyWorkingTree(tree: WorkingTree, fallbackBranch: string): GitStatusReport {
  const staged: string[] = [];
  const unstaged: string[] = [];
  const untracked: string[] = [];
  const conflicts: string[] = [];

  for (const entry of tree.files) {
    if (isUntracked(entry)) {
      untracked.push(entry.path);
      continue;
    }
    if (isConflict(entry)) {
      conflicts.push(entry.path);
      continue;
    }
    if (isChange(entry.index)) staged.push(entry.path);
    if (isChange(entry.working_dir)) unstaged.push(entry.path);
  }

  return {
    branch: tree.branch ?? fallbackBranch,
    tracking: tree.tracking,
    ahead: tree.ahead,
    behind: tree.behind,
    staged,
    unstaged,
    untracked,
    conflicts,
    clean: staged.length + unstaged.length + untracked.length + conflicts.length === 0,
  };
}
