/**
 * Commits never land directly on the integration branches.
 *
 * The match is exact and case-sensitive: `Main` or `main-fix` are ordinary
 * working branches.
 */

export type BranchGuardResult = {
  allowed: boolean;
  reason?: string;
};

export const PROTECTED_BRANCHES: readonly string[] = ["main", "master"];

/** Check if committing on `branch` is allowed. */
export function checkCommitAllowed(branch: string): BranchGuardResult {
  if (PROTECTED_BRANCHES.includes(branch)) {
    return {
      allowed: false,
      reason: `Direct commits to '${branch}' are forbidden. Commit on a working branch and open a pull request.`,
    };
  }
  return { allowed: true };
}
