import type { ClassCoverage, CoverageDelta, CoverageSummary } from "../types/coverage.js";

/** covered/total in percent, two decimals; null when there is nothing to cover. */
export function percent(covered: number, total: number): number | null {
  if (total === 0) return null;
  return Math.round((10000 * covered) / total) / 100;
}

export function summarizeClasses(classes: readonly ClassCoverage[]): CoverageSummary {
  let linesCovered = 0;
  let linesTotal = 0;
  let branchesCovered = 0;
  let branchesTotal = 0;
  let instructionsCovered = 0;
  let instructionsTotal = 0;

  for (const cls of classes) {
    linesCovered += cls.lines_covered;
    linesTotal += cls.lines_total;
    branchesCovered += cls.branches_covered;
    branchesTotal += cls.branches_total;
    instructionsCovered += cls.instructions_covered;
    instructionsTotal += cls.instructions_total;
  }

  return {
    line_coverage: percent(linesCovered, linesTotal),
    branch_coverage: percent(branchesCovered, branchesTotal),
    instruction_coverage: percent(instructionsCovered, instructionsTotal),
    lines_covered: linesCovered,
    lines_total: linesTotal,
    branches_covered: branchesCovered,
    branches_total: branchesTotal,
  };
}

function delta(before: number | null, after: number | null): number | null {
  if (before === null || after === null) return null;
  return Math.round((after - before) * 100) / 100;
}

/**
 * Compare two aggregate summaries.
 *
 * `improved` is true when aggregate line coverage did not decrease. A side
 * with no lines counts as 0% so a first report always qualifies; two
 * line-less reports never do.
 */
export function compareCoverage(before: CoverageSummary, after: CoverageSummary): CoverageDelta {
  const improved =
    (before.line_coverage !== null || after.line_coverage !== null) &&
    (after.line_coverage ?? 0) >= (before.line_coverage ?? 0);

  return {
    before,
    after,
    line_delta: delta(before.line_coverage, after.line_coverage),
    branch_delta: delta(before.branch_coverage, after.branch_coverage),
    improved,
  };
}

/** `61.5%`, or `N/A` when undefined. */
export function formatPercent(value: number | null | undefined): string {
  return value === null || value === undefined ? "N/A" : `${value}%`;
}
