import { parseJacocoXmlFile } from "../coverage/jacoco-xml.js";
import { formatPercent } from "../coverage/summary.js";
import type { CoverageReport } from "../types/coverage.js";

/** Human-readable table: one line per class, worst first, then totals. */
export function formatCoverageReport(report: CoverageReport, limit?: number): string[] {
  const lines: string[] = [];
  const shown = limit === undefined ? report.classes : report.classes.slice(0, limit);
  for (const cls of shown) {
    const missed = cls.lines_total - cls.lines_covered;
    lines.push(
      `${cls.name}  lines ${cls.lines_covered}/${cls.lines_total} (${formatPercent(cls.line_ratio)})  ` +
        `branches ${cls.branches_covered}/${cls.branches_total}  missed ${missed}`,
    );
  }
  if (shown.length < report.classes.length) {
    lines.push(`... ${report.classes.length - shown.length} more classes`);
  }
  const s = report.summary;
  lines.push(
    `TOTAL  lines ${s.lines_covered}/${s.lines_total} (${formatPercent(s.line_coverage)})  ` +
      `branches ${s.branches_covered}/${s.branches_total} (${formatPercent(s.branch_coverage)})`,
  );
  return lines;
}

export function readCoverage(xmlPath: string): CoverageReport {
  return parseJacocoXmlFile(xmlPath);
}
