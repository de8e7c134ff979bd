/** Normalized coverage model built from a JaCoCo XML report. */
export type CounterType = "INSTRUCTION" | "BRANCH" | "LINE" | "METHOD" | "COMPLEXITY" | "CLASS";

export type CoverageCounter = {
  covered: number;
  total: number;
};

export type MethodCoverage = {
  method_name: string;
  descriptor: string | null;
  line: number | null;
  covered: boolean;
};

export type ClassCoverage = {
  name: string;
  package: string;
  source_file: string | null;
  lines_covered: number;
  lines_total: number;
  branches_covered: number;
  branches_total: number;
  instructions_covered: number;
  instructions_total: number;
  /** Covered/total lines in percent; null when the class has no lines. */
  line_ratio: number | null;
  methods: MethodCoverage[];
};

export type CoverageSummary = {
  line_coverage: number | null;
  branch_coverage: number | null;
  instruction_coverage: number | null;
  lines_covered: number;
  lines_total: number;
  branches_covered: number;
  branches_total: number;
};

export type CoverageReport = {
  report_name: string | null;
  source_file: string;
  /** Worst-covered first: descending by missed lines, then by name. */
  classes: ClassCoverage[];
  summary: CoverageSummary;
};

export type CoverageDelta = {
  before: CoverageSummary;
  after: CoverageSummary;
  line_delta: number | null;
  branch_delta: number | null;
  improved: boolean;
};
