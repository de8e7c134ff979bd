import { XMLParser, XMLValidator } from "fast-xml-parser";
import fs from "node:fs";
import { MalformedReportError, NotFoundError } from "../errors/tool-errors.js";
import type {
  ClassCoverage,
  CounterType,
  CoverageCounter,
  CoverageReport,
  MethodCoverage,
} from "../types/coverage.js";
import { percent, summarizeClasses } from "./summary.js";

type XmlNode = Record<string, unknown>;

type Counters = Partial<Record<CounterType, CoverageCounter>>;

type ClassAccumulator = {
  name: string;
  package: string;
  source_file: string | null;
  counters: Required<Pick<Counters, "LINE" | "BRANCH" | "INSTRUCTION">>;
  methods: MethodCoverage[];
  methodIndex: Map<string, number>;
};

const COUNTER_TYPES: readonly CounterType[] = ["INSTRUCTION", "BRANCH", "LINE", "METHOD", "COMPLEXITY", "CLASS"];
const KNOWN_COUNTER_TYPES: ReadonlySet<string> = new Set(COUNTER_TYPES);
const ARRAY_ELEMENTS = new Set(["group", "package", "sourcefile", "class", "method", "counter", "line"]);

function isNode(value: unknown): value is XmlNode {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function children(node: XmlNode, name: string): XmlNode[] {
  const value = node[name];
  if (value === undefined) return [];
  const list = Array.isArray(value) ? value : [value];
  return list.filter(isNode);
}

function attr(node: XmlNode, name: string): string | undefined {
  const value = node[`@_${name}`];
  return typeof value === "string" ? value : undefined;
}

function isCounterType(value: string): value is CounterType {
  return KNOWN_COUNTER_TYPES.has(value);
}

function parseCount(raw: string | undefined, field: string, where: string): number {
  if (raw === undefined || !/^\d+$/.test(raw.trim())) {
    throw new MalformedReportError(`Counter in ${where} has invalid '${field}' attribute: ${raw ?? "(missing)"}`);
  }
  return Number(raw.trim());
}

/** Read the `<counter>` children of one element, keyed by type. */
function readCounters(node: XmlNode, where: string): Counters {
  const counters: Counters = {};
  for (const counter of children(node, "counter")) {
    const type = attr(counter, "type");
    if (!type) {
      throw new MalformedReportError(`Counter in ${where} is missing its 'type' attribute`);
    }
    const covered = parseCount(attr(counter, "covered"), "covered", where);
    const missed = parseCount(attr(counter, "missed"), "missed", where);
    // Unknown counter types from newer JaCoCo releases are ignored.
    if (!isCounterType(type)) continue;

    const existing = counters[type];
    counters[type] = {
      covered: (existing?.covered ?? 0) + covered,
      total: (existing?.total ?? 0) + covered + missed,
    };
  }
  return counters;
}

/** `com/example/Foo$Inner` → `com.example.Foo$Inner`. */
export function normalizeClassName(rawName: string, packageName: string): string {
  const dotted = rawName.replace(/\//g, ".");
  if (!dotted.includes(".") && packageName.length > 0) {
    return `${packageName}.${dotted}`;
  }
  return dotted;
}

function methodCovered(counters: Counters): boolean {
  const counter = counters.METHOD ?? counters.INSTRUCTION ?? counters.LINE;
  return counter !== undefined && counter.covered > 0;
}

function parseLine(raw: string | undefined): number | null {
  if (raw === undefined || !/^\d+$/.test(raw)) return null;
  return Number(raw);
}

class ReportBuilder {
  private readonly classes = new Map<string, ClassAccumulator>();

  addClass(node: XmlNode, packageName: string, sourceFile: string | null): void {
    const rawName = attr(node, "name");
    if (!rawName) {
      throw new MalformedReportError(`A <class> element in package '${packageName || "(default)"}' has no name`);
    }
    const name = normalizeClassName(rawName, packageName);
    const counters = readCounters(node, `class ${name}`);

    let acc = this.classes.get(name);
    if (!acc) {
      acc = {
        name,
        package: packageName,
        source_file: null,
        counters: {
          LINE: { covered: 0, total: 0 },
          BRANCH: { covered: 0, total: 0 },
          INSTRUCTION: { covered: 0, total: 0 },
        },
        methods: [],
        methodIndex: new Map(),
      };
      this.classes.set(name, acc);
    }

    acc.source_file = acc.source_file ?? attr(node, "sourcefilename") ?? sourceFile;
    for (const type of ["LINE", "BRANCH", "INSTRUCTION"] as const) {
      const counter = counters[type];
      if (!counter) continue;
      acc.counters[type].covered += counter.covered;
      acc.counters[type].total += counter.total;
    }

    for (const method of children(node, "method")) {
      const methodName = attr(method, "name");
      if (!methodName) continue;
      const descriptor = attr(method, "desc") ?? null;
      const covered = methodCovered(readCounters(method, `method ${name}#${methodName}`));
      const key = `${methodName}${descriptor ?? ""}`;

      const idx = acc.methodIndex.get(key);
      if (idx === undefined) {
        acc.methodIndex.set(key, acc.methods.length);
        acc.methods.push({ method_name: methodName, descriptor, line: parseLine(attr(method, "line")), covered });
      } else {
        const prev = acc.methods[idx];
        acc.methods[idx] = { ...prev, covered: prev.covered || covered };
      }
    }
  }

  build(): ClassCoverage[] {
    const result: ClassCoverage[] = [];
    for (const acc of this.classes.values()) {
      const { LINE, BRANCH, INSTRUCTION } = acc.counters;
      result.push({
        name: acc.name,
        package: acc.package,
        source_file: acc.source_file,
        lines_covered: LINE.covered,
        lines_total: LINE.total,
        branches_covered: BRANCH.covered,
        branches_total: BRANCH.total,
        instructions_covered: INSTRUCTION.covered,
        instructions_total: INSTRUCTION.total,
        line_ratio: percent(LINE.covered, LINE.total),
        methods: acc.methods,
      });
    }
    return result.sort(compareWorstFirst);
  }
}

/** Most missed lines first; ties by class name so the order is stable. */
export function compareWorstFirst(a: ClassCoverage, b: ClassCoverage): number {
  const missedA = a.lines_total - a.lines_covered;
  const missedB = b.lines_total - b.lines_covered;
  if (missedA !== missedB) return missedB - missedA;
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

function collectPackages(node: XmlNode, builder: ReportBuilder): number {
  let packages = 0;
  for (const group of children(node, "group")) {
    packages += collectPackages(group, builder);
  }
  for (const pkg of children(node, "package")) {
    packages++;
    const packageName = (attr(pkg, "name") ?? "").replace(/\//g, ".");
    for (const cls of children(pkg, "class")) {
      builder.addClass(cls, packageName, null);
    }
    for (const sourceFile of children(pkg, "sourcefile")) {
      for (const cls of children(sourceFile, "class")) {
        builder.addClass(cls, packageName, attr(sourceFile, "name") ?? null);
      }
    }
  }
  return packages;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const inner of Object.values(value)) deepFreeze(inner);
    Object.freeze(value);
  }
  return value;
}

/**
 * Parse JaCoCo XML content into a normalized CoverageReport.
 *
 * @param xmlContent - Raw report text.
 * @param sourceFile - Where the content came from; echoed in the report.
 */
export function parseJacocoXml(xmlContent: string, sourceFile = "<memory>"): CoverageReport {
  const validation = XMLValidator.validate(xmlContent);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new MalformedReportError(`${sourceFile} is not well-formed XML (line ${line}, col ${col}): ${msg}`);
  }

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    parseAttributeValue: false,
    isArray: (name) => ARRAY_ELEMENTS.has(name),
  });

  let parsed: unknown;
  try {
    parsed = parser.parse(xmlContent);
  } catch (err) {
    throw new MalformedReportError(`${sourceFile} could not be parsed`, err);
  }

  const report = isNode(parsed) ? parsed.report : undefined;
  if (!isNode(report)) {
    throw new MalformedReportError(`${sourceFile} has no <report> root element; is it a JaCoCo XML report?`);
  }

  const builder = new ReportBuilder();
  const packages = collectPackages(report, builder);

  const reportCounters = children(report, "counter");
  if (packages > 0 && reportCounters.length === 0) {
    throw new MalformedReportError(`${sourceFile} has packages but no report-level <counter> elements`);
  }
  // Report-level counters are recomputed from the classes; read them only to validate.
  readCounters(report, "report");

  const classes = builder.build();
  return deepFreeze({
    report_name: attr(report, "name") ?? null,
    source_file: sourceFile,
    classes,
    summary: summarizeClasses(classes),
  });
}

/** Read a JaCoCo XML file and return the normalized CoverageReport. */
export function parseJacocoXmlFile(filePath: string): CoverageReport {
  let content: string;
  try {
    const stat = fs.statSync(filePath);
    if (!stat.isFile()) {
      throw new NotFoundError(`Coverage report is not a file: ${filePath}`, { path: filePath });
    }
    content = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    if (err instanceof NotFoundError) throw err;
    throw new NotFoundError(`Coverage report not found: ${filePath}`, { path: filePath });
  }
  return parseJacocoXml(content, filePath);
}
