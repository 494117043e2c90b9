import { XMLParser } from "fast-xml-parser";
import fs from "node:fs";

export type TestFailure = {
  name: string;
  message: string;
  stacktrace?: string;
};

/** Normalized summary of a JUnit XML report. */
export type JunitSummary = {
  pass: boolean;
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  duration_ms: number;
  failures: TestFailure[];
};

type Node = Record<string, unknown>;

function isNode(value: unknown): value is Node {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function nodes(value: unknown): Node[] {
  if (Array.isArray(value)) return value.filter(isNode);
  return isNode(value) ? [value] : [];
}

function attr(node: Node, name: string): string | undefined {
  const value = node[`@_${name}`];
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

function int(node: Node, name: string): number {
  const parsed = parseInt(attr(node, name) ?? "0", 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}

function text(node: Node): string | undefined {
  const value = node["#text"];
  return typeof value === "string" ? value : undefined;
}

function failureOf(name: string, raw: unknown): TestFailure {
  if (typeof raw === "string") return { name, message: raw };
  if (!isNode(raw)) return { name, message: "" };
  return { name, message: attr(raw, "message") ?? text(raw) ?? "", stacktrace: text(raw) };
}

/**
 * Parse JUnit XML (as written by pytest `--junitxml`) into a summary.
 * Accepts a `<testsuites>` wrapper or a bare `<testsuite>`.
 */
export function parseJunitXml(xmlContent: string): JunitSummary {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    parseAttributeValue: false,
    isArray: (name) => name === "testsuite" || name === "testcase" || name === "failure" || name === "error",
  });

  const parsed: unknown = parser.parse(xmlContent);
  const root = isNode(parsed) ? parsed : {};
  const wrapper = isNode(root.testsuites) ? root.testsuites : null;
  const suites = nodes(wrapper ? wrapper.testsuite : root.testsuite);

  let total = 0;
  let failed = 0;
  let skipped = 0;
  let durationSec = 0;
  const failures: TestFailure[] = [];

  for (const suite of suites) {
    total += int(suite, "tests");
    failed += int(suite, "failures") + int(suite, "errors");
    skipped += int(suite, "skipped");
    durationSec += parseFloat(attr(suite, "time") ?? "0") || 0;

    for (const tc of nodes(suite.testcase)) {
      const tcName = attr(tc, "name") ?? "unknown";
      const tcClass = attr(tc, "classname") ?? "";
      const fullName = tcClass ? `${tcClass}.${tcName}` : tcName;

      const problems = [...(Array.isArray(tc.failure) ? tc.failure : []), ...(Array.isArray(tc.error) ? tc.error : [])];
      for (const problem of problems) failures.push(failureOf(fullName, problem));
    }
  }

  return {
    pass: failed === 0,
    total,
    passed: Math.max(0, total - failed - skipped),
    failed,
    skipped,
    duration_ms: Math.round(durationSec * 1000),
    failures,
  };
}

/** Read a JUnit XML file and return its summary. */
export function parseJunitXmlFile(filePath: string): JunitSummary {
  return parseJunitXml(fs.readFileSync(filePath, "utf8"));
}
