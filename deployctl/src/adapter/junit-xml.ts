import { XMLParser } from "fast-xml-parser";
import fs from "node:fs";
import type { TestResult, TestFailure } from "../types/adapter-output.js";

type XmlNode = Record<string, unknown>;

function isNode(v: unknown): v is XmlNode {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

function nodes(v: unknown): XmlNode[] {
  if (Array.isArray(v)) return v.filter(isNode);
  return isNode(v) ? [v] : [];
}

function attr(node: XmlNode, name: string): string | undefined {
  const v = node[`@_${name}`];
  return typeof v === "string" || typeof v === "number" ? String(v) : undefined;
}

function toFailure(name: string, entry: unknown): TestFailure {
  if (typeof entry === "string") return { name, message: entry };
  if (!isNode(entry)) return { name, message: "" };
  const text = typeof entry["#text"] === "string" ? entry["#text"] : undefined;
  return { name, message: attr(entry, "message") ?? text ?? "", stacktrace: text };
}

/**
 * Parse JUnit XML (pytest --junitxml, vitest, jest-junit) into a TestResult.
 */
export function parseJunitXml(xmlContent: string): TestResult {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    isArray: (name) => name === "testsuite" || name === "testcase" || name === "failure" || name === "error",
  });

  const parsed: unknown = parser.parse(xmlContent);
  const root = isNode(parsed) ? parsed : {};

  // Both <testsuites> wrapper and bare <testsuite>
  const wrapper = root.testsuites;
  const suites = isNode(wrapper) ? nodes(wrapper.testsuite) : nodes(root.testsuite);
  if (suites.length === 0) {
    return { pass: true, total: 0, passed: 0, failed: 0, skipped: 0, duration_ms: 0, failures: [] };
  }

  let total = 0;
  let failed = 0;
  let skipped = 0;
  let durationSec = 0;
  const failures: TestFailure[] = [];

  for (const suite of suites) {
    total += parseInt(attr(suite, "tests") ?? "0", 10);
    failed += parseInt(attr(suite, "failures") ?? "0", 10) + parseInt(attr(suite, "errors") ?? "0", 10);
    skipped += parseInt(attr(suite, "skipped") ?? "0", 10);
    durationSec += parseFloat(attr(suite, "time") ?? "0");

    for (const tc of nodes(suite.testcase)) {
      const tcName = attr(tc, "name") ?? "unknown";
      const tcClass = attr(tc, "classname") ?? "";
      const fullName = tcClass ? `${tcClass}.${tcName}` : tcName;

      for (const f of Array.isArray(tc.failure) ? tc.failure : []) failures.push(toFailure(fullName, f));
      for (const e of Array.isArray(tc.error) ? tc.error : []) failures.push(toFailure(fullName, e));
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

/** Read a JUnit XML file and return normalized TestResult. */
export function parseJunitXmlFile(filePath: string): TestResult {
  return parseJunitXml(fs.readFileSync(filePath, "utf8"));
}
