import fs from "node:fs";
import type { TestFailure, TestResult } from "../types/adapter-output.js";

function num(v: unknown): number {
  return typeof v === "number" && Number.isFinite(v) ? v : 0;
}

/**
 * Reads a JSON report that already has the TestResult shape.
 */
export function passthroughJson(filePath: string): TestResult {
  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));

  if (!data || typeof data !== "object" || !("pass" in data) || !("total" in data)) {
    throw new Error(`Invalid test result JSON: missing required fields in ${filePath}`);
  }
  if (typeof data.pass !== "boolean" || typeof data.total !== "number") {
    throw new Error(`Invalid test result JSON: missing required fields in ${filePath}`);
  }

  const record: Record<string, unknown> = { ...data };
  const failures: TestFailure[] = Array.isArray(record.failures)
    ? record.failures
        .filter((f): f is Record<string, unknown> => f !== null && typeof f === "object")
        .map((f) => ({ name: String(f.name ?? "unknown"), message: String(f.message ?? "") }))
    : [];

  return {
    pass: data.pass,
    total: data.total,
    passed: num(record.passed),
    failed: num(record.failed),
    skipped: num(record.skipped),
    duration_ms: num(record.duration_ms),
    failures,
  };
}
