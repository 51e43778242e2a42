/** Normalized test report produced by the report adapters. */
export type TestFailure = {
  name: string;
  message: string;
  stacktrace?: string;
};

export type TestResult = {
  pass: boolean;
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  duration_ms: number;
  failures?: TestFailure[];
};

export type SourceFormat = "junit_xml" | "json" | "custom";

export type AdapterOutput = {
  adapter_version: string;
  source_format: SourceFormat;
  source_file: string;
  converted_at: string;
  result: TestResult;
};
