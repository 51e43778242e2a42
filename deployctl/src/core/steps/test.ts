import fs from "node:fs";
import path from "node:path";
import type { TestConfig } from "../../types/config.js";
import type { AdapterOutput } from "../../types/adapter-output.js";
import type { Logger } from "../../log/logger.js";
import { adaptTestResult } from "../../adapter/adapter.js";
import { materializeTestConfig, writeDotenv } from "../env-config.js";
import { runCommand, tail } from "../exec.js";

export type TestStageInput = {
  config: TestConfig;
  /** Repository checkout the commands run in. */
  repoPath: string;
  /** Per-run directory removed when the run ends. */
  scratchDir: string;
  baseEnv: NodeJS.ProcessEnv;
  logger: Logger;
  signal?: AbortSignal;
  timeoutMs?: number;
};

export type TestStageResult = {
  pass: boolean;
  /** Command that decided the outcome. */
  command: string;
  exit_code: number;
  env_file: string;
  report: AdapterOutput | null;
  output_tail: string;
};

/**
 * Test step: install dependencies, materialize the synthetic configuration,
 * run the suite once. The first non-zero exit decides the stage.
 */
export async function runTestStage(input: TestStageInput): Promise<TestStageResult> {
  const { config, logger } = input;
  const cwd = path.resolve(input.repoPath, config.workdir);

  const testConfig = materializeTestConfig(config.env);
  const envFile = writeDotenv(path.join(input.scratchDir, "test.env"), testConfig);
  const env: NodeJS.ProcessEnv = { ...input.baseEnv, ...testConfig, ENV_FILE: envFile };
  const deadline = input.timeoutMs === undefined ? undefined : Date.now() + input.timeoutMs;

  const steps = [...config.install, config.command];
  for (const argv of steps) {
    const command = argv.join(" ");
    logger.info("TEST_COMMAND", `$ ${command}`);
    const res = await runCommand(argv, {
      cwd,
      env,
      signal: input.signal,
      timeoutMs: deadline === undefined ? undefined : Math.max(1, deadline - Date.now()),
    });
    if (res.exitCode !== 0) {
      return {
        pass: false,
        command,
        exit_code: res.exitCode,
        env_file: envFile,
        report: argv === config.command ? readReport(cwd, config.report, logger) : null,
        output_tail: tail(`${res.stdout}\n${res.stderr}`),
      };
    }
  }

  return {
    pass: true,
    command: config.command.join(" "),
    exit_code: 0,
    env_file: envFile,
    report: readReport(cwd, config.report, logger),
    output_tail: "",
  };
}

function readReport(cwd: string, report: string | undefined, logger: Logger): AdapterOutput | null {
  if (!report) return null;
  const reportPath = path.resolve(cwd, report);
  if (!fs.existsSync(reportPath)) {
    logger.warn("TEST_REPORT_MISSING", `Test report not found: ${report}`);
    return null;
  }
  try {
    return adaptTestResult(reportPath);
  } catch (e) {
    logger.warn("TEST_REPORT_UNREADABLE", `Could not read test report ${report}: ${e instanceof Error ? e.message : String(e)}`);
    return null;
  }
}
