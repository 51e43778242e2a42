#!/usr/bin/env node

import path from "node:path";
import { Command, Option } from "commander";
import { loadRawConfig } from "./config/loader.js";
import { createLogger, type LogFormat } from "./log/logger.js";
import { dispatch } from "./commands/dispatch.js";
import { push } from "./commands/push.js";
import { runEvent } from "./commands/run.js";
import { status, listRuns } from "./commands/status.js";
import { listArtifacts } from "./commands/artifacts.js";
import { approve } from "./commands/approve.js";
import { validateAll } from "./commands/validate.js";
import { EXIT } from "./commands/exit-codes.js";
import type { PipelineCommandResult } from "./commands/pipeline.js";

type CommonOptions = { config?: string; runsDir?: string; format: LogFormat };

const program = new Command();

program
  .name("deployctl")
  .description("Test, publish, deploy and verify a containerized service")
  .version("0.1.0")
  .exitOverride((err) => {
    process.exit(err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS);
  });

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option("--config <path>", "Path to config directory (default: bundled config)")
    .option("--runs-dir <path>", "Runs directory (default: runs_dir from config)")
    .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human"));
}

/** Runs directory for the read-only commands: flag, then configuration, then the default. */
function resolveRunsDir(opts: CommonOptions): string {
  if (opts.runsDir) return path.resolve(opts.runsDir);
  const raw = loadRawConfig(undefined, opts.config ? path.resolve(opts.config) : undefined);
  return path.resolve(typeof raw.runs_dir === "string" ? raw.runs_dir : ".deployctl/runs");
}

function emitError(format: LogFormat, code: string, message: string): void {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", code, message }) + "\n");
  } else {
    console.error(message);
  }
}

/** SIGINT/SIGTERM abort the active stage; a second signal exits at once. */
function cancellationSignal(): AbortSignal {
  const controller = new AbortController();
  const onSignal = (sig: NodeJS.Signals) => {
    if (controller.signal.aborted) process.exit(130);
    process.stderr.write(`Received ${sig}; cancelling run\n`);
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  return controller.signal;
}

function finish(format: LogFormat, res: PipelineCommandResult): never {
  if (!res.ok) {
    // The orchestrator already logged the failure of a run it drove.
    if (!res.run) emitError(format, res.error.code, res.error.message);
    process.exit(res.exitCode);
  }

  if (res.outcome === "ignored") {
    if (format === "human") console.log(`Ignored: ${res.reason}`);
  } else if (format === "jsonl") {
    process.stdout.write(
      JSON.stringify({ level: "info", code: "OK", runId: res.run.run_id, status: res.run.status, statePath: res.run.state_path }) + "\n",
    );
  } else {
    console.log(`Run ${res.run.run_id}: ${res.run.status}`);
  }
  process.exit(EXIT.SUCCESS);
}

function pipelineOptions(opts: CommonOptions) {
  return {
    configDir: opts.config ? path.resolve(opts.config) : undefined,
    runsDir: opts.runsDir,
    logger: createLogger(opts.format),
    signal: cancellationSignal(),
  };
}

withCommonOptions(
  program
    .command("dispatch")
    .description("Run the full pipeline against an environment (manual dispatch)")
    .option("--environment <env>", "Target environment: development|staging|production")
    .option("--sha <sha>", "Commit to deploy (default: HEAD)")
    .option("--ref <ref>", "Ref the commit belongs to"),
).action(async (opts: CommonOptions & { environment?: string; sha?: string; ref?: string }) => {
  const res = await dispatch({ ...pipelineOptions(opts), environment: opts.environment, sha: opts.sha, ref: opts.ref });
  finish(opts.format, res);
});

withCommonOptions(
  program
    .command("push")
    .description("Handle a push: run the test stage only")
    .option("--sha <sha>", "Pushed commit (default: HEAD)")
    .option("--ref <ref>", "Pushed ref (default: current branch)")
    .option("--changed <files...>", "Changed files (default: read from git)")
    .option("--base <ref>", "Compute changed files against this ref"),
).action(async (opts: CommonOptions & { sha?: string; ref?: string; changed?: string[]; base?: string }) => {
  const res = await push({ ...pipelineOptions(opts), sha: opts.sha, ref: opts.ref, changed: opts.changed, base: opts.base });
  finish(opts.format, res);
});

withCommonOptions(
  program
    .command("run")
    .description("Run the pipeline for a JSON event file")
    .requiredOption("--event <path>", "Path to a push or workflow_dispatch event"),
).action(async (opts: CommonOptions & { event: string }) => {
  const res = await runEvent({ ...pipelineOptions(opts), eventFile: opts.event });
  finish(opts.format, res);
});

withCommonOptions(
  program.command("status").description("Show run status").argument("[runId]", "Run ID (omit to list all)"),
).action((runId: string | undefined, opts: CommonOptions) => {
  const runsDir = resolveRunsDir(opts);
  if (runId) {
    const res = status({ runsDir, runId });
    if (!res.ok) {
      emitError(opts.format, "RUN_NOT_FOUND", res.error);
      process.exit(EXIT.INVALID_ARGS);
    }
    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify(res.state) + "\n");
    } else {
      console.log(JSON.stringify(res.state, null, 2));
    }
    return;
  }

  const list = listRuns(runsDir);
  if (opts.format === "jsonl") {
    for (const item of list) process.stdout.write(JSON.stringify(item) + "\n");
  } else {
    if (list.length === 0) {
      console.log("No runs found.");
      return;
    }
    for (const item of list) {
      const failed = item.failed_stage ? ` (failed at ${item.failed_stage})` : item.finished ? "" : " (in progress)";
      console.log(`${item.id}  ${item.status}${failed}  ${item.updated_at}`);
    }
  }
});

withCommonOptions(
  program.command("artifacts").description("List the files a run wrote").argument("<runId>", "Run ID"),
).action((runId: string, opts: CommonOptions) => {
  const res = listArtifacts({ runsDir: resolveRunsDir(opts), runId });
  if (!res.ok) {
    emitError(opts.format, "RUN_NOT_FOUND", res.error);
    process.exit(EXIT.INVALID_ARGS);
  }
  if (opts.format === "jsonl") {
    for (const f of res.files) process.stdout.write(JSON.stringify(f) + "\n");
  } else {
    for (const f of res.files) console.log(`${f.path}  ${f.size} bytes`);
  }
});

withCommonOptions(
  program
    .command("approve")
    .description("Approve (or deny) a run waiting to deploy")
    .argument("<runId>", "Run ID")
    .option("--deny", "Deny instead of approve")
    .option("--by <actor>", "Who decided"),
).action((runId: string, opts: CommonOptions & { deny?: boolean; by?: string }) => {
  const res = approve({ runsDir: resolveRunsDir(opts), runId, deny: opts.deny, by: opts.by });
  if (!res.ok) {
    emitError(opts.format, "APPROVAL_NOT_RECORDED", res.error);
    process.exit(EXIT.INVALID_ARGS);
  }
  if (opts.format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "info", code: "APPROVAL_RECORDED", ...res.record }) + "\n");
  } else {
    console.log(`Run ${runId}: ${res.record.decision}`);
  }
});

withCommonOptions(
  program
    .command("validate")
    .description("Validate configuration and (optionally) a run's artifacts")
    .option("--run <runId>", "Also check this run's state, manifest and checksums"),
).action(async (opts: CommonOptions & { run?: string }) => {
  const res = await validateAll({
    configDir: opts.config ? path.resolve(opts.config) : undefined,
    runsDir: opts.runsDir,
    runId: opts.run,
  });

  if (!res.ok) {
    if (opts.format === "jsonl") {
      for (const err of res.errors) process.stdout.write(JSON.stringify(err) + "\n");
    } else {
      for (const err of res.errors) console.error(err.message);
    }
    process.exit(EXIT.CONFIG_ERROR);
  }

  if (opts.format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK" }) + "\n");
  } else {
    console.log("OK");
  }
});

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.RUN_FAILED);
});
