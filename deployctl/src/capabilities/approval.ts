import fs from "node:fs";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import type { ApprovalDecision } from "../types/run.js";
import type { EnvironmentName } from "../types/trigger.js";
import { atomicWriteJson, runDirFor } from "../core/run-store.js";

export type ApprovalRequest = {
  runId: string;
  environment: EnvironmentName;
  signal?: AbortSignal;
};

/**
 * Environment-level approval. The orchestrator only waits on it; who approves
 * and how is up to the implementation.
 */
export interface ApprovalGate {
  awaitApproval(request: ApprovalRequest): Promise<ApprovalDecision>;
}

export type ApprovalRecord = {
  run_id: string;
  decision: "granted" | "denied";
  by: string | null;
  decided_at: string;
};

const REQUEST_FILE = "approval-request.json";
const DECISION_FILE = "approval.json";

export function hasApprovalRequest(runsDir: string, runId: string): boolean {
  return fs.existsSync(path.join(runDirFor(runsDir, runId), REQUEST_FILE));
}

export function readApprovalDecision(runsDir: string, runId: string): ApprovalRecord | null {
  const p = path.join(runDirFor(runsDir, runId), DECISION_FILE);
  if (!fs.existsSync(p)) return null;
  const record: Partial<ApprovalRecord> = JSON.parse(fs.readFileSync(p, "utf8"));
  if (record.decision !== "granted" && record.decision !== "denied") return null;
  return {
    run_id: runId,
    decision: record.decision,
    by: record.by ?? null,
    decided_at: record.decided_at ?? "",
  };
}

export function writeApprovalDecision(
  runsDir: string,
  runId: string,
  decision: "granted" | "denied",
  by: string | null,
): ApprovalRecord {
  const record: ApprovalRecord = { run_id: runId, decision, by, decided_at: new Date().toISOString() };
  atomicWriteJson(path.join(runDirFor(runsDir, runId), DECISION_FILE), record);
  return record;
}

/**
 * File-based gate: writes approval-request.json into the run directory and
 * polls for approval.json (written by `deployctl approve`).
 */
export class FileApprovalGate implements ApprovalGate {
  constructor(
    private readonly runsDir: string,
    private readonly opts: { timeoutMs: number; pollIntervalMs: number },
  ) {}

  async awaitApproval(request: ApprovalRequest): Promise<ApprovalDecision> {
    atomicWriteJson(path.join(runDirFor(this.runsDir, request.runId), REQUEST_FILE), {
      run_id: request.runId,
      environment: request.environment,
      requested_at: new Date().toISOString(),
      timeout_ms: this.opts.timeoutMs,
    });

    const deadline = Date.now() + this.opts.timeoutMs;
    for (;;) {
      const record = readApprovalDecision(this.runsDir, request.runId);
      if (record) return record.decision;

      const remaining = deadline - Date.now();
      if (remaining <= 0) return "timeout";
      await sleep(Math.min(this.opts.pollIntervalMs, remaining), undefined, { signal: request.signal });
    }
  }
}
