import fs from "node:fs";
import path from "node:path";
import type { TriggerDescriptor } from "../types/trigger.js";

const MAX_CLAIM_ATTEMPTS = 100;

/**
 * Generate a run ID and create its directory in one step.
 * Format: {kind}[-{environment}]-{sha_7}-{YYYYMMDD}-{seq}
 *
 * The directory is created without `recursive`: of two runs racing for the
 * same sequence number exactly one wins, the other takes the next number.
 */
export function claimRunId(trigger: TriggerDescriptor, runsDir: string, now: Date = new Date()): string {
  const prefix = runIdPrefix(trigger, now);
  fs.mkdirSync(runsDir, { recursive: true });

  let seq = getNextSeq(runsDir, prefix);
  for (let attempt = 0; attempt < MAX_CLAIM_ATTEMPTS; attempt++, seq++) {
    const runId = `${prefix}-${formatSeq(seq)}`;
    try {
      fs.mkdirSync(path.join(runsDir, runId));
      return runId;
    } catch (e) {
      if (!isAlreadyExists(e)) throw e;
    }
  }
  throw new Error(`Could not claim a run id for ${prefix} after ${MAX_CLAIM_ATTEMPTS} attempts`);
}

function isAlreadyExists(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "EEXIST";
}

function runIdPrefix(trigger: TriggerDescriptor, now: Date): string {
  const sha7 = trigger.commit.replace(/[^a-zA-Z0-9_]/g, "-").slice(0, 7);
  const date = now.toISOString().slice(0, 10).replace(/-/g, "");
  const scope = trigger.environment ? `${trigger.kind}-${trigger.environment}` : trigger.kind;
  return `${scope}-${sha7}-${date}`;
}

function formatSeq(seq: number): string {
  return String(seq).padStart(3, "0");
}

function getNextSeq(runsDir: string, prefix: string): number {
  if (!fs.existsSync(runsDir)) return 1;

  const entries = fs.readdirSync(runsDir, { withFileTypes: true });
  let maxSeq = 0;

  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    if (!entry.name.startsWith(`${prefix}-`)) continue;
    const last = entry.name.slice(prefix.length + 1);
    const num = parseInt(last, 10);
    if (!isNaN(num) && num > maxSeq) maxSeq = num;
  }

  return maxSeq + 1;
}
