import type { TriggerDescriptor } from "../types/trigger.js";
import { STAGES, type RunStatus, type StageId, type StageRecord } from "../types/run.js";

export { STAGES };

/**
 * A stage runs when every stage in `needs` succeeded and `gate` holds for the
 * run's trigger. Otherwise it is skipped, never failed.
 */
export type StageDefinition = {
  id: StageId;
  needs: StageId[];
  gate: (trigger: TriggerDescriptor) => boolean;
  gateDescription: string;
  /** Run status while the stage executes. */
  runStatus: RunStatus;
};

const always = (): boolean => true;
const producesArtifact = (trigger: TriggerDescriptor): boolean => trigger.kind === "manual";

export const STAGE_GRAPH: readonly StageDefinition[] = [
  { id: "test", needs: [], gate: always, gateDescription: "always", runStatus: "testing" },
  { id: "build", needs: ["test"], gate: producesArtifact, gateDescription: "manual dispatch only", runStatus: "building" },
  { id: "deploy", needs: ["build"], gate: producesArtifact, gateDescription: "manual dispatch only", runStatus: "deploying" },
  { id: "verify", needs: ["deploy"], gate: producesArtifact, gateDescription: "manual dispatch only", runStatus: "verifying" },
];

export type GateDecision = { run: true } | { run: false; reason: string };

/**
 * Throws if a stage depends on itself, on an unknown stage, or on a stage
 * that does not come before it.
 */
export function validateGraph(graph: readonly StageDefinition[]): void {
  const seen = new Set<StageId>();
  for (const def of graph) {
    for (const dep of def.needs) {
      if (!seen.has(dep)) {
        throw new Error(`Stage "${def.id}" depends on "${dep}", which does not run before it`);
      }
    }
    if (seen.has(def.id)) throw new Error(`Duplicate stage "${def.id}"`);
    seen.add(def.id);
  }
}

export function evaluateStage(
  def: StageDefinition,
  trigger: TriggerDescriptor,
  records: Record<StageId, StageRecord>,
): GateDecision {
  for (const dep of def.needs) {
    const status = records[dep].status;
    if (status !== "succeeded") {
      return { run: false, reason: `dependency "${dep}" ${status}` };
    }
  }
  if (!def.gate(trigger)) {
    return { run: false, reason: `gate not satisfied: ${def.gateDescription}` };
  }
  return { run: true };
}

export function createStageRecords(): Record<StageId, StageRecord> {
  const pending = (stage: StageId): StageRecord => ({
    stage,
    status: "pending",
    started_at: null,
    finished_at: null,
    duration_ms: null,
  });
  return { test: pending("test"), build: pending("build"), deploy: pending("deploy"), verify: pending("verify") };
}

/**
 * Terminal status of a run once every stage has been decided:
 * any failure → failed, else any skip → skipped, else succeeded.
 */
export function finalStatus(records: Record<StageId, StageRecord>): "succeeded" | "failed" | "skipped" {
  const statuses = STAGES.map((s) => records[s].status);
  if (statuses.includes("failed")) return "failed";
  if (statuses.includes("skipped")) return "skipped";
  return "succeeded";
}

export function isTerminal(status: RunStatus): boolean {
  return status === "succeeded" || status === "failed" || status === "skipped";
}

const DEFAULT_TIMEOUTS: Record<StageId, number> = { test: 1800, build: 1800, deploy: 600, verify: 300 };

/** Stage timeout in seconds. */
export function getStageTimeout(stage: StageId, timeouts?: Partial<Record<StageId, number>>): number {
  return timeouts?.[stage] ?? DEFAULT_TIMEOUTS[stage];
}
