import type { RunState, RunStatus } from "../types/run.js";
import { listRunStates, loadRunState } from "../core/run-store.js";
import { isTerminal } from "../core/state-machine.js";

export type StatusResult =
  | { ok: true; state: RunState }
  | { ok: false; error: string };

export type RunSummary = {
  id: string;
  status: RunStatus | "corrupted";
  environment: string | null;
  commit: string;
  failed_stage: string | null;
  /** False while a stage is still running (or the process driving it died). */
  finished: boolean;
  updated_at: string;
};

/**
 * Read run state for a given ID.
 */
export function status(opts: { runsDir: string; runId: string }): StatusResult {
  try {
    const state = loadRunState(opts.runsDir, opts.runId);
    if (!state) return { ok: false, error: `No run found: ${opts.runId}` };
    return { ok: true, state };
  } catch (e) {
    return { ok: false, error: `Failed to read state: ${e instanceof Error ? e.message : String(e)}` };
  }
}

/**
 * List all runs with their current status, most recently updated first.
 */
export function listRuns(runsDir: string): RunSummary[] {
  const results = listRunStates(runsDir).map((run): RunSummary =>
    run.ok
      ? {
          id: run.id,
          status: run.state.status,
          environment: run.state.trigger.environment,
          commit: run.state.trigger.commit,
          failed_stage: run.state.failed_stage,
          finished: isTerminal(run.state.status),
          updated_at: run.state.updated_at,
        }
      : { id: run.id, status: "corrupted", environment: null, commit: "", failed_stage: null, finished: false, updated_at: "" },
  );

  return results.sort((a, b) => b.updated_at.localeCompare(a.updated_at));
}
