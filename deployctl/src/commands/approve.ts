import {
  hasApprovalRequest,
  readApprovalDecision,
  writeApprovalDecision,
  type ApprovalRecord,
} from "../capabilities/approval.js";
import { loadRunState } from "../core/run-store.js";

export type ApproveResult =
  | { ok: true; record: ApprovalRecord }
  | { ok: false; error: string };

/**
 * Record an approval decision for a run that is waiting at the deploy gate.
 * The waiting run picks the decision up on its next poll.
 */
export function approve(opts: { runsDir: string; runId: string; deny?: boolean; by?: string }): ApproveResult {
  const state = loadRunState(opts.runsDir, opts.runId);
  if (!state) {
    return { ok: false, error: `No run found: ${opts.runId}` };
  }
  if (!hasApprovalRequest(opts.runsDir, opts.runId)) {
    return { ok: false, error: `Run ${opts.runId} has not requested approval` };
  }
  const existing = readApprovalDecision(opts.runsDir, opts.runId);
  if (existing) {
    return { ok: false, error: `Run ${opts.runId} was already ${existing.decision}` };
  }

  const record = writeApprovalDecision(opts.runsDir, opts.runId, opts.deny ? "denied" : "granted", opts.by ?? null);
  return { ok: true, record };
}
