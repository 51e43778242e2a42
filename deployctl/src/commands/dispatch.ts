import type { DispatchEvent } from "../types/trigger.js";
import { GitOperations } from "../git/operations.js";
import { executeEvent, gitFailure, type PipelineCommandOptions, type PipelineCommandResult } from "./pipeline.js";

export type DispatchOptions = PipelineCommandOptions & {
  /** Omitted: the configured default environment. */
  environment?: string;
  /** Omitted: HEAD of the repository. */
  sha?: string;
  ref?: string;
};

/** Manual dispatch: the full pipeline against one named environment. */
export async function dispatch(opts: DispatchOptions): Promise<PipelineCommandResult> {
  let sha = opts.sha;
  if (sha === undefined) {
    try {
      sha = await new GitOperations(opts.repoPath ?? process.cwd()).getCurrentSha();
    } catch (e) {
      return gitFailure(e);
    }
  }

  const event: DispatchEvent = {
    event_name: "workflow_dispatch",
    sha,
    ...(opts.ref ? { ref: opts.ref } : {}),
    ...(opts.environment !== undefined ? { inputs: { environment: opts.environment } } : {}),
  };
  return executeEvent(event, opts);
}
