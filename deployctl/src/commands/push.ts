import type { PushEvent } from "../types/trigger.js";
import { GitOperations } from "../git/operations.js";
import { executeEvent, gitFailure, type PipelineCommandOptions, type PipelineCommandResult } from "./pipeline.js";

export type PushOptions = PipelineCommandOptions & {
  sha?: string;
  ref?: string;
  /** Files touched by the push; read from git when omitted. */
  changed?: string[];
  /** Compare against this ref instead of the head commit alone. */
  base?: string;
};

/** Push event: test only. Details not passed in are read from the local repository. */
export async function push(opts: PushOptions): Promise<PipelineCommandResult> {
  let event: PushEvent;
  try {
    const git = new GitOperations(opts.repoPath ?? process.cwd());
    const sha = opts.sha ?? (await git.getCurrentSha());
    event = {
      event_name: "push",
      sha,
      ref: opts.ref ?? (await git.getCurrentRef()),
      changed_files: opts.changed ?? (await git.getChangedFiles(sha, opts.base)),
    };
  } catch (e) {
    return gitFailure(e);
  }
  return executeEvent(event, opts);
}
