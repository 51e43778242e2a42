import type { EnvironmentName } from "../types/trigger.js";
import { listRunStates } from "./run-store.js";

export type EnvironmentLockCheck = {
  allowed: boolean;
  activeId?: string;
  reason?: string;
};

export type EnvironmentLockOptions = {
  /**
   * A run whose state has not been written for this long is taken to have
   * died mid-deploy and no longer holds the lock.
   */
  staleAfterMs?: number;
  now?: Date;
};

/**
 * Environment lock: when `environment` is serialized, no other run may be
 * deploying or verifying against it. Runs that only test or build do not hold
 * the lock. Unreadable state files are ignored.
 */
export function checkEnvironmentLock(
  runsDir: string,
  environment: EnvironmentName,
  serialized: EnvironmentName[],
  selfId: string,
  opts: EnvironmentLockOptions = {},
): EnvironmentLockCheck {
  if (!serialized.includes(environment)) {
    return { allowed: true };
  }

  const now = (opts.now ?? new Date()).getTime();
  for (const run of listRunStates(runsDir)) {
    if (!run.ok || run.id === selfId) continue;
    const { state } = run;
    if (state.trigger.environment !== environment) continue;
    if (state.status !== "deploying" && state.status !== "verifying") continue;
    if (opts.staleAfterMs !== undefined && now - Date.parse(state.updated_at) > opts.staleAfterMs) continue;
    return {
      allowed: false,
      activeId: run.id,
      reason: `Environment "${environment}" is locked by run ${run.id} (status: ${state.status})`,
    };
  }

  return { allowed: true };
}
