import fs from "node:fs";
import path from "node:path";
import type { RunState } from "../types/run.js";

export function runDirFor(runsDir: string, runId: string): string {
  return path.join(runsDir, runId);
}

export function statePathFor(runsDir: string, runId: string): string {
  return path.join(runsDir, runId, "state.json");
}

/** Write via temp file + rename so readers never see a half-written state. */
export function atomicWriteJson(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.tmp.${process.pid}.${Date.now()}`;
  try {
    fs.writeFileSync(tmp, JSON.stringify(data, null, 2) + "\n", "utf8");
    fs.renameSync(tmp, filePath);
  } catch (e) {
    fs.rmSync(tmp, { force: true });
    throw e;
  }
}

export function saveRunState(runsDir: string, state: RunState): void {
  atomicWriteJson(statePathFor(runsDir, state.run_id), state);
}

export function loadRunState(runsDir: string, runId: string): RunState | null {
  const statePath = statePathFor(runsDir, runId);
  if (!fs.existsSync(statePath)) return null;
  const state: RunState = JSON.parse(fs.readFileSync(statePath, "utf8"));
  return state;
}

export type RunListing =
  | { id: string; ok: true; state: RunState }
  | { id: string; ok: false; error: string };

/** Every run directory under runsDir that holds a state.json. */
export function listRunStates(runsDir: string): RunListing[] {
  if (!fs.existsSync(runsDir)) return [];

  const results: RunListing[] = [];
  for (const entry of fs.readdirSync(runsDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    const statePath = path.join(runsDir, entry.name, "state.json");
    if (!fs.existsSync(statePath)) continue;

    try {
      const state: RunState = JSON.parse(fs.readFileSync(statePath, "utf8"));
      results.push({ id: entry.name, ok: true, state });
    } catch (e) {
      results.push({ id: entry.name, ok: false, error: e instanceof Error ? e.message : String(e) });
    }
  }
  return results;
}
