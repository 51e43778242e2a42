import fs from "node:fs";
import path from "node:path";
import { runDirFor } from "../core/run-store.js";

export type ArtifactsResult =
  | { ok: true; files: Array<{ path: string; size: number }> }
  | { ok: false; error: string };

/**
 * List the files a run wrote: state, progress log, manifest and artifacts.
 */
export function listArtifacts(opts: { runsDir: string; runId: string }): ArtifactsResult {
  const dir = runDirFor(opts.runsDir, opts.runId);

  if (!fs.existsSync(dir)) {
    return { ok: false, error: `No artifacts found for: ${opts.runId}` };
  }

  const files: Array<{ path: string; size: number }> = [];
  collectFiles(dir, dir, files);

  return { ok: true, files: files.sort((a, b) => a.path.localeCompare(b.path)) };
}

function collectFiles(baseDir: string, currentDir: string, out: Array<{ path: string; size: number }>): void {
  for (const entry of fs.readdirSync(currentDir, { withFileTypes: true })) {
    const fullPath = path.join(currentDir, entry.name);
    if (entry.isDirectory()) {
      collectFiles(baseDir, fullPath, out);
    } else if (entry.isFile()) {
      out.push({ path: path.relative(baseDir, fullPath).split(path.sep).join("/"), size: fs.statSync(fullPath).size });
    }
  }
}
