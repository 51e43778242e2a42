import fs from "node:fs";
import path from "node:path";
import { sanitizeLogMessage } from "./redact.js";

export function progressLogPathFor(runDir: string): string {
  return path.join(runDir, "progress.log");
}

/** Append one line to the run's progress.log. */
export function appendProgress(runDir: string, runId: string, msg: string): void {
  fs.mkdirSync(runDir, { recursive: true });
  const line = `[${new Date().toISOString()}] runId=${sanitizeLogMessage(runId)} ${sanitizeLogMessage(msg)}\n`;
  fs.appendFileSync(progressLogPathFor(runDir), line, "utf8");
}
