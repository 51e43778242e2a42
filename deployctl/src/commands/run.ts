import fs from "node:fs";
import path from "node:path";
import type { TriggerEvent } from "../types/trigger.js";
import { configurationError, errorMessage } from "../core/errors.js";
import { createRegistry } from "../schema/registry.js";
import { EXIT } from "./exit-codes.js";
import { executeEvent, type PipelineCommandOptions, type PipelineCommandResult } from "./pipeline.js";

function invalidEvent(code: string, message: string): PipelineCommandResult {
  return { ok: false, exitCode: EXIT.INVALID_ARGS, error: configurationError(code, message) };
}

/** Read and schema-check an event file (the payload a CI system hands over). */
export async function readEventFile(filePath: string): Promise<{ ok: true; event: TriggerEvent } | { ok: false; result: PipelineCommandResult }> {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    return { ok: false, result: invalidEvent("EVENT_FILE_MISSING", `Event file not found: ${resolved}`) };
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(resolved, "utf8"));
  } catch (e) {
    return { ok: false, result: invalidEvent("EVENT_JSON_INVALID", `Invalid JSON in ${resolved}: ${errorMessage(e)}`) };
  }

  const registry = await createRegistry();
  const isEvent = await registry.compileAs<TriggerEvent>("trigger-event");
  if (!isEvent(data)) {
    const details = await registry.errorsText(isEvent.errors);
    return { ok: false, result: invalidEvent("EVENT_INVALID", `Event file does not describe a push or dispatch: ${details}`) };
  }
  return { ok: true, event: data };
}

/** Run the pipeline for an event file. */
export async function runEvent(opts: PipelineCommandOptions & { eventFile: string }): Promise<PipelineCommandResult> {
  const read = await readEventFile(opts.eventFile);
  if (!read.ok) return read.result;
  return executeEvent(read.event, opts);
}
