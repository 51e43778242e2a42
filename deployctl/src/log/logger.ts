import { redactSensitiveInfo, sanitizeLogMessage } from "./redact.js";

export type LogFormat = "human" | "jsonl";

export type LogLevel = "info" | "warn" | "error";

export type LogFieldValue = string | number | boolean | null | undefined;

export type LogFields = Record<string, LogFieldValue>;

export type LogEntry = { level: LogLevel; code: string; message: string } & LogFields;

export type LogSink = {
  out: (line: string) => void;
  err: (line: string) => void;
};

export interface Logger {
  info(code: string, message: string, fields?: LogFields): void;
  warn(code: string, message: string, fields?: LogFields): void;
  error(code: string, message: string, fields?: LogFields): void;
  /** Logger that adds `fields` to every entry and shares the redaction set. */
  child(fields: LogFields): Logger;
  /** Register a materialized secret value so it never reaches the output. */
  addSecret(value: string): void;
  redact(s: string): string;
}

const stdSink: LogSink = {
  out: (line) => process.stdout.write(line + "\n"),
  err: (line) => process.stderr.write(line + "\n"),
};

/**
 * Line logger. `jsonl` writes one `{level, code, message, ...}` object per line
 * to stdout; `human` writes the message, prefixed by the stage when bound.
 */
class LineLogger implements Logger {
  constructor(
    private readonly format: LogFormat,
    private readonly sink: LogSink,
    private readonly bound: LogFields,
    private readonly secrets: Set<string>,
  ) {}

  info(code: string, message: string, fields?: LogFields): void {
    this.write("info", code, message, fields);
  }

  warn(code: string, message: string, fields?: LogFields): void {
    this.write("warn", code, message, fields);
  }

  error(code: string, message: string, fields?: LogFields): void {
    this.write("error", code, message, fields);
  }

  child(fields: LogFields): Logger {
    return new LineLogger(this.format, this.sink, { ...this.bound, ...fields }, this.secrets);
  }

  addSecret(value: string): void {
    if (value) this.secrets.add(value);
  }

  redact(s: string): string {
    return redactSensitiveInfo(s, this.secrets);
  }

  private write(level: LogLevel, code: string, message: string, fields?: LogFields): void {
    const merged: LogFields = { ...this.bound, ...fields };
    const clean: LogFields = {};
    for (const [key, value] of Object.entries(merged)) {
      if (value === undefined) continue;
      clean[key] = typeof value === "string" ? this.redact(value) : value;
    }
    const text = this.redact(message);

    if (this.format === "jsonl") {
      const entry: LogEntry = { level, code, message: text, ...clean };
      this.sink.out(JSON.stringify(entry));
      return;
    }

    const stage = typeof clean.stage === "string" ? `[${clean.stage}] ` : "";
    const line = sanitizeLogMessage(`${stage}${level === "warn" ? "warning: " : ""}${text}`);
    if (level === "error") this.sink.err(line);
    else this.sink.out(line);
  }
}

export function createLogger(format: LogFormat = "human", sink: LogSink = stdSink): Logger {
  return new LineLogger(format, sink, {}, new Set());
}

/** Logger that collects entries in memory; used where output is not wanted. */
export function createMemoryLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const collect = (line: string): void => {
    const entry: LogEntry = JSON.parse(line);
    entries.push(entry);
  };
  const sink: LogSink = { out: collect, err: collect };
  return { logger: new LineLogger("jsonl", sink, {}, new Set()), entries };
}
