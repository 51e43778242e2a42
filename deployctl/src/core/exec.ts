import { execFile } from "node:child_process";
import { promisify } from "node:util";

const pExecFile = promisify(execFile);

const MAX_BUFFER = 50 * 1024 * 1024;

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type CommandOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  timeoutMs?: number;
  /** Written to the child's stdin, then stdin is closed. */
  input?: string;
};

type ExecFailure = { code?: unknown; stdout?: unknown; stderr?: unknown; killed?: unknown };

function isExecFailure(e: unknown): e is Error & ExecFailure {
  return e instanceof Error && ("stdout" in e || "code" in e);
}

/**
 * Run argv without a shell. Non-zero exits resolve with the exit code; spawn
 * failures (missing binary), aborts and timeouts reject.
 */
export async function runCommand(argv: string[], opts: CommandOptions = {}): Promise<CommandResult> {
  const [command, ...args] = argv;
  if (!command) throw new Error("Empty command");

  const pending = pExecFile(command, args, {
    cwd: opts.cwd,
    env: opts.env,
    signal: opts.signal,
    timeout: opts.timeoutMs,
    maxBuffer: MAX_BUFFER,
    encoding: "utf8",
  });
  if (opts.input !== undefined) pending.child.stdin?.end(opts.input);

  try {
    const { stdout, stderr } = await pending;
    return { exitCode: 0, stdout, stderr };
  } catch (e) {
    if (isExecFailure(e) && typeof e.code === "number" && e.killed !== true) {
      return {
        exitCode: e.code,
        stdout: typeof e.stdout === "string" ? e.stdout : "",
        stderr: typeof e.stderr === "string" ? e.stderr : "",
      };
    }
    throw e;
  }
}

/** Last `lines` lines of command output, for error messages. */
export function tail(output: string, lines = 20): string {
  return output.trimEnd().split("\n").slice(-lines).join("\n");
}
