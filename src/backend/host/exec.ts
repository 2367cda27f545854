import { spawnSync } from "node:child_process";

export type HostCommandErrorKind = "missing" | "failed" | "timeout";

/**
 * A structured error representing a failure to invoke a host command
 * (`defaults`, `ioreg`).
 */
export class HostCommandError extends Error {
  public readonly kind: HostCommandErrorKind;
  public readonly details: Record<string, unknown>;

  public constructor(kind: HostCommandErrorKind, message: string, details: Record<string, unknown>) {
    super(message);
    this.name = "HostCommandError";
    this.kind = kind;
    this.details = details;
  }
}

/** Raw outcome of one process run. */
export interface CommandOutput {
  status: number | null;
  stdout: string;
  stderr: string;
  error?: Error;
}

/**
 * Runs a command to completion. Swapped out in tests so no real `defaults` or
 * `ioreg` is needed.
 */
export type CommandRunner = (command: string, args: string[], timeoutMs?: number) => CommandOutput;

export const spawnRunner: CommandRunner = (command, args, timeoutMs) => {
  const res = spawnSync(command, args, { encoding: "utf-8", timeout: timeoutMs });
  return {
    status: res.status,
    stdout: String(res.stdout ?? ""),
    stderr: String(res.stderr ?? ""),
    error: res.error,
  };
};

export interface HostExecOptions {
  /** Optional timeout in milliseconds for the child process. */
  timeoutMs?: number;
  runner?: CommandRunner;
}

function errorCode(error: Error): unknown {
  return "code" in error ? error.code : undefined;
}

/**
 * Run a host command and return its stdout.
 *
 * @param command - Executable name or absolute path.
 * @param args - Arguments passed to the executable.
 * @returns stdout (trimmed).
 * @throws HostCommandError if the executable is missing, times out, or exits non-zero.
 */
export function hostExec(command: string, args: string[], options?: HostExecOptions): string {
  const run = options?.runner ?? spawnRunner;
  const res = run(command, args, options?.timeoutMs);

  if (res.error) {
    const code = errorCode(res.error);
    if (code === "ENOENT") {
      throw new HostCommandError("missing", `${command} not found`, {
        command,
        args,
        error: String(res.error),
      });
    }
    if (code === "ETIMEDOUT") {
      throw new HostCommandError(
        "timeout",
        `${command} timed out after ${options?.timeoutMs ?? "unknown"}ms`,
        { command, args, timeoutMs: options?.timeoutMs }
      );
    }
  }

  if (res.error || res.status !== 0) {
    throw new HostCommandError("failed", `${command} ${args.join(" ")} failed`, {
      command,
      args,
      error: res.error ? String(res.error) : undefined,
      status: res.status,
      stderr: res.stderr.trim(),
    });
  }

  return res.stdout.trim();
}
