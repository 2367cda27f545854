/**
 * Tagged result type used by every pipeline stage.
 *
 * Stages never throw for expected failures (missing preference, unreachable
 * server, non-2xx status). They return `err(...)` and the caller decides
 * whether to short-circuit.
 */

/** Which pipeline stage (or concern) produced a failure. `input` is a bad caller-supplied value. */
export type StageErrorKind =
  | "input"
  | "config"
  | "hardware"
  | "credentials"
  | "lookup"
  | "command";

export interface StageError {
  kind: StageErrorKind;
  /** Human-readable diagnostic. Never contains credentials. */
  message: string;
  /** Optional structured details (status codes, command args, paths). */
  details?: Record<string, unknown>;
}

export interface Ok<T> {
  ok: true;
  value: T;
}

export interface Err<E = StageError> {
  ok: false;
  error: E;
}

export type Result<T, E = StageError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err(kind: StageErrorKind, message: string, details?: Record<string, unknown>): Err {
  return { ok: false, error: details ? { kind, message, details } : { kind, message } };
}
