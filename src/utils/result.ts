import type { ErrorCategory } from "../errors.js";

export type Success<T> = { ok: true; value: T };
export type Failure = { ok: false; kind: ErrorCategory; message: string };

export type Result<T> = Success<T> | Failure;

export function success<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function failure(kind: ErrorCategory, message: string): Failure {
  return { ok: false, kind, message };
}
