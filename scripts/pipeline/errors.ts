/**
 * Helpers for building typed stage results.
 */

import type { PipelineErrorKind, StageResult } from "./types";

export function ok<T>(value: T): StageResult<T> {
  return { ok: true, value };
}

export function fail<T>(kind: PipelineErrorKind, message: string): StageResult<T> {
  return { ok: false, error: { kind, message } };
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

const ENVIRONMENT_CODES = new Set(["EACCES", "EPERM", "EROFS", "ENOSPC"]);

/**
 * True for filesystem failures no other document could recover from
 * (unwritable output directory, full disk).
 */
export function isEnvironmentFailure(e: unknown): boolean {
  if (!(e instanceof Error) || !("code" in e)) return false;
  const code = e.code;
  return typeof code === "string" && ENVIRONMENT_CODES.has(code);
}
