// packages/ledger/src/errors.ts

export type LedgerErrorCode =
  | "INVALID_CONTENT"
  | "INVALID_STREAM"
  | "INVALID_RANGE"
  | "LOCK_TIMEOUT"
  | "SEQUENCE_CONFLICT"
  | "STORAGE_UNAVAILABLE";

/**
 * Errors raised by the ledger core. A broken chain is never one of these:
 * verification findings are returned as data in the IntegrityReport.
 *
 * Only LOCK_TIMEOUT is safe to retry as-is.
 */
export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly retryable: boolean;
  readonly stream: string | null;

  constructor(
    code: LedgerErrorCode,
    detail: string,
    opts: { stream?: string | null; cause?: unknown } = {}
  ) {
    super(`${code}: ${detail}`, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "LedgerError";
    this.code = code;
    this.retryable = code === "LOCK_TIMEOUT";
    this.stream = opts.stream ?? null;
  }
}

export function isLedgerError(e: unknown, code?: LedgerErrorCode): e is LedgerError {
  if (!(e instanceof LedgerError)) return false;
  return code === undefined || e.code === code;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Wraps anything that is not already a LedgerError as STORAGE_UNAVAILABLE. */
export function toStorageError(e: unknown, stream: string | null): LedgerError {
  if (e instanceof LedgerError) return e;
  return new LedgerError("STORAGE_UNAVAILABLE", errorMessage(e), { stream, cause: e });
}
