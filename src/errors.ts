export type FailureReason = "not_found" | "validation" | "storage";

/**
 * Result of a synchronous operation on the serving path. Foreign, missing
 * and non-active entities all collapse into `not_found`.
 */
export type Outcome = { readonly ok: true } | { readonly ok: false; readonly reason: FailureReason };

export const OK: Outcome = { ok: true };

export function fail(reason: FailureReason): Outcome {
  return { ok: false, reason };
}

export class StorageError extends Error {
  override readonly name = "StorageError";

  constructor(
    message: string,
    readonly key?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ValidationError extends Error {
  override readonly name = "ValidationError";

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
  }
}

/** A persisted record that does not match any known schema version. */
export class RecordDecodeError extends Error {
  override readonly name = "RecordDecodeError";

  constructor(
    message: string,
    readonly key?: string,
  ) {
    super(message);
  }
}

export class TimeoutError extends Error {
  override readonly name = "TimeoutError";

  constructor(
    readonly label: string,
    readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
  }
}
