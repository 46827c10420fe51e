import * as lockfile from "proper-lockfile";

export interface FileLockOptions {
  readonly retries?: number;
  readonly minTimeoutMs?: number;
  /** Age after which a lock left behind by a dead process is taken over. */
  readonly staleMs?: number;
}

const DEFAULT_RETRIES = 5;
const DEFAULT_MIN_TIMEOUT_MS = 50;
const DEFAULT_STALE_MS = 10_000;

/**
 * Runs `fn` while holding a cross-process lock on `filePath`. The file does
 * not need to exist yet; the lock lives in a sibling `.lock` directory.
 */
export async function withFileLock<T>(
  filePath: string,
  fn: () => T | Promise<T>,
  options?: FileLockOptions,
): Promise<T> {
  let release: (() => Promise<void>) | undefined;
  try {
    release = await lockfile.lock(filePath, {
      retries: {
        retries: options?.retries ?? DEFAULT_RETRIES,
        minTimeout: options?.minTimeoutMs ?? DEFAULT_MIN_TIMEOUT_MS,
      },
      stale: options?.staleMs ?? DEFAULT_STALE_MS,
      realpath: false,
    });
    return await fn();
  } finally {
    await release?.();
  }
}
