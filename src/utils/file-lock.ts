import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import * as lockfile from "proper-lockfile";

export interface FileLockOptions {
  readonly retries?: number;
  /** A lock older than this is considered abandoned by a crashed process. */
  readonly staleMs?: number;
}

/** Runs `fn` while holding an exclusive lock on `filePath` (the file itself need not exist). */
export async function withFileLock<T>(
  filePath: string,
  fn: () => T | Promise<T>,
  opts?: FileLockOptions,
): Promise<T> {
  mkdirSync(dirname(filePath), { recursive: true });
  let release: (() => Promise<void>) | undefined;
  try {
    release = await lockfile.lock(filePath, {
      retries: { retries: opts?.retries ?? 5, minTimeout: 50, maxTimeout: 500 },
      stale: opts?.staleMs ?? 10_000,
      realpath: false,
    });
    return await fn();
  } finally {
    await release?.();
  }
}
