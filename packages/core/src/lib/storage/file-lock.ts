import fs from "node:fs/promises";
import process from "node:process";
import { ConflictError } from "../errors.js";
import { sleep } from "../runtime/abort.js";
import { isMissingError, removeIfExists } from "./fs-safe.js";

export type FileLockOptions = {
  timeoutMs?: number;
  retryMs?: number;
  // A lock older than this is left over from a crashed process.
  staleMs?: number;
};

function isExistsError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "EEXIST";
}

async function lockAgeMs(lockPath: string): Promise<number | null> {
  try {
    const st = await fs.stat(lockPath);
    return Date.now() - st.mtimeMs;
  } catch (err) {
    if (isMissingError(err)) return null;
    throw err;
  }
}

async function acquire(lockPath: string, opts: Required<FileLockOptions>): Promise<void> {
  const startedAt = Date.now();
  while (true) {
    try {
      const handle = await fs.open(lockPath, "wx", 0o600);
      try {
        await handle.writeFile(`${process.pid}\n`, "utf8");
      } finally {
        await handle.close();
      }
      return;
    } catch (err) {
      if (!isExistsError(err)) throw err;
    }
    const age = await lockAgeMs(lockPath);
    if (age !== null && age > opts.staleMs) {
      await removeIfExists(lockPath);
      continue;
    }
    if (Date.now() - startedAt >= opts.timeoutMs) {
      throw new ConflictError(
        lockPath,
        `timed out waiting for lock ${lockPath}`,
        "retry; delete the lock file only if no other runnerctl process is running",
      );
    }
    await sleep(opts.retryMs);
  }
}

/**
 * Cross-process exclusive section around `<file>.lock`.
 */
export async function withFileLock<T>(lockPath: string, work: () => Promise<T>, opts: FileLockOptions = {}): Promise<T> {
  await acquire(lockPath, {
    timeoutMs: opts.timeoutMs ?? 10_000,
    retryMs: opts.retryMs ?? 25,
    staleMs: opts.staleMs ?? 30_000,
  });
  try {
    return await work();
  } finally {
    await removeIfExists(lockPath);
  }
}
