import { mkdir, open, readFile, rename, stat, unlink, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";
import { StoreError } from "../errors.js";

export const STALE_LOCK_AGE_MS = 300000; // 5 minutes

export type ReleaseLock = () => Promise<void>;

export function errnoCode(e: unknown): string | undefined {
  if (typeof e !== "object" || e === null || !("code" in e)) return undefined;
  return typeof e.code === "string" ? e.code : undefined;
}

export async function atomicWriteJson(path: string, data: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.tmp.${process.pid}.${Date.now()}.${Math.random().toString(36).slice(2, 8)}`;
  const payload = JSON.stringify(data, null, 2) + "\n";

  let fh: FileHandle | null = null;
  try {
    fh = await open(tmp, "w");
    await fh.writeFile(payload, "utf8");
    await fh.sync();
    await fh.close();
    fh = null;

    await rename(tmp, path);
  } catch (e) {
    if (fh) await fh.close().catch((closeErr: unknown) => console.warn(`[store] close failed for ${tmp}: ${String(closeErr)}`));
    await unlink(tmp).catch((unlinkErr: unknown) => {
      if (errnoCode(unlinkErr) !== "ENOENT") console.warn(`[store] could not remove ${tmp}: ${String(unlinkErr)}`);
    });
    throw e;
  }
}

/** Remove a lock left by a crashed or long-gone holder. Returns true when something was removed. */
async function clearAbandonedLock(lockPath: string, pid: number): Promise<boolean> {
  let age: number;
  try {
    age = Date.now() - (await stat(lockPath)).mtimeMs;
  } catch (e) {
    if (errnoCode(e) === "ENOENT") return false;
    throw e;
  }

  if (age > STALE_LOCK_AGE_MS) {
    console.warn(`[store] Removing stale lock (age: ${Math.round(age / 1000)}s): ${lockPath}`);
    await unlink(lockPath).catch(ignoreMissing);
    return true;
  }

  const content = await readFile(lockPath, "utf8").catch(() => "");
  const [lockPid] = content.split("\n");
  if (!lockPid || lockPid === String(pid)) return false;
  try {
    process.kill(Number(lockPid), 0); // signal 0 only checks that the pid exists
    return false;
  } catch {
    console.warn(`[store] Removing orphaned lock (pid: ${lockPid}): ${lockPath}`);
    await unlink(lockPath).catch(ignoreMissing);
    return true;
  }
}

function ignoreMissing(e: unknown): void {
  if (errnoCode(e) !== "ENOENT") throw e;
}

/**
 * Exclusive lock file (`open wx`) holding the owner's pid and acquisition time.
 * Retries with exponential backoff and jitter until `timeoutMs` elapses.
 */
export async function acquireFsLock(lockPath: string, timeoutMs: number): Promise<ReleaseLock> {
  await mkdir(dirname(lockPath), { recursive: true });
  const started = Date.now();
  const pid = process.pid;
  let retries = 0;

  for (;;) {
    await clearAbandonedLock(lockPath, pid);

    let fh: FileHandle;
    try {
      fh = await open(lockPath, "wx");
    } catch (e) {
      if (errnoCode(e) !== "EEXIST") throw e;

      retries++;
      if (Date.now() - started > timeoutMs) {
        throw new StoreError(
          `Timed out acquiring lock after ${retries} retries: ${lockPath}`,
          { lock_path: lockPath, retries, timeout_ms: timeoutMs },
          undefined,
          "LOCK_TIMEOUT",
        );
      }
      const backoff = Math.min(10 * Math.pow(1.5, retries), 250);
      const jitter = Math.random() * backoff * 0.1;
      await new Promise((r) => setTimeout(r, backoff + jitter));
      continue;
    }

    try {
      await fh.writeFile(`${pid}\n${Date.now()}\n`, "utf8");
      await fh.sync();
    } finally {
      await fh.close();
    }

    return async () => {
      const content = await readFile(lockPath, "utf8");
      const [lockPid] = content.split("\n");
      if (lockPid === String(pid)) {
        await unlink(lockPath);
      } else {
        console.warn(`[store] Lock was taken by another process (current: ${lockPid}, ours: ${pid}): ${lockPath}`);
      }
    };
  }
}

/** Run `fn` while holding the lock; the lock is released on every exit path. */
export async function withFsLock<R>(lockPath: string, timeoutMs: number, fn: () => Promise<R>): Promise<R> {
  const release = await acquireFsLock(lockPath, timeoutMs);
  try {
    return await fn();
  } finally {
    await release();
  }
}
