import fs from "node:fs/promises";
import path from "node:path";

const STALE_LOCK_MS = 10_000;
const LOCK_WAIT_MS = 5_000;

export function hasErrorCode(error: unknown, code: string) {
  return error instanceof Error && "code" in error && error.code === code;
}

async function removeIfPresent(p: string) {
  await fs.rm(p, { force: true });
}

async function ensureLockDir(lockDir: string) {
  await fs.mkdir(lockDir, { recursive: true });
}

async function removeIfStale(p: string, name: string) {
  try {
    const stats = await fs.stat(p);
    if (Date.now() - stats.mtimeMs > STALE_LOCK_MS) {
      await removeIfPresent(p);
      console.log(`[tile-cache] Removed stale lock: ${name}`);
      return true;
    }
  } catch (error) {
    if (!hasErrorCode(error, "ENOENT")) throw error;
  }
  return false;
}

function lockPath(lockDir: string, name: string) {
  return path.join(lockDir, `${name}.lock`);
}

/** Cross-process exclusive section built on `wx` file creation. */
export async function withFileLock<T>(lockDir: string, name: string, fn: () => Promise<T>): Promise<T> {
  await ensureLockDir(lockDir);
  const p = lockPath(lockDir, name);
  const start = Date.now();

  while (true) {
    try {
      await fs.writeFile(p, String(process.pid), { flag: "wx" });
      break;
    } catch (error) {
      if (!hasErrorCode(error, "EEXIST")) throw error;
      const wasStale = await removeIfStale(p, name);
      if (!wasStale && Date.now() - start > LOCK_WAIT_MS) {
        throw new Error(`Lock timeout: ${name}`);
      }
      await new Promise((r) => setTimeout(r, 25 + Math.random() * 25));
    }
  }

  try {
    return await fn();
  } finally {
    await removeIfPresent(p);
  }
}
