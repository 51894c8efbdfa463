/**
 * Cross-process run lock backed by an exclusively created file.
 * Keeps two pipeline runs from writing the same dataset at once.
 */

import { link, mkdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { LOCK_STALE_GRACE_MS } from "../config/constants";
import { getLogger } from "../log/logger";

const log = getLogger("lock");

const lockInfoSchema = z.object({
  pid: z.number().int(),
  createdAt: z.string(),
});

type LockInfo = z.infer<typeof lockInfoSchema>;

export type LockResult = { acquired: true; lockPath: string } | { acquired: false; lockPath: string; ownerPid?: number };

export type LockOptions = {
  /** Age after which a lock whose contents cannot be read counts as abandoned. */
  staleAfterMs?: number;
};

const errorCode = (error: unknown): string | undefined =>
  error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : undefined;

const isPidAlive = (pid: number): boolean => {
  try {
    // Signal 0 checks for existence without killing
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM means the process exists but belongs to someone else
    return errorCode(error) !== "ESRCH";
  }
};

const readLockInfo = async (lockPath: string): Promise<LockInfo | null> => {
  try {
    const result = lockInfoSchema.safeParse(JSON.parse(await readFile(lockPath, "utf-8")));
    return result.success ? result.data : null;
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return null;
    }
    log.warn({ lockPath, err: error }, "unreadable lock file");
    return null;
  }
};

const lockAgeMs = async (lockPath: string): Promise<number | null> => {
  try {
    const stats = await stat(lockPath);
    return Date.now() - stats.mtimeMs;
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return null;
    }
    throw error;
  }
};

// The lock only ever appears with its contents: written to a private file first, then hard-linked into place.
const publishLock = async (lockPath: string): Promise<boolean> => {
  const info: LockInfo = { pid: process.pid, createdAt: new Date().toISOString() };
  const tempPath = `${lockPath}.${process.pid}.tmp`;
  await writeFile(tempPath, JSON.stringify(info, null, 2));
  try {
    await link(tempPath, lockPath);
    return true;
  } catch (error) {
    if (errorCode(error) === "EEXIST") {
      return false;
    }
    throw error;
  } finally {
    await rm(tempPath, { force: true });
  }
};

export const acquireRunLock = async (lockPath: string, options: LockOptions = {}): Promise<LockResult> => {
  const staleAfterMs = options.staleAfterMs ?? LOCK_STALE_GRACE_MS;
  await mkdir(dirname(lockPath), { recursive: true });

  for (let attempt = 0; attempt < 2; attempt += 1) {
    if (await publishLock(lockPath)) {
      return { acquired: true, lockPath };
    }

    const owner = await readLockInfo(lockPath);
    if (owner) {
      if (isPidAlive(owner.pid)) {
        return { acquired: false, lockPath, ownerPid: owner.pid };
      }
      log.warn({ lockPath, stalePid: owner.pid }, "removing stale run lock");
    } else {
      const ageMs = await lockAgeMs(lockPath);
      if (ageMs !== null && ageMs < staleAfterMs) {
        return { acquired: false, lockPath };
      }
      if (ageMs !== null) {
        log.warn({ lockPath, ageMs }, "removing abandoned run lock without an owner");
      }
    }

    if (attempt === 0) {
      await rm(lockPath, { force: true });
    }
  }

  const owner = await readLockInfo(lockPath);
  return { acquired: false, lockPath, ownerPid: owner?.pid };
};

export const releaseRunLock = async (lockPath: string): Promise<void> => {
  const owner = await readLockInfo(lockPath);
  if (owner?.pid === process.pid) {
    await rm(lockPath, { force: true });
  }
};
