// Single-instance batch lock.
// Purpose: create-if-absent marker file guarding a batch run; presence alone means "held".
// No TTL: a lock left by a hard-killed process stays until an operator removes it.

import fs from "node:fs";
import path from "node:path";

import { getErrorCode, LockError } from "./errors.js";
import { ensureDir, isoNow } from "./utils.js";

export type LockToken = {
  lockPath: string;
  acquiredAt: string;
  pid: number;
  release: () => Promise<void>;
};

export type LockAcquireResult =
  | { status: "acquired"; token: LockToken }
  | { status: "held"; lockPath: string };

export type BatchLock = {
  acquire(): Promise<LockAcquireResult>;
};

export function createFileBatchLock(lockPath: string): BatchLock {
  return { acquire: () => acquireBatchLock(lockPath) };
}

export async function acquireBatchLock(lockPath: string): Promise<LockAcquireResult> {
  const absolutePath = path.resolve(lockPath);
  await ensureDir(path.dirname(absolutePath));

  let handle: fs.promises.FileHandle;
  try {
    handle = await fs.promises.open(absolutePath, "wx");
  } catch (error) {
    if (getErrorCode(error) === "EEXIST") {
      return { status: "held", lockPath: absolutePath };
    }
    throw new LockError(`Failed to create lock file ${absolutePath}`, absolutePath, error);
  }

  const acquiredAt = isoNow();
  try {
    await handle.writeFile(`${JSON.stringify({ pid: process.pid, acquired_at: acquiredAt })}\n`, "utf8");
  } catch (error) {
    await handle.close();
    await safeUnlink(absolutePath);
    throw new LockError(`Failed to write lock file ${absolutePath}`, absolutePath, error);
  }
  await handle.close();

  let released = false;

  return {
    status: "acquired",
    token: {
      lockPath: absolutePath,
      acquiredAt,
      pid: process.pid,
      release: async () => {
        if (released) return;
        released = true;
        await safeUnlink(absolutePath);
      },
    },
  };
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

async function safeUnlink(filePath: string): Promise<void> {
  try {
    await fs.promises.unlink(filePath);
  } catch (error) {
    if (getErrorCode(error) !== "ENOENT") {
      throw new LockError(`Failed to remove lock file ${filePath}`, filePath, error);
    }
  }
}
