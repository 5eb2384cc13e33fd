import fs from "node:fs";
import path from "node:path";
import { MergeLockedError } from "../core/errors";
import { isNotFound } from "../core/files";

export interface MergeLock {
  readonly path: string;
  release(): Promise<void>;
}

export interface MergeLockOptions {
  /** A lock older than this is taken over even if its owner cannot be checked. */
  staleAfterMs: number;
  now?: () => Date;
}

export type StaleLockReason = "owner_gone" | "expired";

export interface AcquiredMergeLock extends MergeLock {
  /** Set when a lock left behind by an earlier run was removed first. */
  recovered?: StaleLockReason;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else.
    return errorCode(error) !== "ESRCH";
  }
}

/** Lock files hold `<pid> <iso timestamp>`; a missing or garbled timestamp falls back to the file mtime. */
async function staleReason(lockPath: string, options: MergeLockOptions): Promise<StaleLockReason | undefined> {
  let content: string;
  let modifiedAtMs: number;
  try {
    content = await fs.promises.readFile(lockPath, "utf-8");
    modifiedAtMs = (await fs.promises.stat(lockPath)).mtimeMs;
  } catch (error) {
    if (isNotFound(error)) {
      return "owner_gone";
    }
    throw error;
  }

  const [rawPid, rawTimestamp] = content.trim().split(/\s+/);
  const pid = Number.parseInt(rawPid ?? "", 10);
  if (Number.isInteger(pid) && pid > 0 && pid !== process.pid && !isProcessAlive(pid)) {
    return "owner_gone";
  }

  const writtenAtMs = Date.parse(rawTimestamp ?? "");
  const lockedAtMs = Number.isNaN(writtenAtMs) ? modifiedAtMs : writtenAtMs;
  const now = (options.now ?? (() => new Date()))().getTime();
  return now - lockedAtMs > options.staleAfterMs ? "expired" : undefined;
}

async function createLockFile(lockPath: string): Promise<boolean> {
  let handle: fs.promises.FileHandle;
  try {
    handle = await fs.promises.open(lockPath, "wx");
  } catch (error) {
    if (errorCode(error) === "EEXIST") {
      return false;
    }
    throw error;
  }

  try {
    await handle.writeFile(`${process.pid} ${new Date().toISOString()}\n`, "utf-8");
  } finally {
    await handle.close();
  }
  return true;
}

/**
 * Advisory single-instance guard: an exclusively created file beside the staged
 * outputs. A lock whose owner process is gone, or that outlived `staleAfterMs`,
 * is removed and the lock is taken once more.
 */
export async function acquireMergeLock(dir: string, options: MergeLockOptions): Promise<AcquiredMergeLock> {
  await fs.promises.mkdir(dir, { recursive: true });
  const lockPath = path.join(dir, ".merge.lock");
  const release = async () => {
    await fs.promises.rm(lockPath, { force: true });
  };

  if (await createLockFile(lockPath)) {
    return { path: lockPath, release };
  }

  const reason = await staleReason(lockPath, options);
  if (!reason) {
    throw new MergeLockedError(lockPath);
  }

  await fs.promises.rm(lockPath, { force: true });
  if (!(await createLockFile(lockPath))) {
    throw new MergeLockedError(lockPath);
  }
  return { path: lockPath, release, recovered: reason };
}
