import fs from 'node:fs';
import path from 'node:path';
import { LockHeldError } from '../core/errors';

export const LOCK_FILE_NAME = '.rc-bank-sync.lock';

const MAX_STALE_TAKEOVERS = 3;

let heldLock: string | null = null;
let exitHookInstalled = false;

function errnoCode(err: unknown): string | undefined {
  return err instanceof Error && 'code' in err && typeof err.code === 'string'
    ? err.code
    : undefined;
}

/**
 * PID recorded in a lock file, or null when the file is gone or unreadable
 */
function readOwner(lockPath: string): number | null {
  let content: string;
  try {
    content = fs.readFileSync(lockPath, 'utf8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      return null;
    }
    throw err;
  }
  const pid = Number.parseInt(content.trim(), 10);
  return Number.isNaN(pid) ? null : pid;
}

function isRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return errnoCode(err) === 'EPERM';
  }
}

function createExclusive(lockPath: string): boolean {
  let fd: number;
  try {
    fd = fs.openSync(lockPath, 'wx', 0o600);
  } catch (err) {
    if (errnoCode(err) === 'EEXIST') {
      return false;
    }
    throw err;
  }
  try {
    fs.writeFileSync(fd, String(process.pid));
  } finally {
    fs.closeSync(fd);
  }
  return true;
}

function removeStale(lockPath: string): void {
  try {
    fs.unlinkSync(lockPath);
  } catch (err) {
    if (errnoCode(err) !== 'ENOENT') {
      throw err;
    }
  }
}

/**
 * Take the lock guarding a backup root against a second run.
 * A lock left behind by a dead process is taken over.
 */
export function acquireLock(lockDir: string): void {
  if (!exitHookInstalled) {
    process.once('exit', releaseLock);
    exitHookInstalled = true;
  }

  const lockPath = path.join(lockDir, LOCK_FILE_NAME);
  if (heldLock === lockPath) {
    return;
  }

  for (let takeover = 0; takeover <= MAX_STALE_TAKEOVERS; takeover++) {
    if (createExclusive(lockPath)) {
      heldLock = lockPath;
      return;
    }

    const owner = readOwner(lockPath);
    if (owner === process.pid) {
      heldLock = lockPath;
      return;
    }
    if (owner !== null && isRunning(owner)) {
      throw new LockHeldError(lockPath, owner);
    }
    removeStale(lockPath);
  }

  throw new Error(
    `Failed to acquire lock at ${lockPath}. Please retry the sync command.`,
  );
}

/**
 * Remove the lock if this process still owns it
 */
export function releaseLock(): void {
  const lockPath = heldLock;
  heldLock = null;
  if (!lockPath) {
    return;
  }

  try {
    if (readOwner(lockPath) === process.pid) {
      fs.unlinkSync(lockPath);
    }
  } catch {
    // A leftover lock is taken over as stale on the next run
  }
}
