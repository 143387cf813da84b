/**
 * @kitty-wallet/store — Exclusive lock on a wallet data directory.
 *
 * One process owns a wallet directory at a time. The lock is a file
 * created with O_EXCL holding the owner's pid. A lock left behind by a
 * process that no longer exists is taken over.
 */

import {
  mkdirSync,
  readFileSync,
  unlinkSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { StoreError } from "./types.js";

export const LOCK_FILE_NAME = "wallet.lock";

/** Lock files held by this process */
const heldLocks = new Set<string>();

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return isErrnoException(err) && err.code === "EPERM";
  }
}

export class DirectoryLock {
  private _released = false;

  private constructor(readonly lockPath: string) {}

  /**
   * Acquire the lock for a directory, creating the directory if needed.
   *
   * @throws StoreError STORE_LOCKED if a live process holds the lock
   */
  static acquire(dir: string): DirectoryLock {
    mkdirSync(dir, { recursive: true });
    const lockPath = join(dir, LOCK_FILE_NAME);
    if (heldLocks.has(lockPath)) {
      throw new StoreError(
        "STORE_LOCKED",
        `Wallet directory ${dir} is already open in this process`,
      );
    }

    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        writeFileSync(lockPath, String(process.pid), { flag: "wx" });
        heldLocks.add(lockPath);
        return new DirectoryLock(lockPath);
      } catch (err) {
        if (!isErrnoException(err) || err.code !== "EEXIST") {
          throw err;
        }
      }

      const holder = Number.parseInt(readFileSync(lockPath, "utf-8"), 10);
      if (Number.isInteger(holder) && holder !== process.pid && isProcessAlive(holder)) {
        throw new StoreError(
          "STORE_LOCKED",
          `Wallet directory ${dir} is in use by process ${holder}`,
        );
      }
      // Stale or our own leftover lock
      unlinkSync(lockPath);
    }

    throw new StoreError("STORE_LOCKED", `Could not lock wallet directory ${dir}`);
  }

  get released(): boolean {
    return this._released;
  }

  release(): void {
    if (this._released) {
      return;
    }
    this._released = true;
    heldLocks.delete(this.lockPath);
    try {
      unlinkSync(this.lockPath);
    } catch (err) {
      if (!isErrnoException(err) || err.code !== "ENOENT") {
        throw err;
      }
    }
  }
}
