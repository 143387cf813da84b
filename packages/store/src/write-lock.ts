/**
 * @kitty-wallet/store — In-process single-writer lock.
 *
 * FIFO async mutex. Every write to a wallet's stores runs inside
 * runExclusive(); reads never take the lock and see the last committed
 * batch.
 */

export class WriteLock {
  private _tail: Promise<void> = Promise.resolve();

  private _pending = 0;

  /** True while a holder runs or waiters are queued. */
  get isLocked(): boolean {
    return this._pending > 0;
  }

  /**
   * Run `fn` once every earlier holder has finished.
   * The lock is released even if `fn` throws.
   */
  runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this._tail;
    this._tail = previous.then(() => gate);
    this._pending += 1;

    return previous.then(async () => {
      try {
        return await fn();
      } finally {
        this._pending -= 1;
        release();
      }
    });
  }

  /**
   * Run `fn` only if the lock is free right now.
   *
   * @returns The holder's promise, or undefined if the lock is taken
   */
  tryRunExclusive<T>(fn: () => T | Promise<T>): Promise<T> | undefined {
    if (this._pending > 0) {
      return undefined;
    }
    return this.runExclusive(fn);
  }
}
