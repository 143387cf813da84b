/**
 * Tests for WriteLock.
 */

import { describe, it, expect } from "vitest";
import { WriteLock } from "../src/write-lock.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("runExclusive", () => {
  it("runs holders one at a time in call order", async () => {
    const lock = new WriteLock();
    const log: string[] = [];
    const gate = deferred();

    const first = lock.runExclusive(async () => {
      log.push("first:start");
      await gate.promise;
      log.push("first:end");
    });
    const second = lock.runExclusive(() => {
      log.push("second");
    });

    await Promise.resolve();
    expect(log).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);
    expect(log).toEqual(["first:start", "first:end", "second"]);
  });

  it("returns the holder's value", async () => {
    const lock = new WriteLock();
    await expect(lock.runExclusive(() => 42)).resolves.toBe(42);
  });

  it("releases the lock when the holder throws", async () => {
    const lock = new WriteLock();
    await expect(
      lock.runExclusive(() => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(lock.isLocked).toBe(false);
    await expect(lock.runExclusive(() => "after")).resolves.toBe("after");
  });
});

describe("tryRunExclusive", () => {
  it("refuses while another holder runs", async () => {
    const lock = new WriteLock();
    const gate = deferred();
    const held = lock.runExclusive(() => gate.promise);

    expect(lock.isLocked).toBe(true);
    expect(lock.tryRunExclusive(() => "never")).toBeUndefined();

    gate.resolve();
    await held;
    expect(lock.isLocked).toBe(false);
    await expect(lock.tryRunExclusive(() => "now")).resolves.toBe("now");
  });
});
