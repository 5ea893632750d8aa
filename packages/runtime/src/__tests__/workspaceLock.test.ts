import { describe, expect, it } from "vitest";
import { WorkspaceBusyError } from "@burrow/core";
import { WorkspaceLockManager } from "../workspaceLock";

const tick = () => new Promise((resolve) => setTimeout(resolve, 0));

describe("WorkspaceLockManager", () => {
  it("grants a workspace to one holder at a time in request order", async () => {
    const locks = new WorkspaceLockManager();
    const order: string[] = [];

    const releaseFirst = await locks.acquire("alpha");
    const second = locks.acquire("alpha").then((release) => {
      order.push("second");
      return release;
    });
    const third = locks.acquire("alpha").then((release) => {
      order.push("third");
      return release;
    });

    await tick();
    expect(order).toEqual([]);
    expect(locks.queueDepth("alpha")).toBe(2);

    releaseFirst();
    const releaseSecond = await second;
    await tick();
    expect(order).toEqual(["second"]);

    releaseSecond();
    const releaseThird = await third;
    expect(order).toEqual(["second", "third"]);

    releaseThird();
    expect(locks.isBusy("alpha")).toBe(false);
  });

  it("keeps workspaces independent", async () => {
    const locks = new WorkspaceLockManager();
    const releaseAlpha = await locks.acquire("alpha");
    const releaseBeta = await locks.acquire("beta", "reject");

    expect(locks.busyWorkspaces()).toEqual(["alpha", "beta"]);
    releaseAlpha();
    releaseBeta();
    expect(locks.busyWorkspaces()).toEqual([]);
  });

  it("rejects immediately under the reject policy", async () => {
    const locks = new WorkspaceLockManager();
    const release = await locks.acquire("alpha");

    await expect(locks.acquire("alpha", "reject")).rejects.toBeInstanceOf(WorkspaceBusyError);
    expect(locks.queueDepth("alpha")).toBe(0);
    release();
    const again = await locks.acquire("alpha", "reject");
    again();
  });

  it("bounds the number of waiters", async () => {
    const locks = new WorkspaceLockManager({ maxQueueDepth: 2 });
    const release = await locks.acquire("alpha");
    const waiting = [locks.acquire("alpha"), locks.acquire("alpha")];

    await expect(locks.acquire("alpha")).rejects.toMatchObject({
      code: "WORKSPACE_BUSY",
      message: "Workspace alpha is busy, retry later",
    });

    release();
    for (const pending of waiting) {
      (await pending)();
    }
    expect(locks.isBusy("alpha")).toBe(false);
  });

  it("ignores a second release", async () => {
    const locks = new WorkspaceLockManager();
    const release = await locks.acquire("alpha");
    const waiter = locks.acquire("alpha");

    release();
    release();
    const releaseWaiter = await waiter;

    expect(locks.isBusy("alpha")).toBe(true);
    releaseWaiter();
    expect(locks.isBusy("alpha")).toBe(false);
  });

  it("releases after withLock even when the operation fails", async () => {
    const locks = new WorkspaceLockManager();

    await expect(
      locks.withLock("alpha", "queue", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(locks.isBusy("alpha")).toBe(false);
  });
});
