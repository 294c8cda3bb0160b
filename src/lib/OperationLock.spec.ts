/**
 * OperationLock tests
 * Covers FIFO hand-over, timeouts, external activity and reset semantics
 */

import { OperationLock, OperationLockRegistry, pollUntilIdle } from "./OperationLock";
import { RequestContext } from "./RequestContext";
import * as fc from "fast-check";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

const lockConfig = {
  acquireTimeoutMs: 1000,
  externalActivityMaxWaitMs: 200,
  externalActivityPollMs: 10,
};

describe("OperationLock", () => {
  describe("acquire", () => {
    it("should acquire a free lock immediately", async () => {
      const lock = new OperationLock("build");

      const result = await lock.acquire(100, { owner: "a", label: "make" });

      expect(result.status).toBe("acquired");
      expect(lock.isLocked()).toBe(true);
      expect(lock.holder()?.owner).toBe("a");
      expect(lock.holder()?.operation).toBe("make");
    });

    it("should time out while the lock is held", async () => {
      const lock = new OperationLock("build");
      await lock.acquire(100, { owner: "a", label: "make" });

      const result = await lock.acquire(50, { owner: "b" });

      expect(result.status).toBe("timed_out");
      if (result.status === "timed_out") {
        expect(result.waitedMs).toBeGreaterThanOrEqual(40);
        expect(result.heldBy?.owner).toBe("a");
      }
      expect(lock.queueLength()).toBe(0);
    });

    it("should hand the lock to waiters in FIFO order", async () => {
      const lock = new OperationLock("test");
      const first = await lock.acquire(100, { owner: "first" });
      const order: string[] = [];

      const second = lock.acquire(1000, { owner: "second" }).then((r) => {
        order.push("second");
        return r;
      });
      const third = lock.acquire(1000, { owner: "third" }).then((r) => {
        order.push("third");
        return r;
      });

      if (first.status === "acquired") first.lease.release();
      const secondResult = await second;
      expect(lock.holder()?.owner).toBe("second");
      if (secondResult.status === "acquired") secondResult.lease.release();
      await third;

      expect(order).toEqual(["second", "third"]);
      expect(lock.holder()?.owner).toBe("third");
    });

    it("should skip waiters whose deadline passed", async () => {
      const lock = new OperationLock("test");
      const first = await lock.acquire(100, { owner: "first" });

      const expired = lock.acquire(20, { owner: "expired" });
      const patient = lock.acquire(1000, { owner: "patient" });

      expect((await expired).status).toBe("timed_out");
      if (first.status === "acquired") first.lease.release();

      const result = await patient;
      expect(result.status).toBe("acquired");
      expect(lock.holder()?.owner).toBe("patient");
    });

    it("should treat release as idempotent", async () => {
      const lock = new OperationLock("build");
      const first = await lock.acquire(100, { owner: "a" });
      if (first.status !== "acquired") throw new Error("expected acquisition");

      first.lease.release();
      const second = await lock.acquire(100, { owner: "b" });
      first.lease.release();

      expect(second.status).toBe("acquired");
      expect(lock.holder()?.owner).toBe("b");
    });

    it("should refuse tryAcquire while held", async () => {
      const lock = new OperationLock("build");
      await lock.acquire(100, { owner: "a" });

      expect(lock.tryAcquire({ owner: "b" })).toBeUndefined();
    });

    it("should use the request context id as owner", async () => {
      const lock = new OperationLock("build");

      const owner = await RequestContext.run(async () => {
        await lock.acquire(100);
        return RequestContext.currentId();
      });

      expect(owner).toBeDefined();
      expect(lock.holder()?.owner).toBe(owner);
    });
  });

  describe("waitForExternalActivity", () => {
    it("should finish at once when nothing is active", async () => {
      const lock = new OperationLock("build", () => false);

      const result = await lock.waitForExternalActivity(100, 10);

      expect(result.status).toBe("finished");
    });

    it("should wait until the probe reports idle", async () => {
      let busy = true;
      const lock = new OperationLock("build", () => busy);
      setTimeout(() => {
        busy = false;
      }, 50);

      const result = await lock.waitForExternalActivity(1000, 10);

      expect(result.status).toBe("finished");
      expect(result.waitedMs).toBeGreaterThanOrEqual(40);
    });

    it("should time out when activity persists", async () => {
      const lock = new OperationLock("build", () => true);

      const result = await lock.waitForExternalActivity(60, 10);

      expect(result.status).toBe("timed_out");
      expect(result.waitedMs).toBeGreaterThanOrEqual(60);
    });

    it("should poll a custom busy predicate", async () => {
      let calls = 0;
      const result = await pollUntilIdle(() => ++calls < 3, 1000, 5);

      expect(result.status).toBe("finished");
      expect(calls).toBe(3);
    });
  });

  describe("reset", () => {
    it("should release a lock held by the calling context", async () => {
      const lock = new OperationLock("build");

      const report = await RequestContext.run(async () => {
        await lock.acquire(100, { label: "make" });
        return lock.reset();
      });

      expect(report.action).toBe("released");
      expect(lock.isLocked()).toBe(false);
    });

    it("should report a free lock", () => {
      const lock = new OperationLock("test");

      const report = lock.reset("someone");

      expect(report).toEqual({ action: "free", operation: "test" });
      expect(lock.isLocked()).toBe(false);
    });

    it("should never release a lock held elsewhere", async () => {
      const lock = new OperationLock("build");
      await lock.acquire(100, { owner: "holder", label: "rebuild" });

      const report = lock.reset("other");

      expect(report.action).toBe("held_elsewhere");
      if (report.action === "held_elsewhere") {
        expect(report.holder?.owner).toBe("holder");
        expect(report.holder?.operation).toBe("rebuild");
        expect(report.heldForMs).toBeGreaterThanOrEqual(0);
      }
      expect(lock.isLocked()).toBe(true);
    });
  });
});

describe("OperationLockRegistry", () => {
  it("should release the lock after fn throws", async () => {
    const registry = new OperationLockRegistry(lockConfig);

    await expect(
      registry.runExclusive("build", {}, async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(registry.get("build").isLocked()).toBe(false);
  });

  it("should reject with LockAcquisitionTimeout while held", async () => {
    const registry = new OperationLockRegistry(lockConfig);
    await registry.get("build").acquire(100, { owner: "x", label: "make" });

    const result = await registry.runExclusive(
      "build",
      { acquireTimeoutMs: 30 },
      async () => "ran"
    );

    expect(result.status).toBe("rejected");
    if (result.status === "rejected") {
      expect(result.failure.kind).toBe("LockAcquisitionTimeout");
      expect(result.failure.message).toBe(
        "Another build operation is in progress (make)"
      );
    }
  });

  it("should reject with UpstreamActivityTimeout when the host stays busy", async () => {
    const registry = new OperationLockRegistry(lockConfig, { build: () => true });

    const result = await registry.runExclusive("build", {}, async () => "ran");

    expect(result.status).toBe("rejected");
    if (result.status === "rejected") {
      expect(result.failure.kind).toBe("UpstreamActivityTimeout");
    }
    expect(registry.get("build").isLocked()).toBe(false);
  });

  it("should make a test operation wait for a held build lock", async () => {
    const registry = new OperationLockRegistry(lockConfig);
    const build = await registry.get("build").acquire(100, { owner: "b" });
    const events: string[] = [];

    setTimeout(() => {
      events.push("build released");
      if (build.status === "acquired") build.lease.release();
    }, 40);

    const result = await registry.runExclusive(
      "test",
      { waitFor: ["build"] },
      async () => {
        events.push("test ran");
        return 1;
      }
    );

    expect(result).toEqual({ status: "ran", value: 1 });
    expect(events).toEqual(["build released", "test ran"]);
  });

  it("should not order different operation classes", async () => {
    const registry = new OperationLockRegistry(lockConfig);
    await registry.get("build").acquire(100, { owner: "b" });

    const result = await registry.runExclusive("test", {}, async () => "ran");

    expect(result).toEqual({ status: "ran", value: "ran" });
  });

  it("should report status per operation class", async () => {
    const registry = new OperationLockRegistry(lockConfig, { test: () => true });
    await registry.get("build").acquire(100, { owner: "b", label: "make" });

    const status = registry.status();

    expect(status.map((s) => s.operation)).toEqual(["build", "test"]);
    expect(status[0].locked).toBe(true);
    expect(status[0].holder?.operation).toBe("make");
    expect(status[1].locked).toBe(false);
    expect(status[1].externallyActive).toBe(true);
  });

  describe("Property-based tests", () => {
    it("Property: At most one holder per class under concurrent callers", async () => {
      await fc.assert(
        fc.asyncProperty(
          fc.array(fc.integer({ min: 0, max: 5 }), { minLength: 2, maxLength: 8 }),
          async (delays) => {
            const registry = new OperationLockRegistry(lockConfig);
            let active = 0;
            let maxActive = 0;

            const results = await Promise.all(
              delays.map((delay) =>
                registry.runExclusive("build", {}, async () => {
                  active++;
                  maxActive = Math.max(maxActive, active);
                  await sleep(delay);
                  active--;
                  return delay;
                })
              )
            );

            expect(maxActive).toBe(1);
            expect(results.every((r) => r.status === "ran")).toBe(true);
            expect(registry.get("build").isLocked()).toBe(false);
          }
        ),
        { numRuns: 25 }
      );
    });
  });
});
