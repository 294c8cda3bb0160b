/**
 * OperationLock - Per-operation-class mutual exclusion
 *
 * Waiters are served in FIFO order. A waiter whose deadline passed is
 * skipped on hand-over. reset() never forces a release held by another
 * request context.
 */

import { v4 as uuidv4 } from "uuid";
import {
  ActivityProbe,
  ExternalActivityWait,
  IOperationLock,
  LockAcquisition,
  LockHolder,
  LockLease,
  LockResetReport,
} from "../interfaces/IOperationLock";
import { Failure, LockConfig, OperationClass } from "../types";
import { ErrorHandler } from "./ErrorHandler";
import { RequestContext } from "./RequestContext";

interface Waiter {
  owner: string;
  label: string;
  enqueuedAt: number;
  timer?: NodeJS.Timeout;
  done: boolean;
  resolve: (acquisition: LockAcquisition) => void;
}

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Poll until busy() turns false or maxWaitMs passes
 */
export async function pollUntilIdle(
  busy: () => boolean,
  maxWaitMs: number,
  pollIntervalMs: number
): Promise<ExternalActivityWait> {
  const startedAt = Date.now();
  while (busy()) {
    const waitedMs = Date.now() - startedAt;
    if (waitedMs >= maxWaitMs) {
      return { status: "timed_out", waitedMs };
    }
    await sleep(Math.max(1, Math.min(pollIntervalMs, maxWaitMs - waitedMs)));
  }
  return { status: "finished", waitedMs: Date.now() - startedAt };
}

export class OperationLock implements IOperationLock {
  private current?: { holder: LockHolder; lease: LockLease };
  private waiters: Waiter[] = [];

  constructor(
    readonly operation: OperationClass,
    private readonly probe: ActivityProbe = () => false
  ) {}

  acquire(
    timeoutMs: number,
    options: { owner?: string; label?: string } = {}
  ): Promise<LockAcquisition> {
    const owner = this.resolveOwner(options.owner);
    const label = options.label ?? this.operation;
    const enqueuedAt = Date.now();

    if (!this.current && this.waiters.length === 0) {
      return Promise.resolve({
        status: "acquired",
        lease: this.grant(owner, label),
        waitedMs: 0,
      });
    }

    return new Promise<LockAcquisition>((resolve) => {
      const waiter: Waiter = { owner, label, enqueuedAt, done: false, resolve };
      waiter.timer = setTimeout(() => {
        if (waiter.done) {
          return;
        }
        waiter.done = true;
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve({
          status: "timed_out",
          waitedMs: Date.now() - enqueuedAt,
          heldBy: this.current ? { ...this.current.holder } : undefined,
        });
      }, Math.max(0, timeoutMs));
      this.waiters.push(waiter);
    });
  }

  tryAcquire(options: { owner?: string; label?: string } = {}): LockLease | undefined {
    if (this.current || this.waiters.length > 0) {
      return undefined;
    }
    return this.grant(
      this.resolveOwner(options.owner),
      options.label ?? this.operation
    );
  }

  isLocked(): boolean {
    return this.current !== undefined;
  }

  holder(): LockHolder | undefined {
    return this.current ? { ...this.current.holder } : undefined;
  }

  /**
   * Number of callers queued behind the holder
   */
  queueLength(): number {
    return this.waiters.length;
  }

  isExternallyActive(): boolean {
    return this.probe();
  }

  waitForExternalActivity(
    maxWaitMs: number,
    pollIntervalMs: number
  ): Promise<ExternalActivityWait> {
    return pollUntilIdle(this.probe, maxWaitMs, pollIntervalMs);
  }

  reset(owner: string | undefined = RequestContext.currentId()): LockResetReport {
    const current = this.current;

    if (current && owner !== undefined && current.holder.owner === owner) {
      current.lease.release();
      console.error(
        `[OperationLock] ${this.operation} lock released by its holder on reset`
      );
      return { action: "released", operation: this.operation, holder: current.holder };
    }

    const probe = this.tryAcquire({ owner: `reset-probe-${uuidv4()}` });
    if (probe) {
      probe.release();
      return { action: "free", operation: this.operation };
    }

    const holder = this.holder();
    return {
      action: "held_elsewhere",
      operation: this.operation,
      holder,
      heldForMs: holder ? Date.now() - holder.acquiredAt : undefined,
    };
  }

  private resolveOwner(owner?: string): string {
    return owner ?? RequestContext.currentId() ?? `anonymous-${uuidv4()}`;
  }

  private grant(owner: string, label: string): LockLease {
    const acquiredAt = Date.now();
    const holder: LockHolder = { owner, operation: label, acquiredAt };
    let released = false;

    const lease: LockLease = {
      owner,
      acquiredAt,
      release: () => {
        if (released) {
          return;
        }
        released = true;
        if (this.current?.lease === lease) {
          this.current = undefined;
          this.handOver();
        }
      },
    };

    this.current = { holder, lease };
    return lease;
  }

  private handOver(): void {
    let next = this.waiters.shift();
    while (next && next.done) {
      next = this.waiters.shift();
    }
    if (!next) {
      return;
    }

    next.done = true;
    if (next.timer) {
      clearTimeout(next.timer);
    }
    next.resolve({
      status: "acquired",
      lease: this.grant(next.owner, next.label),
      waitedMs: Date.now() - next.enqueuedAt,
    });
  }
}

export interface ExclusiveOptions {
  label?: string;
  owner?: string;
  acquireTimeoutMs?: number;
  /** Operation classes whose activity must finish first */
  waitFor?: OperationClass[];
}

export type ExclusiveResult<T> =
  | { status: "ran"; value: T }
  | { status: "rejected"; failure: Failure };

/**
 * One lock per operation class for a bridge service
 */
export class OperationLockRegistry {
  private readonly locks: Map<OperationClass, OperationLock> = new Map();

  constructor(
    private readonly config: LockConfig,
    probes: Partial<Record<OperationClass, ActivityProbe>> = {}
  ) {
    this.locks.set("build", new OperationLock("build", probes.build));
    this.locks.set("test", new OperationLock("test", probes.test));
  }

  get(operation: OperationClass): OperationLock {
    const lock = this.locks.get(operation);
    if (lock) {
      return lock;
    }
    const created = new OperationLock(operation);
    this.locks.set(operation, created);
    return created;
  }

  /**
   * Wait for external activity, take the lock, run fn and release in all cases
   */
  async runExclusive<T>(
    operation: OperationClass,
    options: ExclusiveOptions,
    fn: () => Promise<T>
  ): Promise<ExclusiveResult<T>> {
    for (const upstream of options.waitFor ?? [operation]) {
      const wait = await this.waitForActivity(upstream, operation);
      if (wait.status === "timed_out") {
        return {
          status: "rejected",
          failure: ErrorHandler.failure(
            "UpstreamActivityTimeout",
            `Host ${upstream} activity did not finish within ${wait.waitedMs}ms`,
            { upstream, waitedMs: wait.waitedMs }
          ),
        };
      }
    }

    const lock = this.get(operation);
    const acquisition = await lock.acquire(
      options.acquireTimeoutMs ?? this.config.acquireTimeoutMs,
      { owner: options.owner, label: options.label }
    );
    if (acquisition.status === "timed_out") {
      return {
        status: "rejected",
        failure: ErrorHandler.failure(
          "LockAcquisitionTimeout",
          `Another ${operation} operation is in progress` +
            (acquisition.heldBy ? ` (${acquisition.heldBy.operation})` : ""),
          {
            operation,
            waitedMs: acquisition.waitedMs,
            heldBy: acquisition.heldBy,
          }
        ),
      };
    }

    try {
      return { status: "ran", value: await fn() };
    } finally {
      acquisition.lease.release();
    }
  }

  /**
   * Lock state per operation class
   */
  status(): Array<{
    operation: OperationClass;
    locked: boolean;
    holder?: LockHolder;
    queued: number;
    externallyActive: boolean;
  }> {
    return Array.from(this.locks.values()).map((lock) => ({
      operation: lock.operation,
      locked: lock.isLocked(),
      holder: lock.holder(),
      queued: lock.queueLength(),
      externallyActive: lock.isExternallyActive(),
    }));
  }

  reset(operation: OperationClass, owner?: string): LockResetReport {
    return this.get(operation).reset(owner);
  }

  resetAll(owner?: string): LockResetReport[] {
    return Array.from(this.locks.values()).map((lock) => lock.reset(owner));
  }

  /**
   * Another class counts as busy while its lock is held too. For the
   * caller's own class, activity seen while the lock is held belongs to the
   * holder, so the caller goes on to queue for the lock instead.
   */
  private waitForActivity(
    upstream: OperationClass,
    operation: OperationClass
  ): Promise<ExternalActivityWait> {
    const lock = this.get(upstream);
    if (upstream === operation) {
      return pollUntilIdle(
        () => !lock.isLocked() && lock.isExternallyActive(),
        this.config.externalActivityMaxWaitMs,
        this.config.externalActivityPollMs
      );
    }
    return pollUntilIdle(
      () => lock.isLocked() || lock.isExternallyActive(),
      this.config.externalActivityMaxWaitMs,
      this.config.externalActivityPollMs
    );
  }
}
