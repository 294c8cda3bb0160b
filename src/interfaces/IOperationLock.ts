/**
 * Interfaces of the per-operation-class mutual exclusion gate
 */

import { OperationClass } from "../types";

/**
 * Who holds a lock and since when
 */
export interface LockHolder {
  owner: string;
  operation: string;
  acquiredAt: number;
}

/**
 * Proof of ownership; release is idempotent
 */
export interface LockLease {
  readonly owner: string;
  readonly acquiredAt: number;
  release(): void;
}

export type LockAcquisition =
  | { status: "acquired"; lease: LockLease; waitedMs: number }
  | { status: "timed_out"; waitedMs: number; heldBy?: LockHolder };

export type ExternalActivityWait =
  | { status: "finished"; waitedMs: number }
  | { status: "timed_out"; waitedMs: number };

export type LockResetReport =
  | { action: "released"; operation: OperationClass; holder: LockHolder }
  | { action: "free"; operation: OperationClass }
  | {
      action: "held_elsewhere";
      operation: OperationClass;
      holder?: LockHolder;
      heldForMs?: number;
    };

/**
 * Reports whether work of an operation class is running outside the lock
 */
export type ActivityProbe = () => boolean;

export interface IOperationLock {
  readonly operation: OperationClass;

  acquire(
    timeoutMs: number,
    options?: { owner?: string; label?: string }
  ): Promise<LockAcquisition>;

  /** Non-blocking attempt; undefined when the lock is held */
  tryAcquire(options?: { owner?: string; label?: string }): LockLease | undefined;

  isLocked(): boolean;

  holder(): LockHolder | undefined;

  waitForExternalActivity(
    maxWaitMs: number,
    pollIntervalMs: number
  ): Promise<ExternalActivityWait>;

  /**
   * Recovery escape hatch. Releases the lock only when the calling context
   * holds it; otherwise probes and reports. Never forces a release.
   */
  reset(owner?: string): LockResetReport;
}
