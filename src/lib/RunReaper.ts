/**
 * RunReaper - Periodically prunes terminated runs
 *
 * Finished runs keep their captured output until the retention period
 * passes; this sweeps them out of the registry.
 */

import { IRunRegistry } from "../interfaces/IRunRegistry";

/**
 * RunReaper class
 * Drives prune() of a run registry on an interval
 */
export class RunReaper {
  private reapInterval: NodeJS.Timeout | null = null;
  private prunedCount: number = 0;

  constructor(
    private readonly registry: Pick<IRunRegistry, "prune">,
    private readonly retentionMs: number,
    private readonly reapIntervalMs: number = 300000
  ) {}

  /**
   * Start the periodic sweep; a non-positive interval disables it
   */
  start(): void {
    if (this.reapInterval) {
      console.error("[RunReaper] Already running");
      return;
    }
    if (this.reapIntervalMs <= 0) {
      return;
    }

    console.error(
      `[RunReaper] Starting run reaper (interval: ${this.reapIntervalMs}ms, retention: ${this.retentionMs}ms)`
    );

    this.reapInterval = setInterval(() => {
      this.reap();
    }, this.reapIntervalMs);
    this.reapInterval.unref();
  }

  stop(): void {
    if (this.reapInterval) {
      clearInterval(this.reapInterval);
      this.reapInterval = null;
      console.error("[RunReaper] Stopped");
    }
  }

  isRunning(): boolean {
    return this.reapInterval !== null;
  }

  /**
   * Run one sweep now
   * @returns IDs of the pruned runs
   */
  reap(now: number = Date.now()): string[] {
    try {
      const removed = this.registry.prune(this.retentionMs, now);
      if (removed.length > 0) {
        this.prunedCount += removed.length;
        console.error(
          `[RunReaper] Pruned ${removed.length} finished runs: ${removed.join(", ")}`
        );
      }
      return removed;
    } catch (error) {
      console.error("[RunReaper] Error during prune:", error);
      return [];
    }
  }

  getPrunedCount(): number {
    return this.prunedCount;
  }
}
