/**
 * TimeoutManager - Deadlines of bridged operations
 *
 * One timer per operation key. Firing marks the deadline but keeps it until
 * the owner clears it, so a late completion can still tell it timed out.
 */

import { Deadline, ITimeoutManager } from "../interfaces/ITimeoutManager";

interface ArmedDeadline extends Deadline {
  timer: NodeJS.Timeout;
}

export class TimeoutManager implements ITimeoutManager {
  private readonly deadlines = new Map<string, ArmedDeadline>();

  /**
   * @param defaultTimeoutMs Used when a caller passes a non-positive timeout
   */
  constructor(private readonly defaultTimeoutMs: number = 300000) {}

  registerTimeout(key: string, timeoutMs: number, onTimeout: (key: string) => void): void {
    this.clearTimeout(key);

    const effectiveMs = timeoutMs > 0 ? timeoutMs : this.defaultTimeoutMs;
    const armed: ArmedDeadline = {
      key,
      firesAt: Date.now() + effectiveMs,
      timeoutMs: effectiveMs,
      fired: false,
      timer: setTimeout(() => {
        if (this.deadlines.get(key) === armed) {
          armed.fired = true;
          onTimeout(key);
        }
      }, effectiveMs),
    };
    this.deadlines.set(key, armed);
  }

  clearTimeout(key: string): void {
    const armed = this.deadlines.get(key);
    if (armed) {
      clearTimeout(armed.timer);
      this.deadlines.delete(key);
    }
  }

  remainingMs(key: string): number | undefined {
    const armed = this.deadlines.get(key);
    if (!armed) {
      return undefined;
    }
    return armed.fired ? 0 : Math.max(0, armed.firesAt - Date.now());
  }

  deadline(key: string): Deadline | undefined {
    const armed = this.deadlines.get(key);
    if (!armed) {
      return undefined;
    }
    const { firesAt, timeoutMs, fired } = armed;
    return { key, firesAt, timeoutMs, fired };
  }

  pendingCount(): number {
    let count = 0;
    for (const armed of this.deadlines.values()) {
      if (!armed.fired) {
        count++;
      }
    }
    return count;
  }

  clearAll(): void {
    for (const armed of this.deadlines.values()) {
      clearTimeout(armed.timer);
    }
    this.deadlines.clear();
  }
}
