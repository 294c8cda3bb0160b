/**
 * Keyed deadlines for operations waiting on the host
 */

/** A deadline the manager is tracking */
export interface Deadline {
  key: string;
  /** Epoch milliseconds at which the deadline fires */
  firesAt: number;
  timeoutMs: number;
  fired: boolean;
}

export interface ITimeoutManager {
  /**
   * Arm a deadline under `key`, replacing any deadline already armed there.
   * A non-positive `timeoutMs` takes the manager's default.
   */
  registerTimeout(key: string, timeoutMs: number, onTimeout: (key: string) => void): void;

  /** Disarm and forget the deadline under `key` */
  clearTimeout(key: string): void;

  /** Milliseconds left before `key` fires; 0 once fired, undefined when unknown */
  remainingMs(key: string): number | undefined;

  deadline(key: string): Deadline | undefined;

  /** Deadlines armed and not yet fired */
  pendingCount(): number;

  clearAll(): void;
}
