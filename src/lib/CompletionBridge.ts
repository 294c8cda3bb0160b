/**
 * CompletionBridge - Turns callback-driven host completion into an awaited
 * outcome with a deadline
 *
 * The dispatch runs on the application context. Whichever of complete,
 * fail, timeout or cancel comes first settles the outcome; later signals
 * are logged and dropped. Host-side work is never cancelled.
 */

import { IApplicationContext } from "../interfaces/IHostEnvironment";
import { ITimeoutManager } from "../interfaces/ITimeoutManager";
import { Failure } from "../types";
import { ErrorHandler } from "./ErrorHandler";
import { TimeoutManager } from "./TimeoutManager";

/**
 * Handle given to the dispatched task
 */
export interface Completion<T> {
  complete(value: T): void;
  fail(error: unknown): void;
  readonly settled: boolean;
}

export interface BridgePolicy {
  timeoutMs: number;
  /** Used in timer keys and log lines */
  label: string;
}

export type BridgeOutcome<T> =
  | { status: "completed"; value: T; elapsedMs: number }
  | { status: "timeout"; timeoutMs: number; elapsedMs: number }
  | { status: "failed"; error: Failure; elapsedMs: number }
  | { status: "cancelled"; reason: string; elapsedMs: number };

export interface PendingCompletion<T> {
  readonly key: string;
  readonly outcome: Promise<BridgeOutcome<T>>;
  /** Settle the caller side as cancelled; no effect once settled */
  cancel(reason: string): void;
}

export type Dispatch<T> = (completion: Completion<T>) => void | Promise<void>;

export class CompletionBridge {
  private sequence = 0;
  private pending: Map<string, (reason: string) => void> = new Map();

  constructor(
    private readonly context: IApplicationContext,
    private readonly timeouts: ITimeoutManager = new TimeoutManager()
  ) {}

  /**
   * Dispatch and wait for the outcome
   */
  run<T>(dispatch: Dispatch<T>, policy: BridgePolicy): Promise<BridgeOutcome<T>> {
    return this.start(dispatch, policy).outcome;
  }

  /**
   * Dispatch and hand back a cancellable pending outcome
   */
  start<T>(dispatch: Dispatch<T>, policy: BridgePolicy): PendingCompletion<T> {
    const key = `${policy.label}-${++this.sequence}`;
    const startedAt = Date.now();
    let settled = false;
    let resolveOutcome: (outcome: BridgeOutcome<T>) => void = () => {};
    const outcome = new Promise<BridgeOutcome<T>>((resolve) => {
      resolveOutcome = resolve;
    });

    const settle = (result: BridgeOutcome<T>): boolean => {
      if (settled) {
        return false;
      }
      settled = true;
      this.timeouts.clearTimeout(key);
      this.pending.delete(key);
      resolveOutcome(result);
      return true;
    };

    const elapsed = (): number => Date.now() - startedAt;

    const completion: Completion<T> = {
      complete: (value: T) => {
        if (!settle({ status: "completed", value, elapsedMs: elapsed() })) {
          console.error(
            `[CompletionBridge] Late completion for ${key} ignored after ${elapsed()}ms`
          );
        }
      },
      fail: (error: unknown) => {
        const failure = ErrorHandler.toFailure(error);
        if (!settle({ status: "failed", error: failure, elapsedMs: elapsed() })) {
          console.error(
            `[CompletionBridge] Late failure for ${key} ignored: ${failure.message}`
          );
        }
      },
      get settled() {
        return settled;
      },
    };

    const cancel = (reason: string): void => {
      settle({ status: "cancelled", reason, elapsedMs: elapsed() });
    };

    this.pending.set(key, cancel);
    this.timeouts.registerTimeout(key, policy.timeoutMs, () => {
      if (settle({ status: "timeout", timeoutMs: policy.timeoutMs, elapsedMs: elapsed() })) {
        console.error(
          `[CompletionBridge] ${key} timed out after ${policy.timeoutMs}ms`
        );
      }
    });

    try {
      this.context.invokeLater(() => {
        try {
          const result = dispatch(completion);
          if (result instanceof Promise) {
            result.catch((error: unknown) => completion.fail(error));
          }
        } catch (error) {
          completion.fail(error);
        }
      });
    } catch (error) {
      completion.fail(error);
    }

    return { key, outcome, cancel };
  }

  pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Cancel every pending outcome and clear their timers
   */
  shutdown(): void {
    for (const cancel of Array.from(this.pending.values())) {
      cancel("bridge shut down");
    }
    this.timeouts.clearAll();
  }
}
