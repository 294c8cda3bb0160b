/**
 * ApplicationContext - Serial dispatch queue for host interaction
 *
 * Tasks run one at a time in submission order. A task that returns a
 * promise holds the queue until it settles.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { IApplicationContext } from "../interfaces/IHostEnvironment";
import { BridgeError } from "../types";

type Task = () => void | Promise<void>;

export class ApplicationContext implements IApplicationContext {
  private queue: Task[] = [];
  private running = false;
  private closed = false;
  private idleWaiters: Array<() => void> = [];
  private readonly marker = new AsyncLocalStorage<true>();

  /**
   * Schedule a task on the dispatch queue
   * @throws BridgeError once the context has been closed
   */
  invokeLater(task: Task): void {
    if (this.closed) {
      throw new BridgeError(
        "InternalError",
        "Application context is shut down; no further work can be dispatched"
      );
    }

    this.queue.push(task);

    if (!this.running) {
      this.running = true;
      setImmediate(() => {
        this.pump().catch((error) => {
          console.error("[ApplicationContext] Dispatch loop failed:", error);
        });
      });
    }
  }

  /**
   * True while the caller runs inside a dispatched task
   */
  isDispatchContext(): boolean {
    return this.marker.getStore() === true;
  }

  pendingCount(): number {
    return this.queue.length;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Resolve once every queued task has run
   */
  whenIdle(): Promise<void> {
    if (!this.running && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Refuse new work and let queued tasks finish
   */
  close(): Promise<void> {
    this.closed = true;
    return this.whenIdle();
  }

  private async pump(): Promise<void> {
    let task = this.queue.shift();
    while (task) {
      try {
        await this.marker.run(true, task);
      } catch (error) {
        console.error("[ApplicationContext] Dispatched task failed:", error);
      }
      task = this.queue.shift();
    }

    this.running = false;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
