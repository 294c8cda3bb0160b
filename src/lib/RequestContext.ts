/**
 * RequestContext - Identifies the execution context serving a request
 *
 * Lock ownership is keyed by the scope id, so a lock reset can tell
 * whether the caller is the one holding the lock.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { v4 as uuidv4 } from "uuid";

export interface RequestScope {
  id: string;
  label?: string;
  startedAt: number;
}

export class RequestContext {
  private static readonly storage = new AsyncLocalStorage<RequestScope>();

  /**
   * Run fn inside a fresh request scope
   */
  static run<T>(fn: () => T, label?: string): T {
    const scope: RequestScope = { id: uuidv4(), label, startedAt: Date.now() };
    return RequestContext.storage.run(scope, fn);
  }

  static current(): RequestScope | undefined {
    return RequestContext.storage.getStore();
  }

  static currentId(): string | undefined {
    return RequestContext.storage.getStore()?.id;
  }
}
