/**
 * ResultCache - Last structured result per operation class
 */

import { CompileResult, OperationClass, TestRunResult } from "../types";

export interface CachedResults {
  build: CompileResult & { projectName?: string };
  test: TestRunResult;
}

export class ResultCache {
  private entries: Partial<CachedResults> = {};

  get<K extends OperationClass>(operation: K): CachedResults[K] | undefined {
    return this.entries[operation];
  }

  set<K extends OperationClass>(operation: K, result: CachedResults[K]): void {
    this.entries[operation] = result;
  }

  /**
   * Forget the result of an operation class, at the start of a new one
   */
  clear(operation: OperationClass): void {
    delete this.entries[operation];
  }
}
