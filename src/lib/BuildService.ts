/**
 * BuildService - The build operation class
 *
 * Runs make or rebuild under the build lock, waits on the compiler
 * callback with a deadline and keeps the last result for status and
 * diagnostics queries.
 */

import { ICompilerManager, IHostEnvironment } from "../interfaces/IHostEnvironment";
import {
  CompileMessage,
  CompileResult,
  DiagnosticsResult,
  Failure,
  TimeoutConfig,
} from "../types";
import { CompletionBridge } from "./CompletionBridge";
import { OperationLockRegistry } from "./OperationLock";
import { resolveProject } from "./ProjectResolver";
import { ResultCache } from "./ResultCache";

export interface BuildRequest {
  /** make when true (default), rebuild otherwise */
  incremental?: boolean;
  timeoutMs?: number;
  projectRef?: string;
}

export class BuildService {
  constructor(
    private readonly host: IHostEnvironment,
    private readonly locks: OperationLockRegistry,
    private readonly bridge: CompletionBridge,
    private readonly cache: ResultCache,
    private readonly timeouts: TimeoutConfig
  ) {}

  async build(request: BuildRequest = {}): Promise<CompileResult> {
    const resolved = resolveProject(this.host, request.projectRef);
    if (!resolved.success) {
      return BuildService.failedResult(resolved.failure, 0);
    }
    const project = resolved.project;
    const incremental = request.incremental ?? true;
    const timeoutMs = request.timeoutMs ?? this.timeouts.buildMs;

    const exclusive = await this.locks.runExclusive(
      "build",
      {
        label: `${incremental ? "make" : "rebuild"} ${project.info.name}`,
        waitFor: ["build"],
      },
      () => this.compile(project.compiler, project.info.name, incremental, timeoutMs)
    );

    if (exclusive.status === "rejected") {
      return BuildService.failedResult(exclusive.failure, 0);
    }
    return exclusive.value;
  }

  /**
   * Last build result, if any
   */
  status(): (CompileResult & { projectName?: string }) | undefined {
    return this.cache.get("build");
  }

  diagnostics(): DiagnosticsResult {
    const last = this.cache.get("build");
    if (!last) {
      return { errors: [], warnings: [] };
    }
    return {
      errors: last.errors.map((m) => ({ ...m })),
      warnings: last.warnings.map((m) => ({ ...m })),
      projectName: last.projectName,
    };
  }

  private async compile(
    compiler: ICompilerManager,
    projectName: string,
    incremental: boolean,
    timeoutMs: number
  ): Promise<CompileResult> {
    this.cache.clear("build");
    const startedAt = Date.now();

    const outcome = await this.bridge.run<CompileResult>(
      (completion) => {
        const callback = (
          aborted: boolean,
          errorCount: number,
          warningCount: number,
          messages: CompileMessage[]
        ) =>
          completion.complete(
            BuildService.toResult(
              aborted,
              errorCount,
              warningCount,
              messages,
              Date.now() - startedAt
            )
          );

        if (incremental) {
          compiler.make(callback);
        } else {
          compiler.rebuild(callback);
        }
      },
      { timeoutMs, label: "build" }
    );

    let result: CompileResult;
    switch (outcome.status) {
      case "completed":
        result = outcome.value;
        break;
      case "timeout":
        result = BuildService.failedResult(
          {
            kind: "OperationTimeout",
            message: `Build timed out after ${timeoutMs}ms`,
          },
          outcome.elapsedMs
        );
        break;
      case "failed":
        result = BuildService.failedResult(outcome.error, outcome.elapsedMs);
        break;
      case "cancelled":
        result = BuildService.failedResult(
          { kind: "InternalError", message: `Build cancelled: ${outcome.reason}` },
          outcome.elapsedMs
        );
        break;
    }

    this.cache.set("build", { ...result, projectName });
    console.error(
      `[BuildService] ${incremental ? "make" : "rebuild"} of ${projectName}: ` +
        `${result.errors.length} errors, ${result.warnings.length} warnings in ${result.timeMs}ms` +
        (result.failureKind ? ` (${result.failureKind})` : "")
    );
    return result;
  }

  /**
   * Shape a compiler callback into a result; counts without messages get a
   * placeholder entry
   */
  static toResult(
    aborted: boolean,
    errorCount: number,
    warningCount: number,
    messages: CompileMessage[],
    timeMs: number
  ): CompileResult {
    const errors = messages.filter((m) => m.severity === "ERROR");
    const warnings = messages.filter((m) => m.severity === "WARNING");

    if (errorCount > 0 && errors.length === 0) {
      errors.push({
        message: `${errorCount} error(s) occurred during compilation`,
        severity: "ERROR",
      });
    }
    if (warningCount > 0 && warnings.length === 0) {
      warnings.push({
        message: `${warningCount} warning(s) occurred during compilation`,
        severity: "WARNING",
      });
    }

    return {
      success: !aborted && errorCount === 0 && errors.length === 0,
      errors,
      warnings,
      timeMs,
      aborted,
    };
  }

  static failedResult(failure: Failure, timeMs: number): CompileResult {
    return {
      success: false,
      errors: [],
      warnings: [],
      timeMs,
      aborted: false,
      error: failure.message,
      failureKind: failure.kind,
    };
  }
}
