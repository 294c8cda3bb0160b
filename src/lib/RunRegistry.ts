/**
 * RunRegistry - Tracks externally launched runs and their output
 *
 * Responsibilities:
 * - Launch run configurations with listeners attached up front
 * - Capture output per run in a bounded buffer
 * - Converge stop and natural exit into one terminal state
 * - Prune finished runs after the retention period
 */

import {
  IApplicationContext,
  IHostEnvironment,
  IProcessHandle,
  ProcessListener,
} from "../interfaces/IHostEnvironment";
import {
  IRunRegistry,
  RunOutputOutcome,
  RunStartOutcome,
  RunStopOutcome,
} from "../interfaces/IRunRegistry";
import { Failure, RunRegistryConfig, RunSummary } from "../types";
import { CompletionBridge } from "./CompletionBridge";
import { ErrorHandler } from "./ErrorHandler";
import { OutputBuffer } from "./OutputBuffer";
import { resolveProject } from "./ProjectResolver";
import { RunReaper } from "./RunReaper";

/** Exit code recorded when a run is stopped before its exit is observed */
export const STOPPED_EXIT_CODE = -1;

/**
 * A tracked run
 */
export interface Run {
  id: string;
  configName: string;
  projectName: string;
  startTime: number;
  output: OutputBuffer;
  running: boolean;
  exitCode?: number;
  startError?: string;
  /** Set by stop() before the launch has produced a handle */
  stopRequested?: boolean;
  processHandle?: IProcessHandle;
}

export interface RunRegistryOptions extends RunRegistryConfig {
  runStartTimeoutMs: number;
}

/**
 * RunRegistry implementation
 */
export class RunRegistry implements IRunRegistry {
  private runs: Map<string, Run> = new Map();
  private counter = 0;
  private readonly context: IApplicationContext;
  private readonly reaper: RunReaper;

  constructor(
    private readonly host: IHostEnvironment,
    private readonly bridge: CompletionBridge,
    private readonly options: RunRegistryOptions
  ) {
    this.context = host.context;
    this.reaper = new RunReaper(this, options.retentionMs, options.pruneIntervalMs);
  }

  async start(configName: string, projectRef?: string): Promise<RunStartOutcome> {
    const resolved = resolveProject(this.host, projectRef);
    if (!resolved.success) {
      return resolved;
    }
    const project = resolved.project;

    const configurations = project.runManager.listConfigurations();
    const configuration = configurations.find((c) => c.name === configName);
    if (!configuration) {
      return {
        success: false,
        failure: ErrorHandler.failure(
          "RunConfigurationNotFound",
          `Run configuration '${configName}' not found in project '${project.info.name}'`,
          { available: configurations.map((c) => c.name) }
        ),
      };
    }

    const run: Run = {
      id: `run-${++this.counter}`,
      configName,
      projectName: project.info.name,
      startTime: Date.now(),
      output: new OutputBuffer(this.options.outputCapacity),
      running: true,
    };
    this.runs.set(run.id, run);

    const listener: ProcessListener = {
      onText: (text) => run.output.append(text),
      onTerminated: (exitCode) => this.markTerminated(run, exitCode),
    };

    const outcome = await this.bridge.run<IProcessHandle>(
      (completion) => {
        const handle = project.runManager.execute(configuration, listener);
        run.processHandle = handle;
        if (completion.settled) {
          // The caller already gave up
          handle.destroy();
          return;
        }
        if (run.stopRequested && !handle.isTerminated()) {
          handle.destroy();
        }
        completion.complete(handle);
      },
      { timeoutMs: this.options.runStartTimeoutMs, label: `run-start-${run.id}` }
    );

    switch (outcome.status) {
      case "completed":
        console.error(
          `[RunRegistry] Started ${run.id} (${configName}) in ${project.info.name}`
        );
        return {
          success: true,
          runId: run.id,
          configName,
          projectName: project.info.name,
        };
      case "timeout":
        this.markStartFailed(run, `Launch did not complete within ${outcome.timeoutMs}ms`);
        return {
          success: false,
          failure: ErrorHandler.failure(
            "OperationTimeout",
            `Starting '${configName}' timed out after ${outcome.timeoutMs}ms`,
            { runId: run.id }
          ),
        };
      case "failed":
        this.markStartFailed(run, outcome.error.message);
        return {
          success: false,
          failure: { ...outcome.error, details: { ...outcome.error.details, runId: run.id } },
        };
      case "cancelled":
        this.markStartFailed(run, outcome.reason);
        return {
          success: false,
          failure: ErrorHandler.failure(
            "InternalError",
            `Starting '${configName}' was cancelled: ${outcome.reason}`,
            { runId: run.id }
          ),
        };
    }
  }

  getOutput(runId: string, clear: boolean = false): RunOutputOutcome {
    const run = this.runs.get(runId);
    if (!run) {
      return this.notFound(runId);
    }

    // truncated resets on drain, so read it first
    const truncated = run.output.truncated;
    const output = clear ? run.output.drain() : run.output.read();

    return {
      success: true,
      runId,
      output,
      running: run.running,
      exitCode: run.exitCode,
      truncated,
      startError: run.startError,
    };
  }

  stop(runId: string): RunStopOutcome {
    const run = this.runs.get(runId);
    if (!run) {
      return this.notFound(runId);
    }

    if (!run.running) {
      return {
        success: true,
        runId,
        result: "already_terminated",
        message: `Run ${runId} has already terminated`,
      };
    }

    const handle = run.processHandle;
    run.running = false;
    run.exitCode = handle?.exitCode() ?? STOPPED_EXIT_CODE;
    if (!handle) {
      run.stopRequested = true;
    } else if (!handle.isTerminated()) {
      this.destroy(handle, runId);
    }

    console.error(`[RunRegistry] Stopped ${runId}`);
    return { success: true, runId, result: "stopped", message: `Run ${runId} stopped` };
  }

  list(): RunSummary[] {
    return Array.from(this.runs.values()).map((run) => ({
      runId: run.id,
      configName: run.configName,
      projectName: run.projectName,
      startTime: run.startTime,
      running: run.running,
      exitCode: run.exitCode,
    }));
  }

  prune(maxAgeMs: number, now: number = Date.now()): string[] {
    const removed: string[] = [];
    for (const [id, run] of this.runs) {
      if (!run.running && now - run.startTime > maxAgeMs) {
        this.runs.delete(id);
        removed.push(id);
      }
    }
    return removed;
  }

  /**
   * Look up a run record
   */
  get(runId: string): Run | undefined {
    return this.runs.get(runId);
  }

  size(): number {
    return this.runs.size;
  }

  /**
   * Destroy every live process and forget all runs
   */
  reset(): number {
    let destroyed = 0;
    for (const run of this.runs.values()) {
      const handle = run.processHandle;
      if (run.running && handle && !handle.isTerminated()) {
        this.destroy(handle, run.id);
        destroyed++;
      }
    }
    this.runs.clear();
    console.error(`[RunRegistry] Reset: destroyed ${destroyed} live runs`);
    return destroyed;
  }

  startReaper(): void {
    this.reaper.start();
  }

  shutdown(): void {
    this.reaper.stop();
    this.reset();
  }

  private markTerminated(run: Run, exitCode: number): void {
    if (!run.running && run.exitCode !== undefined) {
      // Already stopped; the first observed event wins
      return;
    }
    run.running = false;
    run.exitCode = exitCode;
    console.error(`[RunRegistry] ${run.id} exited with code ${exitCode}`);
  }

  private markStartFailed(run: Run, reason: string): void {
    if (run.exitCode !== undefined) {
      // The process ran and exited, or was stopped, before the caller gave up
      return;
    }
    run.running = false;
    run.startError = reason;
    console.error(`[RunRegistry] ${run.id} failed to start: ${reason}`);
  }

  private destroy(handle: IProcessHandle, runId: string): void {
    try {
      this.context.invokeLater(() => handle.destroy());
    } catch (error) {
      // Context already closed; terminate directly
      console.error(
        `[RunRegistry] Dispatch unavailable, destroying ${runId} directly:`,
        ErrorHandler.toFailure(error).message
      );
      handle.destroy();
    }
  }

  private notFound(runId: string): { success: false; failure: Failure } {
    return {
      success: false,
      failure: ErrorHandler.failure("RunNotFound", `Run not found: ${runId}`, {
        runId,
        known: Array.from(this.runs.keys()),
      }),
    };
  }
}
