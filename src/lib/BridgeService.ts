/**
 * BridgeService - Owns every bridge component for one host
 *
 * Components are constructed here and handed explicitly to whatever needs
 * them; nothing is looked up from global state.
 */

import { IHostEnvironment } from "../interfaces/IHostEnvironment";
import { LockResetReport } from "../interfaces/IOperationLock";
import { BridgeConfig, ProjectInfo } from "../types";
import { ApplicationContext } from "./ApplicationContext";
import { BuildService } from "./BuildService";
import { CompletionBridge } from "./CompletionBridge";
import { DebugFacade } from "./DebugFacade";
import { OperationLockRegistry } from "./OperationLock";
import { ResultCache } from "./ResultCache";
import { RunRegistry } from "./RunRegistry";
import { TestResultExtractor } from "./TestResultExtractor";
import { TestService } from "./TestService";
import { TimeoutManager } from "./TimeoutManager";

/**
 * A host whose application context the service can drain on shutdown
 */
export type BridgeHost = IHostEnvironment & { readonly context: ApplicationContext };

export interface BridgeResetReport {
  locks: LockResetReport[];
  destroyedRuns: number;
}

export class BridgeService {
  readonly timeouts: TimeoutManager;
  readonly bridge: CompletionBridge;
  readonly locks: OperationLockRegistry;
  readonly runs: RunRegistry;
  readonly cache: ResultCache;
  readonly builds: BuildService;
  readonly tests: TestService;
  readonly debug: DebugFacade;
  private started = false;
  private stopped = false;

  constructor(
    readonly host: BridgeHost,
    readonly config: BridgeConfig
  ) {
    this.timeouts = new TimeoutManager();
    this.bridge = new CompletionBridge(host.context, this.timeouts);
    this.locks = new OperationLockRegistry(config.locks, {
      build: () => host.openProjects().some((p) => p.compiler.isCompilationActive()),
      test: () => host.openProjects().some((p) => p.testLauncher?.isTestActive() ?? false),
    });
    this.runs = new RunRegistry(host, this.bridge, {
      ...config.runs,
      runStartTimeoutMs: config.timeouts.runStartMs,
    });
    this.cache = new ResultCache();
    this.builds = new BuildService(host, this.locks, this.bridge, this.cache, config.timeouts);
    this.tests = new TestService(
      host,
      this.locks,
      this.bridge,
      this.cache,
      new TestResultExtractor(config.extraction),
      config.timeouts
    );
    this.debug = new DebugFacade(host, this.bridge, config.timeouts);
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    this.runs.startReaper();
    console.error(
      `[BridgeService] Started with ${this.host.openProjects().length} open project(s)`
    );
  }

  projects(): ProjectInfo[] {
    return this.host.openProjects().map((p) => ({ ...p.info }));
  }

  /**
   * Release locks held by the caller and drop every tracked run
   */
  reset(): BridgeResetReport {
    const locks = this.locks.resetAll();
    const destroyedRuns = this.runs.reset();
    console.error(
      `[BridgeService] Reset: ${locks.filter((l) => l.action === "released").length} lock(s) released, ` +
        `${destroyedRuns} run(s) destroyed`
    );
    return { locks, destroyedRuns };
  }

  async shutdown(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    console.error("[BridgeService] Shutting down...");
    this.runs.shutdown();
    this.bridge.shutdown();
    this.timeouts.clearAll();
    await this.host.context.close();
    console.error("[BridgeService] Shutdown complete");
  }

  isShutDown(): boolean {
    return this.stopped;
  }
}
