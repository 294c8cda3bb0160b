/**
 * Interfaces of the host development environment the bridge drives.
 *
 * Every method here that mutates host state must be called from a task
 * running on the host's application context.
 */

import { CompileMessage, ProjectInfo } from "../types";
import { IDebuggerManager } from "./IDebugger";

/**
 * The host's single execution context for state-mutating work
 */
export interface IApplicationContext {
  /**
   * Queue a task; tasks run one at a time in submission order
   */
  invokeLater(task: () => void | Promise<void>): void;

  /**
   * True while the caller is running inside a queued task
   */
  isDispatchContext(): boolean;
}

/**
 * Completion callback of a compiler run
 */
export type CompileStatusCallback = (
  aborted: boolean,
  errorCount: number,
  warningCount: number,
  messages: CompileMessage[]
) => void;

export interface ICompilerManager {
  /** Incremental build */
  make(callback: CompileStatusCallback): void;
  /** Full rebuild */
  rebuild(callback: CompileStatusCallback): void;
  /** True while any compilation runs, including ones the bridge did not start */
  isCompilationActive(): boolean;
}

/**
 * Listener attached to a process before it is launched
 */
export interface ProcessListener {
  onText(text: string, stream: "stdout" | "stderr" | "system"): void;
  onTerminated(exitCode: number): void;
}

/**
 * Handle to a launched process
 */
export interface IProcessHandle {
  readonly pid?: number;
  isTerminated(): boolean;
  exitCode(): number | undefined;
  /** Request termination; returns once the request is issued */
  destroy(): void;
}

export interface RunConfiguration {
  name: string;
}

export interface IRunManager {
  listConfigurations(): RunConfiguration[];
  /**
   * Launch a configuration. The listener is attached before the process
   * starts, so no output or exit is missed.
   */
  execute(configuration: RunConfiguration, listener: ProcessListener): IProcessHandle;
}

export type TestNodeState = "running" | "passed" | "ignored" | "defect";

/**
 * A node of the asynchronously populated test result tree
 */
export interface TestNode {
  name: string;
  isLeaf: boolean;
  state: TestNodeState;
  durationMs?: number;
  errorMessage?: string;
  stacktrace?: string;
  parent?: TestNode;
  children: TestNode[];
}

/**
 * A launched test process and the result tree its reporter fills in
 */
export interface TestExecution {
  handle: IProcessHandle;
  /** Root of the result tree; undefined until the reporter creates it */
  root(): TestNode | undefined;
}

export interface TestLaunchListener extends ProcessListener {
  /** Called once the process is observed started */
  onStarted?(execution: TestExecution): void;
}

export interface ITestLauncher {
  launch(
    pattern: string,
    options: { debug: boolean },
    listener: TestLaunchListener
  ): TestExecution;
  /** True while a test process runs, including ones the bridge did not start */
  isTestActive(): boolean;
}

/**
 * An open project in the host
 */
export interface IHostProject {
  readonly info: ProjectInfo;
  readonly compiler: ICompilerManager;
  readonly runManager: IRunManager;
  readonly testLauncher?: ITestLauncher;
  readonly debuggerManager?: IDebuggerManager;
}

export interface IHostEnvironment {
  readonly context: IApplicationContext;
  openProjects(): IHostProject[];
}
