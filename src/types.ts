/**
 * Core type definitions for the devhost bridge
 */

/**
 * Operation classes serialized by the operation locks
 */
export type OperationClass = "build" | "test";

export const OPERATION_CLASSES: readonly OperationClass[] = ["build", "test"];

/**
 * Failure taxonomy shared by every component
 */
export type FailureKind =
  | "NoProjectOpen"
  | "LockAcquisitionTimeout"
  | "UpstreamActivityTimeout"
  | "OperationTimeout"
  | "RunNotFound"
  | "RunConfigurationNotFound"
  | "NoActiveDebugSession"
  | "SessionNotSuspended"
  | "EvaluatorUnavailable"
  | "BreakpointNotFound"
  | "DebuggerError"
  | "ExtractionFailed"
  | "NoMatchingTests"
  | "ValidationFailed"
  | "InternalError";

/**
 * A failure captured as data at the point of detection
 */
export interface Failure {
  kind: FailureKind;
  /** Human-readable message */
  message: string;
  /** Fault tag for unexpected internal failures */
  faultKind?: string;
  /** Additional structured details */
  details?: Record<string, unknown>;
}

export type Outcome<T> =
  | ({ success: true } & T)
  | { success: false; failure: Failure };

/**
 * Bridge error class, used for internal throws that are converted to
 * Failure values at component boundaries
 */
export class BridgeError extends Error {
  constructor(
    public readonly kind: FailureKind,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "BridgeError";
  }
}

/**
 * Timeouts for each kind of bridged call, in milliseconds
 */
export interface TimeoutConfig {
  buildMs: number;
  testMs: number;
  runStartMs: number;
  debugStepMs: number;
  debugEvaluateMs: number;
  debugStackMs: number;
  debugVariablesMs: number;
  valuePresentationMs: number;
  breakpointMs: number;
}

export interface LockConfig {
  /** Maximum wait for the lock of an operation class */
  acquireTimeoutMs: number;
  /** Maximum wait for externally triggered activity of the same class */
  externalActivityMaxWaitMs: number;
  /** Poll interval of the external activity probe */
  externalActivityPollMs: number;
}

export interface RetryPolicy {
  maxAttempts: number;
  delayMs: number;
}

export interface RunRegistryConfig {
  /** Maximum characters retained per run */
  outputCapacity: number;
  /** Terminated runs older than this are pruned */
  retentionMs: number;
  /** Interval of the background prune pass (0 disables it) */
  pruneIntervalMs: number;
}

/**
 * A named process launch definition inside a project
 */
export interface RunConfigurationSpec {
  name: string;
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
}

export interface CommandSpec {
  command: string;
  args: string[];
}

/**
 * Project definition for the local host
 */
export interface ProjectSpec {
  name: string;
  basePath: string;
  /** Incremental build command */
  build?: CommandSpec;
  /** Full rebuild command (falls back to build) */
  rebuild?: CommandSpec;
  /** Test command; "{pattern}" in args is replaced by the requested pattern */
  test?: CommandSpec;
  runConfigurations: RunConfigurationSpec[];
}

/**
 * Complete bridge configuration
 */
export interface BridgeConfig {
  timeouts: TimeoutConfig;
  locks: LockConfig;
  extraction: RetryPolicy;
  runs: RunRegistryConfig;
  /** Grace period before SIGTERM escalates to SIGKILL */
  terminationGraceMs: number;
  projects: ProjectSpec[];
}

/**
 * A compiler error or warning
 */
export interface CompileMessage {
  message: string;
  file?: string;
  line?: number;
  column?: number;
  severity: "ERROR" | "WARNING" | "INFO";
}

/**
 * Result of a build operation
 */
export interface CompileResult {
  success: boolean;
  errors: CompileMessage[];
  warnings: CompileMessage[];
  timeMs: number;
  aborted: boolean;
  /** Set when the build did not run to completion */
  error?: string;
  /** Failure kind when the build did not run to completion */
  failureKind?: FailureKind;
}

/**
 * Current diagnostics derived from the last build
 */
export interface DiagnosticsResult {
  errors: CompileMessage[];
  warnings: CompileMessage[];
  projectName?: string;
}

export type TestStatus = "PASSED" | "FAILED" | "SKIPPED" | "ERROR";

/**
 * Individual test case result
 */
export interface TestCaseResult {
  name: string;
  className: string;
  methodName: string;
  status: TestStatus;
  timeMs: number;
  message?: string;
  stackTrace?: string;
}

/**
 * Result of a test operation
 */
export interface TestRunResult {
  success: boolean;
  passed: number;
  failed: number;
  skipped: number;
  timeMs: number;
  tests: TestCaseResult[];
  error?: string;
  failureKind?: FailureKind;
  debugMessage?: string;
}

/**
 * Summary of a tracked run, safe to hand out
 */
export interface RunSummary {
  runId: string;
  configName: string;
  projectName: string;
  startTime: number;
  running: boolean;
  exitCode?: number;
}

export interface ProjectInfo {
  name: string;
  basePath?: string;
}
