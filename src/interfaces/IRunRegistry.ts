/**
 * Interface for the registry of externally launched runs
 */

import { Outcome, RunSummary } from "../types";

export type RunStartOutcome = Outcome<{
  runId: string;
  configName: string;
  projectName: string;
}>;

export type RunOutputOutcome = Outcome<{
  runId: string;
  output: string;
  running: boolean;
  exitCode?: number;
  truncated: boolean;
  startError?: string;
}>;

export type RunStopOutcome = Outcome<{
  runId: string;
  result: "stopped" | "already_terminated";
  message: string;
}>;

export interface IRunRegistry {
  /**
   * Launch a run configuration and track it; resolves once the launch
   * has been issued, without waiting for the process to finish
   */
  start(configName: string, projectRef?: string): Promise<RunStartOutcome>;

  /**
   * Read captured output; with clear, drain it so reads never overlap
   */
  getOutput(runId: string, clear?: boolean): RunOutputOutcome;

  /**
   * Request termination; idempotent
   */
  stop(runId: string): RunStopOutcome;

  /**
   * Snapshot of all tracked runs
   */
  list(): RunSummary[];

  /**
   * Remove terminated runs older than maxAgeMs
   * @returns Removed run IDs
   */
  prune(maxAgeMs: number, now?: number): string[];
}
