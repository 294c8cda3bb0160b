/**
 * LocalProcess - Spawns child processes for the local host
 *
 * Listeners are attached before the process runs, so no output or exit is
 * missed. The exit is reported once, after both output streams closed.
 */

import { spawn, ChildProcess } from "child_process";
import * as os from "os";
import * as path from "path";
import { sync as whichSync } from "which";
import { IProcessHandle, ProcessListener } from "../interfaces/IHostEnvironment";
import { BridgeError } from "../types";
import { ErrorHandler } from "./ErrorHandler";
import { ProcessTerminator } from "./ProcessTerminator";

export interface SpawnSpec {
  command: string;
  args: string[];
  cwd: string;
  env?: Record<string, string>;
}

/** Reported when the process never started */
export const SPAWN_FAILED_EXIT_CODE = -1;

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(os.constants.signals));

/**
 * Resolve a command to an absolute executable path. Commands containing a
 * path separator resolve against the working directory, others via PATH.
 * @throws BridgeError of kind ValidationFailed when nothing is found
 */
export function resolveExecutable(command: string, cwd: string): string {
  if (command.includes("/") || command.includes(path.sep)) {
    return path.resolve(cwd, command);
  }
  const resolved = whichSync(command, { nothrow: true });
  if (!resolved) {
    throw new BridgeError("ValidationFailed", `Executable not found: ${command}`, { command });
  }
  return resolved;
}

/**
 * Exit code of a process; a signal maps to 128 + its number
 */
export function exitCodeOf(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) {
    return code;
  }
  if (signal !== null) {
    return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
  }
  return SPAWN_FAILED_EXIT_CODE;
}

export class LocalProcessHandle implements IProcessHandle {
  readonly pid?: number;
  private terminated = false;
  private code?: number;
  private signal?: NodeJS.Signals;

  private constructor(
    private readonly child: ChildProcess,
    private readonly executable: string,
    private readonly listener: ProcessListener,
    private readonly terminator: ProcessTerminator
  ) {
    this.pid = child.pid;

    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => listener.onText(chunk, "stdout"));
    child.stderr?.on("data", (chunk: string) => listener.onText(chunk, "stderr"));

    child.on("error", (error) => {
      listener.onText(`${ErrorHandler.describeSpawnError(error, executable)}\n`, "system");
      if (child.pid === undefined) {
        this.finish(SPAWN_FAILED_EXIT_CODE, null);
      }
    });
    child.on("close", (code, signal) => this.finish(code, signal));
  }

  /**
   * Spawn a process with the listener attached
   * @throws BridgeError when the executable cannot be resolved
   */
  static spawn(
    spec: SpawnSpec,
    listener: ProcessListener,
    terminator: ProcessTerminator
  ): LocalProcessHandle {
    const executable = resolveExecutable(spec.command, spec.cwd);
    const child = spawn(executable, spec.args, {
      cwd: spec.cwd,
      env: { ...process.env, ...spec.env },
      stdio: ["ignore", "pipe", "pipe"],
    });
    return new LocalProcessHandle(child, executable, listener, terminator);
  }

  isTerminated(): boolean {
    return this.terminated;
  }

  exitCode(): number | undefined {
    return this.code;
  }

  /**
   * Signal that ended the process, if any
   */
  terminationSignal(): NodeJS.Signals | undefined {
    return this.signal;
  }

  destroy(): void {
    if (this.terminated) {
      return;
    }
    this.terminator
      .terminate(this.child)
      .then((result) => {
        console.error(
          `[LocalProcess] ${path.basename(this.executable)} (${result.pid}) terminated: ${result.reason}`
        );
      })
      .catch((error) => {
        console.error(`[LocalProcess] Failed to terminate ${this.pid}:`, error);
      });
  }

  private finish(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.terminated) {
      return;
    }
    this.terminated = true;
    this.code = exitCodeOf(code, signal);
    this.signal = signal ?? undefined;
    this.listener.onTerminated(this.code);
  }
}
