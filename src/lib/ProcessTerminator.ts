/**
 * ProcessTerminator - Handles process termination
 *
 * Sends SIGTERM, waits out the grace period and escalates to SIGKILL.
 */

import { ChildProcess } from "child_process";

export type TerminationReason = "graceful" | "forced" | "already_exited";

export interface TerminationResult {
  pid?: number;
  reason: TerminationReason;
  /** False when the process was still alive after SIGKILL */
  exited: boolean;
}

/** Wait after SIGKILL before giving up on the exit event */
const KILL_WAIT_MS = 1000;

export class ProcessTerminator {
  constructor(private readonly graceMs: number) {}

  /**
   * Terminate a process gracefully, escalating to SIGKILL after the grace period
   */
  async terminate(child: ChildProcess): Promise<TerminationResult> {
    const pid = child.pid;
    if (ProcessTerminator.hasExited(child)) {
      return { pid, reason: "already_exited", exited: true };
    }

    const exit = this.waitForExit(child, this.graceMs);
    child.kill("SIGTERM");
    if (await exit) {
      return { pid, reason: "graceful", exited: true };
    }

    console.error(
      `[ProcessTerminator] Process ${pid} ignored SIGTERM for ${this.graceMs}ms, sending SIGKILL`
    );
    const killed = this.waitForExit(child, KILL_WAIT_MS);
    child.kill("SIGKILL");
    const exited = await killed;
    if (!exited) {
      console.error(`[ProcessTerminator] Process ${pid} did not exit after SIGKILL`);
    }
    return { pid, reason: "forced", exited };
  }

  static hasExited(child: ChildProcess): boolean {
    return child.exitCode !== null || child.signalCode !== null;
  }

  /**
   * Resolve true on exit, false once the timeout passes
   */
  private waitForExit(child: ChildProcess, timeoutMs: number): Promise<boolean> {
    if (ProcessTerminator.hasExited(child)) {
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const onExit = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        child.off("exit", onExit);
        resolve(false);
      }, timeoutMs);
      child.once("exit", onExit);
    });
  }
}
