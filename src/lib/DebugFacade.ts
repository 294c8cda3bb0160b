/**
 * DebugFacade - Awaitable debugger operations over a callback-driven
 * debugger API
 *
 * Preconditions are checked before anything is dispatched. Multi-part
 * container callbacks are collected until the last part arrives; on a
 * deadline the collected part is returned as incomplete.
 */

import {
  IDebuggerManager,
  IDebugSession,
  IDebugValue,
  IStackFrame,
  LineBreakpoint,
  SourcePosition,
  ValuePresentation,
} from "../interfaces/IDebugger";
import { IHostEnvironment } from "../interfaces/IHostEnvironment";
import { BridgeError, Failure, Outcome, TimeoutConfig } from "../types";
import { BridgePolicy, CompletionBridge } from "./CompletionBridge";
import { ErrorHandler } from "./ErrorHandler";
import { pollUntilIdle } from "./OperationLock";

export interface FrameInfo {
  index: number;
  description: string;
  file?: string;
  line?: number;
}

export interface VariableInfo {
  name: string;
  value: string;
  type?: string;
  hasChildren: boolean;
}

export interface SessionInfo {
  id: string;
  name: string;
  suspended: boolean;
  current: boolean;
  position?: SourcePosition;
}

export type DebugActionOutcome = Outcome<{
  action: string;
  message: string;
  suspended: boolean;
  position?: SourcePosition;
}>;

export type EvaluateOutcome = Outcome<{
  expression: string;
  result: string;
  type?: string;
  hasChildren: boolean;
}>;

export type StackOutcome = Outcome<{ frames: FrameInfo[]; complete: boolean }>;

export type VariablesOutcome = Outcome<{
  frameIndex: number;
  variables: VariableInfo[];
  complete: boolean;
  /** Children the debugger declined to enumerate */
  remaining?: number;
}>;

export type BreakpointOutcome = Outcome<{ breakpoint: LineBreakpoint; message: string }>;

export const PRESENTATION_TIMEOUT_TEXT = "(timeout)";

/** Poll interval while waiting for a step to land */
const SUSPEND_POLL_MS = 25;

type Step = "pause" | "resume" | "stepOver" | "stepInto" | "stepOut";

const STEP_MESSAGES: Record<Step, string> = {
  pause: "Paused",
  resume: "Resumed",
  stepOver: "Stepped over",
  stepInto: "Stepped into",
  stepOut: "Stepped out",
};

export class DebugFacade {
  constructor(
    private readonly host: IHostEnvironment,
    private readonly bridge: CompletionBridge,
    private readonly timeouts: TimeoutConfig
  ) {}

  listSessions(): { sessions: SessionInfo[] } {
    const sessions: SessionInfo[] = [];
    for (const manager of this.managers()) {
      const current = manager.currentSession();
      for (const session of manager.sessions()) {
        sessions.push({
          id: session.id,
          name: session.name,
          suspended: session.isSuspended(),
          current: session === current,
          position: session.currentPosition(),
        });
      }
    }
    return { sessions };
  }

  pause(): Promise<DebugActionOutcome> {
    return this.control("pause", false);
  }

  resume(): Promise<DebugActionOutcome> {
    return this.control("resume", true);
  }

  stepOver(): Promise<DebugActionOutcome> {
    return this.control("stepOver", true);
  }

  stepInto(): Promise<DebugActionOutcome> {
    return this.control("stepInto", true);
  }

  stepOut(): Promise<DebugActionOutcome> {
    return this.control("stepOut", true);
  }

  async evaluate(expression: string): Promise<EvaluateOutcome> {
    const session = this.suspendedSession();
    if (!session.success) {
      return session;
    }

    const evaluator = session.session.currentStackFrame()?.evaluator();
    if (!evaluator) {
      return this.fail("EvaluatorUnavailable", "No evaluator is available for the current frame");
    }

    const outcome = await this.bridge.run<IDebugValue>(
      (completion) =>
        evaluator.evaluate(expression, {
          evaluated: (value) => completion.complete(value),
          errorOccurred: (message) =>
            completion.fail(new BridgeError("DebuggerError", message)),
        }),
      this.policy("evaluate", this.timeouts.debugEvaluateMs)
    );

    if (outcome.status !== "completed") {
      return { success: false, failure: this.outcomeFailure(outcome, "Evaluation") };
    }

    const presentation = await this.present(outcome.value);
    return {
      success: true,
      expression,
      result: presentation.value,
      type: presentation.type,
      hasChildren: presentation.hasChildren,
    };
  }

  async getStack(): Promise<StackOutcome> {
    const session = this.suspendedSession();
    if (!session.success) {
      return session;
    }
    const collected = await this.collectFrames(session.session);
    if (!collected.success) {
      return collected;
    }
    return {
      success: true,
      frames: collected.frames.map((frame, index) => DebugFacade.describeFrame(frame, index)),
      complete: collected.complete,
    };
  }

  async getVariables(frameIndex: number = 0): Promise<VariablesOutcome> {
    if (!Number.isInteger(frameIndex) || frameIndex < 0) {
      return this.fail("ValidationFailed", `Invalid frame index: ${frameIndex}`);
    }

    const session = this.suspendedSession();
    if (!session.success) {
      return session;
    }

    // Frame lookup and the children wait share one budget
    const deadline = Date.now() + this.timeouts.debugVariablesMs;
    const remainingMs = (): number => Math.max(1, deadline - Date.now());

    let frame: IStackFrame | undefined;
    if (frameIndex === 0) {
      frame = session.session.currentStackFrame();
    } else {
      const collected = await this.collectFrames(
        session.session,
        Math.min(this.timeouts.debugStackMs, remainingMs())
      );
      if (!collected.success) {
        return collected;
      }
      frame = collected.frames[frameIndex];
      if (!frame) {
        return this.fail(
          "ValidationFailed",
          `Frame index ${frameIndex} out of range (${collected.frames.length} frames` +
            (collected.complete ? ")" : " collected before the deadline)"),
          { frameIndex, frameCount: collected.frames.length }
        );
      }
    }
    if (!frame) {
      return this.fail("DebuggerError", "The session has no current stack frame");
    }

    const target = frame;
    const children: Array<{ name: string; value: IDebugValue }> = [];
    const overflow: { remaining?: number } = {};

    const outcome = await this.bridge.run<true>(
      (completion) =>
        target.computeChildren({
          addChildren: (batch, last) => {
            if (completion.settled) {
              return;
            }
            children.push(...batch);
            if (last) {
              completion.complete(true);
            }
          },
          tooManyChildren: (count) => {
            overflow.remaining = count;
            completion.complete(true);
          },
          setErrorMessage: (message) =>
            completion.fail(new BridgeError("DebuggerError", message)),
        }),
      this.policy("variables", remainingMs())
    );

    if (outcome.status === "failed" || outcome.status === "cancelled") {
      return { success: false, failure: this.outcomeFailure(outcome, "Variable listing") };
    }

    const variables = await Promise.all(
      children.map(async (child): Promise<VariableInfo> => {
        const presentation = await this.present(child.value);
        const info: VariableInfo = {
          name: child.name,
          value: presentation.value,
          hasChildren: presentation.hasChildren,
        };
        if (presentation.type !== undefined) {
          info.type = presentation.type;
        }
        return info;
      })
    );

    const listing = {
      success: true as const,
      frameIndex,
      variables,
      complete: outcome.status === "completed",
    };
    return overflow.remaining === undefined
      ? listing
      : { ...listing, remaining: overflow.remaining };
  }

  listBreakpoints(): Outcome<{ breakpoints: LineBreakpoint[] }> {
    const manager = this.managers()[0];
    if (!manager) {
      return this.fail("NoActiveDebugSession", "No debugger is available in the open projects");
    }
    return { success: true, breakpoints: manager.breakpoints.list() };
  }

  async setBreakpoint(file: string, line: number, condition?: string): Promise<BreakpointOutcome> {
    const manager = this.managers()[0];
    if (!manager) {
      return this.fail("NoActiveDebugSession", "No debugger is available in the open projects");
    }

    const outcome = await this.bridge.run<LineBreakpoint | undefined>(
      (completion) =>
        completion.complete(manager.breakpoints.addLineBreakpoint(file, line, condition)),
      this.policy("breakpoint-set", this.timeouts.breakpointMs)
    );

    if (outcome.status !== "completed") {
      return { success: false, failure: this.outcomeFailure(outcome, "Setting the breakpoint") };
    }
    if (!outcome.value) {
      return this.fail("DebuggerError", `Cannot set a breakpoint at ${file}:${line}`, {
        file,
        line,
      });
    }
    return {
      success: true,
      breakpoint: outcome.value,
      message: `Breakpoint set at ${file}:${line}`,
    };
  }

  async removeBreakpoint(file: string, line: number): Promise<BreakpointOutcome> {
    const manager = this.managers()[0];
    if (!manager) {
      return this.fail("NoActiveDebugSession", "No debugger is available in the open projects");
    }

    const breakpoint = manager.breakpoints
      .list()
      .find((b) => b.file === file && b.line === line);
    if (!breakpoint) {
      return this.fail("BreakpointNotFound", `No breakpoint at ${file}:${line}`, { file, line });
    }

    const outcome = await this.bridge.run<true>(
      (completion) => {
        manager.breakpoints.remove(breakpoint);
        completion.complete(true);
      },
      this.policy("breakpoint-remove", this.timeouts.breakpointMs)
    );

    if (outcome.status !== "completed") {
      return { success: false, failure: this.outcomeFailure(outcome, "Removing the breakpoint") };
    }
    return { success: true, breakpoint, message: `Breakpoint removed from ${file}:${line}` };
  }

  private async control(step: Step, requiresSuspended: boolean): Promise<DebugActionOutcome> {
    const resolved = requiresSuspended ? this.suspendedSession() : this.session();
    if (!resolved.success) {
      return resolved;
    }
    const session = resolved.session;

    const outcome = await this.bridge.run<true>(
      (completion) => {
        session[step]();
        completion.complete(true);
      },
      this.policy(step, this.timeouts.debugStepMs)
    );
    if (outcome.status !== "completed") {
      return { success: false, failure: this.outcomeFailure(outcome, STEP_MESSAGES[step]) };
    }

    if (step === "resume") {
      return {
        success: true,
        action: step,
        message: STEP_MESSAGES[step],
        suspended: session.isSuspended(),
      };
    }

    // Pause and steps land asynchronously
    const remainingMs = Math.max(0, this.timeouts.debugStepMs - outcome.elapsedMs);
    const wait = await pollUntilIdle(() => !session.isSuspended(), remainingMs, SUSPEND_POLL_MS);
    const position = session.currentPosition();

    return {
      success: true,
      action: step,
      message:
        wait.status === "finished"
          ? STEP_MESSAGES[step] +
            (position ? `${step === "pause" ? "" : ", now"} at ${position.file}:${position.line}` : "")
          : `${STEP_MESSAGES[step]}; the session is still running after ${this.timeouts.debugStepMs}ms`,
      suspended: session.isSuspended(),
      position,
    };
  }

  private async collectFrames(
    session: IDebugSession,
    timeoutMs: number = this.timeouts.debugStackMs
  ): Promise<Outcome<{ frames: IStackFrame[]; complete: boolean }>> {
    const stack = session.activeExecutionStack();
    if (!stack) {
      return this.fail("DebuggerError", "The session has no active execution stack");
    }

    const frames: IStackFrame[] = [];
    const outcome = await this.bridge.run<true>(
      (completion) =>
        stack.computeStackFrames(0, {
          addStackFrames: (batch, last) => {
            if (completion.settled) {
              return;
            }
            frames.push(...batch);
            if (last) {
              completion.complete(true);
            }
          },
          errorOccurred: (message) =>
            completion.fail(new BridgeError("DebuggerError", message)),
        }),
      this.policy("stack", timeoutMs)
    );

    if (outcome.status === "failed" || outcome.status === "cancelled") {
      return { success: false, failure: this.outcomeFailure(outcome, "Stack listing") };
    }
    return { success: true, frames: [...frames], complete: outcome.status === "completed" };
  }

  /**
   * Presentation of a value, or the timeout placeholder
   */
  private async present(value: IDebugValue): Promise<ValuePresentation> {
    const outcome = await this.bridge.run<ValuePresentation>(
      (completion) => value.computePresentation((p) => completion.complete(p)),
      this.policy("presentation", this.timeouts.valuePresentationMs)
    );
    if (outcome.status === "completed") {
      return outcome.value;
    }
    return { value: PRESENTATION_TIMEOUT_TEXT, hasChildren: false };
  }

  private managers(): IDebuggerManager[] {
    const managers: IDebuggerManager[] = [];
    for (const project of this.host.openProjects()) {
      if (project.debuggerManager) {
        managers.push(project.debuggerManager);
      }
    }
    return managers;
  }

  private session(): Outcome<{ session: IDebugSession }> {
    for (const manager of this.managers()) {
      const session = manager.currentSession();
      if (session) {
        return { success: true, session };
      }
    }
    return this.fail("NoActiveDebugSession", "No active debug session");
  }

  private suspendedSession(): Outcome<{ session: IDebugSession }> {
    const resolved = this.session();
    if (resolved.success && !resolved.session.isSuspended()) {
      return this.fail(
        "SessionNotSuspended",
        `Debug session '${resolved.session.name}' is running; pause it first`
      );
    }
    return resolved;
  }

  private policy(label: string, timeoutMs: number): BridgePolicy {
    return { label: `debug-${label}`, timeoutMs };
  }

  private outcomeFailure(
    outcome:
      | { status: "timeout"; timeoutMs: number }
      | { status: "failed"; error: Failure }
      | { status: "cancelled"; reason: string },
    what: string
  ): Failure {
    switch (outcome.status) {
      case "timeout":
        return ErrorHandler.failure(
          "OperationTimeout",
          `${what} did not finish within ${outcome.timeoutMs}ms`
        );
      case "failed":
        return outcome.error;
      case "cancelled":
        return ErrorHandler.failure("InternalError", `${what} cancelled: ${outcome.reason}`);
    }
  }

  private fail(
    kind: Failure["kind"],
    message: string,
    details?: Record<string, unknown>
  ): { success: false; failure: Failure } {
    return { success: false, failure: ErrorHandler.failure(kind, message, details) };
  }

  static describeFrame(frame: IStackFrame, index: number): FrameInfo {
    const info: FrameInfo = { index, description: frame.description() };
    const position = frame.sourcePosition();
    if (position) {
      info.file = position.file;
      info.line = position.line;
    }
    return info;
  }
}
