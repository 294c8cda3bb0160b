/**
 * Callback-driven debugger interfaces exposed by the host
 */

export interface SourcePosition {
  file: string;
  /** One-based line */
  line: number;
}

export interface ValuePresentation {
  type?: string;
  value: string;
  hasChildren: boolean;
}

export interface IDebugValue {
  computePresentation(callback: (presentation: ValuePresentation) => void): void;
}

/**
 * Receives the named children of a frame, possibly over several calls
 */
export interface ChildrenContainer {
  addChildren(
    children: Array<{ name: string; value: IDebugValue }>,
    last: boolean
  ): void;
  tooManyChildren(remaining: number): void;
  setErrorMessage(message: string): void;
}

export interface EvaluationCallback {
  evaluated(result: IDebugValue): void;
  errorOccurred(message: string): void;
}

export interface IEvaluator {
  evaluate(expression: string, callback: EvaluationCallback): void;
}

export interface IStackFrame {
  description(): string;
  sourcePosition(): SourcePosition | undefined;
  evaluator(): IEvaluator | undefined;
  computeChildren(container: ChildrenContainer): void;
}

/**
 * Receives stack frames, possibly over several calls
 */
export interface StackFrameContainer {
  addStackFrames(frames: IStackFrame[], last: boolean): void;
  errorOccurred(message: string): void;
}

export interface IExecutionStack {
  computeStackFrames(firstFrameIndex: number, container: StackFrameContainer): void;
}

export interface IDebugSession {
  readonly id: string;
  readonly name: string;
  isSuspended(): boolean;
  currentPosition(): SourcePosition | undefined;
  currentStackFrame(): IStackFrame | undefined;
  activeExecutionStack(): IExecutionStack | undefined;
  pause(): void;
  resume(): void;
  stepOver(): void;
  stepInto(): void;
  stepOut(): void;
}

export interface LineBreakpoint {
  id: string;
  file: string;
  /** One-based line */
  line: number;
  enabled: boolean;
  condition?: string;
}

export interface IBreakpointManager {
  list(): LineBreakpoint[];
  /** Returns undefined when no breakpoint can be placed at the location */
  addLineBreakpoint(file: string, line: number, condition?: string): LineBreakpoint | undefined;
  remove(breakpoint: LineBreakpoint): void;
}

export interface IDebuggerManager {
  currentSession(): IDebugSession | undefined;
  sessions(): IDebugSession[];
  readonly breakpoints: IBreakpointManager;
}
