/**
 * Bridge Tools - Tool implementations for the devhost bridge
 *
 * Provides 24 tools over one BridgeService:
 * - Build: ide_build, ide_build_status, ide_diagnostics
 * - Test: ide_test, ide_test_results
 * - Runs: ide_run_start, ide_run_output, ide_run_stop, ide_run_list
 * - Projects: ide_projects
 * - Debugger: ide_debug_sessions, ide_debug_pause, ide_debug_resume,
 *   ide_debug_step_over, ide_debug_step_into, ide_debug_step_out,
 *   ide_debug_evaluate, ide_debug_stack, ide_debug_variables
 * - Breakpoints: ide_breakpoint_list, ide_breakpoint_set, ide_breakpoint_remove
 * - Locks: ide_lock_status, ide_lock_reset
 *
 * Arguments are validated with zod before anything runs. Every failure is
 * answered with the same envelope, classified as validation_error,
 * not_found or error.
 */

import { z } from "zod";
import { FailureKind, Failure, Outcome, OPERATION_CLASSES } from "../types";
import { BridgeService } from "./BridgeService";
import { ErrorHandler, ResponseStatus } from "./ErrorHandler";

/**
 * Failure envelope returned by every tool
 */
export interface FailureResponse {
  success: false;
  status: ResponseStatus;
  error: {
    kind: FailureKind;
    message: string;
    remediation: string;
    /** Whether retrying, waiting longer or calling reset can help */
    retryable: boolean;
    faultKind?: string;
    details?: Record<string, unknown>;
  };
  timestamp: string;
}

export type ToolResult =
  | { isError: false; payload: object }
  | { isError: true; payload: FailureResponse };

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: z.AnyZodObject;
  handle(args: unknown): Promise<ToolResult>;
}

function defineTool<S extends z.ZodRawShape>(
  name: string,
  description: string,
  shape: S,
  handler: (args: z.infer<z.ZodObject<S>>) => ToolResult | Promise<ToolResult>
): ToolDefinition {
  const inputSchema = z.object(shape);
  return {
    name,
    description,
    inputSchema,
    handle: async (args) => handler(inputSchema.parse(args ?? {})),
  };
}

const timeoutSeconds = z
  .number()
  .positive()
  .optional()
  .describe("Timeout in seconds (defaults to the configured timeout)");

const projectRef = z
  .string()
  .optional()
  .describe("Project name or base path (default: the first open project)");

function toMs(seconds: number | undefined): number | undefined {
  return seconds === undefined ? undefined : Math.round(seconds * 1000);
}

/**
 * BridgeTools class
 * Validates tool arguments and maps service results onto responses
 */
export class BridgeTools {
  private readonly tools: Map<string, ToolDefinition>;

  constructor(private readonly service: BridgeService) {
    this.tools = new Map(this.define().map((tool) => [tool.name, tool]));
  }

  /**
   * All tool definitions, in listing order
   */
  list(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  /**
   * Validate arguments and run a tool; never throws
   */
  async call(name: string, args: unknown): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return BridgeTools.failed(
        ErrorHandler.failure("ValidationFailed", `Unknown tool: ${name}`, {
          available: Array.from(this.tools.keys()),
        })
      );
    }

    try {
      return await tool.handle(args);
    } catch (error) {
      const failure = ErrorHandler.toFailure(error);
      if (failure.kind === "InternalError") {
        console.error(`[BridgeTools] ${name} failed unexpectedly:`, error);
      }
      return BridgeTools.failed(failure);
    }
  }

  private define(): ToolDefinition[] {
    const service = this.service;

    return [
      defineTool(
        "ide_build",
        "Build the project (incremental make by default, full rebuild when incremental is false) and wait for the result",
        {
          incremental: z.boolean().optional().describe("Incremental build (default: true)"),
          timeoutSeconds,
          projectRef,
        },
        async (args) => {
          const result = await service.builds.build({
            incremental: args.incremental,
            timeoutMs: toMs(args.timeoutSeconds),
            projectRef: args.projectRef,
          });
          if (result.failureKind) {
            return BridgeTools.failed(
              ErrorHandler.failure(result.failureKind, result.error ?? "Build failed")
            );
          }
          return BridgeTools.ok(result);
        }
      ),

      defineTool("ide_build_status", "Result of the last build", {}, () =>
        BridgeTools.ok(service.builds.status() ?? { status: "no_build_yet" })
      ),

      defineTool("ide_diagnostics", "Compiler errors and warnings of the last build", {}, () =>
        BridgeTools.ok(service.builds.diagnostics())
      ),

      defineTool(
        "ide_test",
        "Run the tests matching a pattern and wait for their results",
        {
          pattern: z.string().min(1).describe("Test class, method or pattern"),
          timeoutSeconds,
          projectRef,
          debug: z.boolean().optional().describe("Launch under the debugger (default: false)"),
        },
        async (args) => {
          const result = await service.tests.runTests({
            pattern: args.pattern,
            timeoutMs: toMs(args.timeoutSeconds),
            projectRef: args.projectRef,
            debug: args.debug,
          });
          if (result.failureKind) {
            return BridgeTools.failed(
              ErrorHandler.failure(
                result.failureKind,
                result.error ?? "Test run failed",
                result.debugMessage ? { debugMessage: result.debugMessage } : undefined
              )
            );
          }
          return BridgeTools.ok(result);
        }
      ),

      defineTool("ide_test_results", "Result of the last test run", {}, () =>
        BridgeTools.ok(service.tests.lastResult() ?? { status: "no_tests_run_yet" })
      ),

      defineTool(
        "ide_run_start",
        "Launch a run configuration; returns a run ID without waiting for the process",
        {
          configName: z.string().min(1).describe("Run configuration name"),
          projectRef,
        },
        async (args) =>
          BridgeTools.fromOutcome(await service.runs.start(args.configName, args.projectRef))
      ),

      defineTool(
        "ide_run_output",
        "Captured output of a run; with clear, only output not returned before",
        {
          runId: z.string().min(1).describe("Run ID"),
          clear: z.boolean().optional().describe("Drain the returned output (default: false)"),
        },
        (args) => BridgeTools.fromOutcome(service.runs.getOutput(args.runId, args.clear ?? false))
      ),

      defineTool(
        "ide_run_stop",
        "Stop a run; stopping a finished run is not an error",
        { runId: z.string().min(1).describe("Run ID") },
        (args) => BridgeTools.fromOutcome(service.runs.stop(args.runId))
      ),

      defineTool("ide_run_list", "All tracked runs", {}, () =>
        BridgeTools.ok({
          runs: service.runs.list().map((run) => ({
            ...run,
            startTime: new Date(run.startTime).toISOString(),
          })),
        })
      ),

      defineTool("ide_projects", "Open projects", {}, () =>
        BridgeTools.ok({ projects: service.projects() })
      ),

      defineTool("ide_debug_sessions", "Debug sessions and their state", {}, () =>
        BridgeTools.ok(service.debug.listSessions())
      ),

      defineTool("ide_debug_pause", "Pause the current debug session", {}, async () =>
        BridgeTools.fromOutcome(await service.debug.pause())
      ),

      defineTool("ide_debug_resume", "Resume the current debug session", {}, async () =>
        BridgeTools.fromOutcome(await service.debug.resume())
      ),

      defineTool("ide_debug_step_over", "Step over in the current debug session", {}, async () =>
        BridgeTools.fromOutcome(await service.debug.stepOver())
      ),

      defineTool("ide_debug_step_into", "Step into in the current debug session", {}, async () =>
        BridgeTools.fromOutcome(await service.debug.stepInto())
      ),

      defineTool("ide_debug_step_out", "Step out in the current debug session", {}, async () =>
        BridgeTools.fromOutcome(await service.debug.stepOut())
      ),

      defineTool(
        "ide_debug_evaluate",
        "Evaluate an expression in the current frame of a suspended session",
        { expression: z.string().min(1).describe("Expression to evaluate") },
        async (args) => BridgeTools.fromOutcome(await service.debug.evaluate(args.expression))
      ),

      defineTool("ide_debug_stack", "Stack frames of a suspended session", {}, async () =>
        BridgeTools.fromOutcome(await service.debug.getStack())
      ),

      defineTool(
        "ide_debug_variables",
        "Variables of a stack frame of a suspended session",
        {
          frameIndex: z
            .number()
            .int()
            .min(0)
            .optional()
            .describe("Frame index, 0 being the current frame (default: 0)"),
        },
        async (args) =>
          BridgeTools.fromOutcome(await service.debug.getVariables(args.frameIndex ?? 0))
      ),

      defineTool("ide_breakpoint_list", "Line breakpoints", {}, () =>
        BridgeTools.fromOutcome(service.debug.listBreakpoints())
      ),

      defineTool(
        "ide_breakpoint_set",
        "Set a line breakpoint",
        {
          file: z.string().min(1).describe("Source file"),
          line: z.number().int().positive().describe("One-based line"),
          condition: z.string().optional().describe("Condition expression"),
        },
        async (args) =>
          BridgeTools.fromOutcome(
            await service.debug.setBreakpoint(args.file, args.line, args.condition)
          )
      ),

      defineTool(
        "ide_breakpoint_remove",
        "Remove a line breakpoint",
        {
          file: z.string().min(1).describe("Source file"),
          line: z.number().int().positive().describe("One-based line"),
        },
        async (args) =>
          BridgeTools.fromOutcome(await service.debug.removeBreakpoint(args.file, args.line))
      ),

      defineTool("ide_lock_status", "State of the lock of each operation class", {}, () =>
        BridgeTools.ok({ locks: service.locks.status() })
      ),

      defineTool(
        "ide_lock_reset",
        "Release an operation lock held by this caller; reports the holder otherwise",
        {
          operation: z.enum(["build", "test"]).describe(`One of ${OPERATION_CLASSES.join(", ")}`),
        },
        (args) => BridgeTools.ok(service.locks.reset(args.operation))
      ),
    ];
  }

  static ok(payload: object): ToolResult {
    return { isError: false, payload };
  }

  static fromOutcome(outcome: Outcome<object>): ToolResult {
    if (!outcome.success) {
      return BridgeTools.failed(outcome.failure);
    }
    return BridgeTools.ok(outcome);
  }

  static failed(failure: Failure): ToolResult {
    return { isError: true, payload: BridgeTools.toFailureResponse(failure) };
  }

  static toFailureResponse(failure: Failure): FailureResponse {
    const formatted = ErrorHandler.formatFailure(failure);
    const error: FailureResponse["error"] = {
      kind: formatted.code,
      message: formatted.message,
      remediation: formatted.remediation,
      retryable: ErrorHandler.isRetryable(failure.kind),
    };
    if (formatted.faultKind) {
      error.faultKind = formatted.faultKind;
    }
    if (formatted.details) {
      error.details = formatted.details;
    }
    return {
      success: false,
      status: ErrorHandler.classify(failure.kind),
      error,
      timestamp: formatted.timestamp,
    };
  }
}
