/**
 * ErrorHandler - Centralized failure handling and response formatting
 *
 * Converts anything caught at a component boundary into a Failure value
 * and formats failures into structured responses with remediation.
 */

import { ZodError } from "zod";
import { BridgeError, Failure, FailureKind } from "../types";

/**
 * Error codes, one per failure kind
 */
export const ErrorCode = {
  // Project errors
  NO_PROJECT_OPEN: "NoProjectOpen",

  // Concurrency errors
  LOCK_ACQUISITION_TIMEOUT: "LockAcquisitionTimeout",
  UPSTREAM_ACTIVITY_TIMEOUT: "UpstreamActivityTimeout",
  OPERATION_TIMEOUT: "OperationTimeout",

  // Run errors
  RUN_NOT_FOUND: "RunNotFound",
  RUN_CONFIGURATION_NOT_FOUND: "RunConfigurationNotFound",

  // Debugger errors
  NO_ACTIVE_DEBUG_SESSION: "NoActiveDebugSession",
  SESSION_NOT_SUSPENDED: "SessionNotSuspended",
  EVALUATOR_UNAVAILABLE: "EvaluatorUnavailable",
  BREAKPOINT_NOT_FOUND: "BreakpointNotFound",
  DEBUGGER_ERROR: "DebuggerError",

  // Result errors
  EXTRACTION_FAILED: "ExtractionFailed",
  NO_MATCHING_TESTS: "NoMatchingTests",

  // Request errors
  VALIDATION_FAILED: "ValidationFailed",

  // Unexpected faults
  INTERNAL_ERROR: "InternalError",
} as const satisfies Record<string, FailureKind>;

/**
 * Response status at the request boundary
 */
export type ResponseStatus = "validation_error" | "not_found" | "error";

/**
 * Structured error response
 */
export interface ErrorResponse {
  /** Status indicator (always "error") */
  status: "error";
  /** Failure kind for programmatic handling */
  code: FailureKind;
  /** Human-readable error message */
  message: string;
  /** Suggested remediation steps */
  remediation: string;
  /** Tag of an unexpected fault */
  faultKind?: string;
  /** Additional error details */
  details?: Record<string, unknown>;
  /** Timestamp of the error */
  timestamp: string;
}

interface KindPolicy {
  remediation: string;
  retryable: boolean;
  status: ResponseStatus;
}

const POLICIES: Record<FailureKind, KindPolicy> = {
  NoProjectOpen: {
    remediation:
      "Open a project in the host or pass a projectRef naming an open project.",
    retryable: false,
    status: "error",
  },
  LockAcquisitionTimeout: {
    remediation:
      "Another operation of the same class is still running. Wait for it or call the lock reset tool.",
    retryable: true,
    status: "error",
  },
  UpstreamActivityTimeout: {
    remediation:
      "The host is still busy with work the bridge did not start. Wait for it to finish and retry.",
    retryable: true,
    status: "error",
  },
  OperationTimeout: {
    remediation:
      "The operation did not finish in time. Retry with a longer timeoutSeconds; host-side work may still be running.",
    retryable: true,
    status: "error",
  },
  RunNotFound: {
    remediation:
      "Verify the run ID. Finished runs are pruned after the retention period.",
    retryable: false,
    status: "not_found",
  },
  RunConfigurationNotFound: {
    remediation:
      "Use one of the run configuration names listed in the error details.",
    retryable: false,
    status: "not_found",
  },
  NoActiveDebugSession: {
    remediation: "Start a debug session in the host before using debugger tools.",
    retryable: false,
    status: "error",
  },
  SessionNotSuspended: {
    remediation: "Pause the session or wait for a breakpoint to be hit.",
    retryable: true,
    status: "error",
  },
  EvaluatorUnavailable: {
    remediation:
      "The current frame has no evaluator. Select another frame or step to a frame with source.",
    retryable: false,
    status: "error",
  },
  BreakpointNotFound: {
    remediation: "List breakpoints to find the exact file and line.",
    retryable: false,
    status: "not_found",
  },
  DebuggerError: {
    remediation: "The debugger reported an error. Check the message for details.",
    retryable: false,
    status: "error",
  },
  ExtractionFailed: {
    remediation:
      "Test results could not be read. Re-run the tests; check the test command output.",
    retryable: true,
    status: "error",
  },
  NoMatchingTests: {
    remediation: "No tests matched the pattern. Check the test pattern.",
    retryable: false,
    status: "error",
  },
  ValidationFailed: {
    remediation: "Correct the request arguments and try again.",
    retryable: false,
    status: "validation_error",
  },
  InternalError: {
    remediation:
      "An unexpected error occurred. Check the server log; resetting the bridge may help.",
    retryable: false,
    status: "error",
  },
};

/**
 * ErrorHandler class
 * Provides centralized failure conversion and response formatting
 */
export class ErrorHandler {
  /**
   * Build a failure value
   */
  static failure(
    kind: FailureKind,
    message: string,
    details?: Record<string, unknown>
  ): Failure {
    return details ? { kind, message, details } : { kind, message };
  }

  /**
   * Convert any caught value into a failure
   */
  static toFailure(error: unknown): Failure {
    if (error instanceof BridgeError) {
      return this.failure(error.kind, error.message, error.details);
    }

    if (error instanceof ZodError) {
      return this.failure(
        ErrorCode.VALIDATION_FAILED,
        error.issues
          .map((issue) =>
            issue.path.length > 0
              ? `${issue.path.join(".")}: ${issue.message}`
              : issue.message
          )
          .join("; "),
        { issues: error.issues }
      );
    }

    if (error instanceof Error) {
      return {
        kind: ErrorCode.INTERNAL_ERROR,
        message: error.message,
        faultKind: error.name,
      };
    }

    return {
      kind: ErrorCode.INTERNAL_ERROR,
      message: String(error),
      faultKind: typeof error,
    };
  }

  /**
   * Format a failure into a structured error response
   */
  static formatFailure(failure: Failure): ErrorResponse {
    const response: ErrorResponse = {
      status: "error",
      code: failure.kind,
      message: failure.message,
      remediation: this.getRemediation(failure.kind),
      timestamp: new Date().toISOString(),
    };
    if (failure.faultKind) {
      response.faultKind = failure.faultKind;
    }
    if (failure.details) {
      response.details = failure.details;
    }
    return response;
  }

  /**
   * Format any caught value into a structured error response
   */
  static formatError(error: unknown): ErrorResponse {
    return this.formatFailure(this.toFailure(error));
  }

  /**
   * Describe a spawn failure of an executable
   */
  static describeSpawnError(error: Error, executable: string): string {
    const message = error.message.toLowerCase();

    if (message.includes("enoent") || message.includes("not found")) {
      return `Executable not found: ${executable}`;
    }
    if (message.includes("eacces") || message.includes("permission denied")) {
      return `Permission denied: ${executable}`;
    }
    if (message.includes("emfile") || message.includes("too many open files")) {
      return "Too many open files";
    }
    return `Failed to spawn ${executable}: ${error.message}`;
  }

  static getRemediation(kind: FailureKind): string {
    return POLICIES[kind].remediation;
  }

  /**
   * Whether retrying, waiting longer or resetting can help
   */
  static isRetryable(kind: FailureKind): boolean {
    return POLICIES[kind].retryable;
  }

  /**
   * Boundary status for a failure kind
   */
  static classify(kind: FailureKind): ResponseStatus {
    return POLICIES[kind].status;
  }
}
