/**
 * TestResultExtractor - Reads the test result tree after the test process
 * exits, retrying while the tree is still empty
 *
 * The reporter fills the tree asynchronously, so it can lag behind the
 * process exit. Once attempts run out the exit code decides: non-zero
 * yields one synthetic ERROR entry, zero means nothing matched.
 */

import { TestNode } from "../interfaces/IHostEnvironment";
import { Failure, Outcome, RetryPolicy, TestCaseResult, TestStatus } from "../types";
import { ErrorHandler } from "./ErrorHandler";

export const DEFAULT_RETRY_POLICY: RetryPolicy = { maxAttempts: 5, delayMs: 200 };

export type ExtractionOutcome = Outcome<{
  tests: TestCaseResult[];
  attempts: number;
  synthetic: boolean;
}>;

const METHOD_OF_CLASS = /^(.+)\(([^()]+)\)$/;

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class TestResultExtractor {
  constructor(
    private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    private readonly sleep: (ms: number) => Promise<void> = defaultSleep
  ) {}

  /**
   * Attempts made before an extraction gives up
   */
  attemptLimit(): number {
    return Math.max(1, this.policy.maxAttempts);
  }

  async extract(
    source: { root(): TestNode | undefined },
    exitCode: number | undefined
  ): Promise<ExtractionOutcome> {
    const maxAttempts = this.attemptLimit();
    let lastError: Failure | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const root = source.root();
        const tests = root ? TestResultExtractor.collect(root) : [];
        if (tests.length > 0) {
          return { success: true, tests, attempts: attempt, synthetic: false };
        }
        lastError = undefined;
      } catch (error) {
        lastError = ErrorHandler.toFailure(error);
        console.error(
          `[TestResultExtractor] Attempt ${attempt} could not read results: ${lastError.message}`
        );
      }

      if (attempt < maxAttempts) {
        await this.sleep(this.policy.delayMs);
      }
    }

    if (lastError) {
      return {
        success: false,
        failure: ErrorHandler.failure(
          "ExtractionFailed",
          `Could not read test results after ${maxAttempts} attempts: ${lastError.message}`,
          { attempts: maxAttempts, exitCode }
        ),
      };
    }

    if (exitCode === 0) {
      return {
        success: false,
        failure: ErrorHandler.failure(
          "NoMatchingTests",
          "No tests were found matching the pattern",
          { attempts: maxAttempts, exitCode }
        ),
      };
    }

    const code = exitCode === undefined ? "unknown" : String(exitCode);
    return {
      success: true,
      attempts: maxAttempts,
      synthetic: true,
      tests: [
        {
          name: "Test execution",
          className: "",
          methodName: "",
          status: "ERROR",
          timeMs: 0,
          message: `Test process exited with code ${code}`,
        },
      ],
    };
  }

  /**
   * Flatten a result tree into test cases; leaves are tests, other nodes suites
   */
  static collect(node: TestNode): TestCaseResult[] {
    if (node.isLeaf) {
      return [TestResultExtractor.toCase(node)];
    }
    return node.children.flatMap((child) => TestResultExtractor.collect(child));
  }

  static statusOf(node: TestNode): TestStatus {
    switch (node.state) {
      case "passed":
        return "PASSED";
      case "ignored":
        return "SKIPPED";
      case "defect": {
        const trace = node.stacktrace ?? "";
        return trace.includes("Error") || trace.includes("Exception")
          ? "ERROR"
          : "FAILED";
      }
      default:
        return "PASSED";
    }
  }

  private static toCase(node: TestNode): TestCaseResult {
    const split = METHOD_OF_CLASS.exec(node.name);
    const methodName = split ? split[1] : node.name;
    const className = split ? split[2] : node.parent?.name ?? "";

    const result: TestCaseResult = {
      name: node.name,
      className,
      methodName,
      status: TestResultExtractor.statusOf(node),
      timeMs: node.durationMs ?? 0,
    };
    if (node.errorMessage) {
      result.message = node.errorMessage;
    }
    if (node.stacktrace) {
      result.stackTrace = node.stacktrace;
    }
    return result;
  }
}
