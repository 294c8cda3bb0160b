/**
 * TestService - The test operation class
 *
 * Waits for compile activity, runs the test launcher under the test lock
 * and reads the result tree once the process has exited.
 */

import {
  IHostEnvironment,
  ITestLauncher,
  TestExecution,
} from "../interfaces/IHostEnvironment";
import { Failure, TestCaseResult, TestRunResult, TimeoutConfig } from "../types";
import { CompletionBridge } from "./CompletionBridge";
import { OperationLockRegistry } from "./OperationLock";
import { OutputBuffer } from "./OutputBuffer";
import { resolveProject } from "./ProjectResolver";
import { ResultCache } from "./ResultCache";
import { TestResultExtractor } from "./TestResultExtractor";

export interface TestRequest {
  pattern: string;
  timeoutMs?: number;
  projectRef?: string;
  debug?: boolean;
}

/** Output kept for the debug message of a failed run */
const OUTPUT_TAIL_CAPACITY = 4000;

export class TestService {
  constructor(
    private readonly host: IHostEnvironment,
    private readonly locks: OperationLockRegistry,
    private readonly bridge: CompletionBridge,
    private readonly cache: ResultCache,
    private readonly extractor: TestResultExtractor,
    private readonly timeouts: TimeoutConfig
  ) {}

  async runTests(request: TestRequest): Promise<TestRunResult> {
    const resolved = resolveProject(this.host, request.projectRef);
    if (!resolved.success) {
      return TestService.failedResult(resolved.failure, 0);
    }
    const project = resolved.project;
    const launcher = project.testLauncher;
    if (!launcher) {
      return TestService.failedResult(
        {
          kind: "ValidationFailed",
          message: `Project '${project.info.name}' has no test runner configured`,
        },
        0
      );
    }

    const exclusive = await this.locks.runExclusive(
      "test",
      { label: `test ${request.pattern}`, waitFor: ["build", "test"] },
      () =>
        this.execute(
          launcher,
          request.pattern,
          request.debug ?? false,
          request.timeoutMs ?? this.timeouts.testMs
        )
    );

    if (exclusive.status === "rejected") {
      return TestService.failedResult(exclusive.failure, 0);
    }
    return exclusive.value;
  }

  /**
   * Last test result, if any
   */
  lastResult(): TestRunResult | undefined {
    return this.cache.get("test");
  }

  private async execute(
    launcher: ITestLauncher,
    pattern: string,
    debug: boolean,
    timeoutMs: number
  ): Promise<TestRunResult> {
    this.cache.clear("test");
    const startedAt = Date.now();
    const launched: { execution?: TestExecution } = {};
    const output = new OutputBuffer(OUTPUT_TAIL_CAPACITY);

    const outcome = await this.bridge.run<number>(
      (completion) => {
        launched.execution = launcher.launch(
          pattern,
          { debug },
          {
            onText: (text) => output.append(text),
            onTerminated: (exitCode) => completion.complete(exitCode),
            onStarted: (execution) => {
              launched.execution = execution;
            },
          }
        );
      },
      { timeoutMs, label: "test" }
    );

    let result: TestRunResult;
    switch (outcome.status) {
      case "completed":
        result = await this.collect(launched.execution, outcome.value, output, startedAt);
        break;
      case "timeout":
        result = TestService.failedResult(
          {
            kind: "OperationTimeout",
            message: `Test execution timed out after ${timeoutMs}ms`,
          },
          outcome.elapsedMs
        );
        break;
      case "failed":
        result = TestService.failedResult(outcome.error, outcome.elapsedMs);
        break;
      case "cancelled":
        result = TestService.failedResult(
          { kind: "InternalError", message: `Test run cancelled: ${outcome.reason}` },
          outcome.elapsedMs
        );
        break;
    }

    this.cache.set("test", result);
    console.error(
      `[TestService] '${pattern}': ${result.passed} passed, ${result.failed} failed, ` +
        `${result.skipped} skipped in ${result.timeMs}ms` +
        (result.failureKind ? ` (${result.failureKind})` : "")
    );
    return result;
  }

  private async collect(
    execution: TestExecution | undefined,
    exitCode: number,
    output: OutputBuffer,
    startedAt: number
  ): Promise<TestRunResult> {
    const extraction = await this.extractor.extract(
      execution ?? { root: () => undefined },
      exitCode
    );

    if (!extraction.success) {
      const failed = TestService.failedResult(extraction.failure, Date.now() - startedAt);
      failed.debugMessage = TestService.describeExtraction(
        this.extractor.attemptLimit(),
        exitCode,
        output.read()
      );
      return failed;
    }

    const tests = extraction.tests;
    const result = TestService.summarize(tests, Date.now() - startedAt);
    result.debugMessage = TestService.describeExtraction(
      extraction.attempts,
      exitCode,
      extraction.synthetic ? output.read() : ""
    );
    if (extraction.synthetic) {
      result.error = tests[0].message;
    }
    return result;
  }

  private static describeExtraction(attempts: number, exitCode: number, output: string): string {
    const summary = `Results read after ${attempts} attempt(s), exit code ${exitCode}`;
    return output.length > 0 ? `${summary}\n${output}` : summary;
  }

  static summarize(tests: TestCaseResult[], timeMs: number): TestRunResult {
    const passed = tests.filter((t) => t.status === "PASSED").length;
    const skipped = tests.filter((t) => t.status === "SKIPPED").length;
    const failed = tests.length - passed - skipped;

    return {
      success: failed === 0 && tests.length > 0,
      passed,
      failed,
      skipped,
      timeMs,
      tests,
    };
  }

  static failedResult(failure: Failure, timeMs: number): TestRunResult {
    return {
      success: false,
      passed: 0,
      failed: 0,
      skipped: 0,
      timeMs,
      tests: [],
      error: failure.message,
      failureKind: failure.kind,
    };
  }
}
