/**
 * CompletionBridge tests
 * Covers exactly-once settlement, timeouts, failures and cancellation
 */

import { ApplicationContext } from "./ApplicationContext";
import { CompletionBridge, Completion } from "./CompletionBridge";
import { TimeoutManager } from "./TimeoutManager";
import { BridgeError } from "../types";

describe("CompletionBridge", () => {
  let context: ApplicationContext;
  let timeouts: TimeoutManager;
  let bridge: CompletionBridge;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    context = new ApplicationContext();
    timeouts = new TimeoutManager();
    bridge = new CompletionBridge(context, timeouts);
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    bridge.shutdown();
    await context.close();
    errorSpy.mockRestore();
  });

  it("should resolve with the completed value", async () => {
    const outcome = await bridge.run<number>((c) => c.complete(42), {
      timeoutMs: 1000,
      label: "answer",
    });

    expect(outcome.status).toBe("completed");
    if (outcome.status === "completed") {
      expect(outcome.value).toBe(42);
    }
    expect(bridge.pendingCount()).toBe(0);
    expect(timeouts.pendingCount()).toBe(0);
  });

  it("should run the dispatch on the application context", async () => {
    const outcome = await bridge.run<boolean>(
      (c) => c.complete(context.isDispatchContext()),
      { timeoutMs: 1000, label: "ctx" }
    );

    expect(outcome).toMatchObject({ status: "completed", value: true });
    expect(context.isDispatchContext()).toBe(false);
  });

  it("should complete from an asynchronous host callback", async () => {
    const outcome = await bridge.run<string>(
      (c) => {
        setTimeout(() => c.complete("later"), 20);
      },
      { timeoutMs: 1000, label: "async" }
    );

    expect(outcome).toMatchObject({ status: "completed", value: "later" });
  });

  it("should time out when the host never completes", async () => {
    const started = Date.now();

    const outcome = await bridge.run<string>(() => undefined, {
      timeoutMs: 50,
      label: "never",
    });

    expect(outcome.status).toBe("timeout");
    if (outcome.status === "timeout") {
      expect(outcome.timeoutMs).toBe(50);
    }
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it("should ignore completions that arrive after the timeout", async () => {
    let handle: Completion<string> | undefined;

    const outcome = await bridge.run<string>(
      (c) => {
        handle = c;
      },
      { timeoutMs: 30, label: "late" }
    );
    handle?.complete("too late");

    expect(outcome.status).toBe("timeout");
    expect(handle?.settled).toBe(true);
    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringContaining("Late completion for late-1 ignored")
    );
  });

  it("should settle exactly once", async () => {
    const outcome = await bridge.run<number>(
      (c) => {
        c.complete(1);
        c.complete(2);
        c.fail(new Error("ignored"));
      },
      { timeoutMs: 1000, label: "twice" }
    );

    expect(outcome).toMatchObject({ status: "completed", value: 1 });
  });

  it("should report a failure passed to fail", async () => {
    const outcome = await bridge.run<number>(
      (c) => c.fail(new BridgeError("DebuggerError", "frame gone")),
      { timeoutMs: 1000, label: "fail" }
    );

    expect(outcome.status).toBe("failed");
    if (outcome.status === "failed") {
      expect(outcome.error).toEqual({ kind: "DebuggerError", message: "frame gone" });
    }
  });

  it("should report a failure when the dispatch throws", async () => {
    const outcome = await bridge.run<number>(
      () => {
        throw new TypeError("bad dispatch");
      },
      { timeoutMs: 1000, label: "throw" }
    );

    expect(outcome.status).toBe("failed");
    if (outcome.status === "failed") {
      expect(outcome.error).toEqual({
        kind: "InternalError",
        message: "bad dispatch",
        faultKind: "TypeError",
      });
    }
  });

  it("should report a failure when an async dispatch rejects", async () => {
    const outcome = await bridge.run<number>(
      async () => {
        throw new BridgeError("EvaluatorUnavailable", "no evaluator");
      },
      { timeoutMs: 1000, label: "reject" }
    );

    expect(outcome).toMatchObject({
      status: "failed",
      error: { kind: "EvaluatorUnavailable" },
    });
  });

  it("should report a failure once the context is closed", async () => {
    await context.close();

    const outcome = await bridge.run<number>((c) => c.complete(1), {
      timeoutMs: 1000,
      label: "closed",
    });

    expect(outcome).toMatchObject({
      status: "failed",
      error: { kind: "InternalError" },
    });
  });

  it("should cancel the caller side only", async () => {
    let hostRan = false;
    const pending = bridge.start<string>(
      (c) => {
        setTimeout(() => {
          hostRan = true;
          c.complete("done");
        }, 30);
      },
      { timeoutMs: 1000, label: "cancel" }
    );

    pending.cancel("caller gave up");
    const outcome = await pending.outcome;

    expect(outcome).toMatchObject({ status: "cancelled", reason: "caller gave up" });
    await new Promise((resolve) => setTimeout(resolve, 60));
    expect(hostRan).toBe(true);
  });

  it("should cancel pending outcomes on shutdown", async () => {
    const pending = bridge.start<string>(() => undefined, {
      timeoutMs: 5000,
      label: "shutdown",
    });

    bridge.shutdown();

    expect(await pending.outcome).toMatchObject({
      status: "cancelled",
      reason: "bridge shut down",
    });
    expect(timeouts.pendingCount()).toBe(0);
  });
});
