/**
 * BuildService tests
 */

import { BuildService } from "./BuildService";
import { CompletionBridge } from "./CompletionBridge";
import { OperationLockRegistry } from "./OperationLock";
import { ResultCache } from "./ResultCache";
import { TimeoutManager } from "./TimeoutManager";
import { FakeHost, FakeProject } from "../testing/FakeHost";
import { TimeoutConfig } from "../types";

const timeouts: TimeoutConfig = {
  buildMs: 1000,
  testMs: 1000,
  runStartMs: 1000,
  debugStepMs: 500,
  debugEvaluateMs: 500,
  debugStackMs: 500,
  debugVariablesMs: 500,
  valuePresentationMs: 100,
  breakpointMs: 500,
};

describe("BuildService", () => {
  let host: FakeHost;
  let project: FakeProject;
  let bridge: CompletionBridge;
  let locks: OperationLockRegistry;
  let cache: ResultCache;
  let service: BuildService;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    ({ host, project } = FakeHost.withProject("shop"));
    bridge = new CompletionBridge(host.context, new TimeoutManager());
    locks = new OperationLockRegistry(
      { acquireTimeoutMs: 200, externalActivityMaxWaitMs: 200, externalActivityPollMs: 10 },
      { build: () => project.compiler.isCompilationActive() }
    );
    cache = new ResultCache();
    service = new BuildService(host, locks, bridge, cache, timeouts);
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    bridge.shutdown();
    await host.context.close();
    errorSpy.mockRestore();
  });

  it("should run an incremental build and report its messages", async () => {
    project.compiler.script = {
      messages: [
        { message: "Cannot find name 'x'", file: "src/a.ts", line: 3, column: 5, severity: "ERROR" },
        { message: "Unused import", file: "src/b.ts", line: 1, severity: "WARNING" },
      ],
    };

    const result = await service.build();

    expect(project.compiler.calls).toEqual(["make"]);
    expect(result.success).toBe(false);
    expect(result.aborted).toBe(false);
    expect(result.errors).toEqual([
      { message: "Cannot find name 'x'", file: "src/a.ts", line: 3, column: 5, severity: "ERROR" },
    ]);
    expect(result.warnings).toHaveLength(1);
    expect(result.failureKind).toBeUndefined();
    expect(locks.get("build").isLocked()).toBe(false);
  });

  it("should run a rebuild when incremental is false", async () => {
    const result = await service.build({ incremental: false });

    expect(project.compiler.calls).toEqual(["rebuild"]);
    expect(result.success).toBe(true);
  });

  it("should add placeholder messages for counts without messages", async () => {
    project.compiler.script = { errorCount: 2, warningCount: 1, messages: [] };

    const result = await service.build();

    expect(result.errors).toEqual([
      { message: "2 error(s) occurred during compilation", severity: "ERROR" },
    ]);
    expect(result.warnings).toEqual([
      { message: "1 warning(s) occurred during compilation", severity: "WARNING" },
    ]);
  });

  it("should report an aborted build as unsuccessful", async () => {
    project.compiler.script = { aborted: true };

    const result = await service.build();

    expect(result).toMatchObject({ success: false, aborted: true });
  });

  it("should time out and release the lock", async () => {
    project.compiler.script = { hang: true };

    const result = await service.build({ timeoutMs: 50 });

    expect(result.failureKind).toBe("OperationTimeout");
    expect(result.error).toBe("Build timed out after 50ms");
    expect(locks.get("build").isLocked()).toBe(false);
    expect(service.status()?.failureKind).toBe("OperationTimeout");
  });

  it("should fail with NoProjectOpen without touching the lock", async () => {
    host.projects = [];

    const result = await service.build();

    expect(result.failureKind).toBe("NoProjectOpen");
    expect(result.error).toBe("No project is open");
  });

  it("should wait out a build the bridge did not start", async () => {
    project.compiler.externalActive = true;
    setTimeout(() => {
      project.compiler.externalActive = false;
    }, 50);

    const result = await service.build();

    expect(result.success).toBe(true);
  });

  it("should fail with UpstreamActivityTimeout when the compiler stays busy", async () => {
    project.compiler.externalActive = true;

    const result = await service.build();

    expect(result.failureKind).toBe("UpstreamActivityTimeout");
    expect(project.compiler.calls).toEqual([]);
  });

  it("should fail fast with LockAcquisitionTimeout while another build holds the lock", async () => {
    await locks.get("build").acquire(100, { owner: "other", label: "make other" });

    const result = await service.build();

    expect(result.failureKind).toBe("LockAcquisitionTimeout");
    expect(project.compiler.calls).toEqual([]);
  });

  it("should queue for the lock rather than wait on the bridge's own running build", async () => {
    project.compiler.script = { delayMs: 600 };

    const first = service.build();
    while (project.compiler.calls.length === 0) {
      await new Promise((resolve) => setTimeout(resolve, 5));
    }
    expect(project.compiler.isCompilationActive()).toBe(true);

    const second = await service.build();

    expect(second.failureKind).toBe("LockAcquisitionTimeout");
    expect(second.error).toBe("Another build operation is in progress (make shop)");
    expect((await first).success).toBe(true);
    expect(project.compiler.calls).toEqual(["make"]);
  });

  it("should serialize concurrent builds", async () => {
    project.compiler.script = { delayMs: 30 };

    const [first, second] = await Promise.all([service.build(), service.build()]);

    expect(first.success).toBe(true);
    expect(second.success).toBe(true);
    expect(project.compiler.calls).toEqual(["make", "make"]);
  });

  describe("status and diagnostics", () => {
    it("should report nothing before the first build", () => {
      expect(service.status()).toBeUndefined();
      expect(service.diagnostics()).toEqual({ errors: [], warnings: [] });
    });

    it("should hand out diagnostics that cannot change the cached build", async () => {
      project.compiler.script = {
        messages: [{ message: "Type mismatch", file: "a.ts", line: 9, severity: "ERROR" }],
      };
      await service.build();

      const diagnostics = service.diagnostics();
      diagnostics.errors[0].message = "edited";
      diagnostics.warnings.push({ message: "added", severity: "WARNING" });

      expect(service.diagnostics().errors).toEqual([
        { message: "Type mismatch", file: "a.ts", line: 9, severity: "ERROR" },
      ]);
      expect(service.status()?.warnings).toEqual([]);
    });

    it("should derive diagnostics from the last build", async () => {
      project.compiler.script = {
        messages: [{ message: "Type mismatch", file: "a.ts", line: 9, severity: "ERROR" }],
      };

      await service.build();

      expect(service.diagnostics()).toEqual({
        errors: [{ message: "Type mismatch", file: "a.ts", line: 9, severity: "ERROR" }],
        warnings: [],
        projectName: "shop",
      });
      expect(service.status()?.projectName).toBe("shop");
    });
  });
});
