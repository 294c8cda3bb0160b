import { RunReaper } from "./RunReaper";

describe("RunReaper", () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it("should prune with the retention period and count the removals", () => {
    const prune = jest.fn().mockReturnValue(["run-1", "run-2"]);
    const reaper = new RunReaper({ prune }, 60000, 0);

    expect(reaper.reap(1000)).toEqual(["run-1", "run-2"]);
    expect(prune).toHaveBeenCalledWith(60000, 1000);
    expect(reaper.getPrunedCount()).toBe(2);
  });

  it("should not start with a disabled interval", () => {
    const reaper = new RunReaper({ prune: () => [] }, 60000, 0);

    reaper.start();

    expect(reaper.isRunning()).toBe(false);
  });

  it("should sweep on its interval until stopped", () => {
    jest.useFakeTimers();
    try {
      const prune = jest.fn().mockReturnValue([]);
      const reaper = new RunReaper({ prune }, 60000, 1000);

      reaper.start();
      jest.advanceTimersByTime(3500);
      reaper.stop();
      jest.advanceTimersByTime(3000);

      expect(prune).toHaveBeenCalledTimes(3);
      expect(reaper.isRunning()).toBe(false);
    } finally {
      jest.useRealTimers();
    }
  });

  it("should survive a failing prune", () => {
    const reaper = new RunReaper(
      {
        prune: () => {
          throw new Error("registry gone");
        },
      },
      60000,
      0
    );

    expect(reaper.reap()).toEqual([]);
    expect(reaper.getPrunedCount()).toBe(0);
  });
});
