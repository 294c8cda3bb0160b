/**
 * ResultCache tests
 */

import { ResultCache } from "./ResultCache";

describe("ResultCache", () => {
  it("should keep one result per operation class", () => {
    const cache = new ResultCache();
    cache.set("build", { success: true, errors: [], warnings: [], timeMs: 12, aborted: false, projectName: "shop" });
    cache.set("test", { success: true, passed: 2, failed: 0, skipped: 0, timeMs: 30, tests: [] });

    expect(cache.get("build")?.projectName).toBe("shop");
    expect(cache.get("test")?.passed).toBe(2);
  });

  it("should forget only the cleared class", () => {
    const cache = new ResultCache();
    cache.set("build", { success: false, errors: [], warnings: [], timeMs: 5, aborted: true });
    cache.set("test", { success: false, passed: 0, failed: 1, skipped: 0, timeMs: 8, tests: [] });

    cache.clear("build");

    expect(cache.get("build")).toBeUndefined();
    expect(cache.get("test")?.failed).toBe(1);
  });
});
