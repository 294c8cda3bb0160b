/**
 * ConfigLoader tests
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ConfigLoader, DEFAULT_CONFIG } from "./ConfigLoader";
import { BridgeError } from "../types";

describe("ConfigLoader", () => {
  let dir: string;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "devhost-bridge-config-"));
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    errorSpy.mockRestore();
  });

  function expectValidationError(fn: () => unknown, pattern: RegExp): void {
    let caught: unknown;
    try {
      fn();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(BridgeError);
    if (caught instanceof BridgeError) {
      expect(caught.kind).toBe("ValidationFailed");
      expect(caught.message).toMatch(pattern);
    }
  }

  describe("validateAndMerge", () => {
    it("should produce the defaults for an empty object", () => {
      expect(ConfigLoader.validateAndMerge({}, dir)).toEqual(DEFAULT_CONFIG);
    });

    it("should merge partial sections over the defaults", () => {
      const config = ConfigLoader.validateAndMerge({ timeouts: { testMs: 1000 } }, dir);

      expect(config.timeouts.testMs).toBe(1000);
      expect(config.timeouts.buildMs).toBe(300000);
      expect(config.locks).toEqual(DEFAULT_CONFIG.locks);
    });

    it("should resolve project paths and default the run configuration args", () => {
      const config = ConfigLoader.validateAndMerge(
        {
          projects: [
            {
              name: "shop",
              basePath: "shop",
              runConfigurations: [{ name: "server", command: "node" }],
            },
          ],
        },
        "/work"
      );

      expect(config.projects).toEqual([
        {
          name: "shop",
          basePath: path.resolve("/work", "shop"),
          runConfigurations: [{ name: "server", command: "node", args: [] }],
        },
      ]);
    });

    it("should reject a non-positive timeout", () => {
      expectValidationError(
        () => ConfigLoader.validateAndMerge({ timeouts: { buildMs: -1 } }, dir),
        /^Invalid configuration: timeouts\.buildMs: /
      );
    });

    it("should reject duplicate project names", () => {
      expectValidationError(
        () =>
          ConfigLoader.validateAndMerge(
            {
              projects: [
                { name: "shop", basePath: "/a" },
                { name: "shop", basePath: "/b" },
              ],
            },
            dir
          ),
        /Duplicate project name: shop/
      );
    });

    it("should reject duplicate run configuration names", () => {
      expectValidationError(
        () =>
          ConfigLoader.validateAndMerge(
            {
              projects: [
                {
                  name: "shop",
                  basePath: "/a",
                  runConfigurations: [
                    { name: "server", command: "node" },
                    { name: "server", command: "node" },
                  ],
                },
              ],
            },
            dir
          ),
        /Duplicate run configuration name: server/
      );
    });
  });

  describe("loadFromFile", () => {
    it("should resolve project paths against the file's directory", () => {
      const file = path.join(dir, "bridge.json");
      fs.writeFileSync(file, JSON.stringify({ projects: [{ name: "api", basePath: "./api" }] }));

      const config = ConfigLoader.loadFromFile(file);

      expect(config.projects[0].basePath).toBe(path.join(dir, "api"));
    });

    it("should fail for a missing file", () => {
      expectValidationError(
        () => ConfigLoader.loadFromFile(path.join(dir, "missing.json")),
        /^Configuration file not found: /
      );
    });

    it("should fail for malformed JSON", () => {
      const file = path.join(dir, "broken.json");
      fs.writeFileSync(file, "{ not json");

      expectValidationError(() => ConfigLoader.loadFromFile(file), /is not valid JSON/);
    });

    it("should read back a sample configuration", () => {
      const file = path.join(dir, "sample.json");

      ConfigLoader.createSampleConfig(file);
      const config = ConfigLoader.loadFromFile(file);

      expect(config.projects.map((p) => p.name)).toEqual(["my-app"]);
      expect(config.projects[0].basePath).toBe(dir);
      expect(config.projects[0].test?.args).toContain("{pattern}");
    });
  });

  describe("load", () => {
    it("should prefer the config path variable", () => {
      const file = path.join(dir, "custom.json");
      fs.writeFileSync(file, JSON.stringify({ terminationGraceMs: 250 }));

      const config = ConfigLoader.load(
        { DEVHOST_BRIDGE_CONFIG_PATH: file, DEVHOST_BRIDGE_CONFIG: '{"terminationGraceMs": 100}' },
        dir
      );

      expect(config.terminationGraceMs).toBe(250);
    });

    it("should read JSON from the environment", () => {
      const config = ConfigLoader.load({ DEVHOST_BRIDGE_CONFIG: '{"terminationGraceMs": 100}' }, dir);

      expect(config.terminationGraceMs).toBe(100);
    });

    it("should find a config file in the working directory", () => {
      fs.writeFileSync(
        path.join(dir, "devhost-bridge.json"),
        JSON.stringify({ extraction: { maxAttempts: 3 } })
      );

      const config = ConfigLoader.load({}, dir);

      expect(config.extraction).toEqual({ maxAttempts: 3, delayMs: 200 });
    });

    it("should fall back to the defaults when the configured path is unusable", () => {
      const config = ConfigLoader.load(
        { DEVHOST_BRIDGE_CONFIG_PATH: path.join(dir, "nowhere.json") },
        dir
      );

      expect(config).toEqual(DEFAULT_CONFIG);
    });
  });
});
