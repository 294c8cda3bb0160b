/**
 * Configuration Loader
 *
 * Loads bridge configuration from file or environment, merges it over the
 * defaults and validates it with zod.
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { BridgeConfig, BridgeError } from "../types";
import { ErrorHandler } from "./ErrorHandler";

export const CONFIG_PATH_ENV = "DEVHOST_BRIDGE_CONFIG_PATH";
export const CONFIG_JSON_ENV = "DEVHOST_BRIDGE_CONFIG";

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: BridgeConfig = {
  timeouts: {
    buildMs: 300000,
    testMs: 300000,
    runStartMs: 30000,
    debugStepMs: 5000,
    debugEvaluateMs: 10000,
    debugStackMs: 5000,
    debugVariablesMs: 10000,
    valuePresentationMs: 2000,
    breakpointMs: 5000,
  },
  locks: {
    acquireTimeoutMs: 1000,
    externalActivityMaxWaitMs: 60000,
    externalActivityPollMs: 500,
  },
  extraction: {
    maxAttempts: 5,
    delayMs: 200,
  },
  runs: {
    outputCapacity: 1000000,
    retentionMs: 3600000,
    pruneIntervalMs: 300000,
  },
  terminationGraceMs: 5000,
  projects: [],
};

const positiveMs = z.number().int().positive();

const commandSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
});

const runConfigurationSchema = z.object({
  name: z.string().min(1),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  cwd: z.string().optional(),
  env: z.record(z.string(), z.string()).optional(),
});

const projectSchema = z
  .object({
    name: z.string().min(1),
    basePath: z.string().min(1),
    build: commandSchema.optional(),
    rebuild: commandSchema.optional(),
    test: commandSchema.optional(),
    runConfigurations: z.array(runConfigurationSchema).default([]),
  })
  .superRefine((project, ctx) => {
    const seen = new Set<string>();
    for (const configuration of project.runConfigurations) {
      if (seen.has(configuration.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["runConfigurations"],
          message: `Duplicate run configuration name: ${configuration.name}`,
        });
      }
      seen.add(configuration.name);
    }
  });

const defaults = DEFAULT_CONFIG;

export const bridgeConfigSchema = z
  .object({
    timeouts: z
      .object({
        buildMs: positiveMs.default(defaults.timeouts.buildMs),
        testMs: positiveMs.default(defaults.timeouts.testMs),
        runStartMs: positiveMs.default(defaults.timeouts.runStartMs),
        debugStepMs: positiveMs.default(defaults.timeouts.debugStepMs),
        debugEvaluateMs: positiveMs.default(defaults.timeouts.debugEvaluateMs),
        debugStackMs: positiveMs.default(defaults.timeouts.debugStackMs),
        debugVariablesMs: positiveMs.default(defaults.timeouts.debugVariablesMs),
        valuePresentationMs: positiveMs.default(defaults.timeouts.valuePresentationMs),
        breakpointMs: positiveMs.default(defaults.timeouts.breakpointMs),
      })
      .default({}),
    locks: z
      .object({
        acquireTimeoutMs: z.number().int().min(0).default(defaults.locks.acquireTimeoutMs),
        externalActivityMaxWaitMs: z
          .number()
          .int()
          .min(0)
          .default(defaults.locks.externalActivityMaxWaitMs),
        externalActivityPollMs: positiveMs.default(defaults.locks.externalActivityPollMs),
      })
      .default({}),
    extraction: z
      .object({
        maxAttempts: z.number().int().min(1).default(defaults.extraction.maxAttempts),
        delayMs: z.number().int().min(0).default(defaults.extraction.delayMs),
      })
      .default({}),
    runs: z
      .object({
        outputCapacity: z.number().int().min(64).default(defaults.runs.outputCapacity),
        retentionMs: positiveMs.default(defaults.runs.retentionMs),
        pruneIntervalMs: z.number().int().min(0).default(defaults.runs.pruneIntervalMs),
      })
      .default({}),
    terminationGraceMs: z.number().int().min(0).default(defaults.terminationGraceMs),
    projects: z.array(projectSchema).default([]),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    for (const project of config.projects) {
      if (seen.has(project.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["projects"],
          message: `Duplicate project name: ${project.name}`,
        });
      }
      seen.add(project.name);
    }
  });

/**
 * Configuration loader class
 */
export class ConfigLoader {
  /**
   * Load configuration from file; relative project paths resolve against
   * the file's directory
   */
  static loadFromFile(configPath: string): BridgeConfig {
    const absolutePath = path.resolve(configPath);
    console.error(`[ConfigLoader] Loading configuration from: ${absolutePath}`);

    if (!fs.existsSync(absolutePath)) {
      throw new BridgeError(
        "ValidationFailed",
        `Configuration file not found: ${absolutePath}`
      );
    }

    const fileContent = fs.readFileSync(absolutePath, "utf-8");
    return this.validateAndMerge(
      this.parseJson(fileContent, absolutePath),
      path.dirname(absolutePath)
    );
  }

  /**
   * Load configuration from a JSON environment variable
   */
  static loadFromEnv(
    envVar: string = CONFIG_JSON_ENV,
    env: NodeJS.ProcessEnv = process.env
  ): BridgeConfig {
    const configJson = env[envVar];

    if (!configJson) {
      throw new BridgeError("ValidationFailed", `Environment variable ${envVar} not set`);
    }

    return this.validateAndMerge(this.parseJson(configJson, envVar), process.cwd());
  }

  /**
   * Load configuration with fallback chain:
   * 1. File path from DEVHOST_BRIDGE_CONFIG_PATH
   * 2. JSON from DEVHOST_BRIDGE_CONFIG
   * 3. Default config file locations
   * 4. Default configuration
   */
  static load(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): BridgeConfig {
    const configPath = env[CONFIG_PATH_ENV];
    if (configPath) {
      try {
        return this.loadFromFile(configPath);
      } catch (error) {
        console.error(
          "[ConfigLoader] Failed to load from env path:",
          ErrorHandler.toFailure(error).message
        );
      }
    }

    if (env[CONFIG_JSON_ENV]) {
      try {
        return this.loadFromEnv(CONFIG_JSON_ENV, env);
      } catch (error) {
        console.error(
          "[ConfigLoader] Failed to load from environment:",
          ErrorHandler.toFailure(error).message
        );
      }
    }

    const defaultPaths = [
      path.join(cwd, "devhost-bridge.json"),
      path.join(cwd, "config", "devhost-bridge.json"),
    ];

    for (const defaultPath of defaultPaths) {
      if (fs.existsSync(defaultPath)) {
        try {
          return this.loadFromFile(defaultPath);
        } catch (error) {
          console.error(
            `[ConfigLoader] Failed to load from ${defaultPath}:`,
            ErrorHandler.toFailure(error).message
          );
        }
      }
    }

    console.error("[ConfigLoader] No configuration file found, using defaults");
    console.error("[ConfigLoader] WARNING: No projects are configured");
    return this.validateAndMerge({}, cwd);
  }

  /**
   * Validate raw configuration and fill in defaults
   * @throws BridgeError of kind ValidationFailed
   */
  static validateAndMerge(raw: unknown, baseDir: string): BridgeConfig {
    const parsed = bridgeConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const failure = ErrorHandler.toFailure(parsed.error);
      throw new BridgeError(
        "ValidationFailed",
        `Invalid configuration: ${failure.message}`,
        failure.details
      );
    }

    const config: BridgeConfig = {
      ...parsed.data,
      projects: parsed.data.projects.map((project) => ({
        ...project,
        basePath: path.resolve(baseDir, project.basePath),
      })),
    };

    console.error("[ConfigLoader] Configuration loaded successfully");
    console.error(`[ConfigLoader] Projects: ${config.projects.length}`);
    console.error(
      `[ConfigLoader] Build timeout: ${config.timeouts.buildMs}ms, test timeout: ${config.timeouts.testMs}ms`
    );

    return config;
  }

  /**
   * Create a sample configuration file
   */
  static createSampleConfig(outputPath: string): void {
    const sampleConfig: BridgeConfig = {
      ...DEFAULT_CONFIG,
      projects: [
        {
          name: "my-app",
          basePath: ".",
          build: { command: "npx", args: ["tsc", "--incremental"] },
          rebuild: { command: "npx", args: ["tsc", "--build", "--force"] },
          test: {
            command: "npx",
            args: ["jest", "--testNamePattern", "{pattern}", "--reporters", "jest-teamcity"],
          },
          runConfigurations: [
            { name: "server", command: "node", args: ["dist/server.js"], env: { PORT: "3000" } },
          ],
        },
      ],
    };

    fs.writeFileSync(outputPath, JSON.stringify(sampleConfig, null, 2));
    console.error(`[ConfigLoader] Sample configuration written to: ${outputPath}`);
  }

  private static parseJson(text: string, source: string): unknown {
    try {
      const value: unknown = JSON.parse(text);
      return value;
    } catch (error) {
      throw new BridgeError(
        "ValidationFailed",
        `Configuration in ${source} is not valid JSON: ${ErrorHandler.toFailure(error).message}`
      );
    }
  }
}
