#!/usr/bin/env node
/**
 * devhost bridge - CLI Entry Point
 *
 * Starts the bridge over the local host with stdio transport.
 * Configuration is loaded from file or environment.
 */

import { BridgeService } from "./lib/BridgeService";
import { ConfigLoader } from "./lib/ConfigLoader";
import { LocalHost } from "./lib/LocalHost";
import { MCPServer } from "./lib/MCPServer";
import { BridgeConfig } from "./types";

const HELP = `
devhost bridge - Build, test, run and debugger operations for AI agents

Usage:
  devhost-bridge [options]

Options:
  --help, -h              Show this help message
  --create-config <path>  Create a sample configuration file
                          (default: ./devhost-bridge.json)
  --config <path>         Load configuration from specified file

Environment Variables:
  DEVHOST_BRIDGE_CONFIG_PATH  Path to configuration file
  DEVHOST_BRIDGE_CONFIG       JSON configuration string

Configuration:
  The bridge looks for configuration in the following order:
  1. --config command line argument
  2. DEVHOST_BRIDGE_CONFIG_PATH environment variable
  3. DEVHOST_BRIDGE_CONFIG environment variable
  4. ./devhost-bridge.json
  5. ./config/devhost-bridge.json

Concurrency:
  - One build and one test run at a time; other callers are rejected
    after a short wait instead of queueing
  - Every call is bounded by a timeout
  - Run output is captured into bounded buffers
`;

function argumentAfter(flag: string): string | undefined {
  const index = process.argv.indexOf(flag);
  return index === -1 ? undefined : process.argv[index + 1];
}

async function main(): Promise<void> {
  if (process.argv.includes("--create-config")) {
    ConfigLoader.createSampleConfig(argumentAfter("--create-config") ?? "./devhost-bridge.json");
    process.exit(0);
  }

  if (process.argv.includes("--help") || process.argv.includes("-h")) {
    console.error(HELP);
    process.exit(0);
  }

  let config: BridgeConfig;
  if (process.argv.includes("--config")) {
    const configPath = argumentAfter("--config");
    if (!configPath) {
      console.error("Error: --config requires a path argument");
      process.exit(1);
    }
    config = ConfigLoader.loadFromFile(configPath);
  } else {
    config = ConfigLoader.load();
  }

  const service = new BridgeService(new LocalHost(config), config);
  const server = new MCPServer(service);

  const shutdown = (signal: string): void => {
    console.error(`[devhost-bridge] Received ${signal}, shutting down`);
    server
      .shutdown()
      .then(() => process.exit(0))
      .catch((error) => {
        console.error("[devhost-bridge] Error during shutdown:", error);
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  await server.start();

  // Keep process alive
  process.stdin.resume();
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
