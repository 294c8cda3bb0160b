/**
 * MCP Server - MCP surface of the devhost bridge
 *
 * Registers the bridge tools with the SDK server, runs every call inside
 * its own request scope, publishes the cached build and test results as
 * resources and handles server lifecycle.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { BridgeService } from "./BridgeService";
import { BridgeTools } from "./BridgeTools";
import { RequestContext } from "./RequestContext";

export const SERVER_NAME = "devhost-bridge";
export const SERVER_VERSION = "0.1.0";

/**
 * Cached results published as read-only resources
 */
export const RESOURCES = [
  { uri: "devhost://build/last", name: "Last Build Result" },
  { uri: "devhost://test/last", name: "Last Test Results" },
  { uri: "devhost://diagnostics", name: "Current Diagnostics" },
] as const;

interface JsonSchemaProperty {
  type?: "string" | "number" | "integer" | "boolean";
  enum?: string[];
  description?: string;
}

export interface ToolInputJsonSchema {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
}

/**
 * Derive the JSON Schema of a tool input from its zod shape
 */
export function toJsonSchema(schema: z.AnyZodObject): ToolInputJsonSchema {
  const properties: Record<string, JsonSchemaProperty> = {};
  const required: string[] = [];

  for (const [key, field] of Object.entries(schema.shape)) {
    if (!(field instanceof z.ZodType)) {
      continue;
    }
    let inner: z.ZodTypeAny = field;
    let optional = false;
    let description = field.description;
    while (inner instanceof z.ZodOptional || inner instanceof z.ZodDefault) {
      optional = true;
      inner = inner instanceof z.ZodOptional ? inner.unwrap() : inner.removeDefault();
      description = description ?? inner.description;
    }

    const property: JsonSchemaProperty = {};
    if (inner instanceof z.ZodString) {
      property.type = "string";
    } else if (inner instanceof z.ZodNumber) {
      property.type = inner.isInt ? "integer" : "number";
    } else if (inner instanceof z.ZodBoolean) {
      property.type = "boolean";
    } else if (inner instanceof z.ZodEnum) {
      property.type = "string";
      property.enum = [...inner.options];
    }
    if (description) {
      property.description = description;
    }

    properties[key] = property;
    if (!optional) {
      required.push(key);
    }
  }

  return { type: "object", properties, required };
}

/**
 * devhost bridge MCP server
 */
export class MCPServer {
  private server: Server;
  private tools: BridgeTools;
  private isRunning: boolean = false;

  constructor(private readonly service: BridgeService) {
    this.tools = new BridgeTools(service);

    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
          resources: {},
        },
      }
    );

    this.server.onerror = (error) => {
      console.error("[MCP Server Error]", error);
    };

    this.registerHandlers();
  }

  /**
   * Start the bridge and connect the transport (stdio by default)
   */
  async start(transport: Transport = new StdioServerTransport()): Promise<void> {
    if (this.isRunning) {
      throw new Error("Server is already running");
    }

    console.error(`[MCP Server] Starting ${SERVER_NAME} v${SERVER_VERSION}`);

    try {
      this.service.start();
      await this.server.connect(transport);
      this.isRunning = true;
      console.error(
        `[MCP Server] Ready with ${this.tools.list().length} tools`
      );
    } catch (error) {
      console.error("[MCP Server] Failed to start server:", error);
      throw error;
    }
  }

  private registerHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.tools.list().map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: toJsonSchema(tool.inputSchema),
      })),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;

      const result = await RequestContext.run(
        () => this.tools.call(name, args),
        name
      );

      return {
        content: [
          {
            type: "text" as const,
            text: JSON.stringify(result.payload, null, 2),
          },
        ],
        isError: result.isError,
      };
    });

    this.server.setRequestHandler(ListResourcesRequestSchema, async () => ({
      resources: RESOURCES.map((resource) => ({
        ...resource,
        mimeType: "application/json",
      })),
    }));

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      const { uri } = request.params;
      return {
        contents: [
          {
            uri,
            mimeType: "application/json",
            text: JSON.stringify(this.readResource(uri), null, 2),
          },
        ],
      };
    });
  }

  private readResource(uri: string): object {
    switch (uri) {
      case "devhost://build/last":
        return this.service.builds.status() ?? { status: "no_build_yet" };
      case "devhost://test/last":
        return this.service.tests.lastResult() ?? { status: "no_tests_run_yet" };
      case "devhost://diagnostics":
        return this.service.builds.diagnostics();
      default:
        throw new McpError(ErrorCode.InvalidParams, `Unknown resource: ${uri}`);
    }
  }

  /**
   * Stop the bridge and close the transport
   */
  async shutdown(): Promise<void> {
    if (!this.isRunning) {
      console.error("[MCP Server] Server is not running, skipping shutdown");
      return;
    }

    console.error("[MCP Server] Shutting down gracefully...");
    this.isRunning = false;

    try {
      await this.service.shutdown();
      await this.server.close();
      console.error("[MCP Server] Shutdown complete");
    } catch (error) {
      console.error("[MCP Server] Error during shutdown:", error);
      throw error;
    }
  }

  isServerRunning(): boolean {
    return this.isRunning;
  }
}
