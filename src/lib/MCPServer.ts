/**
 * MCP Server implementation for disk insights
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { AnalysisProgress } from "../interfaces/IInsightAggregator";
import { InsightsConfig } from "./ConfigLoader";
import { AnalyzerDependencies, createInsightAggregator } from "./AnalyzerRegistry";
import { SizeWalker } from "./SizeWalker";
import { MCPTools } from "./MCPTools";
import { ErrorHandler } from "./ErrorHandler";

const LOG_PREFIX = "[Disk Insights Server]";

type JsonSchema = Record<string, unknown>;

/**
 * JSON Schema for the zod types the tool schemas use
 */
export function toJsonSchema(schema: z.ZodTypeAny): JsonSchema {
  const described = (base: JsonSchema): JsonSchema =>
    schema.description ? { ...base, description: schema.description } : base;

  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return described(toJsonSchema(schema.unwrap()));
  }
  if (schema instanceof z.ZodDefault) {
    return described(toJsonSchema(schema.removeDefault()));
  }
  if (schema instanceof z.ZodString) {
    return described({ type: "string" });
  }
  if (schema instanceof z.ZodNumber) {
    return described({ type: schema.isInt ? "integer" : "number" });
  }
  if (schema instanceof z.ZodBoolean) {
    return described({ type: "boolean" });
  }
  if (schema instanceof z.ZodEnum) {
    return described({ type: "string", enum: [...schema.options] });
  }
  if (schema instanceof z.ZodNativeEnum) {
    return described({ type: "string", enum: Object.values(schema.enum) });
  }
  if (schema instanceof z.ZodArray) {
    return described({ type: "array", items: toJsonSchema(schema.element) });
  }
  if (schema instanceof z.ZodObject) {
    return described({ ...toObjectJsonSchema(schema) });
  }

  // Zod still validates what JSON Schema leaves open
  return described({});
}

/**
 * JSON Schema of a tool's argument object
 */
export function toObjectJsonSchema(schema: z.AnyZodObject): {
  type: "object";
  properties: Record<string, JsonSchema>;
  required: string[];
} {
  const properties: Record<string, JsonSchema> = {};
  const required: string[] = [];
  const shape: Record<string, z.ZodTypeAny> = schema.shape;

  for (const [key, value] of Object.entries(shape)) {
    properties[key] = toJsonSchema(value);
    if (!value.isOptional()) {
      required.push(key);
    }
  }

  return { type: "object", properties, required };
}

export class MCPServer {
  private server: Server;
  private transport: StdioServerTransport;
  private config: InsightsConfig;
  private mcpTools: MCPTools;
  private isRunning: boolean = false;

  constructor(config: InsightsConfig, deps: AnalyzerDependencies = {}) {
    this.config = config;

    // Initialize server
    this.server = new Server(
      {
        name: "disk-insights",
        version: "0.1.0",
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    const sizeWalker = deps.sizeWalker ?? new SizeWalker();
    const aggregator = createInsightAggregator(config, {
      ...deps,
      sizeWalker,
    });

    this.mcpTools = new MCPTools(aggregator, sizeWalker, {
      maxStoredScans: config.maxStoredScans,
      onProgress: (progress) => this.logProgress(progress),
    });

    // Create stdio transport
    this.transport = new StdioServerTransport();

    // Set up error handlers
    this.server.onerror = (error) => {
      console.error(`${LOG_PREFIX} Error`, error);
    };

    // Set up process signal handlers for graceful shutdown
    process.on("SIGINT", () => {
      console.error(`${LOG_PREFIX} Received SIGINT, shutting down...`);
      void this.stop();
    });
    process.on("SIGTERM", () => {
      console.error(`${LOG_PREFIX} Received SIGTERM, shutting down...`);
      void this.stop();
    });
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      throw new Error("Server is already running");
    }

    console.error(`${LOG_PREFIX} Starting Disk Insights Server v0.1.0`);
    console.error(
      `${LOG_PREFIX} Container CLI: ${this.config.containerCli}; disabled analyzers: ${
        this.config.disabledAnalyzers.join(", ") || "none"
      }`
    );

    try {
      // Register handlers
      this.registerHandlers();
      console.error(
        `${LOG_PREFIX} Registered ${MCPTools.getAllSchemas().length} MCP tools`
      );

      // Connect to stdio transport
      await this.server.connect(this.transport);
      console.error(`${LOG_PREFIX} Connected stdio transport`);

      this.isRunning = true;
      console.error(
        `${LOG_PREFIX} Server started successfully and ready to accept requests`
      );
    } catch (error) {
      console.error(`${LOG_PREFIX} Failed to start server:`, error);
      throw error;
    }
  }

  /**
   * Register MCP protocol handlers
   */
  private registerHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return {
        tools: MCPTools.getAllSchemas().map((schema) => ({
          name: schema.name,
          description: schema.description,
          inputSchema: toObjectJsonSchema(schema.inputSchema),
        })),
      };
    });

    this.server.setRequestHandler(
      CallToolRequestSchema,
      async (request, extra) => {
        const { name, arguments: args } = request.params;

        try {
          const result = await this.callTool(name, args, extra.signal);

          return {
            content: [
              {
                type: "text",
                text: JSON.stringify(result, null, 2),
              },
            ],
          };
        } catch (error) {
          ErrorHandler.logError(error, { tool: name });
          const errorResponse = ErrorHandler.toMCPError(error);

          return {
            content: [
              {
                type: "text",
                text: JSON.stringify(errorResponse, null, 2),
              },
            ],
            isError: true,
          };
        }
      }
    );
  }

  /**
   * Dispatch a tool call; arguments are validated by each tool
   */
  callTool(name: string, args: unknown, signal?: AbortSignal): Promise<unknown> {
    switch (name) {
      case "insights_list_analyzers":
        return this.mcpTools.insightsListAnalyzers(args);

      case "insights_analyze":
        return this.mcpTools.insightsAnalyze(args, signal);

      case "insights_get_scan":
        return this.mcpTools.insightsGetScan(args);

      case "insights_group_by_location":
        return this.mcpTools.insightsGroupByLocation(args);

      case "fs_folder_info":
        return this.mcpTools.fsFolderInfo(args, signal);

      case "fs_list_subdirectories":
        return this.mcpTools.fsListSubdirectories(args, signal);

      default:
        return Promise.reject(new Error(`Unknown tool: ${name}`));
    }
  }

  private logProgress(progress: AnalysisProgress): void {
    console.error(
      `${LOG_PREFIX} [${progress.percentComplete}%] ${progress.currentAnalyzer} (${progress.completedCount}/${progress.totalCount})`
    );
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      console.error(`${LOG_PREFIX} Server is not running, skipping shutdown`);
      return;
    }

    console.error(`${LOG_PREFIX} Shutting down gracefully...`);
    this.isRunning = false;

    try {
      // Close transport
      await this.transport.close();
      console.error(`${LOG_PREFIX} Transport closed`);

      // Close server
      await this.server.close();

      console.error(`${LOG_PREFIX} Shutdown complete`);
    } catch (error) {
      console.error(`${LOG_PREFIX} Error during shutdown:`, error);
    } finally {
      process.exit(0);
    }
  }

  /**
   * Get the server instance
   */
  getServer(): Server {
    return this.server;
  }

  /**
   * Check if server is running
   */
  isServerRunning(): boolean {
    return this.isRunning;
  }
}
