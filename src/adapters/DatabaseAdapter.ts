/**
 * rds-diagnostics-mcp - Database Adapter Interface
 *
 * Abstract base class for diagnostics adapters. An adapter owns its
 * upstream clients and contributes tool definitions to the MCP server.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { logger } from "../utils/logger.js";
import type {
  RequestContext,
  ToolDefinition,
  ToolErrorResult,
  ToolGroup,
} from "../types/index.js";

function isToolErrorResult(value: unknown): value is ToolErrorResult {
  return (
    typeof value === "object" &&
    value !== null &&
    "status" in value &&
    value.status === "error" &&
    "message" in value
  );
}

/**
 * Abstract base class for diagnostics adapters
 */
export abstract class DatabaseAdapter {
  /** Adapter type identifier */
  abstract readonly type: string;

  /** Human-readable adapter name */
  abstract readonly name: string;

  /** Adapter version */
  abstract readonly version: string;

  protected initialized = false;

  // =========================================================================
  // Lifecycle
  // =========================================================================

  /**
   * Build upstream clients. No network call is made here.
   */
  abstract initialize(): Promise<void>;

  /**
   * Release upstream clients
   */
  abstract shutdown(): Promise<void>;

  isInitialized(): boolean {
    return this.initialized;
  }

  // =========================================================================
  // MCP Registration
  // =========================================================================

  /**
   * Get supported tool groups for this adapter
   */
  abstract getSupportedToolGroups(): ToolGroup[];

  /**
   * Get all tool definitions for this adapter
   */
  abstract getToolDefinitions(): ToolDefinition[];

  /**
   * Register tools with the MCP server
   * @param enabledTools - Tool names left enabled by filtering
   */
  registerTools(server: McpServer, enabledTools: Set<string>): void {
    const tools = this.getToolDefinitions();
    let registered = 0;

    for (const tool of tools) {
      if (enabledTools.has(tool.name)) {
        this.registerTool(server, tool);
        registered++;
      }
    }

    logger.info(
      `Registered ${registered}/${tools.length} tools from ${this.name}`,
    );
  }

  /**
   * Register a single tool; results are returned as JSON text content
   */
  protected registerTool(server: McpServer, tool: ToolDefinition): void {
    server.registerTool(
      tool.name,
      {
        title: tool.title,
        description: tool.description,
        inputSchema: tool.inputSchema,
        annotations: tool.annotations,
      },
      async (params: unknown) => {
        const context = this.createContext();
        logger.debug(`Invoking ${tool.name}`, { requestId: context.requestId });
        const result = await tool.handler(params, context);
        return {
          content: [
            {
              type: "text" as const,
              text:
                typeof result === "string"
                  ? result
                  : JSON.stringify(result, null, 2),
            },
          ],
          isError: isToolErrorResult(result),
        };
      },
    );
  }

  /**
   * Create a request context for tool execution
   */
  createContext(requestId?: string): RequestContext {
    return {
      timestamp: new Date(),
      requestId: requestId ?? crypto.randomUUID(),
    };
  }

  /**
   * Get adapter info for logging/debugging
   */
  getInfo(): Record<string, unknown> {
    return {
      type: this.type,
      name: this.name,
      version: this.version,
      initialized: this.initialized,
      toolGroups: this.getSupportedToolGroups(),
    };
  }
}
