/**
 * rds-diagnostics-mcp - MCP Server
 *
 * Main MCP server implementation with adapter registration,
 * tool filtering, and transport handling.
 */

import { McpServer as SdkMcpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { DatabaseAdapter } from "../adapters/DatabaseAdapter.js";
import type {
  McpServerConfig,
  ToolFilterConfig,
  TransportType,
} from "../types/index.js";
import { parseToolFilter, getFilterSummary } from "../filtering/ToolFilter.js";
import { logger } from "../utils/logger.js";
import { mcpLogger } from "../logging/McpLogging.js";

/**
 * Default server configuration
 */
export const DEFAULT_CONFIG: McpServerConfig = {
  name: "rds-diagnostics-mcp",
  version: "0.1.0",
  transport: "stdio",
};

/**
 * RDS Diagnostics MCP Server
 */
export class McpServer {
  private server: SdkMcpServer;
  private adapters = new Map<string, DatabaseAdapter>();
  private config: McpServerConfig;
  private toolFilter: ToolFilterConfig;
  private started = false;

  constructor(config: Partial<McpServerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.toolFilter = parseToolFilter(this.config.toolFilter);

    this.server = new SdkMcpServer(
      {
        name: this.config.name,
        version: this.config.version,
      },
      {
        capabilities: { logging: {} },
      },
    );
    mcpLogger.setServer(this.server);
    mcpLogger.setLoggerName(this.config.name);

    if (this.toolFilter.rules.length > 0) {
      logger.info(getFilterSummary(this.toolFilter));
    }
  }

  /**
   * Register an adapter and its enabled tools
   */
  registerAdapter(adapter: DatabaseAdapter, alias?: string): void {
    const key = alias ?? `${adapter.type}:default`;

    if (this.adapters.has(key)) {
      logger.warn(`Adapter already registered: ${key}`);
      return;
    }

    this.adapters.set(key, adapter);
    adapter.registerTools(this.server, this.toolFilter.enabledTools);

    logger.info(`Registered adapter: ${adapter.name} (${key})`);
  }

  getAdapter(key: string): DatabaseAdapter | undefined {
    return this.adapters.get(key);
  }

  getAdapters(): Map<string, DatabaseAdapter> {
    return this.adapters;
  }

  /**
   * Start the MCP server
   */
  async start(): Promise<void> {
    if (this.started) {
      logger.warn("Server already started");
      return;
    }

    logger.info("Starting MCP server...");

    try {
      await this.startTransport(this.config.transport);
      this.started = true;
      logger.info("Server started successfully");
    } catch (error) {
      logger.error("Failed to start server", { error: String(error) });
      throw error;
    }
  }

  private async startTransport(transport: TransportType): Promise<void> {
    switch (transport) {
      case "stdio": {
        await this.server.connect(new StdioServerTransport());
        break;
      }
    }
  }

  /**
   * Stop the MCP server
   */
  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }

    logger.info("Stopping MCP server...");

    for (const [key, adapter] of this.adapters) {
      try {
        await adapter.shutdown();
        logger.info(`Shut down adapter: ${key}`);
      } catch (error) {
        logger.error(`Error shutting down adapter ${key}`, {
          error: String(error),
        });
      }
    }

    mcpLogger.setServer(null);
    await this.server.close();
    this.started = false;
    logger.info("Server stopped");
  }

  getConfig(): McpServerConfig {
    return { ...this.config };
  }

  getToolFilter(): ToolFilterConfig {
    return this.toolFilter;
  }

  isRunning(): boolean {
    return this.started;
  }

  /**
   * Get the underlying MCP SDK server instance
   */
  getSdkServer(): SdkMcpServer {
    return this.server;
  }
}

/**
 * Create a new MCP server instance
 */
export function createServer(config: Partial<McpServerConfig> = {}): McpServer {
  return new McpServer(config);
}
