/**
 * MCP Protocol Logging
 *
 * Forwards notable server events (directory refreshes, tool failures) to
 * connected clients as `notifications/message`. The stderr logger stays
 * the primary log; this is a best-effort mirror.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { logger } from "../utils/logger.js";

/**
 * MCP log levels (RFC 5424 severities)
 */
export type McpLogLevel =
  | "debug"
  | "info"
  | "notice"
  | "warning"
  | "error"
  | "critical"
  | "alert"
  | "emergency";

const LEVEL_PRIORITY: Record<McpLogLevel, number> = {
  debug: 0,
  info: 1,
  notice: 2,
  warning: 3,
  error: 4,
  critical: 5,
  alert: 6,
  emergency: 7,
};

class McpLogger {
  private server: McpServer | null = null;
  private loggerName = "rds-diagnostics-mcp";
  private minLevel: McpLogLevel = "info";

  setServer(server: McpServer | null): void {
    this.server = server;
  }

  setLoggerName(name: string): void {
    this.loggerName = name;
  }

  setMinLevel(level: McpLogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): McpLogLevel {
    return this.minLevel;
  }

  log(level: McpLogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.server || LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    // Rejects while no transport is connected
    this.server.server
      .sendLoggingMessage({
        level,
        logger: this.loggerName,
        data: data ? { message, ...data } : message,
      })
      .catch((error: unknown) => {
        logger.debug("MCP log notification not delivered", {
          error: error instanceof Error ? error.message : String(error),
        });
      });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  notice(message: string, data?: Record<string, unknown>): void {
    this.log("notice", message, data);
  }

  warning(message: string, data?: Record<string, unknown>): void {
    this.log("warning", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }
}

/**
 * Singleton MCP logger; the server attaches itself on construction.
 */
export const mcpLogger = new McpLogger();
