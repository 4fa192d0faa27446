#!/usr/bin/env node
/**
 * rds-diagnostics-mcp - Command Line Interface
 *
 * Entry point for running the diagnostics server from the command line.
 */

import { fileURLToPath } from "node:url";
import { createServer } from "./server/McpServer.js";
import { RdsAdapter } from "./adapters/rds/RdsAdapter.js";
import { parseArgs, type ParsedArgs } from "./cli/args.js";
import { logger } from "./utils/logger.js";
import { mcpLogger } from "./logging/McpLogging.js";

/**
 * Main entry point
 */
export async function main(args?: ParsedArgs): Promise<void> {
  let parsed: ParsedArgs;
  try {
    parsed = args ?? parseArgs();
  } catch (error) {
    console.error(
      `Error: ${error instanceof Error ? error.message : String(error)}`,
    );
    console.error("Run with --help for usage information");
    process.exit(1);
  }

  const { config, diagnostics, logLevel, shouldExit } = parsed;
  if (shouldExit) {
    process.exit(0);
  }
  if (logLevel) {
    logger.setLevel(logLevel);
    mcpLogger.setMinLevel(logLevel === "warn" ? "warning" : logLevel);
  }

  const server = createServer(config);

  const shutdown = async (): Promise<never> => {
    console.error("\nShutting down...");
    await server.stop();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.error("Shutdown failed", { error: String(error) });
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    const adapter = new RdsAdapter(diagnostics);
    await adapter.initialize();
    server.registerAdapter(adapter);

    await server.start();
  } catch (error) {
    console.error("Fatal error:", error);
    process.exit(1);
  }
}

// Only run if this file is the main module
const isMainModule = process.argv[1] === fileURLToPath(import.meta.url);

if (isMainModule) {
  main().catch(console.error);
}
