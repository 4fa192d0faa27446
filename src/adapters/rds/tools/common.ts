/**
 * rds-diagnostics-mcp - Shared Tool Helpers
 */

import type { z } from "zod";
import type {
  ControlPlaneApi,
  InstanceDirectoryEntry,
  LoadApi,
  MetricsApi,
  ToolErrorResult,
} from "../../../types/index.js";
import {
  InstanceNotFoundError,
  RdsMcpError,
  ValidationError,
} from "../../../types/index.js";
import { logger } from "../../../utils/logger.js";
import { mcpLogger } from "../../../logging/McpLogging.js";
import type { NameResolver } from "../resolver/NameResolver.js";
import type { SlowQueryCollector } from "../logs/SlowQueryCollector.js";

/**
 * Collaborators the tools call into
 */
export interface RdsToolServices {
  resolver: Pick<NameResolver, "resolve">;
  controlPlane: ControlPlaneApi;
  metrics: MetricsApi;
  load: LoadApi;
  collector: Pick<SlowQueryCollector, "collect">;
  now: () => number;
}

/**
 * Parse tool input, raising ValidationError with every issue listed
 */
export function parseParams<T extends z.ZodType>(
  schema: T,
  params: unknown,
): z.output<T> {
  const result = schema.safeParse(params);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0
        ? `${issue.path.map(String).join(".")}: ${issue.message}`
        : issue.message,
    );
    throw new ValidationError(`Invalid input: ${issues.join("; ")}`);
  }
  return result.data;
}

/**
 * Resolve a free-text name to an identifier
 * @throws InstanceNotFoundError when nothing matches
 */
export async function resolveIdentifier(
  services: RdsToolServices,
  databaseName: string,
): Promise<string> {
  const identifier = await services.resolver.resolve(databaseName);
  if (identifier === undefined) {
    throw new InstanceNotFoundError(undefined, { databaseName });
  }
  return identifier;
}

/**
 * Resolve a name and describe the instance it points at
 */
export async function describeResolved(
  services: RdsToolServices,
  databaseName: string,
): Promise<InstanceDirectoryEntry> {
  const identifier = await resolveIdentifier(services, databaseName);
  const instance = await services.controlPlane.describeInstance(identifier);
  if (!instance) {
    throw new InstanceNotFoundError(`RDS instance not found: ${identifier}`, {
      databaseName,
      identifier,
    });
  }
  return instance;
}

/**
 * Convert any failure into the structured error every tool returns
 */
export function toErrorResult(
  toolName: string,
  error: unknown,
): ToolErrorResult {
  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof RdsMcpError) {
    logger.warn(`Tool ${toolName} failed`, { code: error.code, error: message });
    mcpLogger.warning(`Tool ${toolName} failed`, { code: error.code, message });
    return { status: "error", message, code: error.code };
  }

  logger.error(`Tool ${toolName} failed unexpectedly`, { error: message });
  mcpLogger.error(`Tool ${toolName} failed`, { message });
  return { status: "error", message };
}

/**
 * Run a tool body so that nothing escapes the tool boundary
 */
export async function runTool<T>(
  toolName: string,
  body: () => Promise<T>,
): Promise<T | ToolErrorResult> {
  try {
    return await body();
  } catch (error) {
    return toErrorResult(toolName, error);
  }
}
