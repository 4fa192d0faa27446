/**
 * Tool Types
 *
 * Type definitions for MCP tools and tool filtering.
 */

import type { z } from "zod";

/**
 * Tool group identifiers
 */
export type ToolGroup =
  | "instance" // Instance lookup and description
  | "metrics" // CloudWatch point-in-time metrics
  | "logs" // Slow-query log extraction
  | "load"; // Performance Insights top load

/**
 * Per-invocation context handed to tool handlers
 */
export interface RequestContext {
  timestamp: Date;
  requestId: string;
}

/**
 * Tool filter rule
 */
export interface ToolFilterRule {
  /** Rule type: include or exclude */
  type: "include" | "exclude";

  /** Target: group name or tool name */
  target: string;

  /** Whether target is a group (true) or individual tool (false) */
  isGroup: boolean;
}

/**
 * Parsed tool filter configuration
 */
export interface ToolFilterConfig {
  /** Original filter string */
  raw: string;

  /** Parsed rules in order */
  rules: ToolFilterRule[];

  /** Set of enabled tool names after applying rules */
  enabledTools: Set<string>;
}

/**
 * MCP Tool Annotations
 *
 * Behavioral hints for AI clients. These are hints only.
 */
export interface ToolAnnotations {
  /** Tool does not modify state */
  readOnlyHint?: boolean;

  /** Tool may permanently delete/destroy data */
  destructiveHint?: boolean;

  /** Repeated calls with same args produce same result */
  idempotentHint?: boolean;

  /** Tool interacts with external services */
  openWorldHint?: boolean;
}

/**
 * Tool definition for registration
 */
export interface ToolDefinition {
  /** Unique tool name */
  name: string;

  /** Human-readable description */
  description: string;

  /** Tool group for filtering */
  group: ToolGroup;

  /** Zod schema for input validation */
  inputSchema: z.ZodType;

  /** Tool handler function */
  handler: (params: unknown, context: RequestContext) => Promise<unknown>;

  /** Human-readable display title (defaults to name if not provided) */
  title?: string;

  /** Behavioral hints for AI clients */
  annotations?: ToolAnnotations;
}

/**
 * Structured failure returned from every tool boundary
 */
export interface ToolErrorResult {
  status: "error";
  message: string;
  code?: string;
}
