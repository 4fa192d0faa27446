/**
 * Error Types
 *
 * Custom error classes for rds-diagnostics-mcp.
 */

/**
 * Base error class for rds-diagnostics-mcp
 */
export class RdsMcpError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "RdsMcpError";
  }
}

/**
 * Invalid command line or environment configuration
 */
export class ConfigurationError extends RdsMcpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONFIGURATION_ERROR", details);
    this.name = "ConfigurationError";
  }
}

/**
 * Failure at the control-plane, metrics, load or inference boundary
 */
export class UpstreamError extends RdsMcpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "UPSTREAM_ERROR", details);
    this.name = "UpstreamError";
  }
}

/**
 * Slow-query parsing requested for an engine without a parser
 */
export class UnsupportedEngineError extends RdsMcpError {
  constructor(public readonly engine: string) {
    super(`Unsupported database engine: ${engine}`, "UNSUPPORTED_ENGINE", {
      engine,
    });
    this.name = "UnsupportedEngineError";
  }
}

/**
 * Validation error for tool input parameters
 */
export class ValidationError extends RdsMcpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", details);
    this.name = "ValidationError";
  }
}

/**
 * A database name that resolves to no instance, or an instance that
 * disappeared after resolution
 */
export class InstanceNotFoundError extends RdsMcpError {
  constructor(
    message = "No matching RDS instance found",
    details?: Record<string, unknown>,
  ) {
    super(message, "INSTANCE_NOT_FOUND", details);
    this.name = "InstanceNotFoundError";
  }
}
