/**
 * Server Configuration Types
 *
 * Type definitions for MCP server transport and configuration.
 */

/**
 * Transport type for MCP communication
 */
export type TransportType = "stdio";

/**
 * Name resolution strategy
 */
export type ResolverStrategy = "inference" | "match";

/**
 * AWS connection settings. Credentials fall back to the SDK's default
 * provider chain when the keys are absent.
 */
export interface AwsConfig {
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
}

/**
 * Inference service settings
 */
export interface InferenceConfig {
  apiKey?: string;
  model: string;
}

/**
 * MCP Server configuration
 */
export interface McpServerConfig {
  /** Server name */
  name: string;

  /** Server version */
  version: string;

  /** Transport configuration */
  transport: TransportType;

  /** Tool filtering configuration */
  toolFilter?: string;
}

/**
 * Diagnostics adapter configuration
 */
export interface DiagnosticsConfig {
  aws: AwsConfig;
  inference: InferenceConfig;

  /** Explicit strategy; derived from the inference key when omitted */
  resolver?: ResolverStrategy;

  /** Instance directory TTL in seconds */
  cacheTtlSeconds: number;

  /** Maximum memoized name resolutions */
  resolutionCacheSize: number;
}
