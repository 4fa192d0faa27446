/**
 * rds-diagnostics-mcp - Type Definitions
 *
 * Barrel export that re-exports all types from the modules directory.
 */

// Instance directory types
export type {
  EngineFamily,
  Engine,
  InstanceEndpoint,
  InstanceDirectoryEntry,
  DirectorySnapshot,
  DirectoryListing,
} from "./modules/instance.js";

// Slow-query log types
export type {
  SlowQueryRecord,
  DurationUnit,
  RankedSlowQueries,
  LogFileInfo,
} from "./modules/logs.js";

// Upstream service interfaces
export type {
  LogFilePage,
  LogPortion,
  ControlPlaneApi,
  MetricQuery,
  MetricsApi,
  LoadKey,
  LoadApi,
  CompletionOptions,
  InferenceClient,
} from "./modules/upstream.js";

// Server configuration types
export type {
  TransportType,
  ResolverStrategy,
  AwsConfig,
  InferenceConfig,
  McpServerConfig,
  DiagnosticsConfig,
} from "./modules/server.js";

// Tool and filtering types
export type {
  ToolGroup,
  RequestContext,
  ToolFilterRule,
  ToolFilterConfig,
  ToolAnnotations,
  ToolDefinition,
  ToolErrorResult,
} from "./modules/tools.js";

// Error classes
export {
  RdsMcpError,
  ConfigurationError,
  UpstreamError,
  UnsupportedEngineError,
  ValidationError,
  InstanceNotFoundError,
} from "./modules/errors.js";
