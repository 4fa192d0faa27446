/**
 * rds-diagnostics-mcp - Public API
 *
 * Exports the main components for programmatic use.
 */

// Server
export { McpServer, createServer, DEFAULT_CONFIG } from "./server/McpServer.js";

// Adapters
export { DatabaseAdapter } from "./adapters/DatabaseAdapter.js";
export {
  RdsAdapter,
  selectResolverStrategy,
} from "./adapters/rds/RdsAdapter.js";
export type { RdsUpstreams } from "./adapters/rds/RdsAdapter.js";
export { getRdsTools, toErrorResult } from "./adapters/rds/tools/index.js";
export type { RdsToolServices } from "./adapters/rds/tools/index.js";

// Diagnostics pipeline
export { InstanceDirectory } from "./adapters/rds/directory/InstanceDirectory.js";
export { NameResolver } from "./adapters/rds/resolver/NameResolver.js";
export { bestMatch } from "./adapters/rds/resolver/bestMatch.js";
export {
  DeterministicMatchStrategy,
  InferenceMatchStrategy,
} from "./adapters/rds/resolver/strategies.js";
export type { MatchStrategy } from "./adapters/rds/resolver/strategies.js";
export { LogFetcher } from "./adapters/rds/logs/LogFetcher.js";
export { SlowQueryCollector } from "./adapters/rds/logs/SlowQueryCollector.js";
export { parseMySqlSlowLog } from "./adapters/rds/logs/mysqlSlowLog.js";
export { parsePostgresLog } from "./adapters/rds/logs/postgresLog.js";
export {
  normalizeStatement,
  normalizeRecord,
} from "./adapters/rds/logs/normalizer.js";
export { rankSlowQueries } from "./adapters/rds/logs/ranking.js";

// Upstream clients
export {
  AwsClientManager,
  RdsControlPlane,
  CloudWatchMetrics,
  PerformanceInsightsLoad,
} from "./aws/index.js";
export { AnthropicInferenceClient } from "./inference/index.js";

// Filtering
export {
  TOOL_GROUPS,
  getAllToolNames,
  getToolGroup,
  parseToolFilter,
  isToolEnabled,
  filterTools,
  getToolFilterFromEnv,
  calculateTokenSavings,
  getFilterSummary,
  getToolGroupInfo,
} from "./filtering/ToolFilter.js";

// Types
export type {
  EngineFamily,
  Engine,
  InstanceEndpoint,
  InstanceDirectoryEntry,
  DirectorySnapshot,
  DirectoryListing,
  SlowQueryRecord,
  DurationUnit,
  RankedSlowQueries,
  LogFileInfo,
  ControlPlaneApi,
  MetricsApi,
  LoadApi,
  InferenceClient,
  TransportType,
  ResolverStrategy,
  AwsConfig,
  InferenceConfig,
  McpServerConfig,
  DiagnosticsConfig,
  RequestContext,
  ToolGroup,
  ToolFilterRule,
  ToolFilterConfig,
  ToolDefinition,
  ToolErrorResult,
} from "./types/index.js";

// Errors
export {
  RdsMcpError,
  ConfigurationError,
  UpstreamError,
  UnsupportedEngineError,
  ValidationError,
  InstanceNotFoundError,
} from "./types/index.js";

// Logger
export { logger } from "./utils/logger.js";
